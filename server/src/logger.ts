import pino from 'pino';
import {
  describeError,
  formatEndpoint,
  type EndpointPair,
  type ResolvedConfig,
  type World,
  type WorldKind,
} from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'bootstrap.log')
 * @param component - Component name for filtering (e.g., 'bootstrap', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Bootstrap events (config, endpoints, world creation, deployment exchange)
export const logger = createLogger('bootstrap.log', 'bootstrap');

// Player loop timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Bootstrap Logging
// ============================================

export function logBootstrapStarted(config: ResolvedConfig) {
  logger.info(
    {
      event: 'bootstrap_started',
      playType: config.playType,
      streamingRole: config.streamingRole,
      numThinClients: config.numThinClients,
      useRemoteConfig: config.useRemoteConfig,
      isDeploymentService: config.isDeploymentService,
      buildTarget: config.buildTarget,
      nodeId: config.nodeId,
    },
    `Bootstrapping node ${config.nodeId} as ${config.playType}`
  );
}

export function logBootstrapFailed(error: unknown) {
  logger.error({ event: 'bootstrap_failed', ...describeError(error) }, 'Bootstrap failed');
}

export function logEndpointsConfigured(service: 'server' | 'deployment', endpoints: EndpointPair) {
  logger.info(
    {
      event: 'endpoints_configured',
      service,
      listen: formatEndpoint(endpoints.listen),
      connect: formatEndpoint(endpoints.connect),
    },
    `${service} endpoints: listen ${formatEndpoint(endpoints.listen)}, connect ${formatEndpoint(endpoints.connect)}`
  );
}

export function logCatalogFiltered(role: string, before: number, after: number) {
  logger.debug(
    { event: 'catalog_filtered', role, before, after },
    `Filtered ${role} catalog: ${before} -> ${after} systems`
  );
}

export function logWorldCreated(world: World) {
  logger.info(
    {
      event: 'world_created',
      worldId: world.id,
      world: world.name,
      kind: world.kind,
      systems: world.getSystemNames(),
    },
    `Created ${world.kind} world ${world.name} with ${world.getSystems().length} systems`
  );
}

export function logWorldSkipped(name: string, kind: WorldKind, error: unknown) {
  logger.warn(
    { event: 'world_skipped', world: name, kind, ...describeError(error) },
    `Skipped ${kind} world ${name}`
  );
}

export function logDefaultWorldSet(world: World) {
  logger.debug(
    { event: 'default_world_set', worldId: world.id, world: world.name },
    `Default injection world is ${world.name}`
  );
}

// ============================================
// Network Logging
// ============================================

export function logConnectionStatus(world: World, endpoint: string, status: string) {
  logger.info(
    { event: 'connection_status', worldId: world.id, world: world.name, endpoint, status },
    `${world.name} ${endpoint}: ${status}`
  );
}

export function logDeploymentExchange(
  event: 'config_requested' | 'config_received' | 'config_served' | 'config_rejected',
  nodeId: string,
  detail?: string
) {
  const level = event === 'config_rejected' ? 'warn' : 'info';
  logger[level](
    { event: `deployment_${event}`, nodeId, detail },
    `Deployment ${event.replace('_', ' ')} for node ${nodeId}${detail ? `: ${detail}` : ''}`
  );
}
