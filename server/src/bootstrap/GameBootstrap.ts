// ============================================
// Game Bootstrap
// Reads configuration and sets up either the deployment world
// or the local game worlds
// ============================================

import {
  buildEndpoints,
  PlayType,
  RoleUnavailableError,
  StreamingRole,
  WorldKind,
  type ResolvedConfig,
  type World,
} from '#shared';
import { resolveConfig } from '../config/resolveConfig';
import type { SimulationEngine } from '../engine/Engine';
import type { NetworkDriver } from '../net/NetworkDriver';
import { logBootstrapStarted, logEndpointsConfigured, logger, logWorldSkipped } from '../logger';
import { BootstrapContext, type FatalErrorHandler } from './BootstrapContext';
import { DeploymentMode } from './catalogFilter';
import { createDeploymentWorld } from './deploymentWorld';
import {
  createFromPlan,
  isSideAvailable,
  planClientWorld,
  planServerWorld,
  planStreamedClientWorld,
  planThinClientWorlds,
  WorldNames,
  type WorldFactoryDeps,
  type WorldPlan,
  type WorldSide,
} from './worldFactory';

export interface SetupWorldsOptions {
  playType: PlayType;
  streamingRole: StreamingRole;
  numThinClients: number;
  autoConnect: boolean;
  /** Whether a streamed guest world also gets the client auto-connect system */
  streamedClientAutoConnect: boolean;
}

export interface SkippedWorld {
  name: string;
  kind: WorldKind;
  error: RoleUnavailableError;
}

export interface BootstrapResult {
  mode: 'deployment' | 'local';
  /** Worlds created by this call, in creation order */
  created: World[];
  /** Roles this build target cannot host */
  skipped: SkippedWorld[];
}

/**
 * A role the play type asks for, before its catalog is retrieved
 */
interface RoleRequest {
  name: string;
  kind: WorldKind;
  side: WorldSide;
  plan: () => WorldPlan[];
}

/**
 * GameBootstrap - the role orchestrator
 *
 * initialize() runs once at process start. setupWorldsFromConfig() is also
 * the re-entry point once a deployment service has answered.
 */
export class GameBootstrap {
  readonly context: BootstrapContext;
  private readonly engine: SimulationEngine;

  constructor(engine: SimulationEngine, context: BootstrapContext) {
    this.engine = engine;
    this.context = context;
    context.setLocalSetupHandler((config) => this.setupWorldsFromConfig(config).created);
  }

  private get deps(): WorldFactoryDeps {
    return { context: this.context, engine: this.engine };
  }

  /**
   * Deployment mode builds the single deployment world; local mode builds
   * every game world the config asks for.
   */
  initialize(): BootstrapResult {
    const { config } = this.context;
    logBootstrapStarted(config);

    if (config.useRemoteConfig || config.isDeploymentService) {
      const existing = this.context.getDeploymentWorld();
      if (existing) {
        logger.info(
          { event: 'deployment_world_exists', world: existing.name, worldId: existing.id },
          'Deployment world already exists, not creating another'
        );
        return { mode: 'deployment', created: [], skipped: [] };
      }

      // Requesting wins when a node is configured as both
      const mode = config.useRemoteConfig ? DeploymentMode.RequestConfig : DeploymentMode.ServeConfig;
      const world = createDeploymentWorld(this.deps, mode);
      this.context.worlds.add(world);
      return { mode: 'deployment', created: [world], skipped: [] };
    }

    return this.setupWorldsFromConfig(config);
  }

  /**
   * Configure the game server endpoints, then create the local worlds.
   * An unparseable server address fails here, before any world exists.
   */
  setupWorldsFromConfig(config: ResolvedConfig): BootstrapResult {
    const endpoints = buildEndpoints(config.serverHost, config.serverPort);
    this.context.setServerEndpoints(endpoints);
    logEndpointsConfigured('server', endpoints);

    return this.setupWorlds({
      playType: config.playType,
      streamingRole: config.streamingRole,
      numThinClients: config.numThinClients,
      autoConnect: config.autoConnect,
      streamedClientAutoConnect: config.streamedClientAutoConnect,
    });
  }

  /**
   * Create the worlds for a play type.
   *
   * Every catalog is retrieved before the first world is created, so a
   * catalog failure leaves nothing behind. Roles the build target cannot
   * host are reported and skipped; the others still run.
   */
  setupWorlds(options: SetupWorldsOptions): BootstrapResult {
    const { playType, numThinClients, autoConnect } = options;
    // StreamedClient is not a no-op: it forces the Guest role and builds the streaming guest world
    const streamingRole = playType === PlayType.StreamedClient ? StreamingRole.Guest : options.streamingRole;
    this.context.streamingRole = streamingRole;

    logger.info(
      { event: 'setup_worlds', playType, streamingRole, numThinClients, autoConnect },
      `Setting up worlds with playType ${playType} and streaming role ${streamingRole}`
    );

    const requests: RoleRequest[] = [];

    // Client
    if (playType === PlayType.Client || playType === PlayType.ClientAndServer || playType === PlayType.StreamedClient) {
      if (streamingRole === StreamingRole.Guest) {
        requests.push({
          name: WorldNames.StreamingGuest,
          kind: WorldKind.Game,
          side: 'client',
          plan: () => [planStreamedClientWorld(this.engine, options.streamedClientAutoConnect)],
        });
      } else {
        requests.push({
          name: WorldNames.Client,
          kind: WorldKind.GameClient,
          side: 'client',
          plan: () => [planClientWorld(this.engine, autoConnect)],
        });
      }
    }

    // Thin clients
    if (playType === PlayType.ThinClient && numThinClients > 0) {
      requests.push({
        name: WorldNames.ThinClient,
        kind: WorldKind.GameThinClient,
        side: 'client',
        plan: () => planThinClientWorlds(this.engine, numThinClients, autoConnect),
      });
    }

    // Server
    if (playType === PlayType.Server || playType === PlayType.ClientAndServer) {
      requests.push({
        name: WorldNames.Server,
        kind: WorldKind.GameServer,
        side: 'server',
        plan: () => [planServerWorld(this.engine, autoConnect)],
      });
    }

    const { buildTarget } = this.context.config;
    const skipped: SkippedWorld[] = [];
    const plans: WorldPlan[] = [];

    for (const request of requests) {
      if (!isSideAvailable(buildTarget, request.side)) {
        const error = new RoleUnavailableError(
          request.name,
          `Cannot create ${request.side} world ${request.name} on a ${buildTarget} build`
        );
        logWorldSkipped(request.name, request.kind, error);
        skipped.push({ name: request.name, kind: request.kind, error });
        continue;
      }
      plans.push(...request.plan());
    }

    const created: World[] = [];
    for (const plan of plans) {
      const world = createFromPlan(this.deps, plan);
      this.context.worlds.add(world);
      created.push(world);
    }

    return { mode: 'local', created, skipped };
  }
}

export interface StartBootstrapOptions {
  argv: readonly string[];
  engine: SimulationEngine;
  driver: NetworkDriver;
  onFatal?: FatalErrorHandler;
}

/**
 * Resolve configuration and run the orchestrator once.
 * ConfigResolutionError propagates before any world exists.
 */
export function startBootstrap(options: StartBootstrapOptions): { bootstrap: GameBootstrap; result: BootstrapResult } {
  const config = resolveConfig(options.argv);
  const context = new BootstrapContext({ config, driver: options.driver, onFatal: options.onFatal });
  const bootstrap = new GameBootstrap(options.engine, context);
  const result = bootstrap.initialize();
  return { bootstrap, result };
}
