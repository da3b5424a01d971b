// ============================================
// Configuration Resolver
// Command line (and MULTIPLAY_* environment) -> ResolvedConfig
// ============================================

import { readFileSync } from 'fs';
import yargs from 'yargs';
import { z } from 'zod';
import {
  BuildTarget,
  ConfigResolutionError,
  deploymentPlanSchema,
  EmulationType,
  PlayType,
  playTypeSchema,
  portSchema,
  StreamingRole,
  type DeploymentPlan,
  type ResolvedConfig,
} from '#shared';

export const ENV_PREFIX = 'MULTIPLAY';

export const DEFAULT_SERVER_PORT = 7979;
export const DEFAULT_DEPLOYMENT_PORT = 7980;

const cmdArgsSchema = z.object({
  playType: playTypeSchema,
  streamingRole: z.nativeEnum(StreamingRole),
  serverUrl: z.string(),
  serverPort: portSchema,
  numThinClients: z.number().int().min(0),
  remoteConfig: z.boolean(),
  deploymentService: z.boolean(),
  deploymentUrl: z.string(),
  deploymentPort: portSchema,
  nodeId: z.string().min(1),
  autoConnect: z.boolean(),
  streamedClientAutoConnect: z.boolean(),
  buildTarget: z.nativeEnum(BuildTarget),
  tickRate: z.number().positive().max(1000),
  emulationType: z.nativeEnum(EmulationType),
  scenes: z.array(z.string().min(1)),
  deploymentConfig: z.string().optional(),
});

function createParser(args: string[]) {
  return yargs(args)
    .env(ENV_PREFIX)
    .options({
      'play-type': {
        type: 'string',
        default: PlayType.ClientAndServer,
        describe: 'ClientAndServer, Client, Server, StreamedClient or ThinClient (aliases accepted)',
      },
      'streaming-role': { type: 'string', default: StreamingRole.Host, describe: 'Host or Guest' },
      'server-url': { type: 'string', default: '127.0.0.1', describe: 'Game server host' },
      'server-port': { type: 'number', default: DEFAULT_SERVER_PORT },
      'num-thin-clients': { type: 'number', default: 0 },
      'remote-config': { type: 'boolean', default: false, describe: 'Fetch configuration from the deployment service' },
      'deployment-service': { type: 'boolean', default: false, describe: 'Serve configuration to other nodes' },
      'deployment-url': { type: 'string', default: '127.0.0.1' },
      'deployment-port': { type: 'number', default: DEFAULT_DEPLOYMENT_PORT },
      'node-id': { type: 'string', default: 'node-0', describe: 'Identity presented to the deployment service' },
      'auto-connect': { type: 'boolean', default: true },
      'streamed-client-auto-connect': { type: 'boolean', default: false },
      'build-target': { type: 'string', default: BuildTarget.ClientAndServer },
      'tick-rate': { type: 'number', default: 60 },
      'emulation-type': { type: 'string', default: EmulationType.None },
      scenes: { type: 'string', array: true, default: ['MainScene'] },
      'deployment-config': { type: 'string', describe: 'Deployment plan JSON (deployment service only)' },
    })
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw new ConfigResolutionError(error?.message ?? message, { cause: error });
    });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate a deployment plan file
 */
export function loadDeploymentPlan(path: string): DeploymentPlan {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigResolutionError(`Cannot read deployment plan ${path}`, { cause: error });
  }

  const result = deploymentPlanSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigResolutionError(`Invalid deployment plan ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Resolve the process configuration.
 * Throws ConfigResolutionError on unknown flags, invalid values or an unreadable plan.
 */
export function resolveConfig(args: readonly string[]): ResolvedConfig {
  const parsed = createParser([...args]).parseSync();

  const result = cmdArgsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigResolutionError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const options = result.data;

  const deploymentPlan = options.deploymentConfig
    ? loadDeploymentPlan(options.deploymentConfig)
    : { nodes: {} };

  return Object.freeze({
    playType: options.playType,
    streamingRole: options.streamingRole,
    serverHost: options.serverUrl,
    serverPort: options.serverPort,
    numThinClients: options.numThinClients,
    useRemoteConfig: options.remoteConfig,
    isDeploymentService: options.deploymentService,
    deploymentHost: options.deploymentUrl,
    deploymentPort: options.deploymentPort,
    nodeId: options.nodeId,
    autoConnect: options.autoConnect,
    streamedClientAutoConnect: options.streamedClientAutoConnect,
    buildTarget: options.buildTarget,
    tickRate: options.tickRate,
    emulationType: options.emulationType,
    scenes: Object.freeze([...options.scenes]),
    deploymentPlan,
  });
}
