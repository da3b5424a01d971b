// ============================================
// Bootstrap Configuration Types
// Shared by the resolver, the orchestrator and the deployment exchange
// ============================================

import { z } from 'zod';

export const PlayType = {
  ClientAndServer: 'ClientAndServer',
  Client: 'Client',
  Server: 'Server',
  StreamedClient: 'StreamedClient',
  ThinClient: 'ThinClient',
} as const;

export type PlayType = (typeof PlayType)[keyof typeof PlayType];

export const StreamingRole = {
  Host: 'Host',
  Guest: 'Guest',
} as const;

export type StreamingRole = (typeof StreamingRole)[keyof typeof StreamingRole];

/**
 * What the binary was built to host.
 * DedicatedServer cannot create client worlds, ClientOnly cannot create server worlds.
 */
export const BuildTarget = {
  ClientAndServer: 'ClientAndServer',
  DedicatedServer: 'DedicatedServer',
  ClientOnly: 'ClientOnly',
} as const;

export type BuildTarget = (typeof BuildTarget)[keyof typeof BuildTarget];

export const EmulationType = {
  None: 'None',
  Playback: 'Playback',
  Simulation: 'Simulation',
} as const;

export type EmulationType = (typeof EmulationType)[keyof typeof EmulationType];

// Lower-cased alias -> play type
const PLAY_TYPE_ALIASES: Record<string, PlayType> = {
  clientandserver: PlayType.ClientAndServer,
  serverandclient: PlayType.ClientAndServer,
  clientserver: PlayType.ClientAndServer,
  serverclient: PlayType.ClientAndServer,
  client: PlayType.Client,
  server: PlayType.Server,
  streamedclient: PlayType.StreamedClient,
  streamclient: PlayType.StreamedClient,
  guestclient: PlayType.StreamedClient,
  thinclient: PlayType.ThinClient,
};

/**
 * Parse a play type name or one of its aliases, case-insensitively.
 * Returns undefined for unknown names.
 */
export function parsePlayType(value: string): PlayType | undefined {
  return PLAY_TYPE_ALIASES[value.trim().toLowerCase()];
}

export const portSchema = z.number().int().min(0).max(65535);

export const playTypeSchema = z.string().transform((value, ctx) => {
  const playType = parsePlayType(value);
  if (!playType) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown play type "${value}"` });
    return z.NEVER;
  }
  return playType;
});

/**
 * Configuration a deployment service hands to one node.
 * Validated on both ends: plan file load and wire receipt.
 */
export const remoteConfigurationSchema = z.object({
  playType: playTypeSchema,
  streamingRole: z.nativeEnum(StreamingRole).default(StreamingRole.Host),
  serverHost: z.string(),
  serverPort: portSchema,
  numThinClients: z.number().int().min(0).default(0),
  emulationType: z.nativeEnum(EmulationType).optional(),
});

export type RemoteConfiguration = z.output<typeof remoteConfigurationSchema>;

/** Node id -> configuration; the "*" entry answers unknown nodes */
export const deploymentPlanSchema = z.object({
  nodes: z.record(z.string(), remoteConfigurationSchema),
});

export type DeploymentPlan = z.output<typeof deploymentPlanSchema>;

export const WILDCARD_NODE = '*';

/**
 * Fully resolved configuration. Frozen; created once per process start.
 */
export interface ResolvedConfig {
  readonly playType: PlayType;
  readonly streamingRole: StreamingRole;
  readonly serverHost: string;
  readonly serverPort: number;
  readonly numThinClients: number;
  readonly useRemoteConfig: boolean;
  readonly isDeploymentService: boolean;
  readonly deploymentHost: string;
  readonly deploymentPort: number;
  readonly nodeId: string;
  readonly autoConnect: boolean;
  readonly streamedClientAutoConnect: boolean;
  readonly buildTarget: BuildTarget;
  readonly tickRate: number;
  readonly emulationType: EmulationType;
  readonly scenes: readonly string[];
  readonly deploymentPlan: DeploymentPlan;
}

/**
 * Look up the configuration for a node in a plan
 */
export function lookupNodeConfiguration(
  plan: DeploymentPlan,
  nodeId: string
): RemoteConfiguration | undefined {
  return plan.nodes[nodeId] ?? plan.nodes[WILDCARD_NODE];
}

/**
 * Merge configuration received from a deployment service into the local one.
 * The result never asks for remote configuration again.
 */
export function applyRemoteConfiguration(
  base: ResolvedConfig,
  remote: RemoteConfiguration
): ResolvedConfig {
  return Object.freeze({
    ...base,
    playType: remote.playType,
    streamingRole: remote.streamingRole,
    serverHost: remote.serverHost,
    serverPort: remote.serverPort,
    numThinClients: remote.numThinClients,
    emulationType: remote.emulationType ?? base.emulationType,
    useRemoteConfig: false,
    isDeploymentService: false,
  });
}
