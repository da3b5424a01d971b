// ============================================
// Deployment Receive System
// Requests this node's configuration from the deployment service
// ============================================

import {
  applyRemoteConfiguration,
  configRejectedSchema,
  configResponseSchema,
  ConfigResolutionError,
  DeploymentEvents,
  Resources,
  type ConfigRequestMessage,
  type ResolvedConfig,
  type World,
} from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import type { Connection, NetworkState } from '../../net/NetworkDriver';
import { logDeploymentExchange } from '../../logger';
import type { System } from './types';

export type DeploymentStatus =
  | { state: 'requesting'; nodeId: string }
  | { state: 'configured'; nodeId: string; config: ResolvedConfig; worlds: number }
  | { state: 'rejected'; nodeId: string; reason: string };

/**
 * DeploymentReceiveSystem - the deployment world's client half
 *
 * On its first tick it dials the deployment connect address and asks for
 * this node's configuration. The first valid answer is merged into the local
 * config and handed back to the bootstrap, which creates the game worlds.
 * Malformed answers, rejections and setup failures are fatal.
 */
export class DeploymentReceiveSystem implements System {
  readonly name = 'DeploymentReceiveSystem';
  private connection: Connection | undefined;
  private applied = false;

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (this.connection) return;

    const endpoint = this.context.deploymentConnectAddress;
    if (!endpoint) {
      throw new Error(`No deployment connect address configured for ${world.name}`);
    }

    const { nodeId } = this.context.config;
    const connection = this.context.driver.connect(endpoint);
    this.connection = connection;
    world.setResource<NetworkState>(Resources.Network, { mode: 'connect', endpoint, connection });
    world.setResource<DeploymentStatus>(Resources.Deployment, { state: 'requesting', nodeId });

    connection.on(DeploymentEvents.Config, (payload) => this.handleConfig(world, payload));
    connection.on(DeploymentEvents.Rejected, (payload) => this.handleRejected(world, payload));

    const request = () => {
      const message: ConfigRequestMessage = { nodeId };
      connection.send(DeploymentEvents.RequestConfig, message);
      logDeploymentExchange('config_requested', nodeId);
    };
    connection.onStatusChange((status) => {
      if (status === 'connected' && !this.applied) request();
    });
    if (connection.status === 'connected') request();
  }

  private handleConfig(world: World, payload: unknown): void {
    if (this.applied) return;
    const { nodeId } = this.context.config;

    const parsed = configResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.context.fail(
        new ConfigResolutionError(`Malformed configuration from deployment service: ${parsed.error.message}`)
      );
      return;
    }
    this.applied = true;
    logDeploymentExchange('config_received', nodeId, parsed.data.config.playType);

    const config = applyRemoteConfiguration(this.context.config, parsed.data.config);
    try {
      const worlds = this.context.requestLocalSetup(config);
      world.setResource<DeploymentStatus>(Resources.Deployment, {
        state: 'configured',
        nodeId,
        config,
        worlds: worlds.length,
      });
    } catch (error) {
      this.context.fail(error);
    }
  }

  private handleRejected(world: World, payload: unknown): void {
    if (this.applied) return;
    const { nodeId } = this.context.config;

    const parsed = configRejectedSchema.safeParse(payload);
    const reason = parsed.success ? parsed.data.reason : 'unreadable rejection';
    logDeploymentExchange('config_rejected', nodeId, reason);
    world.setResource<DeploymentStatus>(Resources.Deployment, { state: 'rejected', nodeId, reason });

    this.context.fail(new ConfigResolutionError(`Deployment service rejected node ${nodeId}: ${reason}`));
  }

  onDestroy(): void {
    this.connection?.close();
  }
}
