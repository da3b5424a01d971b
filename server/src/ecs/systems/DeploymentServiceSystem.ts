// ============================================
// Deployment Service System
// Answers configuration requests from other nodes
// ============================================

import {
  configRequestSchema,
  DeploymentEvents,
  lookupNodeConfiguration,
  Resources,
  type ConfigRejectedMessage,
  type ConfigResponseMessage,
  type World,
} from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import type { Connection, Listener, NetworkState } from '../../net/NetworkDriver';
import { logDeploymentExchange } from '../../logger';
import type { System } from './types';

/**
 * DeploymentServiceSystem - the deployment world's server half
 *
 * Listens on the deployment listen address and answers each request from
 * the deployment plan: the node's own entry, else the "*" entry, else a
 * rejection.
 */
export class DeploymentServiceSystem implements System {
  readonly name = 'DeploymentServiceSystem';
  private listener: Listener | undefined;

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (this.listener) return;

    const endpoint = this.context.deploymentListenAddress;
    if (!endpoint) {
      throw new Error(`No deployment listen address configured for ${world.name}`);
    }

    const listener = this.context.driver.listen(endpoint);
    this.listener = listener;
    world.setResource<NetworkState>(Resources.Network, { mode: 'listen', endpoint, listener });

    listener.onConnection((connection) => {
      connection.on(DeploymentEvents.RequestConfig, (payload) => this.answer(connection, payload));
    });
  }

  private answer(connection: Connection, payload: unknown): void {
    const parsed = configRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const rejection: ConfigRejectedMessage = { nodeId: '', reason: 'Malformed configuration request' };
      connection.send(DeploymentEvents.Rejected, rejection);
      logDeploymentExchange('config_rejected', connection.id, rejection.reason);
      return;
    }

    const { nodeId } = parsed.data;
    const config = lookupNodeConfiguration(this.context.config.deploymentPlan, nodeId);
    if (!config) {
      const rejection: ConfigRejectedMessage = { nodeId, reason: `No configuration for node ${nodeId}` };
      connection.send(DeploymentEvents.Rejected, rejection);
      logDeploymentExchange('config_rejected', nodeId, rejection.reason);
      return;
    }

    const response: ConfigResponseMessage = { nodeId, config };
    connection.send(DeploymentEvents.Config, response);
    logDeploymentExchange('config_served', nodeId, config.playType);
  }

  onDestroy(): void {
    this.listener?.close();
  }
}
