// ============================================
// Connection Monitor System
// ============================================

import { formatEndpoint, Resources, type World } from '#shared';
import { describeNetworkStatus, type NetworkState } from '../../net/NetworkDriver';
import { logConnectionStatus } from '../../logger';
import type { System } from './types';

/**
 * ConnectionMonitorSystem - logs every change of the world's network status
 *
 * Priority: 900 (runs last, after anything that may have opened a socket)
 */
export class ConnectionMonitorSystem implements System {
  readonly name = 'ConnectionMonitorSystem';
  private lastStatus: string | undefined;

  update(world: World): void {
    const state = world.getResource<NetworkState>(Resources.Network);
    if (!state) return;

    const status = describeNetworkStatus(state);
    if (status === this.lastStatus) return;

    this.lastStatus = status;
    logConnectionStatus(world, formatEndpoint(state.endpoint), status);
  }
}
