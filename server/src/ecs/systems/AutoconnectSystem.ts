// ============================================
// Autoconnect Systems
// Dial or listen on the endpoints the bootstrap computed
// ============================================

import { Resources, type World } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import { closeNetworkState, type NetworkState } from '../../net/NetworkDriver';
import type { System } from './types';

/**
 * ClientAutoconnectSystem - connects a client-side world to the game server
 *
 * Runs once, on the world's first tick. Uses the context's client connect
 * address; never falls back to another endpoint.
 */
export class ClientAutoconnectSystem implements System {
  readonly name = 'ClientAutoconnectSystem';
  private opened: NetworkState | undefined;
  private attempted = false;

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (this.attempted) return;
    this.attempted = true;

    const endpoint = this.context.clientConnectAddress;
    if (!endpoint) {
      throw new Error(`No client connect address configured for ${world.name}`);
    }

    this.opened = { mode: 'connect', endpoint, connection: this.context.driver.connect(endpoint) };
    world.setResource<NetworkState>(Resources.Network, this.opened);
  }

  onDestroy(): void {
    if (this.opened) closeNetworkState(this.opened);
  }
}

/**
 * ServerAutolistenSystem - opens the game server's listen endpoint
 */
export class ServerAutolistenSystem implements System {
  readonly name = 'ServerAutolistenSystem';
  private opened: NetworkState | undefined;
  private attempted = false;

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (this.attempted) return;
    this.attempted = true;

    const endpoint = this.context.serverListenAddress;
    if (!endpoint) {
      throw new Error(`No server listen address configured for ${world.name}`);
    }

    this.opened = { mode: 'listen', endpoint, listener: this.context.driver.listen(endpoint) };
    world.setResource<NetworkState>(Resources.Network, this.opened);
  }

  onDestroy(): void {
    if (this.opened) closeNetworkState(this.opened);
  }
}
