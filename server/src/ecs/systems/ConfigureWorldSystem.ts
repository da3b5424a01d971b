// ============================================
// Configure World System
// Engine built-in generic network configuration
// ============================================

import { buildEndpoints, formatEndpoint, Resources, type World } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import { closeNetworkState, type NetworkState } from '../../net/NetworkDriver';
import { logger } from '../../logger';
import type { System } from './types';

/** Endpoint the engine falls back to when nothing configured the world */
export const ENGINE_DEFAULT_ENDPOINTS = buildEndpoints('127.0.0.1', 7979);

/**
 * ConfigureWorldSystem - generic role configuration shipped with the engine
 *
 * Dials (client kinds) or listens (server kinds) on the engine default
 * endpoint unless the world already has a network resource. Worlds built by
 * the bootstrap never contain it; it stays registered for worlds created
 * through other paths.
 */
export class ConfigureWorldSystem implements System {
  private opened: NetworkState | undefined;
  private configured = false;

  constructor(
    readonly name: string,
    private readonly mode: 'connect' | 'listen',
    private readonly context: BootstrapContext
  ) {}

  update(world: World): void {
    if (this.configured) return;
    this.configured = true;
    if (world.hasResource(Resources.Network)) return;

    const { driver } = this.context;
    if (this.mode === 'connect') {
      const endpoint = ENGINE_DEFAULT_ENDPOINTS.connect;
      this.opened = { mode: 'connect', endpoint, connection: driver.connect(endpoint) };
    } else {
      const endpoint = ENGINE_DEFAULT_ENDPOINTS.listen;
      this.opened = { mode: 'listen', endpoint, listener: driver.listen(endpoint) };
    }
    world.setResource<NetworkState>(Resources.Network, this.opened);

    logger.warn(
      { event: 'generic_world_configuration', world: world.name, system: this.name, endpoint: formatEndpoint(this.opened.endpoint) },
      `${this.name} configured ${world.name} with the engine default endpoint`
    );
  }

  onDestroy(): void {
    if (this.opened) closeNetworkState(this.opened);
  }
}
