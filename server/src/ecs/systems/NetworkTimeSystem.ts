// ============================================
// Network Time System
// ============================================

import { Resources, type World } from '#shared';
import type { System } from './types';

export interface NetworkTime {
  tick: number;
  elapsed: number;
}

/**
 * NetworkTimeSystem - advances the world's tick counter and elapsed seconds
 */
export class NetworkTimeSystem implements System {
  readonly name = 'NetworkTimeSystem';

  update(world: World, deltaTime: number): void {
    let time = world.getResource<NetworkTime>(Resources.NetworkTime);
    if (!time) {
      time = { tick: 0, elapsed: 0 };
      world.setResource(Resources.NetworkTime, time);
    }
    time.tick++;
    time.elapsed += deltaTime;
  }
}
