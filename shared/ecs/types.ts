// ============================================
// ECS Core Types
// ============================================

import type { World } from './World';

/**
 * World kind - the role a world plays inside the process.
 * Using const object for type safety while keeping string values.
 */
export const WorldKind = {
  Game: 'Game',
  GameClient: 'GameClient',
  GameServer: 'GameServer',
  GameThinClient: 'GameThinClient',
  DeploymentClient: 'DeploymentClient',
  DeploymentServer: 'DeploymentServer',
} as const;

export type WorldKind = (typeof WorldKind)[keyof typeof WorldKind];

/**
 * Simulation filter flags.
 * A catalog entry declares which simulation kinds it belongs to as a bitmask;
 * catalog queries match on any shared bit.
 */
export const SimulationFilter = {
  ClientSimulation: 1 << 0,
  ServerSimulation: 1 << 1,
  ThinClientSimulation: 1 << 2,
  Presentation: 1 << 3,
} as const;

export type SimulationFilterMask = number;

/**
 * Names of the set bits, for logging
 */
export function describeFilter(mask: SimulationFilterMask): string {
  const names = Object.entries(SimulationFilter)
    .filter(([, bit]) => (mask & bit) !== 0)
    .map(([name]) => name);
  return names.length > 0 ? names.join('|') : 'None';
}

/**
 * Base System interface.
 * Every behavior attached to a world implements this.
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every tick of the world's player loop
   * @param deltaTime Time since last tick in seconds
   */
  update(world: World, deltaTime: number): void;

  /** Called once when the world is disposed */
  onDestroy?(world: World): void;
}

/**
 * Resource keys for world.getResource/setResource.
 * Resources are per-world singleton data.
 */
export const Resources = {
  Network: 'Network',
  NetworkTime: 'NetworkTime',
  Scenes: 'Scenes',
  Streaming: 'Streaming',
  Emulation: 'Emulation',
  Deployment: 'Deployment',
} as const;
