// ============================================
// Simulation Engine
// What the bootstrap needs from the host runtime
// ============================================

import { World, type SimulationFilterMask, type WorldKind } from '#shared';
import type { SystemCatalogEntry } from '../ecs/systems/types';
import { PlayerLoop } from './PlayerLoop';
import { SystemRegistry, type CatalogQueryOptions } from './SystemRegistry';

/**
 * The engine contract consumed by the world factory and the orchestrator.
 * The bootstrap never inspects the catalog beyond these calls.
 */
export interface SimulationEngine {
  getCatalog(filter: SimulationFilterMask, options?: CatalogQueryOptions): SystemCatalogEntry[];
  getEntry(id: string): SystemCatalogEntry;
  sort(entries: readonly SystemCatalogEntry[]): SystemCatalogEntry[];
  allocateWorld(name: string, kind: WorldKind): World;
  registerWorld(world: World): void;
}

/**
 * In-process engine: a system registry plus one player loop
 */
export class Engine implements SimulationEngine {
  readonly registry: SystemRegistry;
  readonly loop: PlayerLoop;

  constructor(registry = new SystemRegistry(), loop = new PlayerLoop()) {
    this.registry = registry;
    this.loop = loop;
  }

  getCatalog(filter: SimulationFilterMask, options?: CatalogQueryOptions): SystemCatalogEntry[] {
    return this.registry.getCatalog(filter, options);
  }

  getEntry(id: string): SystemCatalogEntry {
    return this.registry.getEntry(id);
  }

  sort(entries: readonly SystemCatalogEntry[]): SystemCatalogEntry[] {
    return this.registry.sort(entries);
  }

  allocateWorld(name: string, kind: WorldKind): World {
    return new World(name, kind);
  }

  registerWorld(world: World): void {
    this.loop.registerWorld(world);
  }
}
