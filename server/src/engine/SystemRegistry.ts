// ============================================
// System Registry
// Catalog of every system the engine can put in a world
// ============================================

import { CatalogRetrievalError, describeFilter, type SimulationFilterMask } from '#shared';
import type { SystemCatalogEntry } from '../ecs/systems/types';

export interface CatalogQueryOptions {
  /** Include application-added ('user') systems. Default true. */
  includeUserSystems?: boolean;
}

/**
 * SystemRegistry - owns the system catalog
 *
 * Entries keep their registration order; sort() orders them for execution.
 */
export class SystemRegistry {
  private entries: SystemCatalogEntry[] = [];
  private byId = new Map<string, SystemCatalogEntry>();

  /**
   * Register a catalog entry. Ids are unique.
   */
  register(entry: SystemCatalogEntry): void {
    if (this.byId.has(entry.id)) {
      throw new Error(`System ${entry.id} is already registered`);
    }
    this.entries.push(entry);
    this.byId.set(entry.id, entry);
  }

  /**
   * Every auto-created entry that belongs to any of the filter's simulation kinds.
   * Throws CatalogRetrievalError when nothing matches.
   */
  getCatalog(filter: SimulationFilterMask, options: CatalogQueryOptions = {}): SystemCatalogEntry[] {
    const includeUserSystems = options.includeUserSystems ?? true;
    const catalog = this.entries.filter(
      (entry) =>
        entry.autoCreate &&
        (entry.filter & filter) !== 0 &&
        (includeUserSystems || entry.origin !== 'user')
    );

    if (catalog.length === 0) {
      throw new CatalogRetrievalError(`No systems registered for ${describeFilter(filter)}`);
    }
    return catalog;
  }

  /**
   * Look up one entry by id, whether or not it is auto-created
   */
  getEntry(id: string): SystemCatalogEntry {
    const entry = this.byId.get(id);
    if (!entry) {
      throw new CatalogRetrievalError(`System ${id} is not registered`);
    }
    return entry;
  }

  /**
   * Order entries for execution: priority ascending, registration order on ties.
   * Returns a new array.
   */
  sort(entries: readonly SystemCatalogEntry[]): SystemCatalogEntry[] {
    const order = (entry: SystemCatalogEntry) => {
      const index = this.entries.indexOf(entry);
      return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };
    return [...entries].sort((a, b) => a.priority - b.priority || order(a) - order(b));
  }

  get size(): number {
    return this.entries.length;
  }
}
