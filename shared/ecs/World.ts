// ============================================
// ECS World
// ============================================

import type { System, WorldKind } from './types';

let nextWorldId = 1;

/**
 * World - an isolated execution context.
 *
 * Manages:
 * - Identity (id, name, kind)
 * - The system set, attached exactly once and frozen afterwards
 * - Resources (per-world singleton data: network state, scenes, time)
 * - Disposal (systems get onDestroy once)
 */
export class World {
  readonly id: number;
  readonly name: string;
  readonly kind: WorldKind;

  private systems: readonly System[] = [];
  private systemsAttached = false;
  private disposed = false;

  // Resources - singleton data that isn't tied to entities
  // Examples: network connection, scene registry, network time
  private resources = new Map<string, unknown>();

  constructor(name: string, kind: WorldKind) {
    this.id = nextWorldId++;
    this.name = name;
    this.kind = kind;
  }

  // ============================================
  // Systems
  // ============================================

  /**
   * Attach the world's system set.
   * Throws on a second call: the set is immutable once attached.
   */
  attachSystems(systems: readonly System[]): void {
    if (this.systemsAttached) {
      throw new Error(`World ${this.name} (#${this.id}) already has its systems attached`);
    }
    this.systems = Object.freeze([...systems]);
    this.systemsAttached = true;
  }

  getSystems(): readonly System[] {
    return this.systems;
  }

  getSystemNames(): string[] {
    return this.systems.map((system) => system.name);
  }

  get hasSystems(): boolean {
    return this.systemsAttached;
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  /**
   * Set a resource value.
   * Resources are singleton data not tied to entities.
   */
  setResource<T>(key: string, value: T): void {
    this.resources.set(key, value);
  }

  /**
   * Get a resource value.
   * Returns undefined if not set.
   */
  getResource<T>(key: string): T | undefined {
    return this.resources.get(key) as T | undefined;
  }

  hasResource(key: string): boolean {
    return this.resources.has(key);
  }

  deleteResource(key: string): void {
    this.resources.delete(key);
  }

  // ============================================
  // Lifecycle
  // ============================================

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Dispose the world: every system's onDestroy runs once, in reverse order,
   * then resources are dropped. Safe to call twice.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const system of [...this.systems].reverse()) {
      system.onDestroy?.(this);
    }
    this.resources.clear();
  }
}
