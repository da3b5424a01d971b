import type { World, WorldKind } from '#shared';

/**
 * Every world this process created, in creation order.
 * Append-only; read by monitoring and shutdown.
 */
export class WorldRegistry implements Iterable<World> {
  private worlds: World[] = [];

  add(world: World): void {
    if (this.worlds.includes(world)) {
      throw new Error(`World ${world.name} (#${world.id}) is already in the registry`);
    }
    this.worlds.push(world);
  }

  all(): readonly World[] {
    return this.worlds;
  }

  byKind(kind: WorldKind): World[] {
    return this.worlds.filter((world) => world.kind === kind);
  }

  get size(): number {
    return this.worlds.length;
  }

  [Symbol.iterator](): Iterator<World> {
    return this.worlds[Symbol.iterator]();
  }
}
