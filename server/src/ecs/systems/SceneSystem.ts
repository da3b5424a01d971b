// ============================================
// Scene System
// Scene GUID management
// ============================================

import { v4 as uuidv4 } from 'uuid';
import { Resources, type World } from '#shared';
import type { System } from './types';

/**
 * Scene name <-> GUID mapping for one world
 */
export class SceneRegistry {
  private guidsByName = new Map<string, string>();
  private namesByGuid = new Map<string, string>();

  /**
   * Register a scene and return its GUID. Loading a name twice returns the same GUID.
   */
  load(name: string): string {
    const existing = this.guidsByName.get(name);
    if (existing) return existing;

    const guid = uuidv4();
    this.guidsByName.set(name, guid);
    this.namesByGuid.set(guid, name);
    return guid;
  }

  getGuid(name: string): string | undefined {
    return this.guidsByName.get(name);
  }

  getName(guid: string): string | undefined {
    return this.namesByGuid.get(guid);
  }

  getSceneNames(): string[] {
    return Array.from(this.guidsByName.keys());
  }

  get size(): number {
    return this.guidsByName.size;
  }
}

/**
 * SceneSystem - owns the world's SceneRegistry resource
 *
 * Priority: 10 (before anything loads scenes)
 */
export class SceneSystem implements System {
  readonly name = 'SceneSystem';

  update(world: World): void {
    if (!world.hasResource(Resources.Scenes)) {
      world.setResource(Resources.Scenes, new SceneRegistry());
    }
  }
}
