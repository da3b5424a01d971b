// ============================================
// Authoring Scene Loader System
// ============================================

import { Resources, type World } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import { logger } from '../../logger';
import type { SceneRegistry } from './SceneSystem';
import type { System } from './types';

/**
 * AuthoringSceneLoaderSystem - registers the configured authoring scenes once
 *
 * Needs SceneSystem to have created the registry (lower priority runs first).
 */
export class AuthoringSceneLoaderSystem implements System {
  readonly name = 'AuthoringSceneLoaderSystem';
  private loaded = false;

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (this.loaded) return;

    const scenes = world.getResource<SceneRegistry>(Resources.Scenes);
    if (!scenes) {
      throw new Error(`${world.name} has no scene registry; SceneSystem must run before ${this.name}`);
    }
    this.loaded = true;

    for (const name of this.context.config.scenes) {
      scenes.load(name);
    }

    logger.info(
      { event: 'authoring_scenes_loaded', world: world.name, scenes: scenes.getSceneNames() },
      `Loaded ${scenes.size} authoring scenes into ${world.name}`
    );
  }
}
