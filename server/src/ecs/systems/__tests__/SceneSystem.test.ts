// ============================================
// Scene Systems Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { Resources, World, WorldKind } from '#shared';
import { SceneRegistry, SceneSystem } from '../SceneSystem';
import { AuthoringSceneLoaderSystem } from '../AuthoringSceneLoaderSystem';
import { createTestBootstrap } from '../../../__tests__/testUtils';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('SceneRegistry', () => {
  it('assigns a v4 GUID per scene', () => {
    const registry = new SceneRegistry();
    const guid = registry.load('Lobby');

    expect(guid).toMatch(UUID_PATTERN);
    expect(registry.getGuid('Lobby')).toBe(guid);
    expect(registry.getName(guid)).toBe('Lobby');
  });

  it('returns the same GUID when a scene is loaded twice', () => {
    const registry = new SceneRegistry();
    expect(registry.load('Lobby')).toBe(registry.load('Lobby'));
    expect(registry.size).toBe(1);
  });

  it('gives different scenes different GUIDs', () => {
    const registry = new SceneRegistry();
    expect(registry.load('Lobby')).not.toBe(registry.load('Arena'));
    expect(registry.getSceneNames()).toEqual(['Lobby', 'Arena']);
  });

  it('returns undefined for unknown scenes', () => {
    const registry = new SceneRegistry();
    expect(registry.getGuid('Lobby')).toBeUndefined();
    expect(registry.getName('00000000-0000-4000-8000-000000000000')).toBeUndefined();
  });
});

describe('SceneSystem', () => {
  it('creates the registry once', () => {
    const world = new World('W', WorldKind.Game);
    const system = new SceneSystem();

    system.update(world);
    const registry = world.getResource<SceneRegistry>(Resources.Scenes);
    system.update(world);

    expect(registry).toBeInstanceOf(SceneRegistry);
    expect(world.getResource(Resources.Scenes)).toBe(registry);
  });
});

describe('AuthoringSceneLoaderSystem', () => {
  it('loads the configured scenes into the registry once', () => {
    const { context } = createTestBootstrap({ scenes: ['Lobby', 'Arena'] });
    const world = new World('DeploymentWorld', WorldKind.DeploymentServer);
    new SceneSystem().update(world);
    const loader = new AuthoringSceneLoaderSystem(context);

    loader.update(world);
    const registry = world.getResource<SceneRegistry>(Resources.Scenes);
    const lobby = registry?.getGuid('Lobby');
    loader.update(world);

    expect(registry?.getSceneNames()).toEqual(['Lobby', 'Arena']);
    expect(registry?.getGuid('Lobby')).toBe(lobby);
  });

  it('needs the scene registry to exist', () => {
    const { context } = createTestBootstrap();
    const world = new World('DeploymentWorld', WorldKind.DeploymentServer);

    expect(() => new AuthoringSceneLoaderSystem(context).update(world)).toThrow(
      'DeploymentWorld has no scene registry; SceneSystem must run before AuthoringSceneLoaderSystem'
    );
  });

  it('runs after SceneSystem in a deployment world', () => {
    const { bootstrap, context, engine } = createTestBootstrap({ isDeploymentService: true, scenes: ['Lobby'] });
    bootstrap.initialize();

    engine.loop.tick(0.016);

    const registry = context.getDeploymentWorld()?.getResource<SceneRegistry>(Resources.Scenes);
    expect(registry?.getSceneNames()).toEqual(['Lobby']);
  });
});
