// ============================================
// GameBootstrap Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  AddressParseError,
  BuildTarget,
  CatalogRetrievalError,
  ConfigResolutionError,
  PlayType,
  RoleUnavailableError,
  SimulationFilter,
  StreamingRole,
  WorldKind,
} from '#shared';
import { startBootstrap } from '../GameBootstrap';
import { Engine } from '../../engine/Engine';
import {
  createTestBootstrap,
  createTestEngine,
  InMemoryNetworkDriver,
} from '../../__tests__/testUtils';
import { logWorldSkipped } from '../../logger';

const names = (worlds: readonly { name: string }[]) => worlds.map((world) => world.name);

describe('GameBootstrap', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('local mode', () => {
    it('ClientAndServer creates a client and a server world', () => {
      const { bootstrap, context, engine } = createTestBootstrap();

      const result = bootstrap.initialize();

      expect(result.mode).toBe('local');
      expect(names(result.created)).toEqual(['ClientWorld', 'ServerWorld']);
      expect(result.created.map((world) => world.kind)).toEqual([WorldKind.GameClient, WorldKind.GameServer]);
      expect(result.skipped).toEqual([]);
      expect(names(context.worlds.all())).toEqual(['ClientWorld', 'ServerWorld']);
      expect(names(engine.loop.getWorlds())).toEqual(['ClientWorld', 'ServerWorld']);
    });

    it('first created world becomes the default', () => {
      const { bootstrap, context } = createTestBootstrap();
      const { created } = bootstrap.initialize();
      expect(context.getDefaultWorld()).toBe(created[0]);
    });

    it('configures both server endpoints from host and port', () => {
      const { bootstrap, context } = createTestBootstrap({ serverHost: '192.168.1.20', serverPort: 9000 });

      bootstrap.initialize();

      expect(context.clientConnectAddress).toEqual({ family: 'ipv4', address: '192.168.1.20', port: 9000 });
      expect(context.serverListenAddress).toEqual({ family: 'ipv4', address: '0.0.0.0', port: 9000 });
      expect(context.deploymentConnectAddress).toBeUndefined();
    });

    it('Client creates only the client world', () => {
      const { bootstrap } = createTestBootstrap({ playType: PlayType.Client });
      expect(names(bootstrap.initialize().created)).toEqual(['ClientWorld']);
    });

    it('Server creates only the server world', () => {
      const { bootstrap, context } = createTestBootstrap({ playType: PlayType.Server });
      const { created } = bootstrap.initialize();
      expect(names(created)).toEqual(['ServerWorld']);
      expect(context.getDefaultWorld()?.name).toBe('ServerWorld');
    });

    it('ThinClient creates the requested number of thin client worlds', () => {
      const { bootstrap, context } = createTestBootstrap({ playType: PlayType.ThinClient, numThinClients: 3 });

      const { created } = bootstrap.initialize();

      expect(names(created)).toEqual(['ThinClientWorld0', 'ThinClientWorld1', 'ThinClientWorld2']);
      expect(context.getDefaultWorld()?.name).toBe('ThinClientWorld0');
    });

    it('five auto-connecting thin clients each get exactly one auto-connect system', () => {
      const { bootstrap } = createTestBootstrap({ playType: PlayType.ThinClient, numThinClients: 5, autoConnect: true });

      const { created } = bootstrap.initialize();

      expect(created).toHaveLength(5);
      for (const world of created) {
        const systemNames = world.getSystemNames();
        expect(world.kind).toBe(WorldKind.GameThinClient);
        expect(systemNames.filter((name) => name === 'ClientAutoconnectSystem')).toHaveLength(1);
        expect(systemNames.filter((name) => name.startsWith('Configure'))).toEqual([]);
      }
    });

    it('ThinClient with zero thin clients creates nothing', () => {
      const { bootstrap, context } = createTestBootstrap({ playType: PlayType.ThinClient, numThinClients: 0 });

      expect(bootstrap.initialize().created).toEqual([]);
      expect(context.getDefaultWorld()).toBeUndefined();
    });

    it('ignores the thin client count for other play types', () => {
      const { bootstrap } = createTestBootstrap({ playType: PlayType.Client, numThinClients: 4 });
      expect(names(bootstrap.initialize().created)).toEqual(['ClientWorld']);
    });

    it('StreamedClient creates the streaming guest world', () => {
      const { bootstrap, context } = createTestBootstrap({ playType: PlayType.StreamedClient });

      const { created } = bootstrap.initialize();

      expect(names(created)).toEqual(['StreamingGuestWorld']);
      expect(created[0]?.kind).toBe(WorldKind.Game);
      expect(created[0]?.getSystemNames()).toEqual(['MultiplayInitSystem', 'EmulationInitSystem']);
      expect(context.streamingRole).toBe(StreamingRole.Guest);
    });

    it('streaming guest world auto-connects only when configured to', () => {
      const { bootstrap } = createTestBootstrap({
        playType: PlayType.StreamedClient,
        streamedClientAutoConnect: true,
      });
      expect(bootstrap.initialize().created[0]?.getSystemNames()).toEqual([
        'ClientAutoconnectSystem',
        'MultiplayInitSystem',
        'EmulationInitSystem',
      ]);
    });

    it('a Guest streaming role turns the client world into a streaming guest world', () => {
      const { bootstrap } = createTestBootstrap({ streamingRole: StreamingRole.Guest });
      expect(names(bootstrap.initialize().created)).toEqual(['StreamingGuestWorld', 'ServerWorld']);
    });

    it('auto-connect off leaves the connection systems out', () => {
      const { bootstrap } = createTestBootstrap({ autoConnect: false });
      const { created } = bootstrap.initialize();
      expect(created.map((world) => world.getSystemNames())).toEqual([
        ['SceneSystem', 'NetworkTimeSystem'],
        ['SceneSystem', 'NetworkTimeSystem'],
      ]);
    });
  });

  describe('build targets', () => {
    it('DedicatedServer skips the client world and still creates the server', () => {
      const { bootstrap } = createTestBootstrap({ buildTarget: BuildTarget.DedicatedServer });

      const { created, skipped } = bootstrap.initialize();

      expect(names(created)).toEqual(['ServerWorld']);
      expect(skipped).toHaveLength(1);
      expect(skipped[0]?.name).toBe('ClientWorld');
      expect(skipped[0]?.kind).toBe(WorldKind.GameClient);
      expect(skipped[0]?.error).toBeInstanceOf(RoleUnavailableError);
      expect(skipped[0]?.error.message).toBe('Cannot create client world ClientWorld on a DedicatedServer build');
      expect(logWorldSkipped).toHaveBeenCalledTimes(1);
    });

    it('ClientOnly skips the server world', () => {
      const { bootstrap } = createTestBootstrap({
        playType: PlayType.Server,
        buildTarget: BuildTarget.ClientOnly,
      });

      const { created, skipped } = bootstrap.initialize();

      expect(created).toEqual([]);
      expect(skipped.map((s) => s.name)).toEqual(['ServerWorld']);
    });
  });

  describe('failures', () => {
    it('an unparseable server address fails before any world exists', () => {
      const { bootstrap, engine } = createTestBootstrap({ serverHost: 'not a host' });

      expect(() => bootstrap.initialize()).toThrow(AddressParseError);
      expect(engine.loop.getWorlds()).toEqual([]);
    });

    it('an empty server host fails before any world exists', () => {
      const { bootstrap, engine, context } = createTestBootstrap({ serverHost: '' });

      expect(() => bootstrap.initialize()).toThrow(AddressParseError);
      expect(engine.loop.getWorlds()).toEqual([]);
      expect(context.getDefaultWorld()).toBeUndefined();
    });

    it('a missing catalog fails before any world exists', () => {
      // Client systems only: the client plan succeeds, the server plan fails
      const engine = new Engine();
      engine.registry.register({
        id: 'game.hud',
        name: 'HudSystem',
        filter: SimulationFilter.ClientSimulation,
        priority: 100,
        origin: 'user',
        autoCreate: true,
        create: () => ({ name: 'HudSystem', update: () => {} }),
      });
      const { bootstrap, context } = createTestBootstrap({ autoConnect: false }, { engine });

      expect(() => bootstrap.initialize()).toThrow(CatalogRetrievalError);
      expect(engine.loop.getWorlds()).toEqual([]);
      expect(context.worlds.size).toBe(0);
      expect(context.getDefaultWorld()).toBeUndefined();
    });
  });

  describe('deployment mode', () => {
    it('remote config creates only the requesting deployment world', () => {
      const { bootstrap, context } = createTestBootstrap({ useRemoteConfig: true });

      const result = bootstrap.initialize();

      expect(result.mode).toBe('deployment');
      expect(names(result.created)).toEqual(['DeploymentWorld']);
      expect(result.created[0]?.kind).toBe(WorldKind.DeploymentClient);
      expect(context.clientConnectAddress).toBeUndefined();
      expect(names(context.worlds.all())).toEqual(['DeploymentWorld']);
    });

    it('deployment service creates the serving deployment world', () => {
      const { bootstrap } = createTestBootstrap({ isDeploymentService: true });
      expect(bootstrap.initialize().created[0]?.kind).toBe(WorldKind.DeploymentServer);
    });

    it('requesting wins when both flags are set', () => {
      const { bootstrap } = createTestBootstrap({ useRemoteConfig: true, isDeploymentService: true });
      expect(bootstrap.initialize().created[0]?.kind).toBe(WorldKind.DeploymentClient);
    });

    it('a second initialize does not create another deployment world', () => {
      const { bootstrap, engine } = createTestBootstrap({ useRemoteConfig: true });
      bootstrap.initialize();

      const again = bootstrap.initialize();

      expect(again).toEqual({ mode: 'deployment', created: [], skipped: [] });
      expect(engine.loop.getWorlds()).toHaveLength(1);
    });
  });

  describe('re-entry', () => {
    it('setupWorldsFromConfig creates worlds for a config received later', () => {
      const { bootstrap, context } = createTestBootstrap({ useRemoteConfig: true });
      bootstrap.initialize();

      const created = context.requestLocalSetup({ ...context.config, playType: PlayType.Server, serverPort: 8200 });

      expect(names(created)).toEqual(['ServerWorld']);
      expect(context.serverListenAddress?.port).toBe(8200);
      expect(names(context.worlds.all())).toEqual(['DeploymentWorld', 'ServerWorld']);
      // The deployment world was created first and stays the default
      expect(context.getDefaultWorld()?.name).toBe('DeploymentWorld');
    });
  });
});

describe('startBootstrap', () => {
  it('resolves the command line and runs local setup', () => {
    const engine = createTestEngine();
    const { bootstrap, result } = startBootstrap({
      argv: ['--play-type', 'server', '--server-port', '9100'],
      engine,
      driver: new InMemoryNetworkDriver(),
    });

    expect(names(result.created)).toEqual(['ServerWorld']);
    expect(bootstrap.context.serverListenAddress?.port).toBe(9100);
  });

  it('fails on invalid configuration before creating anything', () => {
    const engine = createTestEngine();
    expect(() =>
      startBootstrap({ argv: ['--play-type', 'Spectator'], engine, driver: new InMemoryNetworkDriver() })
    ).toThrow(ConfigResolutionError);
    expect(engine.loop.getWorlds()).toEqual([]);
  });
});
