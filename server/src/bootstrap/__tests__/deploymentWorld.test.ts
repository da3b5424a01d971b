// ============================================
// Deployment World Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { AddressParseError, SimulationFilter, WorldKind } from '#shared';
import { DeploymentMode } from '../catalogFilter';
import { createDeploymentWorld } from '../deploymentWorld';
import { createTestBootstrap, createTestEngine } from '../../__tests__/testUtils';

describe('createDeploymentWorld', () => {
  it('request side: deployment client world with the receive system', () => {
    const { engine, context } = createTestBootstrap();

    const world = createDeploymentWorld({ engine, context }, DeploymentMode.RequestConfig);

    expect(world.name).toBe('DeploymentWorld');
    expect(world.kind).toBe(WorldKind.DeploymentClient);
    expect(world.getSystemNames()).toEqual([
      'SceneSystem',
      'AuthoringSceneLoaderSystem',
      'DeploymentReceiveSystem',
      'NetworkTimeSystem',
      'ConnectionMonitorSystem',
    ]);
    expect(context.getDeploymentWorld()).toBe(world);
    expect(context.getDefaultWorld()).toBe(world);
    expect(engine.loop.isRegistered(world)).toBe(true);
  });

  it('serve side: deployment server world with the service system', () => {
    const { engine, context } = createTestBootstrap();

    const world = createDeploymentWorld({ engine, context }, DeploymentMode.ServeConfig);

    expect(world.kind).toBe(WorldKind.DeploymentServer);
    expect(world.getSystemNames()).toEqual([
      'SceneSystem',
      'AuthoringSceneLoaderSystem',
      'DeploymentServiceSystem',
      'NetworkTimeSystem',
      'ConnectionMonitorSystem',
    ]);
  });

  it('configures the deployment endpoints and leaves the game server ones alone', () => {
    const { engine, context } = createTestBootstrap({ deploymentHost: '10.0.0.5', deploymentPort: 8100 });

    createDeploymentWorld({ engine, context }, DeploymentMode.RequestConfig);

    expect(context.deploymentConnectAddress).toEqual({ family: 'ipv4', address: '10.0.0.5', port: 8100 });
    expect(context.deploymentListenAddress).toEqual({ family: 'ipv4', address: '0.0.0.0', port: 8100 });
    expect(context.clientConnectAddress).toBeUndefined();
    expect(context.serverListenAddress).toBeUndefined();
  });

  it('never includes application systems', () => {
    const engine = createTestEngine();
    engine.registry.register({
      id: 'game.inventory',
      name: 'InventorySystem',
      filter: SimulationFilter.ClientSimulation | SimulationFilter.ServerSimulation,
      priority: 400,
      origin: 'user',
      autoCreate: true,
      create: () => ({ name: 'InventorySystem', update: () => {} }),
    });
    const { context } = createTestBootstrap({}, { engine });

    const world = createDeploymentWorld({ engine, context }, DeploymentMode.ServeConfig);

    expect(world.getSystemNames()).not.toContain('InventorySystem');
  });

  it('refuses to create a second deployment world', () => {
    const { engine, context } = createTestBootstrap();
    createDeploymentWorld({ engine, context }, DeploymentMode.RequestConfig);

    expect(() => createDeploymentWorld({ engine, context }, DeploymentMode.ServeConfig)).toThrow(
      'Deployment world already exists'
    );
    expect(engine.loop.getWorlds()).toHaveLength(1);
  });

  it('fails on an unparseable deployment address before creating anything', () => {
    const { engine, context } = createTestBootstrap({ deploymentHost: 'bad host' });

    expect(() => createDeploymentWorld({ engine, context }, DeploymentMode.RequestConfig)).toThrow(AddressParseError);
    expect(engine.loop.getWorlds()).toHaveLength(0);
    expect(context.getDeploymentWorld()).toBeUndefined();
  });
});
