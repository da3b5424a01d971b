// ============================================
// ConnectionMonitorSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Resources, World, WorldKind } from '#shared';
import { ConnectionMonitorSystem } from '../ConnectionMonitorSystem';
import type { NetworkState } from '../../../net/NetworkDriver';
import { logConnectionStatus } from '../../../logger';
import { InMemoryNetworkDriver } from '../../../__tests__/testUtils';

const endpoint = { family: 'ipv4' as const, address: '127.0.0.1', port: 7979 };

describe('ConnectionMonitorSystem', () => {
  let driver: InMemoryNetworkDriver;

  beforeEach(() => {
    vi.clearAllMocks();
    driver = new InMemoryNetworkDriver();
  });

  it('does nothing for worlds without a network resource', () => {
    new ConnectionMonitorSystem().update(new World('W', WorldKind.Game));
    expect(logConnectionStatus).not.toHaveBeenCalled();
  });

  it('logs each status change once', () => {
    const world = new World('ClientWorld', WorldKind.GameClient);
    const connection = driver.connect(endpoint);
    world.setResource<NetworkState>(Resources.Network, { mode: 'connect', endpoint, connection });
    const monitor = new ConnectionMonitorSystem();

    monitor.update(world);
    monitor.update(world);
    driver.listen({ ...endpoint, address: '0.0.0.0' });
    monitor.update(world);

    expect(vi.mocked(logConnectionStatus).mock.calls).toEqual([
      [world, '127.0.0.1:7979', 'connecting'],
      [world, '127.0.0.1:7979', 'connected'],
    ]);
  });

  it('reports listener connection counts', () => {
    const world = new World('ServerWorld', WorldKind.GameServer);
    const listen = { ...endpoint, address: '0.0.0.0' };
    world.setResource<NetworkState>(Resources.Network, { mode: 'listen', endpoint: listen, listener: driver.listen(listen) });
    const monitor = new ConnectionMonitorSystem();

    monitor.update(world);
    driver.connect(endpoint);
    monitor.update(world);

    expect(vi.mocked(logConnectionStatus).mock.calls.map((call) => call[2])).toEqual([
      'listening (0 connections)',
      'listening (1 connections)',
    ]);
  });
});
