// ============================================
// Default System Catalog
// Everything the engine ships, with its simulation kinds and update order
// ============================================

import { SimulationFilter } from '#shared';
import type { SystemRegistry } from '../../engine/SystemRegistry';
import { AuthoringSceneLoaderSystem } from './AuthoringSceneLoaderSystem';
import { ClientAutoconnectSystem, ServerAutolistenSystem } from './AutoconnectSystem';
import { ConfigureWorldSystem } from './ConfigureWorldSystem';
import { ConnectionMonitorSystem } from './ConnectionMonitorSystem';
import { DeploymentReceiveSystem } from './DeploymentReceiveSystem';
import { DeploymentServiceSystem } from './DeploymentServiceSystem';
import { EmulationInitSystem } from './EmulationInitSystem';
import { MultiplayInitSystem } from './MultiplayInitSystem';
import { NetworkTimeSystem } from './NetworkTimeSystem';
import { SceneSystem } from './SceneSystem';
import { SystemIds, SystemPriority, type SystemCatalogEntry } from './types';

const { ClientSimulation, ServerSimulation, ThinClientSimulation } = SimulationFilter;
const ANY_SIMULATION = ClientSimulation | ServerSimulation | ThinClientSimulation;
const CLIENT_SIDE = ClientSimulation | ThinClientSimulation;

export const DEFAULT_SYSTEM_CATALOG: readonly SystemCatalogEntry[] = [
  // Scenes
  {
    id: SystemIds.Scene,
    name: 'SceneSystem',
    filter: ANY_SIMULATION,
    priority: SystemPriority.SCENE,
    origin: 'engine',
    autoCreate: true,
    create: () => new SceneSystem(),
  },
  {
    id: SystemIds.AuthoringSceneLoader,
    name: 'AuthoringSceneLoaderSystem',
    filter: ClientSimulation | ServerSimulation,
    priority: SystemPriority.AUTHORING_SCENE_LOADER,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new AuthoringSceneLoaderSystem(bootstrap),
  },

  // Generic role configuration
  {
    id: SystemIds.ConfigureClientWorld,
    name: 'ConfigureClientWorldSystem',
    filter: ClientSimulation,
    priority: SystemPriority.CONFIGURE_WORLD,
    origin: 'engine',
    autoCreate: true,
    create: ({ bootstrap }) => new ConfigureWorldSystem('ConfigureClientWorldSystem', 'connect', bootstrap),
  },
  {
    id: SystemIds.ConfigureThinClientWorld,
    name: 'ConfigureThinClientWorldSystem',
    filter: ThinClientSimulation,
    priority: SystemPriority.CONFIGURE_WORLD,
    origin: 'engine',
    autoCreate: true,
    create: ({ bootstrap }) => new ConfigureWorldSystem('ConfigureThinClientWorldSystem', 'connect', bootstrap),
  },
  {
    id: SystemIds.ConfigureServerWorld,
    name: 'ConfigureServerWorldSystem',
    filter: ServerSimulation,
    priority: SystemPriority.CONFIGURE_WORLD,
    origin: 'engine',
    autoCreate: true,
    create: ({ bootstrap }) => new ConfigureWorldSystem('ConfigureServerWorldSystem', 'listen', bootstrap),
  },

  // Explicit role wiring
  {
    id: SystemIds.ClientAutoconnect,
    name: 'ClientAutoconnectSystem',
    filter: CLIENT_SIDE,
    priority: SystemPriority.AUTOCONNECT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new ClientAutoconnectSystem(bootstrap),
  },
  {
    id: SystemIds.ServerAutolisten,
    name: 'ServerAutolistenSystem',
    filter: ServerSimulation,
    priority: SystemPriority.AUTOCONNECT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new ServerAutolistenSystem(bootstrap),
  },

  // Deployment exchange
  {
    id: SystemIds.DeploymentReceive,
    name: 'DeploymentReceiveSystem',
    filter: ClientSimulation,
    priority: SystemPriority.DEPLOYMENT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new DeploymentReceiveSystem(bootstrap),
  },
  {
    id: SystemIds.DeploymentService,
    name: 'DeploymentServiceSystem',
    filter: ServerSimulation,
    priority: SystemPriority.DEPLOYMENT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new DeploymentServiceSystem(bootstrap),
  },

  // Streaming guest
  {
    id: SystemIds.MultiplayInit,
    name: 'MultiplayInitSystem',
    filter: ClientSimulation,
    priority: SystemPriority.MULTIPLAY_INIT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new MultiplayInitSystem(bootstrap),
  },
  {
    id: SystemIds.EmulationInit,
    name: 'EmulationInitSystem',
    filter: CLIENT_SIDE,
    priority: SystemPriority.EMULATION_INIT,
    origin: 'engine',
    autoCreate: false,
    create: ({ bootstrap }) => new EmulationInitSystem(bootstrap),
  },

  // Simulation
  {
    id: SystemIds.NetworkTime,
    name: 'NetworkTimeSystem',
    filter: ANY_SIMULATION,
    priority: SystemPriority.NETWORK_TIME,
    origin: 'engine',
    autoCreate: true,
    create: () => new NetworkTimeSystem(),
  },
  {
    id: SystemIds.ConnectionMonitor,
    name: 'ConnectionMonitorSystem',
    filter: ANY_SIMULATION,
    priority: SystemPriority.CONNECTION_MONITOR,
    origin: 'engine',
    autoCreate: false,
    create: () => new ConnectionMonitorSystem(),
  },
];

/**
 * Register the default catalog with a registry
 */
export function registerDefaultSystems(registry: SystemRegistry): void {
  for (const entry of DEFAULT_SYSTEM_CATALOG) {
    registry.register(entry);
  }
}
