// ============================================
// ECS System Types
// ============================================

import type { SimulationFilterMask, System } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';

export type { System };

/**
 * Stable identifiers of the systems this process knows about.
 * Catalog filtering matches on these, never on display names.
 */
export const SystemIds = {
  // Generic role configuration (engine built-ins, superseded by explicit wiring)
  ConfigureClientWorld: 'ConfigureClientWorldSystem',
  ConfigureThinClientWorld: 'ConfigureThinClientWorldSystem',
  ConfigureServerWorld: 'ConfigureServerWorldSystem',

  // Explicit role wiring
  ClientAutoconnect: 'ClientAutoconnectSystem',
  ServerAutolisten: 'ServerAutolistenSystem',

  // Deployment exchange
  DeploymentReceive: 'DeploymentReceiveSystem',
  DeploymentService: 'DeploymentServiceSystem',

  // Scenes
  Scene: 'SceneSystem',
  AuthoringSceneLoader: 'AuthoringSceneLoaderSystem',

  // Streaming guest
  MultiplayInit: 'MultiplayInitSystem',
  EmulationInit: 'EmulationInitSystem',

  // Simulation
  NetworkTime: 'NetworkTimeSystem',
  ConnectionMonitor: 'ConnectionMonitorSystem',
} as const;

/**
 * Where a catalog entry came from.
 * Deployment worlds only take 'engine' entries.
 */
export type SystemOrigin = 'engine' | 'user';

/**
 * What a system receives when a world instantiates it
 */
export interface SystemContext {
  bootstrap: BootstrapContext;
}

/**
 * One registered capability in the engine catalog.
 */
export interface SystemCatalogEntry {
  /** Stable identifier, unique per registry */
  readonly id: string;
  /** Display name for logs */
  readonly name: string;
  /** Simulation kinds this entry belongs to (SimulationFilter bits) */
  readonly filter: SimulationFilterMask;
  /** Lower numbers update first */
  readonly priority: number;
  readonly origin: SystemOrigin;
  /** false: never returned by catalog queries, only by explicit lookup */
  readonly autoCreate: boolean;
  create(context: SystemContext): System;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Scenes (GUID registry must exist before anything loads into it)
 * 2. Network configuration (generic, then explicit wiring)
 * 3. Deployment exchange
 * 4. Streaming guest initialization
 * 5. Simulation
 * 6. Monitoring - runs last
 */
export const SystemPriority = {
  SCENE: 10,
  AUTHORING_SCENE_LOADER: 20,

  CONFIGURE_WORLD: 100,
  AUTOCONNECT: 110,

  DEPLOYMENT: 200,

  MULTIPLAY_INIT: 300,
  EMULATION_INIT: 310,

  NETWORK_TIME: 500,

  CONNECTION_MONITOR: 900,
} as const;
