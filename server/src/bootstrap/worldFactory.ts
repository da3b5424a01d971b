// ============================================
// World Factory
// One isolated world per role instance
// ============================================

import {
  BuildTarget,
  RoleUnavailableError,
  SimulationFilter,
  WorldKind,
  type World,
} from '#shared';
import { SystemIds, type SystemCatalogEntry } from '../ecs/systems/types';
import type { SimulationEngine } from '../engine/Engine';
import { logWorldCreated } from '../logger';
import type { BootstrapContext } from './BootstrapContext';
import { filterCatalog } from './catalogFilter';

export interface WorldFactoryDeps {
  context: BootstrapContext;
  engine: SimulationEngine;
}

/** Which half of the build a world needs */
export type WorldSide = 'client' | 'server';

/**
 * A world ready to be created: every catalog lookup already done
 */
export interface WorldPlan {
  name: string;
  kind: WorldKind;
  side: WorldSide;
  systems: readonly SystemCatalogEntry[];
}

export const WorldNames = {
  Client: 'ClientWorld',
  StreamingGuest: 'StreamingGuestWorld',
  ThinClient: 'ThinClientWorld',
  Server: 'ServerWorld',
  Deployment: 'DeploymentWorld',
} as const;

// ============================================
// Creation
// ============================================

/**
 * Allocate a world, attach its sorted systems, register it with the
 * player loop and make it the default world if there is none yet.
 */
export function createWorld(
  deps: WorldFactoryDeps,
  name: string,
  kind: WorldKind,
  systems: readonly SystemCatalogEntry[]
): World {
  const { context, engine } = deps;
  const world = engine.allocateWorld(name, kind);

  const ordered = engine.sort(systems);
  world.attachSystems(ordered.map((entry) => entry.create({ bootstrap: context })));

  engine.registerWorld(world);
  context.trySetDefaultWorld(world);

  logWorldCreated(world);
  return world;
}

export function isSideAvailable(target: BuildTarget, side: WorldSide): boolean {
  if (side === 'client') return target !== BuildTarget.DedicatedServer;
  return target !== BuildTarget.ClientOnly;
}

function assertSideAvailable(target: BuildTarget, name: string, side: WorldSide): void {
  if (!isSideAvailable(target, side)) {
    throw new RoleUnavailableError(name, `Cannot create ${side} world ${name} on a ${target} build`);
  }
}

export function createClientKindWorld(
  deps: WorldFactoryDeps,
  name: string,
  kind: WorldKind,
  systems: readonly SystemCatalogEntry[]
): World {
  assertSideAvailable(deps.context.config.buildTarget, name, 'client');
  return createWorld(deps, name, kind, systems);
}

export function createServerKindWorld(
  deps: WorldFactoryDeps,
  name: string,
  kind: WorldKind,
  systems: readonly SystemCatalogEntry[]
): World {
  assertSideAvailable(deps.context.config.buildTarget, name, 'server');
  return createWorld(deps, name, kind, systems);
}

export function createFromPlan(deps: WorldFactoryDeps, plan: WorldPlan): World {
  return plan.side === 'client'
    ? createClientKindWorld(deps, plan.name, plan.kind, plan.systems)
    : createServerKindWorld(deps, plan.name, plan.kind, plan.systems);
}

// ============================================
// Plans
// ============================================

export function planClientWorld(engine: SimulationEngine, autoConnect: boolean): WorldPlan {
  const catalog = engine.getCatalog(SimulationFilter.ClientSimulation | SimulationFilter.Presentation);
  return {
    name: WorldNames.Client,
    kind: WorldKind.GameClient,
    side: 'client',
    systems: filterCatalog(catalog, 'client', autoConnect, engine),
  };
}

/**
 * Streamed guests run a hand-picked set; nothing comes from the catalog query
 */
export function planStreamedClientWorld(engine: SimulationEngine, autoConnect: boolean): WorldPlan {
  const systems = [engine.getEntry(SystemIds.MultiplayInit), engine.getEntry(SystemIds.EmulationInit)];
  if (autoConnect) {
    systems.push(engine.getEntry(SystemIds.ClientAutoconnect));
  }
  return {
    name: WorldNames.StreamingGuest,
    kind: WorldKind.Game,
    side: 'client',
    systems,
  };
}

export function planThinClientWorlds(
  engine: SimulationEngine,
  numThinClients: number,
  autoConnect: boolean
): WorldPlan[] {
  if (!Number.isInteger(numThinClients) || numThinClients < 0) {
    throw new RangeError(`Thin client count must be a non-negative integer, got ${numThinClients}`);
  }
  if (numThinClients === 0) return [];

  const catalog = engine.getCatalog(SimulationFilter.ThinClientSimulation);
  const systems = filterCatalog(catalog, 'thinClient', autoConnect, engine);

  const plans: WorldPlan[] = [];
  for (let i = 0; i < numThinClients; i++) {
    plans.push({
      name: `${WorldNames.ThinClient}${i}`,
      kind: WorldKind.GameThinClient,
      side: 'client',
      systems,
    });
  }
  return plans;
}

export function planServerWorld(engine: SimulationEngine, autoConnect: boolean): WorldPlan {
  const catalog = engine.getCatalog(SimulationFilter.ServerSimulation);
  return {
    name: WorldNames.Server,
    kind: WorldKind.GameServer,
    side: 'server',
    systems: filterCatalog(catalog, 'server', autoConnect, engine),
  };
}

// ============================================
// Variants
// ============================================

export function createClientWorld(deps: WorldFactoryDeps, autoConnect: boolean): World {
  return createFromPlan(deps, planClientWorld(deps.engine, autoConnect));
}

export function createStreamedClientWorld(deps: WorldFactoryDeps, autoConnect: boolean): World {
  return createFromPlan(deps, planStreamedClientWorld(deps.engine, autoConnect));
}

export function createThinClientWorlds(
  deps: WorldFactoryDeps,
  numThinClients: number,
  autoConnect: boolean
): World[] {
  return planThinClientWorlds(deps.engine, numThinClients, autoConnect).map((plan) => createFromPlan(deps, plan));
}

export function createServerWorld(deps: WorldFactoryDeps, autoConnect: boolean): World {
  return createFromPlan(deps, planServerWorld(deps.engine, autoConnect));
}
