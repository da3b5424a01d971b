// ============================================
// Deployment World
// The one world that exists before configuration is known
// ============================================

import { buildEndpoints, SimulationFilter, WorldKind, type World } from '#shared';
import { logEndpointsConfigured } from '../logger';
import { DeploymentMode, filterDeploymentCatalog } from './catalogFilter';
import { createWorld, WorldNames, type WorldFactoryDeps } from './worldFactory';

/**
 * Build the deployment world: a minimal connect-capable system set plus
 * either the configuration request or the configuration serve system.
 *
 * Only engine systems are considered; application-added systems never run here.
 * Throws if the context already has a deployment world.
 */
export function createDeploymentWorld(deps: WorldFactoryDeps, mode: DeploymentMode): World {
  const { context, engine } = deps;
  const existing = context.getDeploymentWorld();
  if (existing) {
    throw new Error(`Deployment world already exists: ${existing.name} (#${existing.id})`);
  }

  // Connect side dials the service, listen side accepts requests; one pair for both
  const endpoints = buildEndpoints(context.config.deploymentHost, context.config.deploymentPort);
  context.setDeploymentEndpoints(endpoints);
  logEndpointsConfigured('deployment', endpoints);

  const requesting = mode === DeploymentMode.RequestConfig;
  const catalog = engine.getCatalog(
    requesting ? SimulationFilter.ClientSimulation : SimulationFilter.ServerSimulation,
    { includeUserSystems: false }
  );
  const systems = engine.sort(filterDeploymentCatalog(catalog, mode, engine));

  const world = createWorld(
    deps,
    WorldNames.Deployment,
    requesting ? WorldKind.DeploymentClient : WorldKind.DeploymentServer,
    systems
  );
  context.markDeploymentWorld(world);
  return world;
}
