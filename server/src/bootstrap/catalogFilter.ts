// ============================================
// System Catalog Filter
// Narrows an engine catalog down to what one role may run
// ============================================

import { SystemIds, type SystemCatalogEntry } from '../ecs/systems/types';
import type { SimulationEngine } from '../engine/Engine';
import { logCatalogFiltered } from '../logger';

export type RoleKind = 'client' | 'thinClient' | 'server';

export const DeploymentMode = {
  RequestConfig: 'RequestConfig',
  ServeConfig: 'ServeConfig',
} as const;

export type DeploymentMode = (typeof DeploymentMode)[keyof typeof DeploymentMode];

/**
 * Generic role configuration. The bootstrap wires roles explicitly, so no
 * entry whose id or name contains one of these runs in a world it builds.
 */
export const GENERIC_CONFIGURATION_SYSTEMS: ReadonlySet<string> = new Set([
  SystemIds.ConfigureThinClientWorld,
  SystemIds.ConfigureClientWorld,
  SystemIds.ConfigureServerWorld,
]);

const AUTOCONNECT_BY_ROLE: Record<RoleKind, string> = {
  client: SystemIds.ClientAutoconnect,
  thinClient: SystemIds.ClientAutoconnect,
  server: SystemIds.ServerAutolisten,
};

type EntryLookup = Pick<SimulationEngine, 'getEntry'>;

export function isGenericConfigurationSystem(entry: SystemCatalogEntry): boolean {
  for (const denied of GENERIC_CONFIGURATION_SYSTEMS) {
    if (entry.id.includes(denied) || entry.name.includes(denied)) return true;
  }
  return false;
}

/**
 * Append unless an entry with the same id is already present
 */
function appendUnique(entries: SystemCatalogEntry[], entry: SystemCatalogEntry): void {
  if (!entries.some((existing) => existing.id === entry.id)) {
    entries.push(entry);
  }
}

/**
 * Remove generic role configuration, then append the role's auto-connect
 * system when requested. The result is unsorted; the engine sorts it.
 */
export function filterCatalog(
  fullCatalog: readonly SystemCatalogEntry[],
  role: RoleKind,
  autoConnect: boolean,
  engine: EntryLookup
): SystemCatalogEntry[] {
  const filtered = fullCatalog.filter((entry) => !isGenericConfigurationSystem(entry));

  if (autoConnect) {
    appendUnique(filtered, engine.getEntry(AUTOCONNECT_BY_ROLE[role]));
  }

  logCatalogFiltered(role, fullCatalog.length, filtered.length);
  return filtered;
}

/**
 * Deployment worlds: remove generic role configuration, append the
 * request or serve system, scene GUID management, the connection monitor
 * and the authoring scene loader.
 */
export function filterDeploymentCatalog(
  fullCatalog: readonly SystemCatalogEntry[],
  mode: DeploymentMode,
  engine: EntryLookup
): SystemCatalogEntry[] {
  const filtered = fullCatalog.filter((entry) => !isGenericConfigurationSystem(entry));

  appendUnique(
    filtered,
    engine.getEntry(
      mode === DeploymentMode.RequestConfig ? SystemIds.DeploymentReceive : SystemIds.DeploymentService
    )
  );
  appendUnique(filtered, engine.getEntry(SystemIds.Scene));
  appendUnique(filtered, engine.getEntry(SystemIds.ConnectionMonitor));
  appendUnique(filtered, engine.getEntry(SystemIds.AuthoringSceneLoader));

  logCatalogFiltered(`deployment:${mode}`, fullCatalog.length, filtered.length);
  return filtered;
}
