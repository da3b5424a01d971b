// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System, SystemCatalogEntry, SystemContext, SystemOrigin } from './types';
export { SystemIds, SystemPriority } from './types';

// Catalog
export { DEFAULT_SYSTEM_CATALOG, registerDefaultSystems } from './catalog';

// Network configuration
export { ConfigureWorldSystem, ENGINE_DEFAULT_ENDPOINTS } from './ConfigureWorldSystem';
export { ClientAutoconnectSystem, ServerAutolistenSystem } from './AutoconnectSystem';
export { ConnectionMonitorSystem } from './ConnectionMonitorSystem';

// Deployment
export { DeploymentReceiveSystem } from './DeploymentReceiveSystem';
export type { DeploymentStatus } from './DeploymentReceiveSystem';
export { DeploymentServiceSystem } from './DeploymentServiceSystem';

// Scenes
export { SceneSystem, SceneRegistry } from './SceneSystem';
export { AuthoringSceneLoaderSystem } from './AuthoringSceneLoaderSystem';

// Streaming guest
export { MultiplayInitSystem } from './MultiplayInitSystem';
export type { StreamingSession } from './MultiplayInitSystem';
export { EmulationInitSystem } from './EmulationInitSystem';
export type { EmulationSettings } from './EmulationInitSystem';

// Simulation
export { NetworkTimeSystem } from './NetworkTimeSystem';
export type { NetworkTime } from './NetworkTimeSystem';
