// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';

// Types and constants
export { WorldKind, SimulationFilter, Resources, describeFilter } from './types';
export type { System, SimulationFilterMask } from './types';
