// ============================================
// Shared Types & Constants
// Used by the bootstrap, the engine and the systems
// ============================================

// ECS Module - worlds and system contracts
export * from './ecs';

// Error taxonomy
export * from './errors';

// Network endpoints
export * from './network';

// Resolved configuration (PlayType, ResolvedConfig, deployment plan)
export * from './config';

// Deployment exchange messages
export * from './messages';
