// ============================================
// Bootstrap Context
// Process-wide bootstrap state, passed explicitly instead of held in globals
// ============================================

import type {
  EndpointPair,
  NetworkEndpoint,
  ResolvedConfig,
  StreamingRole,
  World,
} from '#shared';
import type { NetworkDriver } from '../net/NetworkDriver';
import { logDefaultWorldSet } from '../logger';
import { WorldRegistry } from './WorldRegistry';

export type LocalSetupHandler = (config: ResolvedConfig) => World[];
export type FatalErrorHandler = (error: unknown) => void;

export interface BootstrapContextOptions {
  config: ResolvedConfig;
  driver: NetworkDriver;
  onFatal?: FatalErrorHandler;
}

/**
 * BootstrapContext - created once per process start
 *
 * Holds:
 * - The resolved config (immutable)
 * - Server and deployment endpoint pairs (computed independently)
 * - The world registry
 * - The default injection world (first writer wins)
 * - The deployment world marker
 * - Hooks back into the orchestrator for re-entrant setup and fatal errors
 */
export class BootstrapContext {
  readonly config: ResolvedConfig;
  readonly driver: NetworkDriver;
  readonly worlds = new WorldRegistry();

  /** Streaming role of the client world currently set up */
  streamingRole: StreamingRole;

  private serverEndpoints: EndpointPair | undefined;
  private deploymentEndpoints: EndpointPair | undefined;
  private defaultWorld: World | undefined;
  private deploymentWorld: World | undefined;
  private localSetupHandler: LocalSetupHandler | undefined;
  private readonly fatalHandler: FatalErrorHandler | undefined;

  constructor(options: BootstrapContextOptions) {
    this.config = options.config;
    this.driver = options.driver;
    this.streamingRole = options.config.streamingRole;
    this.fatalHandler = options.onFatal;
  }

  // ============================================
  // Endpoints
  // ============================================

  setServerEndpoints(endpoints: EndpointPair): void {
    this.serverEndpoints = endpoints;
  }

  setDeploymentEndpoints(endpoints: EndpointPair): void {
    this.deploymentEndpoints = endpoints;
  }

  get clientConnectAddress(): NetworkEndpoint | undefined {
    return this.serverEndpoints?.connect;
  }

  get serverListenAddress(): NetworkEndpoint | undefined {
    return this.serverEndpoints?.listen;
  }

  get deploymentConnectAddress(): NetworkEndpoint | undefined {
    return this.deploymentEndpoints?.connect;
  }

  get deploymentListenAddress(): NetworkEndpoint | undefined {
    return this.deploymentEndpoints?.listen;
  }

  // ============================================
  // Default injection world
  // ============================================

  /**
   * Make `world` the default injection world if none is set yet.
   * Returns true when this call set it.
   */
  trySetDefaultWorld(world: World): boolean {
    if (this.defaultWorld) return false;
    this.defaultWorld = world;
    logDefaultWorldSet(world);
    return true;
  }

  getDefaultWorld(): World | undefined {
    return this.defaultWorld;
  }

  // ============================================
  // Deployment world
  // ============================================

  markDeploymentWorld(world: World): void {
    if (this.deploymentWorld) {
      throw new Error(`Deployment world already exists: ${this.deploymentWorld.name} (#${this.deploymentWorld.id})`);
    }
    this.deploymentWorld = world;
  }

  getDeploymentWorld(): World | undefined {
    return this.deploymentWorld;
  }

  // ============================================
  // Hooks
  // ============================================

  setLocalSetupHandler(handler: LocalSetupHandler): void {
    this.localSetupHandler = handler;
  }

  /**
   * Create local worlds from a configuration that arrived after startup
   */
  requestLocalSetup(config: ResolvedConfig): World[] {
    if (!this.localSetupHandler) {
      throw new Error('No local setup handler is installed on the bootstrap context');
    }
    return this.localSetupHandler(config);
  }

  /**
   * Report an error raised outside the orchestrator's call stack
   * (network callbacks). Rethrows when no handler is installed.
   */
  fail(error: unknown): void {
    if (!this.fatalHandler) {
      throw error;
    }
    this.fatalHandler(error);
  }
}
