// ============================================
// Bootstrap Errors
// ============================================

export type BootstrapErrorCode =
  | 'CONFIG_RESOLUTION_FAILURE'
  | 'ADDRESS_PARSE_ERROR'
  | 'ROLE_UNAVAILABLE'
  | 'CATALOG_RETRIEVAL_FAILURE';

/**
 * Base class for every error raised while deciding and building worlds.
 * `code` is stable and safe to log or match on.
 */
export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;

  constructor(code: BootstrapErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Command line / environment / plan file could not be turned into a config.
 * Always fatal: the process exits before any world exists.
 */
export class ConfigResolutionError extends BootstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_RESOLUTION_FAILURE', message, options);
  }
}

export class AddressParseError extends BootstrapError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, reason: string) {
    super('ADDRESS_PARSE_ERROR', `Cannot build endpoint for "${host}:${port}": ${reason}`);
    this.host = host;
    this.port = port;
  }
}

/**
 * The requested world side cannot run on this build target
 * (client world on a dedicated server build, or the reverse).
 */
export class RoleUnavailableError extends BootstrapError {
  readonly worldName: string;

  constructor(worldName: string, message: string) {
    super('ROLE_UNAVAILABLE', message);
    this.worldName = worldName;
  }
}

export class CatalogRetrievalError extends BootstrapError {
  constructor(message: string) {
    super('CATALOG_RETRIEVAL_FAILURE', message);
  }
}

/**
 * Format an unknown thrown value for structured logs
 */
export function describeError(error: unknown): { error: string; code?: string; stack?: string } {
  if (error instanceof BootstrapError) {
    return { error: error.message, code: error.code, stack: error.stack };
  }
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
