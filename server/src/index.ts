import { hideBin } from 'yargs/helpers';
import { Engine } from './engine/Engine';
import { registerDefaultSystems } from './ecs/systems';
import { startBootstrap } from './bootstrap/GameBootstrap';
import { SocketIoDriver } from './net/SocketIoDriver';
import { logBootstrapFailed, logger } from './logger';

// ============================================
// Engine
// ============================================

const engine = new Engine();
registerDefaultSystems(engine.registry);

/**
 * Errors raised after startup (deployment exchange callbacks) end the process
 */
function fatal(error: unknown): void {
  logBootstrapFailed(error);
  engine.loop.stop();
  process.exitCode = 1;
  // Give the log transports a moment to flush
  setTimeout(() => process.exit(1), 500).unref();
}

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 * Stops the loop and disposes every world (closing their sockets).
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);
  engine.loop.stop();
  logger.info({ event: 'shutdown_complete' }, 'Worlds disposed');

  // Force exit after 3 seconds if sockets keep the process alive
  setTimeout(() => {
    logger.warn({ event: 'shutdown_forced' }, 'Forced shutdown after timeout');
    process.exit(0);
  }, 3000).unref();
}

// ============================================
// Bootstrap
// ============================================

function main(): void {
  let started: ReturnType<typeof startBootstrap>;
  try {
    started = startBootstrap({
      argv: hideBin(process.argv),
      engine,
      driver: new SocketIoDriver(),
      onFatal: fatal,
    });
  } catch (error) {
    // Nothing was created; the process ends once the logs flush
    logBootstrapFailed(error);
    process.exitCode = 1;
    return;
  }

  const { bootstrap, result } = started;
  logger.info(
    {
      event: 'bootstrap_complete',
      mode: result.mode,
      worlds: result.created.map((world) => `${world.name}#${world.id}`),
      skipped: result.skipped.map((skipped) => skipped.name),
    },
    `Bootstrap complete (${result.mode}): ${result.created.length} worlds created`
  );

  engine.loop.start(bootstrap.context.config.tickRate);

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
