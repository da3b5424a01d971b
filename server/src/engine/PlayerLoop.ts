// ============================================
// Player Loop
// Ticks every registered world's systems in order
// ============================================

import type { World } from '#shared';
import { logger, perfLogger } from '../logger';

/**
 * PlayerLoop - the process-wide execution loop
 *
 * Worlds are registered exactly once and ticked in registration order.
 * Within a world, systems run in the order they were attached.
 */
export class PlayerLoop {
  private worlds: World[] = [];
  private timer: ReturnType<typeof setInterval> | undefined;
  private lastTick = 0;

  /**
   * Append a world to the loop.
   * Throws if the world is already registered.
   */
  registerWorld(world: World): void {
    if (this.worlds.includes(world)) {
      throw new Error(`World ${world.name} (#${world.id}) is already registered with the player loop`);
    }
    this.worlds.push(world);
  }

  isRegistered(world: World): boolean {
    return this.worlds.includes(world);
  }

  getWorlds(): readonly World[] {
    return this.worlds;
  }

  /**
   * Run all systems of all worlds once
   * Tracks per-world timing and logs when the tick is slow
   */
  tick(deltaTime: number): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    // Systems may create worlds mid-tick (remote config arriving); they start next tick
    for (const world of [...this.worlds]) {
      if (world.isDisposed) continue;
      const worldStart = performance.now();

      for (const system of world.getSystems()) {
        try {
          system.update(world, deltaTime);
        } catch (error) {
          logger.error({
            event: 'system_error',
            world: world.name,
            system: system.name,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
          }, `System ${system.name} in ${world.name} threw an error`);
          // Continue with next system - don't crash the loop
        }
      }

      timings.push({ name: `${world.name}#${world.id}`, ms: performance.now() - worldStart });
    }

    const totalMs = performance.now() - tickStart;

    // Log breakdown when tick takes > 10ms
    if (totalMs > 10) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5)
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Tick at a fixed rate until stop()
   */
  start(tickRate: number): void {
    if (this.timer) return;
    const interval = 1000 / tickRate;
    this.lastTick = performance.now();

    this.timer = setInterval(() => {
      const now = performance.now();
      const deltaTime = (now - this.lastTick) / 1000;
      this.lastTick = now;
      this.tick(deltaTime);
    }, interval);
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Stop ticking and dispose every world, newest first
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const world of [...this.worlds].reverse()) {
      world.dispose();
    }
    this.worlds = [];
  }
}
