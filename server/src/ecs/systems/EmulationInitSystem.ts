// ============================================
// Emulation Init System
// ============================================

import { Resources, type EmulationType, type World } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import { logger } from '../../logger';
import type { System } from './types';

export interface EmulationSettings {
  type: EmulationType;
}

/**
 * EmulationInitSystem - records which input emulation this world runs with
 */
export class EmulationInitSystem implements System {
  readonly name = 'EmulationInitSystem';

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (world.hasResource(Resources.Emulation)) return;

    const settings: EmulationSettings = { type: this.context.config.emulationType };
    world.setResource(Resources.Emulation, settings);
    logger.debug({ event: 'emulation_initialized', world: world.name, type: settings.type });
  }
}
