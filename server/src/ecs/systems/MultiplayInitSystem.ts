// ============================================
// Multiplay Init System
// Streamed guest session setup
// ============================================

import { formatEndpoint, Resources, type StreamingRole, type World } from '#shared';
import type { BootstrapContext } from '../../bootstrap/BootstrapContext';
import { logger } from '../../logger';
import type { System } from './types';

export interface StreamingSession {
  role: StreamingRole;
  /** Host the guest streams from, when known */
  host: string | undefined;
}

export class MultiplayInitSystem implements System {
  readonly name = 'MultiplayInitSystem';

  constructor(private readonly context: BootstrapContext) {}

  update(world: World): void {
    if (world.hasResource(Resources.Streaming)) return;

    const hostEndpoint = this.context.clientConnectAddress;
    const session: StreamingSession = {
      role: this.context.streamingRole,
      host: hostEndpoint ? formatEndpoint(hostEndpoint) : undefined,
    };
    world.setResource(Resources.Streaming, session);

    logger.info(
      { event: 'streaming_session_initialized', world: world.name, ...session },
      `${world.name} streaming as ${session.role}${session.host ? ` from ${session.host}` : ''}`
    );
  }
}
