// ============================================
// Network Driver
// Transport abstraction the systems dial and listen through
// ============================================

import type { NetworkEndpoint } from '#shared';

export type ConnectionStatus = 'connecting' | 'connected' | 'disconnected';

export type MessageHandler = (payload: unknown) => void;

/**
 * One reliable, ordered, event-based connection.
 */
export interface Connection {
  readonly id: string;
  readonly status: ConnectionStatus;
  send(event: string, payload: unknown): void;
  on(event: string, handler: MessageHandler): void;
  onStatusChange(handler: (status: ConnectionStatus) => void): void;
  close(): void;
}

export interface Listener {
  readonly endpoint: NetworkEndpoint;
  readonly connectionCount: number;
  /** Called for every open connection, including ones accepted before registration */
  onConnection(handler: (connection: Connection) => void): void;
  close(): void;
}

export interface NetworkDriver {
  connect(endpoint: NetworkEndpoint): Connection;
  listen(endpoint: NetworkEndpoint): Listener;
}

/**
 * Network resource stored on a world by whichever system opened its socket.
 */
export type NetworkState =
  | { mode: 'connect'; endpoint: NetworkEndpoint; connection: Connection }
  | { mode: 'listen'; endpoint: NetworkEndpoint; listener: Listener };

export function describeNetworkStatus(state: NetworkState): string {
  if (state.mode === 'connect') {
    return state.connection.status;
  }
  return `listening (${state.listener.connectionCount} connections)`;
}

export function closeNetworkState(state: NetworkState): void {
  if (state.mode === 'connect') {
    state.connection.close();
  } else {
    state.listener.close();
  }
}
