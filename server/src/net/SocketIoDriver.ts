// ============================================
// Socket.io Network Driver
// ============================================

import { Server, type Socket as ServerSocket } from 'socket.io';
import { io as connectSocket, type Socket as ClientSocket } from 'socket.io-client';
import { endpointUrl, type NetworkEndpoint } from '#shared';
import type { Connection, ConnectionStatus, Listener, MessageHandler, NetworkDriver } from './NetworkDriver';

/**
 * Outgoing socket.io-client connection
 */
class ClientConnection implements Connection {
  private statusHandlers: Array<(status: ConnectionStatus) => void> = [];
  private currentStatus: ConnectionStatus = 'connecting';

  constructor(private readonly socket: ClientSocket) {
    socket.on('connect', () => this.setStatus('connected'));
    socket.on('disconnect', () => this.setStatus('disconnected'));
  }

  get id(): string {
    return this.socket.id ?? 'pending';
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  send(event: string, payload: unknown): void {
    this.socket.emit(event, payload);
  }

  on(event: string, handler: MessageHandler): void {
    this.socket.on(event, handler);
  }

  onStatusChange(handler: (status: ConnectionStatus) => void): void {
    this.statusHandlers.push(handler);
  }

  close(): void {
    this.socket.disconnect();
  }

  private setStatus(status: ConnectionStatus): void {
    this.currentStatus = status;
    for (const handler of this.statusHandlers) {
      handler(status);
    }
  }
}

/**
 * Server side of an accepted socket.io connection
 */
class AcceptedConnection implements Connection {
  private statusHandlers: Array<(status: ConnectionStatus) => void> = [];
  private currentStatus: ConnectionStatus = 'connected';

  constructor(private readonly socket: ServerSocket) {
    socket.on('disconnect', () => {
      this.currentStatus = 'disconnected';
      for (const handler of this.statusHandlers) {
        handler('disconnected');
      }
    });
  }

  get id(): string {
    return this.socket.id;
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  send(event: string, payload: unknown): void {
    this.socket.emit(event, payload);
  }

  on(event: string, handler: MessageHandler): void {
    this.socket.on(event, handler);
  }

  onStatusChange(handler: (status: ConnectionStatus) => void): void {
    this.statusHandlers.push(handler);
  }

  close(): void {
    this.socket.disconnect(true);
  }
}

class SocketIoListener implements Listener {
  private connections = new Set<Connection>();
  private handlers: Array<(connection: Connection) => void> = [];

  constructor(
    readonly endpoint: NetworkEndpoint,
    private readonly io: Server
  ) {
    io.on('connection', (socket) => {
      const connection = new AcceptedConnection(socket);
      this.connections.add(connection);
      connection.onStatusChange((status) => {
        if (status === 'disconnected') this.connections.delete(connection);
      });
      for (const handler of this.handlers) {
        handler(connection);
      }
    });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  onConnection(handler: (connection: Connection) => void): void {
    this.handlers.push(handler);
    for (const connection of this.connections) {
      handler(connection);
    }
  }

  close(): void {
    this.connections.clear();
    this.io.close();
  }
}

/**
 * Production driver: socket.io server for listen endpoints,
 * socket.io-client for connect endpoints (websocket transport only).
 */
export class SocketIoDriver implements NetworkDriver {
  connect(endpoint: NetworkEndpoint): Connection {
    const socket = connectSocket(endpointUrl(endpoint), {
      transports: ['websocket'],
      reconnection: true,
    });
    return new ClientConnection(socket);
  }

  listen(endpoint: NetworkEndpoint): Listener {
    // The port is bound on every interface; listen endpoints are always wildcard
    const io = new Server(endpoint.port, {
      cors: { origin: '*' },
    });
    return new SocketIoListener(endpoint, io);
  }
}
