/**
 * WebSocket Bridge
 *
 * `ws` server that pushes display messages (JSON text frames) to UI clients.
 * New clients get the most recent status right away; PING is answered with PONG.
 */

import { WebSocketServer as WSServer, WebSocket as WSWebSocket, type RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import type { DisplayFeed } from './DisplayFeed';
import { MESSAGE_TYPES, type DeviceStatusMessage, type DisplayMessage } from './types/MessageTypes';

const log = createLogger('WebSocketBridge');

export interface BridgeConfig {
  host: string;
  /** 0 picks a free port */
  port: number;
  maxConnections: number;
  heartbeatIntervalMs: number;
  maxPayload: number;
}

export interface BridgeStats {
  connections: number;
  messagesReceived: number;
  messagesSent: number;
  errors: number;
  uptime: number;
}

interface ClientConnection {
  id: string;
  socket: WSWebSocket;
  alive: boolean;
}

const DEFAULT_CONFIG: BridgeConfig = {
  host: '127.0.0.1',
  port: 8765,
  maxConnections: 10,
  heartbeatIntervalMs: 30000,
  maxPayload: 64 * 1024,
};

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export class WebSocketBridge {
  private server: WSServer | null = null;
  private clients = new Map<string, ClientConnection>();
  private readonly config: BridgeConfig;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private lastStatus: DeviceStatusMessage | null = null;
  private startTime = 0;
  private stats = { messagesReceived: 0, messagesSent: 0, errors: 0 };

  constructor(config: Partial<BridgeConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * @returns the bound port
   */
  async start(): Promise<number> {
    if (this.server) {
      throw new Error('WebSocket bridge already running');
    }

    const server = new WSServer({
      host: this.config.host,
      port: this.config.port,
      maxPayload: this.config.maxPayload,
      perMessageDeflate: false,
    });

    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve());
      server.once('error', reject);
    });

    server.on('connection', socket => this.handleConnection(socket));
    server.on('error', error => {
      this.stats.errors++;
      log.error(`Server error: ${describeError(error)}`);
    });

    this.server = server;
    this.startTime = Date.now();
    this.startHeartbeat();

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.config.port;
    log.info(`🌐 Display bridge listening on ws://${this.config.host}:${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    this.clients.forEach(client => client.socket.terminate());
    this.clients.clear();

    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    log.info('Display bridge stopped');
  }

  /**
   * Forward every message of a display feed. Returns the detach function.
   */
  attachFeed(feed: DisplayFeed): () => void {
    const forward = (message: DisplayMessage) => {
      this.broadcast(message);
    };
    feed.on('message', forward);
    return () => {
      feed.off('message', forward);
    };
  }

  broadcast(message: DisplayMessage): number {
    if (message.type === MESSAGE_TYPES.DEVICE_STATUS) this.lastStatus = message;
    if (this.clients.size === 0) return 0;

    const text = JSON.stringify(message);
    let sentCount = 0;

    this.clients.forEach(client => {
      if (this.sendText(client, text)) sentCount++;
    });
    return sentCount;
  }

  getStats(): BridgeStats {
    return {
      ...this.stats,
      connections: this.clients.size,
      uptime: this.startTime ? Date.now() - this.startTime : 0,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Clients
  // ───────────────────────────────────────────────────────────────────────────

  private handleConnection(socket: WSWebSocket): void {
    if (this.clients.size >= this.config.maxConnections) {
      socket.close(1008, 'Server at maximum capacity');
      return;
    }

    const client: ClientConnection = { id: uuidv4(), socket, alive: true };
    this.clients.set(client.id, client);
    log.info(`Client connected: ${client.id}`);

    socket.on('message', data => this.handleMessage(client, data));
    socket.on('pong', () => {
      client.alive = true;
    });
    socket.on('close', () => {
      this.clients.delete(client.id);
      log.info(`Client disconnected: ${client.id}`);
    });
    socket.on('error', error => {
      this.stats.errors++;
      log.warn(`Socket error for ${client.id}: ${describeError(error)}`);
    });

    if (this.lastStatus) this.sendText(client, JSON.stringify(this.lastStatus));
  }

  private handleMessage(client: ClientConnection, data: RawData): void {
    this.stats.messagesReceived++;
    client.alive = true;

    let type: unknown;
    try {
      const parsed: unknown = JSON.parse(rawToString(data));
      type = typeof parsed === 'object' && parsed !== null && 'type' in parsed ? parsed.type : undefined;
    } catch (error) {
      this.sendError(client, `Invalid JSON: ${describeError(error)}`);
      return;
    }

    if (type === MESSAGE_TYPES.PING) {
      this.sendText(client, JSON.stringify({ type: MESSAGE_TYPES.PONG, timestamp: Date.now() }));
    } else if (type !== MESSAGE_TYPES.PONG && type !== MESSAGE_TYPES.HEARTBEAT) {
      this.sendError(client, `Unsupported message type: ${String(type)}`);
    }
  }

  private sendError(client: ClientConnection, error: string): void {
    this.sendText(client, JSON.stringify({ type: MESSAGE_TYPES.ERROR, timestamp: Date.now(), error }));
  }

  private sendText(client: ClientConnection, text: string): boolean {
    if (client.socket.readyState !== WSWebSocket.OPEN) return false;

    try {
      client.socket.send(text);
      this.stats.messagesSent++;
      return true;
    } catch (error) {
      this.stats.errors++;
      log.error(`Failed to send to ${client.id}: ${describeError(error)}`);
      return false;
    }
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      this.clients.forEach(client => {
        if (!client.alive) {
          log.warn(`Client ${client.id} missed heartbeat; terminating`);
          client.socket.terminate();
          this.clients.delete(client.id);
          return;
        }
        client.alive = false;
        client.socket.ping();
      });
    }, this.config.heartbeatIntervalMs);
  }
}
