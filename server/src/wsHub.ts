import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { CommandRouter } from './commandRouter';
import { wsLog, logger } from './logger';
import { OutboundMessage } from './models';
import { Session, SessionChannel, SessionRegistry } from './sessionRegistry';

export interface WsHubOptions {
  path: string;
  maxPayload: number;
  perMessageDeflate: boolean;
  /** Protocol-level ping period; a socket that misses one round is dropped. */
  livenessIntervalMs: number;
  /** Period of the application heartbeat pushed to authenticated sessions. */
  heartbeatIntervalMs: number;
  version: string;
  isDeviceConnected: () => boolean;
}

class WsSessionChannel implements SessionChannel {
  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress: string
  ) {}

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}

interface Connection {
  session: Session;
  alive: boolean;
}

export class WsHub {
  private readonly wss: WebSocketServer;
  private readonly connections = new Map<WebSocket, Connection>();
  private livenessTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;

  constructor(
    server: http.Server,
    private readonly registry: SessionRegistry,
    private readonly router: CommandRouter,
    private readonly options: WsHubOptions
  ) {
    this.wss = new WebSocketServer({
      noServer: true,
      perMessageDeflate: options.perMessageDeflate,
      maxPayload: options.maxPayload,
      clientTracking: true,
    });
    this.wss.on('connection', (socket, req) => this.handleConnection(socket, req));

    // Handle upgrade manually to filter by path
    server.on('upgrade', (req, sock, head) => {
      if (req.url !== options.path) {
        sock.destroy();
        return;
      }
      this.wss.handleUpgrade(req, sock, head, (ws) => {
        this.wss.emit('connection', ws, req);
      });
    });
  }

  start(): void {
    this.startLiveness();
    this.startHeartbeat();
  }

  stop(): void {
    if (this.livenessTimer) {
      clearInterval(this.livenessTimer);
      this.livenessTimer = undefined;
    }
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  /** Closes every session, then the ws server itself. */
  close(code: number, reason: string): Promise<void> {
    this.stop();
    this.registry.closeAll(code, reason);
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleConnection(socket: WebSocket, req: http.IncomingMessage): void {
    const remote = `${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? 0}`;
    const session = new Session(new WsSessionChannel(socket, remote));
    const connection: Connection = { session, alive: true };
    this.connections.set(socket, connection);
    this.registry.register(session);

    // low-latency control frames
    req.socket.setNoDelay(true);

    socket.on('pong', () => {
      connection.alive = true;
    });
    socket.on('message', (data) => this.handleMessage(session, data));
    socket.on('close', (code, reason) => this.handleClose(socket, code, reason.toString()));
    socket.on('error', (err) => wsLog(`Socket error from ${session.label}: ${err.message}`));

    this.send(session, {
      type: 'welcome',
      message: 'Robot Control Server',
      version: this.options.version,
      commands: this.router.commands,
      arduino_connected: this.options.isDeviceConnected(),
    });
  }

  /**
   * Frames from one session are processed one at a time: the next frame is
   * not handled until the previous response has been sent.
   */
  private handleMessage(session: Session, data: WebSocket.RawData): void {
    const text = data.toString();
    session
      .enqueue(async () => {
        logger.debug('[WS]', `Received from ${session.label}: ${text}`);
        const response = await this.router.handle(session, text);
        const sent = await session.deliver(response);
        if (!sent) {
          wsLog(`Dropped ${response.type} response for closed session ${session.label}`);
        }
      })
      .catch((err: unknown) => wsLog(`Failed to answer ${session.label}`, err));
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    const connection = this.connections.get(socket);
    this.connections.delete(socket);
    if (!connection) return;
    wsLog(`Client disconnected: ${connection.session.label} (${code}: ${reason})`);
    this.registry.remove(connection.session);
  }

  private send(session: Session, message: OutboundMessage): void {
    session.deliver(message).catch((err: unknown) => wsLog(`Failed to send to ${session.label}`, err));
  }

  /**
   * Liveness:
   * - Send a protocol-level ping every interval.
   * - A socket that did not pong since the previous round is terminated.
   */
  private startLiveness(): void {
    if (this.livenessTimer) return;
    this.livenessTimer = setInterval(() => {
      for (const [socket, connection] of this.connections) {
        if (socket.readyState !== WebSocket.OPEN) continue;
        if (!connection.alive) {
          wsLog(`No pong from ${connection.session.label}; terminating socket`);
          socket.terminate();
          this.registry.remove(connection.session);
          continue;
        }
        connection.alive = false;
        try {
          socket.ping();
        } catch (e) {
          wsLog(`ping error: ${e instanceof Error ? e.message : String(e)}`);
        }
      }
    }, this.options.livenessIntervalMs);
  }

  private startHeartbeat(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => {
      this.registry
        .broadcast({
          type: 'heartbeat',
          arduino_connected: this.options.isDeviceConnected(),
          timestamp: new Date().toISOString(),
        })
        .catch((err: unknown) => wsLog('Heartbeat broadcast failed', err));
    }, this.options.heartbeatIntervalMs);
  }
}
