/**
 * WebSocket transport for content surfaces.
 *
 * Each page that connects is one content-surface instance with its own
 * session. The connection's Origin header is the bridge origin: untrusted
 * origins are refused during the handshake and checked again per message.
 * Replies travel back as `callback` frames.
 */
import type { IncomingMessage } from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import type { CallbackFrame } from 'hostbridge-shared';
import { formatBridgeError } from 'hostbridge-shared';
import type { DispatchSink } from './dispatch-sink.js';
import type { HostEnvironment } from './environment.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import type { SecurityGate } from './security-gate.js';
import { BridgeSession } from './session.js';

export interface SurfaceServerOptions {
  gate: SecurityGate;
  environment: HostEnvironment;
  port: number;
  host?: string;
  logger?: Logger;
  /** Called for every accepted connection with its new session */
  onSession?: (session: BridgeSession) => void;
}

/** Sends replies to one connected page */
export class SocketDispatchSink implements DispatchSink {
  constructor(private readonly socket: WebSocket) {}

  deliver(callback: string, json: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Content surface is not connected'));
    }
    const frame: CallbackFrame = { kind: 'callback', callback, payload: json };
    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(frame), (err) => (err ? reject(err) : resolve()));
    });
  }
}

function originOf(req: IncomingMessage): string | undefined {
  const origin = req.headers.origin;
  return Array.isArray(origin) ? origin[0] : origin;
}

export class SurfaceServer {
  private sessions = new Map<WebSocket, BridgeSession>();
  private readonly logger: Logger;

  private constructor(
    private readonly wss: WebSocketServer,
    private readonly options: SurfaceServerOptions
  ) {
    this.logger = options.logger ?? createConsoleLogger('WS');

    this.wss.on('error', (err) => {
      this.logger.error('Server error', err);
    });

    this.wss.on('connection', (ws, req) => {
      this.handleConnection(ws, originOf(req));
    });
  }

  /** Create a SurfaceServer and wait for it to be listening. */
  static async create(options: SurfaceServerOptions): Promise<SurfaceServer> {
    const logger = options.logger ?? createConsoleLogger('Security');
    const wss = new WebSocketServer({
      port: options.port,
      host: options.host ?? '127.0.0.1',
      verifyClient: (info: { req: IncomingMessage }) => {
        const origin = originOf(info.req);
        if (options.gate.isBridgeOriginTrusted(origin)) return true;
        logger.warn(
          formatBridgeError(
            'UNTRUSTED_ORIGIN',
            `Refused connection from untrusted origin: ${origin ?? 'unknown'}`
          )
        );
        return false;
      },
    });
    await new Promise<void>((resolve, reject) => {
      wss.once('listening', resolve);
      wss.once('error', reject);
    });
    return new SurfaceServer(wss, options);
  }

  /** Port the server is bound to */
  get port(): number {
    const address = this.wss.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.port;
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  private handleConnection(ws: WebSocket, origin: string | undefined): void {
    const session = new BridgeSession({
      gate: this.options.gate,
      environment: this.options.environment,
      sink: new SocketDispatchSink(ws),
      logger: this.options.logger,
    });
    this.sessions.set(ws, session);
    this.logger.info(`Content surface connected from ${origin ?? 'unknown origin'}`);
    this.options.onSession?.(session);

    ws.on('message', (data) => {
      session.handler.handleFrame(data.toString(), origin);
    });

    ws.on('close', () => {
      session.close();
      this.sessions.delete(ws);
      this.logger.info('Content surface disconnected');
    });

    ws.on('error', (err) => {
      this.logger.error('Connection error', err);
    });
  }

  async close(): Promise<void> {
    for (const [ws, session] of this.sessions) {
      session.close();
      ws.close();
    }
    this.sessions.clear();

    return new Promise((resolve) => {
      this.wss.close(() => resolve());
    });
  }
}
