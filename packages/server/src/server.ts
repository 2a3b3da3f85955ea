import net, { type Server, type Socket } from 'node:net';
import { logger } from '@step-relay/shared';
import type { ServerConfig } from './config/serverConfig.js';
import {
  type SessionConnection,
  type SessionSummary,
  StepSession,
  type StepSessionConfig,
} from './session/StepSession.js';

export interface StepServerOptions {
  /** Callback invoked whenever a session closes */
  onSessionClosed?: (summary: SessionSummary) => void;
  /** How long a closed session's socket may wait for the peer's FIN before it is destroyed */
  closeGraceMs?: number;
}

const DEFAULT_CLOSE_GRACE_MS = 1000;

export interface ListeningAddress {
  host: string;
  port: number;
}

/**
 * Adapt a TCP socket to the session's connection interface.
 */
function createSocketConnection(socket: Socket, closeGraceMs: number): SessionConnection {
  return {
    send(frame: Uint8Array): void {
      socket.write(frame);
    },
    close(): void {
      if (socket.destroyed) return;
      socket.end();

      // Destroy the socket if the peer never closes its side
      const timer = setTimeout(() => socket.destroy(), closeGraceMs);
      timer.unref();
      socket.once('close', () => clearTimeout(timer));
    },
    get isWritable(): boolean {
      return socket.writable && !socket.destroyed;
    },
  };
}

/**
 * Accepts TCP connections and gives each one its own StepSession.
 * The listener itself performs no validation.
 */
export class StepServer {
  private readonly server: Server;
  private readonly sessionConfig: StepSessionConfig;
  private readonly connections = new Map<Socket, StepSession>();
  private sessionCounter = 0;

  constructor(
    private readonly config: ServerConfig,
    private readonly options: StepServerOptions = {}
  ) {
    this.sessionConfig = {
      timeoutThresholdSeconds: config.timeoutThresholdSeconds,
      idleTimeoutMs: config.idleTimeoutSeconds * 1000,
      maxFrameBytes: config.maxFrameBytes,
      firstStepId: config.firstStepId,
    };
    this.server = net.createServer((socket) => this.handleConnection(socket));
  }

  /**
   * Bind to the configured host and port.
   * @returns the address actually bound (port 0 picks a free port)
   */
  start(): Promise<ListeningAddress> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        this.server.off('error', onError);
        this.server.on('error', (error: Error) => {
          logger.error('Listener error', { error: error.message });
        });

        const address = this.address();
        logger.info('Server started', {
          ...address,
          timeoutThresholdSeconds: this.config.timeoutThresholdSeconds,
          idleTimeoutSeconds: this.config.idleTimeoutSeconds,
        });
        resolve(address);
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.config.port, this.config.host);
    });
  }

  /**
   * Address the listener is bound to.
   */
  address(): ListeningAddress {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return { host: address.address, port: address.port };
  }

  /** Number of sockets not yet closed, including those of finished sessions */
  getConnectionCount(): number {
    return this.connections.size;
  }

  private handleConnection(socket: Socket): void {
    this.sessionCounter++;
    const sessionId = `session-${this.sessionCounter}`;
    logger.info('Connection accepted', {
      sessionId,
      peer: `${socket.remoteAddress}:${socket.remotePort}`,
    });

    const conn = createSocketConnection(
      socket,
      this.options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS
    );
    const session = new StepSession(conn, {
      sessionId,
      config: this.sessionConfig,
      onClose: (summary) => this.options.onSessionClosed?.(summary),
    });
    this.connections.set(socket, session);

    socket.on('data', (chunk: Buffer) => {
      session.handleData(chunk);
    });

    socket.on('end', () => {
      session.handleEnd();
    });

    socket.on('error', (error: Error) => {
      logger.debug('Socket error', { sessionId, error: error.message });
      session.handleError(error);
    });

    socket.on('close', () => {
      this.connections.delete(socket);
      session.handleEnd();
    });
  }

  /**
   * Close every open session and stop accepting connections.
   */
  async stop(): Promise<void> {
    for (const [socket, session] of this.connections) {
      session.shutdown();
      socket.destroy();
    }
    this.connections.clear();

    if (!this.server.listening) return;

    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    logger.info('Server closed');
  }
}
