/**
 * @fileoverview Length-prefixed TCP connection for the client driver.
 *
 * Frames arriving between requests are queued, so a notice the server sends
 * on its own (an idle timeout, say) is seen before the next send.
 */

import net from 'node:net';
import { ConnectionError, describeError, FrameError, FrameReader } from '@step-relay/shared';

export type RecvResult =
  | { kind: 'frame'; frame: Uint8Array }
  | { kind: 'timeout' }
  | { kind: 'closed'; error: Error | null };

export class FramedConnection {
  private readonly reader = new FrameReader();
  private pendingFrames: Uint8Array[] = [];
  private waitingResolve: ((frame: Uint8Array | null) => void) | null = null;
  private closed = false;
  private error: Error | null = null;

  private constructor(private readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.reader.push(chunk);
      this.processBuffer();
    });

    socket.on('error', (error: Error) => {
      this.error = new ConnectionError(error.message, { cause: error });
      this.markClosed();
    });

    socket.on('close', () => {
      this.markClosed();
    });
  }

  /**
   * Open a connection.
   * @throws {ConnectionError} if the server cannot be reached
   */
  static connect(host: string, port: number): Promise<FramedConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });
      const onError = (error: Error) => {
        reject(
          new ConnectionError(`Cannot connect to ${host}:${port}: ${error.message}`, {
            cause: error,
          })
        );
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new FramedConnection(socket));
      });
    });
  }

  private processBuffer(): void {
    try {
      for (let frame = this.reader.next(); frame !== null; frame = this.reader.next()) {
        if (this.waitingResolve) {
          this.waitingResolve(frame);
          this.waitingResolve = null;
        } else {
          this.pendingFrames.push(frame);
        }
      }
    } catch (error) {
      this.error =
        error instanceof FrameError ? error : new ConnectionError(describeError(error));
      this.socket.destroy();
    }
  }

  private markClosed(): void {
    this.closed = true;
    if (this.waitingResolve) {
      this.waitingResolve(null);
      this.waitingResolve = null;
    }
  }

  /** Whether the connection has been closed by either side */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Write one complete frame.
   */
  send(frame: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed) {
        reject(new ConnectionError('connection is closed'));
        return;
      }
      this.socket.write(frame, (error) => {
        if (error) reject(new ConnectionError(error.message, { cause: error }));
        else resolve();
      });
    });
  }

  /**
   * Take a frame that arrived without being awaited, if any.
   */
  takePendingFrame(): Uint8Array | null {
    return this.pendingFrames.shift() ?? null;
  }

  /**
   * Receive the next frame, waiting at most `timeoutMs`.
   */
  recv(timeoutMs: number): Promise<RecvResult> {
    const pending = this.takePendingFrame();
    if (pending) {
      return Promise.resolve({ kind: 'frame', frame: pending });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed', error: this.error });
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waitingResolve = null;
        resolve({ kind: 'timeout' });
      }, timeoutMs);

      this.waitingResolve = (frame) => {
        clearTimeout(timer);
        resolve(frame ? { kind: 'frame', frame } : { kind: 'closed', error: this.error });
      };
    });
  }

  /** Close the connection. */
  close(): void {
    this.socket.destroy();
  }
}
