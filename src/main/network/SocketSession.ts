import type { Socket } from 'net';
import { logger } from '../utils/logger';

const NEWLINE = 0x0a;

/**
 * Buffered view over an accepted socket for scripted exchanges.
 *
 * Nothing here rejects: a timeout, a reset or the peer hanging up all read as "no more
 * input" (`null`), and writes to a dead socket are dropped. Handlers keep whatever they
 * captured so far.
 */
export class SocketSession {
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;
  private waiter: (() => void) | null = null;
  // read eagerly: both go undefined once the socket is destroyed
  readonly remoteAddress: string;
  readonly remotePort: number;

  constructor(
    private readonly socket: Socket,
    readonly sessionId: string
  ) {
    this.remoteAddress = normalizeAddress(socket.remoteAddress);
    this.remotePort = socket.remotePort ?? 0;

    socket.on('data', (chunk: Buffer) => {
      this.buffered = Buffer.concat([this.buffered, chunk]);
      this.wake();
    });
    socket.on('end', () => this.markEnded());
    socket.on('close', () => this.markEnded());
    socket.on('error', (error) => {
      logger.debug('Decoy socket error', { sessionId, error: error.message });
      this.markEnded();
    });
  }

  /** Up to `maxBytes` of whatever arrives first, or null if nothing does. */
  async readChunk(maxBytes: number, timeoutMs: number): Promise<Buffer | null> {
    if (this.buffered.length === 0 && !this.ended) {
      await this.waitForInput(timeoutMs);
    }
    if (this.buffered.length === 0) {
      return null;
    }
    return this.take(Math.min(maxBytes, this.buffered.length));
  }

  /**
   * Next newline-terminated line without its line ending. A final unterminated line is
   * returned once the peer stops sending; lines longer than `maxBytes` are cut.
   */
  async readLine(timeoutMs: number, maxBytes = 1024): Promise<string | null> {
    for (;;) {
      const newline = this.buffered.indexOf(NEWLINE);
      if (newline !== -1 && newline < maxBytes) {
        const line = this.take(newline + 1);
        return line.toString('utf-8').replace(/\r?\n$/, '');
      }
      if (this.buffered.length >= maxBytes) {
        return this.take(maxBytes).toString('utf-8');
      }
      if (this.ended) {
        return this.buffered.length > 0 ? this.take(this.buffered.length).toString('utf-8') : null;
      }
      const arrived = await this.waitForInput(timeoutMs);
      if (!arrived) {
        return this.buffered.length > 0 ? this.take(this.buffered.length).toString('utf-8') : null;
      }
    }
  }

  write(text: string): Promise<void> {
    if (!this.socket.writable) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.write(text, (error) => {
        if (error) {
          logger.debug('Decoy socket write failed', { sessionId: this.sessionId, error: error.message });
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.socket.destroyed) {
      return;
    }
    this.socket.end(() => this.socket.destroy());
  }

  private take(length: number): Buffer {
    const chunk = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    return chunk;
  }

  private waitForInput(timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(false);
      }, timeoutMs);
      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(true);
      };
    });
  }

  private wake(): void {
    this.waiter?.();
  }

  private markEnded(): void {
    this.ended = true;
    this.wake();
  }
}

export function normalizeAddress(address: string | undefined): string {
  if (!address) {
    return 'unknown';
  }
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}
