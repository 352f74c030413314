import net, { Server, Socket } from 'net';
import { v4 as uuidv4 } from 'uuid';
import type { Protocol } from '../../shared/types/attack';
import { DEFAULT_READ_TIMEOUT_MS } from '../../shared/constants/decoy';
import type { CapturePipeline } from '../core/capture/CapturePipeline';
import type { ConnectionHandler } from './handlers/ConnectionHandler';
import { SocketSession } from './SocketSession';
import { ListenerBindError, errorCode } from '../utils/errors';
import { logger } from '../utils/logger';

export interface DecoyListener {
  readonly protocol: Protocol;
  readonly host: string;
  readonly port: number;
  readonly isRunning: boolean;
  readonly activeConnections: number;
  start(host: string, port: number): Promise<void>;
  stop(): void;
  drain(): Promise<void>;
}

export interface DecoyListenerOptions {
  readTimeoutMs?: number;
  // 0 leaves fan-out unbounded
  maxConnections?: number;
}

/**
 * Accepts connections on one TCP port and runs each through `handler` as its own task,
 * handing the capture to the pipeline once the socket is closed.
 */
export class TcpDecoyListener implements DecoyListener {
  private server: Server | null = null;
  private running = false;
  private boundHost = '';
  private boundPort = 0;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly readTimeoutMs: number;
  private readonly maxConnections: number;

  constructor(
    private readonly handler: ConnectionHandler,
    private readonly pipeline: CapturePipeline,
    options: DecoyListenerOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.maxConnections = options.maxConnections ?? 0;
  }

  get protocol(): Protocol {
    return this.handler.protocol;
  }

  get host(): string {
    return this.boundHost;
  }

  get port(): number {
    return this.boundPort;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get activeConnections(): number {
    return this.inFlight.size;
  }

  async start(host: string, port: number): Promise<void> {
    if (this.running) {
      throw new ListenerBindError(
        this.protocol,
        host,
        port,
        'ERR_ALREADY_RUNNING',
        `${this.protocol} listener is already running on ${this.boundHost}:${this.boundPort}`
      );
    }

    const server = net.createServer((socket) => this.accept(socket));
    if (this.maxConnections > 0) {
      server.maxConnections = this.maxConnections;
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.close();
        reject(new ListenerBindError(this.protocol, host, port, errorCode(error) ?? 'UNKNOWN', error.message));
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      logger.error(`${this.protocol} listener error`, error);
    });

    const address = server.address();
    this.boundHost = host;
    this.boundPort = address && typeof address === 'object' ? address.port : port;
    this.server = server;
    this.running = true;

    logger.info(`${this.protocol} decoy listening on ${this.boundHost}:${this.boundPort}`);
  }

  stop(): void {
    if (!this.running || !this.server) {
      return;
    }

    this.running = false;
    const server = this.server;
    this.server = null;

    // in-flight sessions keep their sockets and finish on their own
    server.close((error) => {
      if (error) {
        logger.warn(`${this.protocol} listener close reported an error`, error);
      }
    });
    logger.info(`${this.protocol} decoy stopped on ${this.boundHost}:${this.boundPort}`, {
      inFlight: this.inFlight.size,
    });
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  private accept(socket: Socket): void {
    if (!this.running) {
      socket.destroy();
      return;
    }

    const session = new SocketSession(socket, uuidv4());
    const task = this.runSession(session).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  private async runSession(session: SocketSession): Promise<void> {
    logger.debug(`${this.protocol} connection from ${session.remoteAddress}:${session.remotePort}`, {
      sessionId: session.sessionId,
    });

    let payload = '';
    try {
      payload = await this.handler.handle(session, { readTimeoutMs: this.readTimeoutMs });
    } catch (error) {
      logger.warn(`${this.protocol} handler failed`, { sessionId: session.sessionId, error });
    } finally {
      session.close();
    }

    try {
      await this.pipeline.capture({
        sourceIp: session.remoteAddress,
        sourcePort: session.remotePort,
        protocol: this.handler.protocol,
        attackType: this.handler.attackType,
        payload,
        sessionId: session.sessionId,
      });
    } catch (error) {
      logger.error(`${this.protocol} capture failed`, { sessionId: session.sessionId, error });
    }
  }
}
