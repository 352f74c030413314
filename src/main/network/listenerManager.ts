import type { ListenerStatus, Protocol } from '../../shared/types/attack';
import type { ListenerConfig } from '../../shared/types/config';
import { DEFAULT_HOST, DEFAULT_PORTS } from '../../shared/constants/decoy';
import type { CapturePipeline } from '../core/capture/CapturePipeline';
import type { DecoyListener, DecoyListenerOptions } from './DecoyListener';
import { createListener } from './listenerFactory';
import { ListenerBindError, ListenerNotRunningError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface StartListenerCommand {
  protocol: Protocol;
  host?: string;
  port?: number;
}

export interface ListenerManagerOptions {
  pipeline: CapturePipeline;
  listenerOptions?: DecoyListenerOptions;
  defaults?: Partial<Record<Protocol, Pick<ListenerConfig, 'host' | 'port'>>>;
  factory?: (protocol: Protocol, pipeline: CapturePipeline, options?: DecoyListenerOptions) => DecoyListener;
}

/**
 * Keeps at most one running decoy per protocol and answers the start, stop and list
 * commands for them.
 */
export class ListenerManager {
  private readonly listeners = new Map<Protocol, DecoyListener>();
  // stopped but still finishing in-flight sessions
  private readonly stopped = new Set<DecoyListener>();
  private readonly pipeline: CapturePipeline;
  private readonly listenerOptions?: DecoyListenerOptions;
  private readonly defaults: Partial<Record<Protocol, Pick<ListenerConfig, 'host' | 'port'>>>;
  private readonly factory: NonNullable<ListenerManagerOptions['factory']>;

  constructor(options: ListenerManagerOptions) {
    this.pipeline = options.pipeline;
    this.listenerOptions = options.listenerOptions;
    this.defaults = options.defaults ?? {};
    this.factory = options.factory ?? createListener;
  }

  async start(command: StartListenerCommand): Promise<ListenerStatus> {
    const { protocol } = command;
    const host = command.host ?? this.defaults[protocol]?.host ?? DEFAULT_HOST;
    const port = command.port ?? this.defaults[protocol]?.port ?? DEFAULT_PORTS[protocol];

    const existing = this.listeners.get(protocol);
    if (existing?.isRunning) {
      throw new ListenerBindError(
        protocol,
        host,
        port,
        'ERR_ALREADY_RUNNING',
        `Listener '${protocol}' is already running on ${existing.host}:${existing.port}`
      );
    }

    const listener = this.factory(protocol, this.pipeline, this.listenerOptions);
    try {
      await listener.start(host, port);
    } catch (error) {
      logger.error(`Failed to start ${protocol} listener on ${host}:${port}`, error);
      throw error;
    }

    this.listeners.set(protocol, listener);
    return toStatus(listener);
  }

  stop(protocol: Protocol): ListenerStatus {
    const listener = this.listeners.get(protocol);
    if (!listener || !listener.isRunning) {
      throw new ListenerNotRunningError(protocol);
    }

    listener.stop();
    this.listeners.delete(protocol);
    this.stopped.add(listener);
    void listener.drain().then(() => {
      this.stopped.delete(listener);
    });
    return toStatus(listener);
  }

  list(): ListenerStatus[] {
    return Array.from(this.listeners.values(), toStatus);
  }

  get(protocol: Protocol): DecoyListener | undefined {
    return this.listeners.get(protocol);
  }

  /** Stops every listener and waits for their in-flight sessions to finish. */
  async stopAll(): Promise<void> {
    for (const protocol of Array.from(this.listeners.keys())) {
      this.stop(protocol);
    }
    await Promise.all(Array.from(this.stopped, (listener) => listener.drain()));
  }
}

function toStatus(listener: DecoyListener): ListenerStatus {
  return {
    protocol: listener.protocol,
    host: listener.host,
    port: listener.port,
    isRunning: listener.isRunning,
    activeConnections: listener.activeConnections,
  };
}
