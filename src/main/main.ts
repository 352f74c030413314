import { initializeLogger, logger } from './utils/logger';
import { loadConfig } from './utils/configLoader';
import { createControlBridgeServer, createControlHandlers, ControlBridgeServer } from './utils/controlBridge';
import { ThreatAnalyzer } from './core/analysis/ThreatAnalyzer';
import { AlertPolicy } from './core/alerts/AlertPolicy';
import { CapturePipeline } from './core/capture/CapturePipeline';
import { SQLiteEventStore } from './core/storage/SQLiteEventStore';
import type { EventStore } from './core/storage/EventStore';
import { ListenerManager } from './network/listenerManager';
import { PROTOCOLS, Alert } from '../shared/types/attack';
import type { AppConfig } from '../shared/types/config';

export interface Daemon {
  config: AppConfig;
  analyzer: ThreatAnalyzer;
  store: EventStore;
  pipeline: CapturePipeline;
  manager: ListenerManager;
  bridge: ControlBridgeServer | null;
  shutdown: () => Promise<void>;
}

export interface DaemonOptions {
  config: AppConfig;
  store?: EventStore;
  // the control socket is optional so several daemons can share a host in tests
  controlBridge?: boolean;
}

/**
 * Builds the shared services once and wires them into the listeners: one analyzer and one
 * store for every connection on every protocol.
 */
export async function startDaemon(options: DaemonOptions): Promise<Daemon> {
  const { config } = options;

  const analyzer = new ThreatAnalyzer();
  const store = options.store ?? new SQLiteEventStore(config.storage.databasePath);
  const pipeline = new CapturePipeline({
    analyzer,
    store,
    alertPolicy: new AlertPolicy(config.alerts.keywords),
  });
  pipeline.on('alert', (alert: Alert) => {
    logger.warn(`Alert ${alert.alertType} raised for ${alert.sourceIp}`, { attackId: alert.attackId });
  });

  const manager = new ListenerManager({
    pipeline,
    defaults: config.listeners,
    listenerOptions: {
      readTimeoutMs: config.capture.readTimeoutMs,
      maxConnections: config.capture.maxConnections,
    },
  });

  for (const protocol of PROTOCOLS) {
    const listenerConfig = config.listeners[protocol];
    if (!listenerConfig.enabled) {
      continue;
    }
    try {
      await manager.start({ protocol, host: listenerConfig.host, port: listenerConfig.port });
    } catch (error) {
      // one protocol failing to bind leaves the others running
      logger.error(`Skipping ${protocol} listener`, error);
    }
  }

  const bridge =
    options.controlBridge === false
      ? null
      : await createControlBridgeServer(
          createControlHandlers({ manager, store, analyzer }),
          config.control.socketPath
        );

  let shuttingDown: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!shuttingDown) {
      shuttingDown = (async () => {
        logger.info('Shutting down decoy listeners');
        await bridge?.close();
        await manager.stopAll();
        await store.close();
        logger.info('Clean shutdown complete');
      })();
    }
    return shuttingDown;
  };

  return { config, analyzer, store, pipeline, manager, bridge, shutdown };
}

export async function runDaemon(configPath?: string): Promise<Daemon> {
  const config = await loadConfig(configPath);
  initializeLogger(config.logging);

  if (typeof process.getuid === 'function' && process.getuid() === 0) {
    logger.warn('Running as root is not recommended; bind the decoys to unprivileged ports instead');
  }

  const daemon = await startDaemon({ config });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    daemon
      .shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return daemon;
}

if (require.main === module) {
  runDaemon(process.env.SNARE_CONFIG).catch((error) => {
    logger.error('Failed to start snare', error);
    process.exit(1);
  });
}
