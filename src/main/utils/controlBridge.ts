import fs from 'fs';
import net, { Server } from 'net';
import { logger } from './logger';
import { getControlBridgePath } from '../../shared/constants/controlBridge';
import type {
  AnalyzerStatistics,
  AttackStatistics,
  AttackSummary,
  ListenerStatus,
  Protocol,
  StoredAlert,
  StoredAttackEvent,
} from '../../shared/types/attack';
import type { ControlResponse } from '../../shared/types/control';
import type { AttackQueryInput, EventStore, PageInput } from '../core/storage/EventStore';
import type { ThreatAnalyzer } from '../core/analysis/ThreatAnalyzer';
import type { ListenerManager, StartListenerCommand } from '../network/listenerManager';
import { ensureControlRequest } from './validation';
import { errorMessage } from './errors';

export interface CombinedStatistics {
  database: AttackStatistics;
  analyzer: AnalyzerStatistics;
}

export interface ControlBridgeHandlers {
  list: () => ListenerStatus[];
  start: (command: StartListenerCommand) => Promise<ListenerStatus>;
  stop: (protocol: Protocol) => ListenerStatus;
  attacks: (query: AttackQueryInput) => Promise<StoredAttackEvent[]>;
  attack: (id: number) => Promise<StoredAttackEvent | undefined>;
  alerts: (page: PageInput) => Promise<StoredAlert[]>;
  statistics: () => Promise<CombinedStatistics>;
  summary: () => Promise<AttackSummary>;
}

export interface ControlBridgeServer {
  server: Server;
  socketPath: string;
  close: () => Promise<void>;
}

export function createControlHandlers(services: {
  manager: ListenerManager;
  store: EventStore;
  analyzer: ThreatAnalyzer;
}): ControlBridgeHandlers {
  const { manager, store, analyzer } = services;
  return {
    list: () => manager.list(),
    start: (command) => manager.start(command),
    stop: (protocol) => manager.stop(protocol),
    attacks: (query) => store.getAttacks(query),
    attack: (id) => store.getAttackById(id),
    alerts: (page) => store.getAlerts(page),
    statistics: async () => ({
      database: await store.getAttackStatistics(),
      analyzer: analyzer.getStatistics(),
    }),
    summary: () => store.getSummary(),
  };
}

export async function handleControlRequest(
  payload: unknown,
  handlers: ControlBridgeHandlers
): Promise<unknown> {
  const request = ensureControlRequest(payload);

  switch (request.action) {
    case 'list':
      return handlers.list();
    case 'start':
      return handlers.start({ protocol: request.protocol, host: request.host, port: request.port });
    case 'stop':
      return handlers.stop(request.protocol);
    case 'attacks':
      return handlers.attacks({
        limit: request.limit,
        offset: request.offset,
        filters: request.filters,
      });
    case 'attack': {
      const attack = await handlers.attack(request.id);
      if (!attack) {
        throw new Error(`Attack ${request.id} not found`);
      }
      return attack;
    }
    case 'alerts':
      return handlers.alerts({ limit: request.limit, offset: request.offset });
    case 'statistics':
      return handlers.statistics();
    case 'summary':
      return handlers.summary();
  }
}

export function createControlBridgeServer(
  handlers: ControlBridgeHandlers,
  customPath?: string
): Promise<ControlBridgeServer> {
  const socketPath = getControlBridgePath(customPath);

  if (process.platform !== 'win32' && fs.existsSync(socketPath)) {
    try {
      fs.unlinkSync(socketPath);
    } catch (error) {
      logger.warn('Failed to remove stale control socket', error);
    }
  }

  // half-open: the client ends its side to mark the request complete, we answer after
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    let buffer = '';
    socket.setEncoding('utf-8');

    socket.on('data', (chunk: string) => {
      buffer += chunk;
    });

    socket.on('end', () => {
      void respond(buffer, handlers).then((response) => {
        socket.end(`${JSON.stringify(response)}\n`);
      });
    });

    socket.on('error', (error) => {
      logger.warn('Control bridge socket error', error);
    });
  });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    if (process.platform !== 'win32' && fs.existsSync(socketPath)) {
      try {
        fs.unlinkSync(socketPath);
      } catch (error) {
        logger.warn('Failed to unlink control socket on close', error);
      }
    }
  };

  return new Promise<ControlBridgeServer>((resolve, reject) => {
    server.once('error', reject);
    server.listen(socketPath, () => {
      server.removeListener('error', reject);
      server.on('error', (error) => {
        logger.error('Control bridge server error', error);
      });
      logger.info(`Control bridge listening on ${socketPath}`);
      resolve({ server, socketPath, close });
    });
  });
}

async function respond(raw: string, handlers: ControlBridgeHandlers): Promise<ControlResponse<unknown>> {
  try {
    const payload: unknown = JSON.parse(raw);
    const data = await handleControlRequest(payload, handlers);
    return { success: true, data };
  } catch (error) {
    logger.warn('Control bridge request failed', { error: errorMessage(error) });
    return { success: false, error: errorMessage(error) };
  }
}
