#!/usr/bin/env node

import { Command } from 'commander';
import net from 'net';
import { getControlBridgePath } from '../shared/constants/controlBridge';
import type { ControlRequest, ControlResponse } from '../shared/types/control';
import { loadConfig } from './utils/configLoader';
import { ensureProtocol } from './utils/validation';
import { errorCode } from './utils/errors';
import { logger } from './utils/logger';
import { runDaemon } from './main';

const program = new Command();

const BRIDGE_TIMEOUT_MS = 3000;

let pendingBridgeConnection: net.Socket | null = null;

function cleanupPendingConnection(): void {
  if (pendingBridgeConnection) {
    pendingBridgeConnection.destroy();
    pendingBridgeConnection = null;
  }
}

async function resolveSocketPath(configPath?: string): Promise<string> {
  const config = await loadConfig(configPath);
  return getControlBridgePath(config.control.socketPath);
}

async function sendBridgeRequest(payload: ControlRequest, configPath?: string): Promise<unknown> {
  const socketPath = await resolveSocketPath(configPath);

  return await new Promise<unknown>((resolve, reject) => {
    const client = net.createConnection(socketPath, () => {
      client.end(`${JSON.stringify(payload)}\n`);
    });

    pendingBridgeConnection = client;
    let responseBuffer = '';

    client.setEncoding('utf-8');
    client.setTimeout(BRIDGE_TIMEOUT_MS, () => {
      client.destroy(new Error('Control bridge request timed out'));
    });

    client.on('data', (chunk: string) => {
      responseBuffer += chunk;
    });

    client.on('end', () => {
      cleanupPendingConnection();
      try {
        const parsed = JSON.parse(responseBuffer.trim()) as ControlResponse<unknown>;
        if (parsed.success) {
          resolve(parsed.data);
        } else {
          reject(new Error(parsed.error ?? 'Unknown bridge error'));
        }
      } catch (error) {
        reject(error);
      }
    });

    client.on('error', (error) => {
      cleanupPendingConnection();
      reject(error);
    });
  });
}

function isBridgeUnavailable(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ECONNREFUSED' || code === 'ENOENT';
}

function printJson(data: unknown): void {
  process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

async function runQuery(payload: ControlRequest, configPath?: string): Promise<void> {
  try {
    printJson(await sendBridgeRequest(payload, configPath));
  } catch (error) {
    if (isBridgeUnavailable(error)) {
      logger.error('Snare daemon is not running; start it with "snare serve"');
    } else {
      logger.error('Control bridge request failed', { error: error instanceof Error ? error.message : error });
    }
    process.exitCode = 1;
  }
}

program.name('snare').description('Decoy network services that capture and classify attacks').version('1.0.0');

program
  .command('serve')
  .description('Run the decoy listeners in the foreground')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async ({ config }: { config?: string }) => {
    await runDaemon(config);
  });

program
  .command('listeners')
  .description('List running decoy listeners')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async ({ config }: { config?: string }) => {
    await runQuery({ action: 'list' }, config);
  });

program
  .command('start <protocol>')
  .description('Start the decoy listener for ssh, http or ftp')
  .option('-H, --host <host>', 'Address to bind')
  .option('-p, --port <port>', 'Port to bind', parseInteger)
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (protocol: string, options: { host?: string; port?: number; config?: string }) => {
    await runQuery(
      { action: 'start', protocol: ensureProtocol(protocol), host: options.host, port: options.port },
      options.config
    );
  });

program
  .command('stop <protocol>')
  .description('Stop the decoy listener for ssh, http or ftp')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (protocol: string, { config }: { config?: string }) => {
    await runQuery({ action: 'stop', protocol: ensureProtocol(protocol) }, config);
  });

program
  .command('attacks')
  .description('List captured attacks, newest first')
  .option('-l, --limit <n>', 'Maximum number of rows', parseInteger)
  .option('-o, --offset <n>', 'Rows to skip', parseInteger)
  .option('--protocol <protocol>', 'Only this protocol')
  .option('--attack-type <type>', 'Only this attack type')
  .option('--source-ip <ip>', 'Only this source address')
  .option('--threat-level <level>', 'Only this threat level')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(
    async (options: {
      limit?: number;
      offset?: number;
      protocol?: string;
      attackType?: string;
      sourceIp?: string;
      threatLevel?: string;
      config?: string;
    }) => {
      const filters: Record<string, string> = {};
      if (options.protocol) filters.protocol = options.protocol;
      if (options.attackType) filters.attackType = options.attackType;
      if (options.sourceIp) filters.sourceIp = options.sourceIp;
      if (options.threatLevel) filters.threatLevel = options.threatLevel;

      await runQuery(
        { action: 'attacks', limit: options.limit, offset: options.offset, filters },
        options.config
      );
    }
  );

program
  .command('attack <id>')
  .description('Show one captured attack')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (id: string, { config }: { config?: string }) => {
    await runQuery({ action: 'attack', id: parseInteger(id) }, config);
  });

program
  .command('alerts')
  .description('List raised alerts, newest first')
  .option('-l, --limit <n>', 'Maximum number of rows', parseInteger)
  .option('-o, --offset <n>', 'Rows to skip', parseInteger)
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (options: { limit?: number; offset?: number; config?: string }) => {
    await runQuery({ action: 'alerts', limit: options.limit, offset: options.offset }, options.config);
  });

program
  .command('stats')
  .description('Print stored and in-memory attack statistics')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async ({ config }: { config?: string }) => {
    await runQuery({ action: 'statistics' }, config);
  });

program
  .command('summary')
  .description('Print the most targeted service and busiest hour of the last day')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async ({ config }: { config?: string }) => {
    await runQuery({ action: 'summary' }, config);
  });

void program
  .parseAsync(process.argv)
  .catch((error) => {
    logger.error('CLI command failed', { error });
    process.exit(1);
  })
  .finally(() => {
    cleanupPendingConnection();
  });
