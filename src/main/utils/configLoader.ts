import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AppConfig } from '../../shared/types/config';
import {
  DEFAULT_DANGEROUS_KEYWORDS,
  DEFAULT_HOST,
  DEFAULT_PORTS,
  DEFAULT_READ_TIMEOUT_MS,
} from '../../shared/constants/decoy';
import { ensureEnum, sanitizeAppConfig } from './validation';
import { ValidationError, errorMessage } from './errors';

export function getDataDir(): string {
  return process.env.SNARE_DATA_DIR || path.join(os.homedir(), '.snare');
}

export function createDefaultConfig(dataDir: string = getDataDir()): AppConfig {
  return {
    listeners: {
      ssh: { enabled: true, host: DEFAULT_HOST, port: DEFAULT_PORTS.ssh },
      http: { enabled: true, host: DEFAULT_HOST, port: DEFAULT_PORTS.http },
      ftp: { enabled: true, host: DEFAULT_HOST, port: DEFAULT_PORTS.ftp },
    },
    capture: {
      readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
      maxConnections: 0,
    },
    alerts: {
      keywords: [...DEFAULT_DANGEROUS_KEYWORDS],
    },
    storage: {
      databasePath: path.join(dataDir, 'snare.db'),
    },
    logging: {
      level: 'info',
      directory: path.join(dataDir, 'logs'),
    },
    control: {},
  };
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  if (process.env.SNARE_CONFIG) {
    return path.resolve(process.env.SNARE_CONFIG);
  }
  return path.join(getDataDir(), 'config.json');
}

async function ensureConfigExists(targetPath: string, defaults: AppConfig): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  try {
    await fs.access(targetPath);
  } catch {
    await fs.writeFile(targetPath, JSON.stringify(defaults, null, 2));
  }
}

function applyEnvOverrides(config: AppConfig): AppConfig {
  const databasePath = process.env.SNARE_DB_PATH;
  const logLevel = process.env.SNARE_LOG_LEVEL;

  return {
    ...config,
    storage: databasePath ? { ...config.storage, databasePath } : config.storage,
    logging: logLevel
      ? {
          ...config.logging,
          level: ensureEnum(logLevel, 'SNARE_LOG_LEVEL', ['error', 'warn', 'info', 'debug']),
        }
      : config.logging,
  };
}

/**
 * Reads the configuration file, writing the defaults first if there is none, then applies
 * environment overrides.
 */
export async function loadConfig(customPath?: string): Promise<AppConfig> {
  const configPath = resolveConfigPath(customPath);
  const defaults = createDefaultConfig();
  await ensureConfigExists(configPath, defaults);

  const contents = await fs.readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ValidationError(`Configuration file ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }

  return applyEnvOverrides(sanitizeAppConfig(parsed, defaults));
}
