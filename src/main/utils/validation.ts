import {
  ALERT_TYPES,
  ATTACK_FILTER_KEYS,
  ATTACK_PATTERNS,
  ATTACK_TYPES,
  Alert,
  AttackEvent,
  AttackFilters,
  AttackQuery,
  Pagination,
  PROTOCOLS,
  Protocol,
  THREAT_LEVELS,
} from '../../shared/types/attack';
import { AppConfig, ListenerConfig, LogLevel } from '../../shared/types/config';
import { ControlAction, ControlRequest } from '../../shared/types/control';
import { ValidationError } from './errors';

type PlainObject = Record<string, unknown>;

const ALLOWED_LOG_LEVELS = new Set<LogLevel>(['error', 'warn', 'info', 'debug']);
const ALLOWED_CONTROL_ACTIONS = new Set<ControlAction>([
  'list',
  'start',
  'stop',
  'attacks',
  'attack',
  'alerts',
  'statistics',
  'summary',
]);
const ALLOWED_FILTER_KEYS = new Set<string>(ATTACK_FILTER_KEYS);

const ISO_TIMESTAMP_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 100_000;
const MAX_HOST_LENGTH = 255;
const MAX_KEYWORDS = 100;

export function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}

export function ensureString(
  value: unknown,
  field: string,
  options?: { allowEmpty?: boolean; maxLength?: number; pattern?: RegExp; trim?: boolean }
): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`Field "${field}" must be a string.`);
  }
  const result = options?.trim === false ? value : value.trim();
  if (!options?.allowEmpty && result.length === 0) {
    throw new ValidationError(`Field "${field}" cannot be empty.`);
  }
  if (options?.maxLength && result.length > options.maxLength) {
    throw new ValidationError(`Field "${field}" exceeds maximum length of ${options.maxLength}`);
  }
  if (options?.pattern && !options.pattern.test(result)) {
    throw new ValidationError(`Field "${field}" has invalid format.`);
  }
  return result;
}

export function ensureEnum<T extends string>(value: unknown, field: string, allowed: readonly T[]): T {
  const match = allowed.find((entry) => entry === value);
  if (match === undefined) {
    throw new ValidationError(`Field "${field}" must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function ensureBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`Field "${field}" must be a boolean.`);
  }
  return value;
}

export function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isInteger(value)) {
    throw new ValidationError(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new ValidationError(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new ValidationError(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

export function ensurePort(value: unknown, field: string): number {
  return ensureNumber(value, field, { integer: true, min: 0, max: 65535 });
}

export function ensureStringArray(
  value: unknown,
  field: string,
  options?: { maxLength?: number; maxEntries?: number }
): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`Field "${field}" must be an array.`);
  }
  if (options?.maxEntries && value.length > options.maxEntries) {
    throw new ValidationError(`Field "${field}" exceeds maximum length of ${options.maxEntries}.`);
  }
  // keywords such as "nc " are significant with their whitespace
  return value.map((entry, index) =>
    ensureString(entry, `${field}[${index}]`, { maxLength: options?.maxLength, trim: false })
  );
}

export function ensureAttackEvent(value: AttackEvent): AttackEvent {
  return {
    ...(value.id !== undefined
      ? { id: ensureNumber(value.id, 'id', { integer: true, min: 1 }) }
      : {}),
    timestamp: ensureString(value.timestamp, 'timestamp', { pattern: ISO_TIMESTAMP_REGEX }),
    sourceIp: ensureString(value.sourceIp, 'sourceIp', { maxLength: MAX_HOST_LENGTH }),
    sourcePort: ensurePort(value.sourcePort, 'sourcePort'),
    protocol: ensureEnum(value.protocol, 'protocol', PROTOCOLS),
    attackType: ensureEnum(value.attackType, 'attackType', ATTACK_TYPES),
    rawPayload: ensureString(value.rawPayload, 'rawPayload', { allowEmpty: true, trim: false }),
    threatLevel: ensureEnum(value.threatLevel, 'threatLevel', THREAT_LEVELS),
    attackPattern: ensureEnum(value.attackPattern, 'attackPattern', ATTACK_PATTERNS),
  };
}

export function ensureAlert(value: Alert): Alert {
  return {
    timestamp: ensureString(value.timestamp, 'timestamp', { pattern: ISO_TIMESTAMP_REGEX }),
    sourceIp: ensureString(value.sourceIp, 'sourceIp', { maxLength: MAX_HOST_LENGTH }),
    alertType: ensureEnum(value.alertType, 'alertType', ALERT_TYPES),
    detail: ensureString(value.detail, 'detail', { allowEmpty: true, trim: false }),
    attackId:
      value.attackId === null ? null : ensureNumber(value.attackId, 'attackId', { integer: true }),
  };
}

export function ensurePagination(value: { limit?: unknown; offset?: unknown } = {}): Pagination {
  return {
    limit:
      value.limit === undefined
        ? DEFAULT_PAGE_LIMIT
        : ensureNumber(value.limit, 'limit', { integer: true, min: 1, max: MAX_PAGE_LIMIT }),
    offset:
      value.offset === undefined
        ? 0
        : ensureNumber(value.offset, 'offset', { integer: true, min: 0 }),
  };
}

export function ensureAttackFilters(value: unknown): AttackFilters {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new ValidationError('Filters must be an object.');
  }

  const filters: AttackFilters = {};
  for (const [key, raw] of Object.entries(value)) {
    if (!ALLOWED_FILTER_KEYS.has(key)) {
      throw new ValidationError(`Filter column '${key}' is not allowed`);
    }
    switch (key) {
      case 'protocol':
        filters.protocol = ensureEnum(raw, 'filters.protocol', PROTOCOLS);
        break;
      case 'attackType':
        filters.attackType = ensureEnum(raw, 'filters.attackType', ATTACK_TYPES);
        break;
      case 'threatLevel':
        filters.threatLevel = ensureEnum(raw, 'filters.threatLevel', THREAT_LEVELS);
        break;
      case 'sourceIp':
        filters.sourceIp = ensureString(raw, 'filters.sourceIp', { maxLength: MAX_HOST_LENGTH });
        break;
    }
  }
  return filters;
}

export function ensureAttackQuery(
  value: { limit?: unknown; offset?: unknown; filters?: unknown } = {}
): AttackQuery {
  return {
    ...ensurePagination(value),
    filters: ensureAttackFilters(value.filters),
  };
}

function sanitizeListenerConfig(value: unknown, field: string, fallback: ListenerConfig): ListenerConfig {
  if (value === undefined) {
    return { ...fallback };
  }
  if (!isPlainObject(value)) {
    throw new ValidationError(`Field "${field}" must be an object.`);
  }
  return {
    enabled:
      value.enabled === undefined ? fallback.enabled : ensureBoolean(value.enabled, `${field}.enabled`),
    host:
      value.host === undefined
        ? fallback.host
        : ensureString(value.host, `${field}.host`, { maxLength: MAX_HOST_LENGTH }),
    port: value.port === undefined ? fallback.port : ensurePort(value.port, `${field}.port`),
  };
}

function section(value: PlainObject, key: string): PlainObject {
  const entry = value[key];
  if (entry === undefined) {
    return {};
  }
  if (!isPlainObject(entry)) {
    throw new ValidationError(`Field "${key}" must be an object.`);
  }
  return entry;
}

/**
 * Validates a configuration document read from disk and fills every missing field from
 * `defaults`. Unknown keys are ignored.
 */
export function sanitizeAppConfig(value: unknown, defaults: AppConfig): AppConfig {
  if (!isPlainObject(value)) {
    throw new ValidationError('Configuration must be an object.');
  }

  const listeners = section(value, 'listeners');
  const capture = section(value, 'capture');
  const alerts = section(value, 'alerts');
  const storage = section(value, 'storage');
  const logging = section(value, 'logging');
  const control = section(value, 'control');

  return {
    listeners: {
      ssh: sanitizeListenerConfig(listeners.ssh, 'listeners.ssh', defaults.listeners.ssh),
      http: sanitizeListenerConfig(listeners.http, 'listeners.http', defaults.listeners.http),
      ftp: sanitizeListenerConfig(listeners.ftp, 'listeners.ftp', defaults.listeners.ftp),
    },
    capture: {
      readTimeoutMs:
        capture.readTimeoutMs === undefined
          ? defaults.capture.readTimeoutMs
          : ensureNumber(capture.readTimeoutMs, 'capture.readTimeoutMs', { integer: true, min: 1 }),
      maxConnections:
        capture.maxConnections === undefined
          ? defaults.capture.maxConnections
          : ensureNumber(capture.maxConnections, 'capture.maxConnections', { integer: true, min: 0 }),
    },
    alerts: {
      keywords:
        alerts.keywords === undefined
          ? [...defaults.alerts.keywords]
          : ensureStringArray(alerts.keywords, 'alerts.keywords', {
              maxEntries: MAX_KEYWORDS,
              maxLength: 64,
            }),
    },
    storage: {
      databasePath:
        storage.databasePath === undefined
          ? defaults.storage.databasePath
          : ensureString(storage.databasePath, 'storage.databasePath'),
    },
    logging: {
      level:
        logging.level === undefined
          ? defaults.logging.level
          : ensureEnum(logging.level, 'logging.level', Array.from(ALLOWED_LOG_LEVELS)),
      directory:
        logging.directory === undefined
          ? defaults.logging.directory
          : ensureString(logging.directory, 'logging.directory'),
    },
    control: {
      socketPath:
        control.socketPath === undefined
          ? defaults.control.socketPath
          : ensureString(control.socketPath, 'control.socketPath'),
    },
  };
}

export function ensureProtocol(value: unknown, field = 'protocol'): Protocol {
  return ensureEnum(typeof value === 'string' ? value.toLowerCase() : value, field, PROTOCOLS);
}

function optionalNumber(value: unknown, field: string): number | undefined {
  return value === undefined ? undefined : ensureNumber(value, field);
}

/**
 * Narrows an untrusted control-socket payload to a `ControlRequest`. Pagination and filter
 * contents are left to the store, which owns those rules.
 */
export function ensureControlRequest(value: unknown): ControlRequest {
  if (!isPlainObject(value)) {
    throw new ValidationError('Control request must be an object.');
  }
  const action = ensureEnum(value.action, 'action', Array.from(ALLOWED_CONTROL_ACTIONS));

  switch (action) {
    case 'list':
    case 'statistics':
    case 'summary':
      return { action };
    case 'start':
      return {
        action,
        protocol: ensureProtocol(value.protocol),
        host:
          value.host === undefined
            ? undefined
            : ensureString(value.host, 'host', { maxLength: MAX_HOST_LENGTH }),
        port: value.port === undefined ? undefined : ensurePort(value.port, 'port'),
      };
    case 'stop':
      return { action, protocol: ensureProtocol(value.protocol) };
    case 'attack':
      return { action, id: ensureNumber(value.id, 'id', { integer: true, min: 1 }) };
    case 'alerts':
      return {
        action,
        limit: optionalNumber(value.limit, 'limit'),
        offset: optionalNumber(value.offset, 'offset'),
      };
    case 'attacks': {
      const filters = value.filters;
      if (filters !== undefined && !isPlainObject(filters)) {
        throw new ValidationError('Filters must be an object.');
      }
      return {
        action,
        limit: optionalNumber(value.limit, 'limit'),
        offset: optionalNumber(value.offset, 'offset'),
        filters,
      };
    }
  }
}
