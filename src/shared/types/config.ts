import { Protocol } from './attack';

export interface AppConfig {
  listeners: Record<Protocol, ListenerConfig>;
  capture: CaptureConfig;
  alerts: AlertConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
  control: ControlConfig;
}

export interface ListenerConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface CaptureConfig {
  readTimeoutMs: number;
  maxConnections: number; // 0 = unbounded
}

export interface AlertConfig {
  keywords: string[];
}

export interface StorageConfig {
  databasePath: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  directory?: string;
}

export interface ControlConfig {
  socketPath?: string;
}
