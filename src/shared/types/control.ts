import type { Protocol } from './attack';

export type ControlAction =
  | 'list'
  | 'start'
  | 'stop'
  | 'attacks'
  | 'attack'
  | 'alerts'
  | 'statistics'
  | 'summary';

export type ControlRequest =
  | { action: 'list' }
  | { action: 'start'; protocol: Protocol; host?: string; port?: number }
  | { action: 'stop'; protocol: Protocol }
  | { action: 'attacks'; limit?: number; offset?: number; filters?: Record<string, unknown> }
  | { action: 'attack'; id: number }
  | { action: 'alerts'; limit?: number; offset?: number }
  | { action: 'statistics' }
  | { action: 'summary' };

export interface ControlResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
