import type {
  Alert,
  AttackEvent,
  AttackStatistics,
  AttackSummary,
  StoredAlert,
  StoredAttackEvent,
} from '../../../shared/types/attack';

export interface AttackQueryInput {
  limit?: number;
  offset?: number;
  // checked against the filter allow-list at run time
  filters?: Record<string, unknown>;
}

export interface PageInput {
  limit?: number;
  offset?: number;
}

export interface EventStore {
  recordAttack(event: AttackEvent): Promise<number>;
  getAttacks(query?: AttackQueryInput): Promise<StoredAttackEvent[]>;
  getAttackById(id: number): Promise<StoredAttackEvent | undefined>;
  getAttackStatistics(): Promise<AttackStatistics>;
  getSummary(now?: Date): Promise<AttackSummary>;
  recordAlert(alert: Alert): Promise<number>;
  getAlerts(page?: PageInput): Promise<StoredAlert[]>;
  close(): Promise<void>;
}
