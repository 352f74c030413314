export const PROTOCOLS = ['ssh', 'http', 'ftp'] as const;
export const ATTACK_TYPES = ['brute-force-ssh', 'http-probe', 'brute-force-ftp'] as const;
export const THREAT_LEVELS = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export const ATTACK_PATTERNS = ['BRUTE_FORCE', 'RECONNAISSANCE', 'EXPLOIT_ATTEMPT', 'UNKNOWN'] as const;
export const ALERT_TYPES = ['DANGEROUS_COMMAND', 'HIGH_THREAT'] as const;

export type Protocol = (typeof PROTOCOLS)[number];
export type AttackType = (typeof ATTACK_TYPES)[number];
export type ThreatLevel = (typeof THREAT_LEVELS)[number];
export type AttackPattern = (typeof ATTACK_PATTERNS)[number];
export type AlertType = (typeof ALERT_TYPES)[number];

export interface AttackEvent {
  id?: number;
  timestamp: string; // ISO-8601, UTC
  sourceIp: string;
  sourcePort: number;
  protocol: Protocol;
  attackType: AttackType;
  rawPayload: string; // HTML-entity escaped
  threatLevel: ThreatLevel;
  attackPattern: AttackPattern;
}

export type StoredAttackEvent = AttackEvent & { id: number };

export interface Alert {
  id?: number;
  timestamp: string;
  sourceIp: string;
  alertType: AlertType;
  detail: string;
  attackId: number | null;
}

export type StoredAlert = Alert & { id: number };

export interface ThreatAssessment {
  threatLevel: ThreatLevel;
  attackPattern: AttackPattern;
  recommendations: string[];
}

export interface IpCount {
  ip: string;
  count: number;
}

export interface AnalyzerStatistics {
  attackCountsByType: Record<string, number>;
  topAttackingIps: IpCount[];
  threatDistribution: Record<string, number>;
  totalAttacks: number;
}

export const ATTACK_FILTER_KEYS = ['protocol', 'attackType', 'sourceIp', 'threatLevel'] as const;

export interface AttackFilters {
  protocol?: Protocol;
  attackType?: AttackType;
  sourceIp?: string;
  threatLevel?: ThreatLevel;
}

export interface Pagination {
  limit: number;
  offset: number;
}

export interface AttackQuery extends Pagination {
  filters: AttackFilters;
}

export interface AttackStatistics {
  totalAttacks: number;
  uniqueAttackers: number;
  attacksByType: Record<string, number>;
  attacksByThreatLevel: Record<string, number>;
  topAttackingIps: IpCount[];
}

export interface AttackSummary {
  totalAttacks: number;
  uniqueAttackers: number;
  mostTargetedAttackType: string | null;
  busiestHourLast24h: string | null;
  attacksByThreatLevel: Record<string, number>;
}

export interface ListenerStatus {
  protocol: Protocol;
  host: string;
  port: number;
  isRunning: boolean;
  activeConnections: number;
}
