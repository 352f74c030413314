import type {
  AnalyzerStatistics,
  AttackPattern,
  IpCount,
  ThreatAssessment,
  ThreatLevel,
} from '../../../shared/types/attack';

export const MEDIUM_THRESHOLD = 3;
export const HIGH_THRESHOLD = 10;
export const CRITICAL_THRESHOLD = 25;

const TOP_IP_LIMIT = 10;
const UNKNOWN = 'unknown';

const BRUTE_FORCE_TYPES = new Set(['brute-force-ssh', 'brute-force-ftp']);
const RECONNAISSANCE_TYPES = new Set(['http-probe']);

export interface AnalyzerInput {
  sourceIp?: string;
  attackType?: string;
}

/**
 * Tracks how often each source and attack type has been seen and grades every new event
 * against that history.
 *
 * One instance is shared by all listeners. Every update happens synchronously inside
 * `analyze`, so no other connection's task can observe a half-applied update.
 */
export class ThreatAnalyzer {
  private readonly attackCounts = new Map<string, number>();
  private readonly typeCounts = new Map<string, number>();
  private readonly threatCounts = new Map<ThreatLevel, number>();

  analyze(input: AnalyzerInput): ThreatAssessment {
    const sourceIp = input.sourceIp || UNKNOWN;
    const attackType = input.attackType || UNKNOWN;

    const history = increment(this.attackCounts, sourceIp);
    increment(this.typeCounts, attackType);

    const threatLevel = computeThreatLevel(history, attackType);
    const attackPattern = detectPattern(attackType);
    const recommendations = buildRecommendations(threatLevel, attackPattern, sourceIp);

    increment(this.threatCounts, threatLevel);

    return { threatLevel, attackPattern, recommendations };
  }

  getAttackHistory(sourceIp: string): number {
    return this.attackCounts.get(sourceIp) ?? 0;
  }

  getStatistics(): AnalyzerStatistics {
    const attackCountsByType = Object.fromEntries(this.typeCounts);
    // Array.prototype.sort is stable, so equal counts keep first-seen order
    const topAttackingIps: IpCount[] = Array.from(this.attackCounts, ([ip, count]) => ({ ip, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_IP_LIMIT);
    let totalAttacks = 0;
    for (const count of this.typeCounts.values()) {
      totalAttacks += count;
    }

    return {
      attackCountsByType,
      topAttackingIps,
      threatDistribution: Object.fromEntries(this.threatCounts),
      totalAttacks,
    };
  }

  reset(): void {
    this.attackCounts.clear();
    this.typeCounts.clear();
    this.threatCounts.clear();
  }
}

function increment<K>(counts: Map<K, number>, key: K): number {
  const next = (counts.get(key) ?? 0) + 1;
  counts.set(key, next);
  return next;
}

export function computeThreatLevel(history: number, attackType: string): ThreatLevel {
  if (history >= CRITICAL_THRESHOLD) {
    return 'CRITICAL';
  }
  if (history >= HIGH_THRESHOLD) {
    return 'HIGH';
  }
  if (history >= MEDIUM_THRESHOLD || BRUTE_FORCE_TYPES.has(attackType)) {
    return 'MEDIUM';
  }
  return 'LOW';
}

export function detectPattern(attackType: string): AttackPattern {
  if (BRUTE_FORCE_TYPES.has(attackType)) {
    return 'BRUTE_FORCE';
  }
  if (RECONNAISSANCE_TYPES.has(attackType)) {
    return 'RECONNAISSANCE';
  }
  return 'EXPLOIT_ATTEMPT';
}

export function buildRecommendations(
  threatLevel: ThreatLevel,
  attackPattern: AttackPattern,
  sourceIp: string
): string[] {
  const recommendations: string[] = [];

  if (threatLevel === 'HIGH' || threatLevel === 'CRITICAL') {
    recommendations.push(`Block IP ${sourceIp} immediately at the firewall level.`);
  }

  if (attackPattern === 'BRUTE_FORCE') {
    recommendations.push('Enable account lockout policies and consider fail2ban.');
    recommendations.push('Disable password authentication and enforce SSH key-based login.');
  } else if (attackPattern === 'RECONNAISSANCE') {
    recommendations.push('Review exposed HTTP endpoints and remove unnecessary server banners.');
    recommendations.push('Enable a Web Application Firewall (WAF).');
  } else {
    recommendations.push('Investigate the source IP and review related logs.');
  }

  if (threatLevel === 'CRITICAL') {
    recommendations.push('Escalate to the incident response team.');
  }

  return recommendations;
}
