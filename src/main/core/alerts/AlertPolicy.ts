import type { Alert, AlertType, AttackEvent } from '../../../shared/types/attack';
import {
  ALERT_DETAIL_PAYLOAD_CHARS,
  DEFAULT_DANGEROUS_KEYWORDS,
} from '../../../shared/constants/decoy';

export interface AlertDecision {
  alertType: AlertType;
  matchedKeyword?: string;
}

export class AlertPolicy {
  private readonly keywords: string[];

  constructor(keywords: string[] = DEFAULT_DANGEROUS_KEYWORDS) {
    this.keywords = keywords.map((keyword) => keyword.toLowerCase()).filter((keyword) => keyword.length > 0);
  }

  /**
   * `capturedText` is what the attacker sent before escaping; keyword matching runs on it,
   * while the alert detail quotes the escaped payload stored with the event.
   */
  evaluate(event: AttackEvent, capturedText: string): AlertDecision | null {
    const lowered = capturedText.toLowerCase();
    const matchedKeyword = this.keywords.find((keyword) => lowered.includes(keyword));

    if (matchedKeyword !== undefined) {
      return { alertType: 'DANGEROUS_COMMAND', matchedKeyword };
    }
    if (event.threatLevel === 'HIGH' || event.threatLevel === 'CRITICAL') {
      return { alertType: 'HIGH_THREAT' };
    }
    return null;
  }

  buildAlert(event: AttackEvent, decision: AlertDecision): Alert {
    return {
      timestamp: event.timestamp,
      sourceIp: event.sourceIp,
      alertType: decision.alertType,
      detail: formatAlertDetail(event),
      attackId: event.id ?? null,
    };
  }
}

export function formatAlertDetail(event: AttackEvent): string {
  return (
    `threatLevel=${event.threatLevel} attackType=${event.attackType} ` +
    `data=${event.rawPayload.slice(0, ALERT_DETAIL_PAYLOAD_CHARS)}`
  );
}
