import { EventEmitter } from 'events';
import type {
  Alert,
  AttackEvent,
  AttackType,
  Protocol,
  ThreatAssessment,
} from '../../../shared/types/attack';
import { ThreatAnalyzer } from '../analysis/ThreatAnalyzer';
import { AlertPolicy } from '../alerts/AlertPolicy';
import type { EventStore } from '../storage/EventStore';
import { escapeHtml } from '../../utils/sanitize';
import { ensureAttackEvent } from '../../utils/validation';
import { logger } from '../../utils/logger';

export interface RawCapture {
  sourceIp: string;
  sourcePort: number;
  protocol: Protocol;
  attackType: AttackType;
  payload: string;
  sessionId?: string;
}

export interface CaptureResult {
  event: AttackEvent;
  recommendations: string[];
  alert?: Alert;
}

export interface CapturePipelineOptions {
  analyzer: ThreatAnalyzer;
  store: EventStore;
  alertPolicy: AlertPolicy;
}

const FALLBACK_ASSESSMENT: ThreatAssessment = {
  threatLevel: 'LOW',
  attackPattern: 'UNKNOWN',
  recommendations: [],
};

/**
 * Classify, persist and alert on one captured connection, strictly in that order.
 *
 * Emits `attack` with every `CaptureResult` and `alert` with every persisted alert.
 */
export class CapturePipeline extends EventEmitter {
  private readonly analyzer: ThreatAnalyzer;
  private readonly store: EventStore;
  private readonly alertPolicy: AlertPolicy;

  constructor(options: CapturePipelineOptions) {
    super();
    this.analyzer = options.analyzer;
    this.store = options.store;
    this.alertPolicy = options.alertPolicy;
  }

  async capture(raw: RawCapture): Promise<CaptureResult> {
    const timestamp = new Date().toISOString();
    const assessment = this.assess(raw);

    const event: AttackEvent = ensureAttackEvent({
      timestamp,
      sourceIp: raw.sourceIp,
      sourcePort: raw.sourcePort,
      protocol: raw.protocol,
      attackType: raw.attackType,
      rawPayload: escapeHtml(raw.payload),
      threatLevel: assessment.threatLevel,
      attackPattern: assessment.attackPattern,
    });

    try {
      event.id = await this.store.recordAttack(event);
    } catch (error) {
      logger.error('Failed to persist attack event', {
        sessionId: raw.sessionId,
        sourceIp: event.sourceIp,
        protocol: event.protocol,
        error,
      });
    }

    const result: CaptureResult = { event, recommendations: assessment.recommendations };

    const decision = this.alertPolicy.evaluate(event, raw.payload);
    if (decision) {
      const alert = this.alertPolicy.buildAlert(event, decision);
      try {
        alert.id = await this.store.recordAlert(alert);
        result.alert = alert;
        this.emit('alert', alert);
      } catch (error) {
        logger.error('Failed to persist alert', {
          sessionId: raw.sessionId,
          alertType: alert.alertType,
          attackId: alert.attackId,
          error,
        });
      }
    }

    logger.warn(
      `[${event.protocol}] Attack from ${event.sourceIp}:${event.sourcePort} | type=${event.attackType} | threat=${event.threatLevel}`,
      { sessionId: raw.sessionId, attackId: event.id }
    );
    this.emit('attack', result);

    return result;
  }

  private assess(raw: RawCapture): ThreatAssessment {
    try {
      return this.analyzer.analyze({ sourceIp: raw.sourceIp, attackType: raw.attackType });
    } catch (error) {
      logger.error('Threat analysis failed, defaulting to LOW', {
        sessionId: raw.sessionId,
        sourceIp: raw.sourceIp,
        error,
      });
      return { ...FALLBACK_ASSESSMENT, recommendations: [] };
    }
  }
}
