import type { AttackEvent } from '../../src/shared/types/attack';

export const createAttackEvent = (overrides: Partial<AttackEvent> = {}): AttackEvent => ({
  timestamp: '2024-05-01T10:00:00.000Z',
  sourceIp: '203.0.113.10',
  sourcePort: 40000,
  protocol: 'ssh',
  attackType: 'brute-force-ssh',
  rawPayload: 'SSH-2.0-libssh_0.9.6',
  threatLevel: 'MEDIUM',
  attackPattern: 'BRUTE_FORCE',
  ...overrides,
});
