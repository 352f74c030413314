import type { AttackType, Protocol } from '../../../shared/types/attack';
import type { SocketSession } from '../SocketSession';

export interface HandlerOptions {
  readTimeoutMs: number;
}

/**
 * One scripted exchange with a connected peer. `handle` resolves with the text to record
 * as the attack payload and never rejects; the caller owns closing the session.
 */
export interface ConnectionHandler {
  readonly protocol: Protocol;
  readonly attackType: AttackType;
  handle(session: SocketSession, options: HandlerOptions): Promise<string>;
}
