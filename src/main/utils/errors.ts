import type { Protocol } from '../../shared/types/attack';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a listener cannot take its address: the port is in use, binding is not
 * permitted, or the listener is already running. `code` carries the socket error code
 * (`EADDRINUSE`, `EACCES`, ...) or `ERR_ALREADY_RUNNING`.
 */
export class ListenerBindError extends Error {
  constructor(
    readonly protocol: Protocol,
    readonly host: string,
    readonly port: number,
    readonly code: string,
    message?: string
  ) {
    super(message ?? `Failed to bind ${protocol} listener on ${host}:${port} (${code})`);
    this.name = 'ListenerBindError';
  }
}

export class ListenerNotRunningError extends Error {
  constructor(readonly protocol: Protocol) {
    super(`Listener '${protocol}' is not running`);
    this.name = 'ListenerNotRunningError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
