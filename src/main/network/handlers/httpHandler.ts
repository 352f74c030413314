import { HTTP_DECOY_RESPONSE, HTTP_METHODS, HTTP_READ_SIZE } from '../../../shared/constants/decoy';
import type { ConnectionHandler } from './ConnectionHandler';

export interface ParsedHttpRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
}

export function parseHttpRequest(raw: string): ParsedHttpRequest | null {
  if (raw.length === 0) {
    return null;
  }

  const lines = raw.split(/\r\n|\r|\n/);
  const parts = lines[0].split(/\s+/).filter((part) => part.length > 0);
  const method = parts.length > 0 && HTTP_METHODS.has(parts[0]) ? parts[0] : 'UNKNOWN';
  const path = parts.length > 1 ? parts[1] : '/';

  const headers: Record<string, string> = {};
  for (const line of lines.slice(1)) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }
    headers[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }

  return { method, path, headers };
}

export function formatHttpCapture(raw: string): string {
  const request = parseHttpRequest(raw);
  if (!request) {
    return raw;
  }
  return `method=${request.method} path=${request.path} headers=${JSON.stringify(request.headers)}`;
}

export const httpHandler: ConnectionHandler = {
  protocol: 'http',
  attackType: 'http-probe',

  async handle(session, options) {
    const data = await session.readChunk(HTTP_READ_SIZE, options.readTimeoutMs);
    const raw = data ? data.toString('utf-8') : '';
    // the decoy page goes out whatever was asked
    await session.write(HTTP_DECOY_RESPONSE);
    return formatHttpCapture(raw);
  },
};
