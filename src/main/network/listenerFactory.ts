import type { Protocol } from '../../shared/types/attack';
import type { CapturePipeline } from '../core/capture/CapturePipeline';
import type { ConnectionHandler } from './handlers/ConnectionHandler';
import { sshHandler } from './handlers/sshHandler';
import { httpHandler } from './handlers/httpHandler';
import { ftpHandler } from './handlers/ftpHandler';
import { DecoyListener, DecoyListenerOptions, TcpDecoyListener } from './DecoyListener';

export const CONNECTION_HANDLERS: Record<Protocol, ConnectionHandler> = {
  ssh: sshHandler,
  http: httpHandler,
  ftp: ftpHandler,
};

export function createSshListener(pipeline: CapturePipeline, options?: DecoyListenerOptions): DecoyListener {
  return new TcpDecoyListener(sshHandler, pipeline, options);
}

export function createHttpListener(pipeline: CapturePipeline, options?: DecoyListenerOptions): DecoyListener {
  return new TcpDecoyListener(httpHandler, pipeline, options);
}

export function createFtpListener(pipeline: CapturePipeline, options?: DecoyListenerOptions): DecoyListener {
  return new TcpDecoyListener(ftpHandler, pipeline, options);
}

export function createListener(
  protocol: Protocol,
  pipeline: CapturePipeline,
  options?: DecoyListenerOptions
): DecoyListener {
  return new TcpDecoyListener(CONNECTION_HANDLERS[protocol], pipeline, options);
}
