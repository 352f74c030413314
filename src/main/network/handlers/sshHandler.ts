import { SSH_BANNER, SSH_READ_SIZE } from '../../../shared/constants/decoy';
import type { ConnectionHandler } from './ConnectionHandler';

export const sshHandler: ConnectionHandler = {
  protocol: 'ssh',
  attackType: 'brute-force-ssh',

  async handle(session, options) {
    await session.write(SSH_BANNER);
    const data = await session.readChunk(SSH_READ_SIZE, options.readTimeoutMs);
    return data ? data.toString('utf-8').trim() : '';
  },
};
