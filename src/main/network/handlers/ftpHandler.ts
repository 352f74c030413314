import {
  FTP_BANNER,
  FTP_LOGIN_FAILED,
  FTP_MAX_LINE_BYTES,
  FTP_MAX_TURNS,
  FTP_NOT_UNDERSTOOD,
  FTP_USER_OK,
} from '../../../shared/constants/decoy';
import type { ConnectionHandler } from './ConnectionHandler';

export function formatFtpCapture(username: string, password: string): string {
  return `USER=${username} PASS=${password}`;
}

export const ftpHandler: ConnectionHandler = {
  protocol: 'ftp',
  attackType: 'brute-force-ftp',

  async handle(session, options) {
    let username = '';
    let password = '';

    await session.write(FTP_BANNER);

    for (let turn = 0; turn < FTP_MAX_TURNS; turn++) {
      const received = await session.readLine(options.readTimeoutMs, FTP_MAX_LINE_BYTES);
      if (received === null) {
        break;
      }

      const line = received.trim();
      const command = line.toUpperCase();
      if (command.startsWith('USER')) {
        username = line.slice(4).trim();
        await session.write(FTP_USER_OK);
      } else if (command.startsWith('PASS')) {
        password = line.slice(4).trim();
        await session.write(FTP_LOGIN_FAILED);
        break;
      } else {
        await session.write(FTP_NOT_UNDERSTOOD);
      }
    }

    return formatFtpCapture(username, password);
  },
};
