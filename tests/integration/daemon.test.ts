jest.mock('../../src/main/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { startDaemon } from '../../src/main/main';
import { createDefaultConfig } from '../../src/main/utils/configLoader';
import { SQLiteEventStore } from '../../src/main/core/storage/SQLiteEventStore';
import type { AppConfig } from '../../src/shared/types/config';
import { FTP_BANNER, FTP_USER_OK, SSH_BANNER } from '../../src/shared/constants/decoy';
import { DecoyClient } from '../helpers/decoyClient';

const testConfig = (): AppConfig => {
  const config = createDefaultConfig('/nonexistent/snare-test');
  return {
    ...config,
    listeners: {
      ssh: { enabled: true, host: '127.0.0.1', port: 0 },
      http: { enabled: false, host: '127.0.0.1', port: 0 },
      ftp: { enabled: true, host: '127.0.0.1', port: 0 },
    },
    capture: { readTimeoutMs: 2000, maxConnections: 0 },
  };
};

describe('Daemon', () => {
  it('starts the enabled decoys and records attacks across protocols from one source', async () => {
    const store = new SQLiteEventStore(':memory:');
    const daemon = await startDaemon({ config: testConfig(), store, controlBridge: false });

    try {
      expect(daemon.manager.list().map((status) => status.protocol)).toEqual(['ssh', 'ftp']);

      const sshPort = daemon.manager.get('ssh')?.port ?? 0;
      const ftpPort = daemon.manager.get('ftp')?.port ?? 0;

      const ssh = await DecoyClient.connect(sshPort);
      await ssh.waitFor(SSH_BANNER);
      ssh.send('SSH-2.0-scanner');
      await ssh.closed;

      const ftp = await DecoyClient.connect(ftpPort);
      await ftp.waitFor(FTP_BANNER);
      ftp.send('USER root\r\n');
      await ftp.waitFor(FTP_USER_OK);
      ftp.send('PASS chmod 777\r\n');
      await ftp.closed;

      await daemon.manager.get('ssh')?.drain();
      await daemon.manager.get('ftp')?.drain();

      const attacks = await store.getAttacks();
      expect(attacks.map((attack) => [attack.protocol, attack.rawPayload])).toEqual([
        ['ftp', 'USER=root PASS=chmod 777'],
        ['ssh', 'SSH-2.0-scanner'],
      ]);
      expect(daemon.analyzer.getAttackHistory('127.0.0.1')).toBe(2);

      const alerts = await store.getAlerts();
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({ alertType: 'DANGEROUS_COMMAND', attackId: 2 });
    } finally {
      await daemon.shutdown();
    }

    expect(daemon.manager.list()).toEqual([]);
    await expect(store.getAttacks()).rejects.toThrow('Event store is closed');
  });

  it('keeps the other decoys running when one cannot bind', async () => {
    const store = new SQLiteEventStore(':memory:');
    const blocker = await startDaemon({
      config: {
        ...testConfig(),
        listeners: {
          ssh: { enabled: true, host: '127.0.0.1', port: 0 },
          http: { enabled: false, host: '127.0.0.1', port: 0 },
          ftp: { enabled: false, host: '127.0.0.1', port: 0 },
        },
      },
      store: new SQLiteEventStore(':memory:'),
      controlBridge: false,
    });
    const takenPort = blocker.manager.get('ssh')?.port ?? 0;

    const daemon = await startDaemon({
      config: {
        ...testConfig(),
        listeners: {
          ssh: { enabled: true, host: '127.0.0.1', port: takenPort },
          http: { enabled: true, host: '127.0.0.1', port: 0 },
          ftp: { enabled: false, host: '127.0.0.1', port: 0 },
        },
      },
      store,
      controlBridge: false,
    });

    try {
      expect(daemon.manager.list().map((status) => status.protocol)).toEqual(['http']);
    } finally {
      await daemon.shutdown();
      await blocker.shutdown();
    }
  });
});
