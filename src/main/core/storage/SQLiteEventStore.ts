import Database from 'better-sqlite3';
import PQueue from 'p-queue';
import * as path from 'path';
import * as fs from 'fs';
import type {
  Alert,
  AttackEvent,
  AttackStatistics,
  AttackSummary,
  IpCount,
  StoredAlert,
  StoredAttackEvent,
} from '../../../shared/types/attack';
import { AttackQueryInput, EventStore, PageInput } from './EventStore';
import { ensureAlert, ensureAttackEvent, ensureAttackQuery, ensurePagination } from '../../utils/validation';
import { logger } from '../../utils/logger';

const MEMORY_DATABASE = ':memory:';
const TOP_IP_LIMIT = 10;
const DAY_MS = 24 * 60 * 60 * 1000;

interface GroupCountRow {
  label: string;
  count: number;
}

/**
 * Append-only SQLite log of captured attacks and the alerts they raised.
 *
 * Every read and write goes through a single-slot queue, which is the store's only mutual
 * exclusion domain: ids come out unique and strictly increasing no matter how many
 * connections record at once, and a read issued after a write observes it.
 */
export class SQLiteEventStore implements EventStore {
  private readonly db: Database.Database;
  private readonly queue = new PQueue({ concurrency: 1 });
  private closed = false;

  constructor(readonly dbPath: string) {
    if (dbPath !== MEMORY_DATABASE) {
      const dataDir = path.dirname(dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initializeDatabase();
    logger.info(`SQLite event store initialized at ${dbPath}`);
  }

  private initializeDatabase(): void {
    if (this.dbPath !== MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    // a resolved write has reached the disk
    this.db.pragma('synchronous = FULL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS attack_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        sourceIp TEXT NOT NULL,
        sourcePort INTEGER NOT NULL,
        protocol TEXT NOT NULL,
        attackType TEXT NOT NULL,
        rawPayload TEXT NOT NULL,
        threatLevel TEXT NOT NULL,
        attackPattern TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_attack_timestamp ON attack_events(timestamp);
      CREATE INDEX IF NOT EXISTS idx_attack_sourceIp ON attack_events(sourceIp);
      CREATE INDEX IF NOT EXISTS idx_attack_protocol ON attack_events(protocol);

      CREATE TABLE IF NOT EXISTS alerts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        sourceIp TEXT NOT NULL,
        alertType TEXT NOT NULL,
        detail TEXT NOT NULL,
        attackId INTEGER
      );
    `);
  }

  private exclusive<T>(operation: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Event store is closed'));
    }
    return this.queue.add(operation);
  }

  async recordAttack(event: AttackEvent): Promise<number> {
    const row = ensureAttackEvent(event);

    return this.exclusive(() => {
      try {
        const stmt = this.db.prepare<Omit<AttackEvent, 'id'>>(`
          INSERT INTO attack_events
            (timestamp, sourceIp, sourcePort, protocol, attackType, rawPayload, threatLevel, attackPattern)
          VALUES
            (@timestamp, @sourceIp, @sourcePort, @protocol, @attackType, @rawPayload, @threatLevel, @attackPattern)
        `);
        const info = stmt.run({
          timestamp: row.timestamp,
          sourceIp: row.sourceIp,
          sourcePort: row.sourcePort,
          protocol: row.protocol,
          attackType: row.attackType,
          rawPayload: row.rawPayload,
          threatLevel: row.threatLevel,
          attackPattern: row.attackPattern,
        });
        const id = Number(info.lastInsertRowid);
        logger.debug(`Recorded attack ${id} from ${row.sourceIp}`);
        return id;
      } catch (error) {
        logger.error(`Failed to record attack from ${row.sourceIp}`, error);
        throw error;
      }
    });
  }

  async getAttacks(query: AttackQueryInput = {}): Promise<StoredAttackEvent[]> {
    const { limit, offset, filters } = ensureAttackQuery(query);

    const clauses: string[] = [];
    const params: unknown[] = [];
    for (const [column, value] of Object.entries(filters)) {
      // column names come from the filter allow-list only
      clauses.push(`${column} = ?`);
      params.push(value);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    return this.exclusive(() => {
      try {
        const stmt = this.db.prepare<unknown[], StoredAttackEvent>(
          `SELECT * FROM attack_events ${where} ORDER BY id DESC LIMIT ? OFFSET ?`
        );
        return stmt.all(...params, limit, offset);
      } catch (error) {
        logger.error('Failed to list attacks', error);
        throw error;
      }
    });
  }

  async getAttackById(id: number): Promise<StoredAttackEvent | undefined> {
    return this.exclusive(() => {
      try {
        const stmt = this.db.prepare<[number], StoredAttackEvent>(
          'SELECT * FROM attack_events WHERE id = ?'
        );
        return stmt.get(id);
      } catch (error) {
        logger.error(`Failed to get attack ${id}`, error);
        throw error;
      }
    });
  }

  async getAttackStatistics(): Promise<AttackStatistics> {
    return this.exclusive(() => {
      try {
        return this.collectStatistics();
      } catch (error) {
        logger.error('Failed to compute attack statistics', error);
        throw error;
      }
    });
  }

  async getSummary(now: Date = new Date()): Promise<AttackSummary> {
    const since = new Date(now.getTime() - DAY_MS).toISOString();

    return this.exclusive(() => {
      try {
        const stats = this.collectStatistics();
        const mostTargeted = this.db
          .prepare<[], GroupCountRow>(
            `SELECT attackType AS label, COUNT(*) AS count FROM attack_events
             GROUP BY attackType ORDER BY count DESC, attackType ASC LIMIT 1`
          )
          .get();
        // ISO timestamps carry the hour at characters 12-13
        const busiestHour = this.db
          .prepare<[string], GroupCountRow>(
            `SELECT substr(timestamp, 12, 2) AS label, COUNT(*) AS count FROM attack_events
             WHERE timestamp >= ? GROUP BY label ORDER BY count DESC, label ASC LIMIT 1`
          )
          .get(since);

        return {
          totalAttacks: stats.totalAttacks,
          uniqueAttackers: stats.uniqueAttackers,
          mostTargetedAttackType: mostTargeted?.label ?? null,
          busiestHourLast24h: busiestHour?.label ?? null,
          attacksByThreatLevel: stats.attacksByThreatLevel,
        };
      } catch (error) {
        logger.error('Failed to compute attack summary', error);
        throw error;
      }
    });
  }

  async recordAlert(alert: Alert): Promise<number> {
    const row = ensureAlert(alert);

    return this.exclusive(() => {
      try {
        const stmt = this.db.prepare<Omit<Alert, 'id'>>(`
          INSERT INTO alerts (timestamp, sourceIp, alertType, detail, attackId)
          VALUES (@timestamp, @sourceIp, @alertType, @detail, @attackId)
        `);
        const info = stmt.run({
          timestamp: row.timestamp,
          sourceIp: row.sourceIp,
          alertType: row.alertType,
          detail: row.detail,
          attackId: row.attackId,
        });
        const id = Number(info.lastInsertRowid);
        logger.debug(`Recorded ${row.alertType} alert ${id} for ${row.sourceIp}`);
        return id;
      } catch (error) {
        logger.error(`Failed to record alert for ${row.sourceIp}`, error);
        throw error;
      }
    });
  }

  async getAlerts(page: PageInput = {}): Promise<StoredAlert[]> {
    const { limit, offset } = ensurePagination(page);

    return this.exclusive(() => {
      try {
        const stmt = this.db.prepare<[number, number], StoredAlert>(
          'SELECT * FROM alerts ORDER BY id DESC LIMIT ? OFFSET ?'
        );
        return stmt.all(limit, offset);
      } catch (error) {
        logger.error('Failed to list alerts', error);
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.queue.onIdle();
    this.db.close();
    logger.info('SQLite event store closed');
  }

  private collectStatistics(): AttackStatistics {
    const total = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM attack_events')
      .get();
    const unique = this.db
      .prepare<[], { count: number }>('SELECT COUNT(DISTINCT sourceIp) AS count FROM attack_events')
      .get();
    const byType = this.db
      .prepare<[], GroupCountRow>(
        'SELECT attackType AS label, COUNT(*) AS count FROM attack_events GROUP BY attackType'
      )
      .all();
    const byThreat = this.db
      .prepare<[], GroupCountRow>(
        'SELECT threatLevel AS label, COUNT(*) AS count FROM attack_events GROUP BY threatLevel'
      )
      .all();
    const topIps = this.db
      .prepare<[number], IpCount>(
        `SELECT sourceIp AS ip, COUNT(*) AS count FROM attack_events
         GROUP BY sourceIp ORDER BY count DESC, MIN(id) ASC LIMIT ?`
      )
      .all(TOP_IP_LIMIT);

    return {
      totalAttacks: total?.count ?? 0,
      uniqueAttackers: unique?.count ?? 0,
      attacksByType: toCountMap(byType),
      attacksByThreatLevel: toCountMap(byThreat),
      topAttackingIps: topIps,
    };
  }
}

function toCountMap(rows: GroupCountRow[]): Record<string, number> {
  return Object.fromEntries(rows.map((row) => [row.label, row.count]));
}
