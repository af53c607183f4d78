import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { join } from 'path';
import {
  Adjustment,
  DurationUnit,
  FinishedSession,
  LOG_KINDS,
  LogEntry,
  LogKind,
  MAX_LOG_ENTRIES,
  User,
  WorkSession,
} from '../types/ledger';
import {
  ConflictError,
  LedgerError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../types/errors';

interface UserRow {
  id: number;
  name: string;
  created_at: string;
}

interface SessionRow {
  id: number;
  user_id: number;
  start_time: string;
  end_time: string | null;
  minutes: number | null;
}

interface AdjustmentRow {
  id: number;
  user_id: number;
  minutes: number;
  reason: string | null;
  created_at: string;
}

interface LogRow {
  id: number;
  user_id: number;
  kind: string;
  minutes: number | null;
  ts: string;
  details: string;
}

interface DurationRow {
  id: number;
  minutes: number;
}

interface LogDurationRow extends DurationRow {
  kind: string;
}

export interface LedgerDBOptions {
  /**
   * How long a write waits for a lock held by another connection
   * before failing with StorageError
   * @default 2000
   */
  busyTimeoutMs?: number;
}

/**
 * Converters applied to every stored duration when the unit changes
 */
export interface DurationConverters {
  session(value: number): number;
  adjustment(value: number): number;
  log(kind: LogKind, value: number): number;
}

export interface ConversionCounts {
  sessions: number;
  adjustments: number;
  logs: number;
}

const MAX_NAME_LENGTH = 255;

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isLogKind(value: string): value is LogKind {
  return LOG_KINDS.some((kind) => kind === value);
}

/**
 * SQLite-backed store for users, sessions, adjustments and the audit log
 */
export class LedgerDB {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:', options: LedgerDBOptions = {}) {
    let db: Database.Database;
    try {
      db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 2000 });
    } catch (error) {
      throw new StorageError(`Failed to open database: ${error}`, error);
    }
    this.db = db;

    try {
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      this.initialize();
    } catch (error) {
      db.close();
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Failed to open database: ${error}`, error);
    }
  }

  /**
   * Initialize database schema.
   * An existing database is only read here, so opening it never waits on
   * another connection's write lock.
   */
  private initialize(): void {
    try {
      if (!this.hasTable('meta')) {
        const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
        this.db.exec(schema);
      }
      this.seedMeta();
    } catch (error) {
      throw new StorageError(`Failed to initialize schema: ${error}`, error);
    }
  }

  private hasTable(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(name);
    return row !== undefined;
  }

  /**
   * Write the revision counter and the duration unit marker when missing.
   * A database holding durations but no unit marker predates the marker,
   * and those builds stored seconds.
   */
  private seedMeta(): void {
    const keys = this.db
      .prepare<[], { key: string }>("SELECT key FROM meta WHERE key IN ('revision', 'duration_unit')")
      .all();
    if (keys.length === 2) {
      return;
    }

    this.db
      .transaction(() => {
        this.db.prepare("INSERT OR IGNORE INTO meta (key, value) VALUES ('revision', '0')").run();
        this.db
          .prepare(`
            INSERT OR IGNORE INTO meta (key, value)
              SELECT 'duration_unit',
                CASE
                  WHEN EXISTS (SELECT 1 FROM sessions WHERE minutes IS NOT NULL)
                    OR EXISTS (SELECT 1 FROM adjustments)
                  THEN 'seconds'
                  ELSE 'minutes'
                END
          `)
          .run();
      })
      .immediate();
  }

  /**
   * Run a database call, turning driver failures into ledger errors
   */
  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof LedgerError) {
        throw error;
      }
      throw new StorageError(`Failed to ${action}: ${error}`, error);
    }
  }

  /**
   * Run fn inside one transaction. Everything fn writes commits together
   * or not at all. The write lock is taken up front (BEGIN IMMEDIATE), so
   * a read inside fn cannot go stale before fn writes.
   */
  transaction<T>(fn: () => T): T {
    return this.run('run transaction', () => this.db.transaction(fn).immediate());
  }

  // ==================== Users ====================

  /**
   * Return the user with this name, creating it on first use.
   * Two connections racing on the same new name end up with one row.
   */
  findOrCreateUser(name: string, createdAt: Date = new Date()): User {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('User name cannot be empty');
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`User name is longer than ${MAX_NAME_LENGTH} characters`);
    }

    return this.run('find or create user', () => {
      this.db
        .prepare<[string, string]>(`
          INSERT INTO users (name, created_at) VALUES (?, ?)
          ON CONFLICT(name) DO NOTHING
        `)
        .run(trimmed, createdAt.toISOString());

      const user = this.getUserByName(trimmed);
      if (!user) {
        throw new StorageError(`User "${trimmed}" vanished after insert`);
      }
      return user;
    });
  }

  getUserById(id: number): User | null {
    return this.run('get user', () => {
      const row = this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
      return row ? this.rowToUser(row) : null;
    });
  }

  getUserByName(name: string): User | null {
    return this.run('get user', () => {
      const row = this.db
        .prepare<[string], UserRow>('SELECT * FROM users WHERE name = ?')
        .get(name.trim());
      return row ? this.rowToUser(row) : null;
    });
  }

  listUsers(): User[] {
    return this.run('list users', () =>
      this.db
        .prepare<[], UserRow>('SELECT * FROM users ORDER BY name')
        .all()
        .map((row) => this.rowToUser(row))
    );
  }

  /**
   * Delete a user together with its sessions, adjustments and logs
   */
  deleteUser(id: number): void {
    this.run('delete user', () => {
      const result = this.db.prepare<[number]>('DELETE FROM users WHERE id = ?').run(id);
      if (result.changes === 0) {
        throw new NotFoundError(`User ${id} not found`);
      }
      this.bumpRevision();
    });
  }

  // ==================== Sessions ====================

  /**
   * Get the running session (end_time is NULL) for a user
   */
  getActiveSession(userId: number): WorkSession | null {
    return this.run('get active session', () => {
      const row = this.db
        .prepare<[number], SessionRow>(`
          SELECT * FROM sessions
          WHERE user_id = ? AND end_time IS NULL
        `)
        .get(userId);
      return row ? this.rowToSession(row) : null;
    });
  }

  getSessionById(id: number): WorkSession | null {
    return this.run('get session', () => {
      const row = this.db.prepare<[number], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
      return row ? this.rowToSession(row) : null;
    });
  }

  /**
   * Insert a running session.
   * The partial unique index rejects a second running session for the
   * same user; that surfaces as ConflictError.
   */
  insertSession(userId: number, startTime: Date): WorkSession {
    try {
      const row = this.db
        .prepare<[number, string], SessionRow>(`
          INSERT INTO sessions (user_id, start_time) VALUES (?, ?)
          RETURNING *
        `)
        .get(userId, startTime.toISOString());

      if (!row) {
        throw new StorageError('Session insert returned no row');
      }
      this.bumpRevision();
      return this.rowToSession(row);
    } catch (error) {
      if (sqliteCode(error) === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConflictError(`User ${userId} already has a running session`);
      }
      if (error instanceof LedgerError) {
        throw error;
      }
      throw new StorageError(`Failed to insert session: ${error}`, error);
    }
  }

  /**
   * Set end time and minutes on a running session.
   * A session that is missing or already finished is left untouched.
   */
  finishSession(sessionId: number, endTime: Date, minutes: number): FinishedSession {
    if (!Number.isSafeInteger(minutes) || minutes < 0) {
      throw new ValidationError(`Session minutes must be a non-negative integer, got ${minutes}`);
    }

    return this.run('finish session', () => {
      const row = this.db
        .prepare<[string, number, number], SessionRow>(`
          UPDATE sessions SET end_time = ?, minutes = ?
          WHERE id = ? AND end_time IS NULL
          RETURNING *
        `)
        .get(endTime.toISOString(), minutes, sessionId);

      if (!row) {
        throw new NotFoundError(`No running session with id ${sessionId}`);
      }
      this.bumpRevision();

      const session = this.rowToSession(row);
      if (!session.endTime || session.minutes === undefined) {
        throw new StorageError(`Session ${sessionId} was not finished`);
      }
      return { ...session, endTime: session.endTime, minutes: session.minutes };
    });
  }

  listFinishedSessions(userId: number): FinishedSession[] {
    return this.run('list sessions', () => {
      const rows = this.db
        .prepare<[number], SessionRow>(`
          SELECT * FROM sessions
          WHERE user_id = ? AND end_time IS NOT NULL
          ORDER BY id ASC
        `)
        .all(userId);

      const finished: FinishedSession[] = [];
      for (const row of rows) {
        if (row.end_time !== null && row.minutes !== null) {
          finished.push({
            id: row.id,
            userId: row.user_id,
            startTime: new Date(row.start_time),
            endTime: new Date(row.end_time),
            minutes: row.minutes,
          });
        }
      }
      return finished;
    });
  }

  // ==================== Adjustments ====================

  insertAdjustment(userId: number, minutes: number, reason: string | undefined, createdAt: Date): Adjustment {
    if (!Number.isSafeInteger(minutes) || minutes === 0) {
      throw new ValidationError(`Adjustment must be a nonzero whole number of minutes, got ${minutes}`);
    }
    const trimmedReason = reason?.trim() || null;

    return this.run('insert adjustment', () => {
      const row = this.db
        .prepare<[number, number, string | null, string], AdjustmentRow>(`
          INSERT INTO adjustments (user_id, minutes, reason, created_at)
          VALUES (?, ?, ?, ?)
          RETURNING *
        `)
        .get(userId, minutes, trimmedReason, createdAt.toISOString());

      if (!row) {
        throw new StorageError('Adjustment insert returned no row');
      }
      this.bumpRevision();
      return this.rowToAdjustment(row);
    });
  }

  listAdjustments(userId: number): Adjustment[] {
    return this.run('list adjustments', () =>
      this.db
        .prepare<[number], AdjustmentRow>('SELECT * FROM adjustments WHERE user_id = ? ORDER BY id ASC')
        .all(userId)
        .map((row) => this.rowToAdjustment(row))
    );
  }

  // ==================== Logs ====================

  appendLog(
    userId: number,
    kind: LogKind,
    minutes: number | undefined,
    details: string,
    timestamp: Date
  ): LogEntry {
    return this.run('append log', () => {
      const row = this.db
        .prepare<[number, string, number | null, string, string], LogRow>(`
          INSERT INTO logs (user_id, kind, minutes, ts, details)
          VALUES (?, ?, ?, ?, ?)
          RETURNING *
        `)
        .get(userId, kind, minutes ?? null, timestamp.toISOString(), details);

      if (!row) {
        throw new StorageError('Log insert returned no row');
      }
      return this.rowToLog(row);
    });
  }

  /**
   * Most recent log entries first, at most MAX_LOG_ENTRIES
   */
  listLogs(userId: number, limit: number = MAX_LOG_ENTRIES): LogEntry[] {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(`Log limit must be a positive integer, got ${limit}`);
    }

    return this.run('list logs', () =>
      this.db
        .prepare<[number, number], LogRow>(`
          SELECT * FROM logs
          WHERE user_id = ?
          ORDER BY id DESC
          LIMIT ?
        `)
        .all(userId, Math.min(limit, MAX_LOG_ENTRIES))
        .map((row) => this.rowToLog(row))
    );
  }

  // ==================== Meta ====================

  /**
   * Counter bumped by every change to sessions, adjustments or users
   */
  getRevision(): number {
    return Number(this.getMeta('revision') ?? '0');
  }

  getDurationUnit(): DurationUnit {
    const unit = this.getMeta('duration_unit');
    if (unit === 'minutes' || unit === 'seconds') {
      return unit;
    }
    throw new StorageError(`Unknown duration unit in database: ${unit}`);
  }

  setDurationUnit(unit: DurationUnit): void {
    this.setMeta('duration_unit', unit);
  }

  /**
   * Rewrite every stored duration with the given converters, in place.
   * Callers wrap this in a transaction together with the unit change.
   */
  convertDurations(converters: DurationConverters): ConversionCounts {
    return this.run('convert durations', () => {
      const sessions = this.db
        .prepare<[], DurationRow>('SELECT id, minutes FROM sessions WHERE minutes IS NOT NULL')
        .all();
      const updateSession = this.db.prepare<[number, number]>('UPDATE sessions SET minutes = ? WHERE id = ?');
      for (const row of sessions) {
        updateSession.run(converters.session(row.minutes), row.id);
      }

      const adjustments = this.db.prepare<[], DurationRow>('SELECT id, minutes FROM adjustments').all();
      const updateAdjustment = this.db.prepare<[number, number]>('UPDATE adjustments SET minutes = ? WHERE id = ?');
      for (const row of adjustments) {
        updateAdjustment.run(converters.adjustment(row.minutes), row.id);
      }

      const logs = this.db
        .prepare<[], LogDurationRow>('SELECT id, kind, minutes FROM logs WHERE minutes IS NOT NULL')
        .all();
      const updateLog = this.db.prepare<[number, number]>('UPDATE logs SET minutes = ? WHERE id = ?');
      for (const row of logs) {
        if (!isLogKind(row.kind)) {
          throw new StorageError(`Unknown log kind "${row.kind}" in log ${row.id}`);
        }
        updateLog.run(converters.log(row.kind, row.minutes), row.id);
      }

      this.bumpRevision();
      return { sessions: sessions.length, adjustments: adjustments.length, logs: logs.length };
    });
  }

  private getMeta(key: string): string | undefined {
    return this.run('read meta', () =>
      this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(key)?.value
    );
  }

  private setMeta(key: string, value: string): void {
    this.run('write meta', () => {
      this.db
        .prepare<[string, string]>(`
          INSERT INTO meta (key, value) VALUES (?, ?)
          ON CONFLICT(key) DO UPDATE SET value = excluded.value
        `)
        .run(key, value);
    });
  }

  private bumpRevision(): void {
    this.db
      .prepare(`
        UPDATE meta SET value = CAST(CAST(value AS INTEGER) + 1 AS TEXT)
        WHERE key = 'revision'
      `)
      .run();
  }

  // ==================== Row mapping ====================

  private rowToUser(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      createdAt: new Date(row.created_at),
    };
  }

  private rowToSession(row: SessionRow): WorkSession {
    return {
      id: row.id,
      userId: row.user_id,
      startTime: new Date(row.start_time),
      endTime: row.end_time ? new Date(row.end_time) : undefined,
      minutes: row.minutes ?? undefined,
    };
  }

  private rowToAdjustment(row: AdjustmentRow): Adjustment {
    return {
      id: row.id,
      userId: row.user_id,
      minutes: row.minutes,
      reason: row.reason ?? undefined,
      createdAt: new Date(row.created_at),
    };
  }

  private rowToLog(row: LogRow): LogEntry {
    if (!isLogKind(row.kind)) {
      throw new StorageError(`Unknown log kind "${row.kind}" in log ${row.id}`);
    }
    return {
      id: row.id,
      userId: row.user_id,
      kind: row.kind,
      timestamp: new Date(row.ts),
      minutes: row.minutes ?? undefined,
      details: row.details,
    };
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
