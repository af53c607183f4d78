import { LedgerDB } from '../db/database';
import { Clock, systemClock } from '../utils/clock';
import { elapsedSeconds } from '../utils/duration';
import { assertTimeZone, formatLocalTimestamp } from '../utils/timezone';
import { DEFAULT_CONFIG } from '../types/config';
import { Adjustment, LogEntry, MAX_LOG_ENTRIES, MonthBucket, User, WorkSession } from '../types/ledger';
import { NotFoundError, StorageError } from '../types/errors';
import { Aggregator } from './aggregator';
import { SessionController, StopResult } from './session-controller';

export interface TimeLedgerOptions {
  clock?: Clock;
  /**
   * IANA timezone for month buckets and log details
   * @default "Europe/Zurich"
   */
  timezone?: string;
  /**
   * Default number of entries returned by recentLogs
   * @default 500
   */
  logLimit?: number;
}

/**
 * Time ledger engine.
 *
 * Holds the store, the clock and the display timezone; everything the
 * presentation layer needs goes through here. Commands mutate through the
 * SessionController, month figures come from the Aggregator.
 */
export class TimeLedger {
  readonly timezone: string;
  private readonly clock: Clock;
  private readonly logLimit: number;
  private readonly controller: SessionController;
  private readonly aggregator: Aggregator;

  constructor(
    private readonly db: LedgerDB,
    options: TimeLedgerOptions = {}
  ) {
    this.timezone = options.timezone ?? DEFAULT_CONFIG.timezone;
    assertTimeZone(this.timezone);

    if (db.getDurationUnit() !== 'minutes') {
      throw new StorageError('Database stores durations in seconds; run `tl migrate` first');
    }

    this.clock = options.clock ?? systemClock;
    this.logLimit = Math.min(options.logLimit ?? MAX_LOG_ENTRIES, MAX_LOG_ENTRIES);
    this.controller = new SessionController(db, this.clock, this.timezone);
    this.aggregator = new Aggregator(db, this.clock, this.timezone);
  }

  // ==================== Commands ====================

  login(name: string): User {
    return this.db.findOrCreateUser(name, this.clock.now());
  }

  startSession(userId: number): WorkSession {
    this.requireUser(userId);
    return this.controller.start(userId);
  }

  stopSession(userId: number): StopResult {
    this.requireUser(userId);
    return this.controller.stop(userId);
  }

  adjust(userId: number, deltaMinutes: number, reason?: string): Adjustment {
    this.requireUser(userId);
    return this.controller.adjust(userId, deltaMinutes, reason);
  }

  /**
   * Delete a user and everything it owns
   */
  removeUser(userId: number): void {
    this.db.deleteUser(userId);
  }

  // ==================== Queries ====================

  findUser(name: string): User | null {
    return this.db.getUserByName(name);
  }

  listUsers(): User[] {
    return this.db.listUsers();
  }

  activeSession(userId: number): WorkSession | null {
    this.requireUser(userId);
    return this.db.getActiveSession(userId);
  }

  /**
   * Seconds the running session has been going, or undefined when idle.
   * Computed fresh on every call; the engine keeps no timers.
   */
  liveElapsedSeconds(userId: number): number | undefined {
    const active = this.activeSession(userId);
    return active ? elapsedSeconds(active.startTime, this.clock.now()) : undefined;
  }

  monthTotals(userId: number): MonthBucket[] {
    this.requireUser(userId);
    return this.aggregator.monthTotals(userId);
  }

  currentMonthMinutes(userId: number): number {
    this.requireUser(userId);
    return this.aggregator.currentMonthMinutes(userId);
  }

  recentLogs(userId: number, limit: number = this.logLimit): LogEntry[] {
    this.requireUser(userId);
    return this.db.listLogs(userId, limit);
  }

  /**
   * Wall-clock rendering of an instant in the display timezone
   */
  localTimestamp(date: Date): string {
    return formatLocalTimestamp(date, this.timezone);
  }

  private requireUser(userId: number): User {
    const user = this.db.getUserById(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }
}
