import { LedgerDB } from '../db/database';
import { Clock } from '../utils/clock';
import { billableMinutes, elapsedSeconds, formatHms } from '../utils/duration';
import { formatLocalTimestamp } from '../utils/timezone';
import { logger } from '../utils/logger';
import { Adjustment, FinishedSession, WorkSession } from '../types/ledger';
import { ConflictError, NotFoundError, ValidationError } from '../types/errors';

export interface StopResult {
  session: FinishedSession;
  elapsedSeconds: number;
}

/**
 * The only writer of ledger state.
 *
 * Each transition writes its state change, its log entry and the
 * revision bump in one transaction, so the audit log can never miss a
 * mutation that committed.
 */
export class SessionController {
  constructor(
    private readonly db: LedgerDB,
    private readonly clock: Clock,
    private readonly timezone: string
  ) {}

  /**
   * Idle → Running.
   * A second start for the same user fails with ConflictError carrying the
   * session that is already running.
   */
  start(userId: number): WorkSession {
    const now = this.clock.now();

    try {
      const session = this.db.transaction(() => {
        const inserted = this.db.insertSession(userId, now);
        this.db.appendLog(userId, 'start', undefined, `Started at ${this.local(now)}`, now);
        return inserted;
      });
      logger.debug(`User ${userId} started session ${session.id}`);
      return session;
    } catch (error) {
      if (error instanceof ConflictError) {
        const active = this.db.getActiveSession(userId) ?? undefined;
        const since = active ? ` since ${this.local(active.startTime)}` : '';
        throw new ConflictError(`A session is already running${since}`, active);
      }
      throw error;
    }
  }

  /**
   * Running → Idle. Fixes end time and billable minutes for good.
   */
  stop(userId: number): StopResult {
    const now = this.clock.now();

    const result = this.db.transaction(() => {
      const active = this.db.getActiveSession(userId);
      if (!active) {
        throw new NotFoundError('No running session to stop');
      }

      if (now.getTime() < active.startTime.getTime()) {
        logger.warning(
          `Session ${active.id} ends before it starts (${now.toISOString()} < ${active.startTime.toISOString()}); recording the minimum duration`
        );
      }

      const elapsed = elapsedSeconds(active.startTime, now);
      const minutes = billableMinutes(active.startTime, now);
      const session = this.db.finishSession(active.id, now, minutes);
      this.db.appendLog(
        userId,
        'stop',
        minutes,
        `Stopped at ${this.local(now)} (${formatHms(elapsed)})`,
        now
      );
      return { session, elapsedSeconds: elapsed };
    });

    logger.debug(`User ${userId} stopped session ${result.session.id}: ${result.session.minutes} min`);
    return result;
  }

  /**
   * Record a signed manual correction. Valid whether or not a session runs.
   */
  adjust(userId: number, deltaMinutes: number, reason?: string): Adjustment {
    if (!Number.isSafeInteger(deltaMinutes)) {
      throw new ValidationError(`Adjustment must be a whole number of minutes, got ${deltaMinutes}`);
    }
    if (deltaMinutes === 0) {
      throw new ValidationError('Adjustment cannot be zero');
    }

    const now = this.clock.now();
    const details = reason?.trim() || 'Manual adjustment';

    const adjustment = this.db.transaction(() => {
      const inserted = this.db.insertAdjustment(userId, deltaMinutes, reason, now);
      this.db.appendLog(userId, 'adjust', deltaMinutes, details, now);
      return inserted;
    });

    logger.debug(`User ${userId} adjusted by ${deltaMinutes} min`);
    return adjustment;
  }

  private local(date: Date): string {
    return formatLocalTimestamp(date, this.timezone);
  }
}
