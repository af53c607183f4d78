import { LedgerDB, ConversionCounts } from './database';
import { MINIMUM_BILLABLE_MINUTES, roundSecondsToMinutes } from '../utils/duration';
import { logger } from '../utils/logger';

/**
 * Seconds → minutes for a finished session: half-up, at least one minute
 */
export function sessionSecondsToMinutes(seconds: number): number {
  return Math.max(MINIMUM_BILLABLE_MINUTES, roundSecondsToMinutes(seconds));
}

/**
 * Seconds → minutes for an adjustment: half-up, sign kept.
 * Adjustments are never zero, so anything under 30 seconds becomes ±1.
 */
export function adjustmentSecondsToMinutes(seconds: number): number {
  const minutes = roundSecondsToMinutes(seconds);
  if (minutes !== 0) {
    return minutes;
  }
  return seconds < 0 ? -1 : 1;
}

/**
 * One-time conversion of a database whose duration columns hold seconds.
 *
 * Runs in a single transaction: every session, adjustment and log duration
 * is rewritten, the unit marker flips to minutes and the revision is bumped.
 * A database already in minutes is left alone.
 */
export function migrateSecondsToMinutes(db: LedgerDB): ConversionCounts {
  return db.transaction(() => {
    if (db.getDurationUnit() === 'minutes') {
      logger.debug('Durations already stored in minutes, nothing to migrate');
      return { sessions: 0, adjustments: 0, logs: 0 };
    }

    const counts = db.convertDurations({
      session: sessionSecondsToMinutes,
      adjustment: adjustmentSecondsToMinutes,
      log: (kind, seconds) =>
        kind === 'adjust' ? adjustmentSecondsToMinutes(seconds) : sessionSecondsToMinutes(seconds),
    });
    db.setDurationUnit('minutes');

    logger.debug(
      `Converted ${counts.sessions} sessions, ${counts.adjustments} adjustments, ${counts.logs} log entries to minutes`
    );
    return counts;
  });
}
