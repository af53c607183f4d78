import { LedgerDB } from '../db/database';
import { Clock } from '../utils/clock';
import { monthKey } from '../utils/timezone';
import { MonthBucket } from '../types/ledger';

interface CachedTotals {
  revision: number;
  buckets: MonthBucket[];
}

/**
 * Month totals rebuilt from finished sessions and adjustments.
 *
 * Sessions count toward the month of their end instant, adjustments toward
 * the month they were created in, both in the display timezone. Results
 * are cached per user until the store revision moves.
 */
export class Aggregator {
  private cache = new Map<number, CachedTotals>();

  constructor(
    private readonly db: LedgerDB,
    private readonly clock: Clock,
    private readonly timezone: string
  ) {}

  /**
   * Buckets sorted by month, newest first
   */
  monthTotals(userId: number): MonthBucket[] {
    const revision = this.db.getRevision();
    const cached = this.cache.get(userId);
    if (cached && cached.revision === revision) {
      return cached.buckets.map((bucket) => ({ ...bucket }));
    }

    const totals = new Map<string, number>();
    const add = (month: string, minutes: number) => {
      totals.set(month, (totals.get(month) ?? 0) + minutes);
    };

    for (const session of this.db.listFinishedSessions(userId)) {
      add(monthKey(session.endTime, this.timezone), session.minutes);
    }
    for (const adjustment of this.db.listAdjustments(userId)) {
      add(monthKey(adjustment.createdAt, this.timezone), adjustment.minutes);
    }

    const buckets = Array.from(totals.entries())
      .map(([month, minutes]) => ({ month, minutes }))
      .sort((a, b) => (a.month < b.month ? 1 : a.month > b.month ? -1 : 0));

    this.cache.set(userId, { revision, buckets });
    return buckets.map((bucket) => ({ ...bucket }));
  }

  /**
   * Total for the month containing clock.now(), 0 when nothing was booked
   */
  currentMonthMinutes(userId: number): number {
    const current = monthKey(this.clock.now(), this.timezone);
    return this.monthTotals(userId).find((bucket) => bucket.month === current)?.minutes ?? 0;
  }
}
