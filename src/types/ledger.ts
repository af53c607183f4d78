/**
 * Audit log entry kinds
 */
export type LogKind = 'start' | 'stop' | 'adjust';

export const LOG_KINDS: readonly LogKind[] = ['start', 'stop', 'adjust'];

/**
 * A ledger owner, identified by a unique display name
 */
export interface User {
  id: number;
  name: string;
  createdAt: Date;
}

/**
 * One continuous work interval.
 * endTime and minutes are absent while the session is running.
 */
export interface WorkSession {
  id: number;
  userId: number;
  startTime: Date;
  endTime?: Date;
  minutes?: number;
}

/**
 * A finished session, as returned by the finished-session listing
 */
export type FinishedSession = Required<WorkSession>;

/**
 * Signed manual correction in whole minutes
 */
export interface Adjustment {
  id: number;
  userId: number;
  minutes: number;
  reason?: string;
  createdAt: Date;
}

/**
 * Append-only audit record of one mutation
 */
export interface LogEntry {
  id: number;
  userId: number;
  kind: LogKind;
  timestamp: Date;
  minutes?: number;
  details: string;
}

/**
 * Total minutes for one calendar month (YYYY-MM, display timezone)
 */
export interface MonthBucket {
  month: string;
  minutes: number;
}

/**
 * Unit stored in the minutes columns
 */
export type DurationUnit = 'minutes' | 'seconds';

/**
 * Upper bound on log entries returned by one query
 */
export const MAX_LOG_ENTRIES = 500;
