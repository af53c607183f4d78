import { differenceInMilliseconds } from 'date-fns';

/**
 * Leftover seconds at or above this value round the minute up
 */
export const ROUND_UP_SECONDS = 30;

/**
 * Smallest duration recorded for a session that was started and stopped
 */
export const MINIMUM_BILLABLE_MINUTES = 1;

/**
 * Whole seconds between two instants, never negative.
 * For live display only; never persisted.
 */
export function elapsedSeconds(start: Date, end: Date): number {
  const ms = differenceInMilliseconds(end, start);
  return Math.max(0, Math.floor(ms / 1000));
}

/**
 * Round a seconds count to whole minutes, half-up at 30 seconds.
 * The sign is preserved: -90 becomes -2.
 */
export function roundSecondsToMinutes(seconds: number): number {
  const magnitude = Math.abs(Math.trunc(seconds));
  const whole = Math.floor(magnitude / 60);
  const leftover = magnitude % 60;
  const minutes = whole + (leftover >= ROUND_UP_SECONDS ? 1 : 0);
  return seconds < 0 && minutes !== 0 ? -minutes : minutes;
}

/**
 * Duration in whole minutes between two instants.
 * Clock skew (end before start) yields 0.
 */
export function durationMinutes(start: Date, end: Date): number {
  return Math.max(0, roundSecondsToMinutes(elapsedSeconds(start, end)));
}

/**
 * Minutes recorded when a session is stopped: durationMinutes with the
 * minimum billable floor applied.
 */
export function billableMinutes(start: Date, end: Date): number {
  return Math.max(MINIMUM_BILLABLE_MINUTES, durationMinutes(start, end));
}

/**
 * Format a seconds count as HH:MM:SS.
 * Hours keep growing past 24; negative values get a leading minus.
 */
export function formatHms(totalSeconds: number): string {
  const sign = totalSeconds < 0 ? '-' : '';
  const abs = Math.abs(Math.trunc(totalSeconds));
  const h = Math.floor(abs / 3600);
  const m = Math.floor((abs % 3600) / 60);
  const s = abs % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${sign}${pad(h)}:${pad(m)}:${pad(s)}`;
}

/**
 * Format minutes as a short human-readable string (e.g. "2h 5m", "-15m")
 */
export function formatMinutes(minutes: number): string {
  const sign = minutes < 0 ? '-' : '';
  const abs = Math.abs(minutes);
  const hours = Math.floor(abs / 60);
  const mins = abs % 60;

  if (hours > 0) {
    return mins > 0 ? `${sign}${hours}h ${mins}m` : `${sign}${hours}h`;
  }
  return `${sign}${mins}m`;
}
