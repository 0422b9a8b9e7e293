import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import utc from 'dayjs/plugin/utc';
import { INACTIVITY_WINDOW_DAYS } from '../config/audit.config';
import { logger } from '../utils/logger';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const LOGIN_TIMESTAMP_FORMAT = 'YYYY-MM-DD[T]HH:mm:ss[Z]';

/**
 * Parse a YYYY-MM-DDTHH:MM:SSZ timestamp. Returns null for anything else,
 * including out-of-range calendar values such as Feb 30.
 */
export function parseLoginTimestamp(value: string): Date | null {
  const parsed = dayjs.utc(value, LOGIN_TIMESTAMP_FORMAT, true);
  return parsed.isValid() ? parsed.toDate() : null;
}

/**
 * Start of the recency window: now minus the inactivity window
 */
export function inactivityCutoff(now: Date, windowDays: number = INACTIVITY_WINDOW_DAYS): Date {
  return dayjs.utc(now).subtract(windowDays, 'day').toDate();
}

/**
 * True when the timestamp falls inside the window (boundary inclusive).
 * Unparseable timestamps count as not recent.
 */
export function isRecent(timestamp: string, now: Date, windowDays: number = INACTIVITY_WINDOW_DAYS): boolean {
  const loggedAt = parseLoginTimestamp(timestamp);
  if (!loggedAt) {
    logger.warn(`Invalid date format: ${timestamp}`);
    return false;
  }
  return !dayjs.utc(loggedAt).isBefore(inactivityCutoff(now, windowDays));
}
