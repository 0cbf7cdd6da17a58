/**
 * Time parsing and formatting utilities
 * Pure functions over the text LSF prints for run and submit times
 */

import { formatTimestamp } from './time';

const SECONDS_PER_DAY = 86400;

const MONTHS: Record<string, number> = {
  Jan: 0, Feb: 1, Mar: 2, Apr: 3, May: 4, Jun: 5,
  Jul: 6, Aug: 7, Sep: 8, Oct: 9, Nov: 10, Dec: 11,
};

/**
 * Parse a bjobs run_time column into seconds
 * Handles: "HH:MM", "12 minute(s) 5 second(s)", "3600 second(s)"
 * @returns Total seconds, 0 when nothing numeric is present
 */
export function parseRuntimeSeconds(raw: string | null | undefined): number {
  if (!raw) return 0;

  const hhmm = raw.match(/(\d+):(\d+)/);
  if (hhmm) {
    return parseInt(hhmm[1], 10) * 3600 + parseInt(hhmm[2], 10) * 60;
  }

  const minutes = raw.match(/(\d+)\s+minute\(s\)/);
  const seconds = raw.match(/(\d+)\s+second\(s\)/);
  const m = minutes ? parseInt(minutes[1], 10) : 0;
  const s = seconds ? parseInt(seconds[1], 10) : 0;
  if (m > 0 || s > 0) {
    return m * 60 + s;
  }

  const bare = raw.match(/(\d+)/);
  return bare ? parseInt(bare[1], 10) : 0;
}

/**
 * Format seconds for display (1d 2h 3m, 2h 3m, 3m 4s, 4s)
 * Zero seconds shows "0m" for pending jobs and "N/A" otherwise.
 */
export function formatRuntime(seconds: number, status = ''): string {
  if (seconds <= 0) {
    return status === 'PEND' || status === 'PSUSP' ? '0m' : 'N/A';
  }
  const days = Math.floor(seconds / SECONDS_PER_DAY);
  const hours = Math.floor((seconds % SECONDS_PER_DAY) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${secs}s`;
  return `${secs}s`;
}

/**
 * Normalize an LSF submit time to "YYYY-MM-DD HH:MM:SS"
 *
 * LSF omits the year, so "Oct 19 10:12" lands in the current year unless
 * that would be in the future. A bare "HH:MM" means today, or yesterday
 * when later than now.
 *
 * @param raw - "Mon DD HH:MM", "Mon DD YYYY" or "HH:MM"
 * @param now - Reference time
 * @returns Normalized timestamp, or null for unrecognized input
 */
export function parseSubmitTime(raw: string | null | undefined, now: Date = new Date()): string | null {
  if (!raw) return null;
  const text = raw.trim();

  const monDayTime = text.match(/^([A-Za-z]{3})\s+(\d{1,2})\s+(\d{1,2}):(\d{2})/);
  if (monDayTime && monDayTime[1] in MONTHS) {
    const [, mon, day, hour, minute] = monDayTime;
    let date = new Date(now.getFullYear(), MONTHS[mon], Number(day), Number(hour), Number(minute));
    if (date > now) {
      date = new Date(now.getFullYear() - 1, MONTHS[mon], Number(day), Number(hour), Number(minute));
    }
    return formatTimestamp(date);
  }

  const monDayYear = text.match(/^([A-Za-z]{3})\s+(\d{1,2})\s+(\d{4})/);
  if (monDayYear && monDayYear[1] in MONTHS) {
    const [, mon, day, year] = monDayYear;
    return formatTimestamp(new Date(Number(year), MONTHS[mon], Number(day)));
  }

  const timeOnly = text.match(/^(\d{1,2}):(\d{2})/);
  if (timeOnly) {
    const date = new Date(now.getFullYear(), now.getMonth(), now.getDate(),
      Number(timeOnly[1]), Number(timeOnly[2]));
    if (date > now) {
      date.setDate(date.getDate() - 1);
    }
    return formatTimestamp(date);
  }

  return null;
}
