// Time-of-day and calendar date utilities

import { GAME_CONSTANTS } from '../constants/game';
import type { DateKey, TimeOfDay } from '../types/game';

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Minutes past midnight for an `HH:MM` (or `H:MM`) value.
 * Returns null when the value is not a time of day.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return hours * GAME_CONSTANTS.MINUTES_PER_HOUR + minutes;
}

export function minutesToTimeOfDay(totalMinutes: number): TimeOfDay {
  const clamped = Math.min(Math.max(Math.round(totalMinutes), 0), GAME_CONSTANTS.MINUTES_PER_DAY - 1);
  const hours = Math.floor(clamped / GAME_CONSTANTS.MINUTES_PER_HOUR);
  const minutes = clamped % GAME_CONSTANTS.MINUTES_PER_HOUR;
  return `${pad2(hours)}:${pad2(minutes)}`;
}

/** Canonical two-digit form (`9:05` -> `09:05`), or null if the value does not parse. */
export function normalizeTimeOfDay(value: string): TimeOfDay | null {
  const minutes = parseTimeOfDay(value);
  return minutes === null ? null : minutesToTimeOfDay(minutes);
}

// Linear, same-day difference. 23:55 vs 00:05 is 1430 minutes, not 10.
export function timeDifference(a: TimeOfDay, b: TimeOfDay): number | null {
  const first = parseTimeOfDay(a);
  const second = parseTimeOfDay(b);
  if (first === null || second === null) {
    return null;
  }
  return Math.abs(first - second);
}

export function formatDifference(minutes: number): string {
  const hours = Math.floor(minutes / GAME_CONSTANTS.MINUTES_PER_HOUR);
  const mins = minutes % GAME_CONSTANTS.MINUTES_PER_HOUR;
  return hours > 0 ? `${hours}h ${mins}m` : `${mins}m`;
}

/** Local calendar date of `date` as `YYYY-MM-DD`. */
export function formatDateKey(date: Date = new Date()): DateKey {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function isValidDateKey(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);

  return date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day;
}
