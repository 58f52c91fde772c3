// Guess lookups on a daily record. Names are looked up as own keys only,
// so a participant called "constructor" or "__proto__" is an ordinary name.

import type { DailyRecord, TimeOfDay } from '../types/game';

export function hasGuessed(record: DailyRecord, participant: string): boolean {
  return Object.hasOwn(record.guesses, participant);
}

export function getGuess(record: DailyRecord, participant: string): TimeOfDay | undefined {
  return hasGuessed(record, participant) ? record.guesses[participant] : undefined;
}

/** Copy of `guesses` with one more entry, stored as an own property. */
export function withGuess(
  guesses: Record<string, TimeOfDay>,
  participant: string,
  time: TimeOfDay
): Record<string, TimeOfDay> {
  return { ...guesses, [participant]: time };
}
