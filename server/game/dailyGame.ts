import { getGuess, hasGuessed, normalizeTimeOfDay, withGuess } from '@shared';
import type {
  DailyRecord,
  DateKey,
  GameDocument,
  GameError,
  GameErrorCode,
  RecordPhase,
  TimeOfDay,
} from '@shared';

export type GameResult =
  | { success: true; document: GameDocument; record: DailyRecord }
  | { success: false; error: GameError };

function fail(code: GameErrorCode, message: string): GameResult {
  return { success: false, error: { code, message } };
}

function cloneRecord(record: DailyRecord): DailyRecord {
  const copy: DailyRecord = { guesses: { ...record.guesses } };
  if (record.actual_time !== undefined) {
    copy.actual_time = record.actual_time;
  }
  return copy;
}

/**
 * Guess-then-reveal rules for one day's record.
 *
 * Every operation takes a document and returns a new one; nothing here
 * touches storage or keeps state between calls.
 */
export class DailyGame {
  readonly participants: readonly string[];

  constructor(participants: readonly string[]) {
    this.participants = participants;
  }

  isParticipant(name: string): boolean {
    return this.participants.includes(name);
  }

  getRecord(document: GameDocument, date: DateKey): DailyRecord {
    const record = document[date];
    return record ? cloneRecord(record) : { guesses: {} };
  }

  getPhase(record: DailyRecord): RecordPhase {
    if (record.actual_time !== undefined) {
      return 'revealed';
    }

    const guessed = this.participants.filter(p => hasGuessed(record, p)).length;
    if (guessed === 0) {
      return 'empty';
    }
    return guessed === this.participants.length ? 'ready_to_reveal' : 'guessing';
  }

  missingParticipants(record: DailyRecord): string[] {
    return this.participants.filter(p => !hasGuessed(record, p));
  }

  submitGuess(document: GameDocument, date: DateKey, participant: string, time: TimeOfDay): GameResult {
    return this.submitGuesses(document, date, { [participant]: time });
  }

  /** Applies several guesses at once. Either all of them are stored or none. */
  submitGuesses(document: GameDocument, date: DateKey, guesses: Record<string, TimeOfDay>): GameResult {
    const entries = Object.entries(guesses);
    if (entries.length === 0) {
      return fail('NO_GUESSES', 'No guesses were submitted');
    }

    const record = this.getRecord(document, date);

    for (const [participant, time] of entries) {
      if (!this.isParticipant(participant)) {
        return fail('INVALID_PARTICIPANT', `"${participant}" is not one of ${this.participants.join(', ')}`);
      }

      const normalized = normalizeTimeOfDay(time);
      if (normalized === null) {
        return fail('MALFORMED_TIME', `Invalid time format for ${participant}. Please use HH:MM format.`);
      }

      if (record.actual_time !== undefined) {
        return fail('ALREADY_REVEALED', `The actual time for ${date} is already recorded; guesses are locked`);
      }

      const existing = getGuess(record, participant);
      if (existing !== undefined) {
        return fail('DUPLICATE_GUESS', `${participant} has already guessed ${existing} for ${date}`);
      }

      record.guesses = withGuess(record.guesses, participant, normalized);
    }

    return { success: true, document: { ...document, [date]: record }, record: cloneRecord(record) };
  }

  revealActualTime(document: GameDocument, date: DateKey, time: TimeOfDay): GameResult {
    const normalized = normalizeTimeOfDay(time);
    if (normalized === null) {
      return fail('MALFORMED_TIME', 'Invalid time format. Please use HH:MM format.');
    }

    const record = this.getRecord(document, date);

    if (record.actual_time !== undefined) {
      return fail('ALREADY_REVEALED', `The actual time for ${date} is already recorded (${record.actual_time})`);
    }

    const missing = this.missingParticipants(record);
    if (missing.length > 0) {
      return fail('INCOMPLETE_GUESSES', `Still waiting for guesses from ${missing.join(', ')}`);
    }

    record.actual_time = normalized;
    return { success: true, document: { ...document, [date]: record }, record: cloneRecord(record) };
  }

  resetDay(document: GameDocument, date: DateKey): GameDocument {
    if (!Object.hasOwn(document, date)) {
      return document;
    }
    const rest = { ...document };
    delete rest[date];
    return rest;
  }
}
