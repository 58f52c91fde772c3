import { hasGuessed, isValidDateKey, parseTimeOfDay, withGuess } from '@shared';
import type { DailyRecord, DateKey, GameDocument, TimeOfDay } from '@shared';
import { StorageError } from './storageError.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): StorageError {
  return new StorageError('STORAGE_UNAVAILABLE', `Data file is malformed: ${message}`);
}

function readTime(value: unknown, where: string): TimeOfDay {
  if (typeof value !== 'string' || parseTimeOfDay(value) === null) {
    throw new StorageError('MALFORMED_TIME', `Malformed time ${JSON.stringify(value)} at ${where}`);
  }
  return value;
}

function readDate(value: unknown, where: string): DateKey {
  if (typeof value !== 'string' || !isValidDateKey(value)) {
    throw malformed(`invalid date ${JSON.stringify(value)} at ${where}`);
  }
  return value;
}

function parseRecord(date: DateKey, value: unknown): DailyRecord {
  if (!isPlainObject(value)) {
    throw malformed(`record for ${date} is not an object`);
  }

  const rawGuesses = value['guesses'] ?? {};
  if (!isPlainObject(rawGuesses)) {
    throw malformed(`guesses for ${date} is not an object`);
  }

  const record: DailyRecord = {
    guesses: Object.fromEntries(
      Object.entries(rawGuesses).map(([name, time]): [string, TimeOfDay] => [name, readTime(time, `${date}.guesses.${name}`)])
    ),
  };

  const actual = value['actual_time'];
  if (actual !== undefined && actual !== null) {
    record.actual_time = readTime(actual, `${date}.actual_time`);
  }

  return record;
}

/**
 * The list-based layout written by the first version of the game:
 * `{ guesses: [{ date, name, guess_time }], actual_times: [{ date, actual_time }] }`.
 */
export function isLegacyDocument(raw: unknown): raw is Record<string, unknown> {
  return isPlainObject(raw) && Array.isArray(raw['guesses']) && Array.isArray(raw['actual_times']);
}

function convertLegacyDocument(raw: Record<string, unknown>): GameDocument {
  const document: GameDocument = {};
  const guesses = Array.isArray(raw['guesses']) ? raw['guesses'] : [];
  const actualTimes = Array.isArray(raw['actual_times']) ? raw['actual_times'] : [];

  guesses.forEach((entry: unknown, index) => {
    const where = `guesses[${index}]`;
    const name = isPlainObject(entry) ? entry['name'] : undefined;
    if (!isPlainObject(entry) || typeof name !== 'string') {
      throw malformed(`${where} needs a date, name and guess_time`);
    }
    const date = readDate(entry['date'], where);
    const time = readTime(entry['guess_time'], where);
    const record = document[date] ?? { guesses: {} };
    // First guess wins, same as live submissions
    if (!hasGuessed(record, name)) {
      record.guesses = withGuess(record.guesses, name, time);
    }
    document[date] = record;
  });

  actualTimes.forEach((entry: unknown, index) => {
    const where = `actual_times[${index}]`;
    if (!isPlainObject(entry)) {
      throw malformed(`${where} needs a date and actual_time`);
    }
    const date = readDate(entry['date'], where);
    const time = readTime(entry['actual_time'], where);
    const record = document[date] ?? { guesses: {} };
    if (record.actual_time === undefined) {
      record.actual_time = time;
    }
    document[date] = record;
  });

  return document;
}

/** Validates parsed JSON and returns it as a typed document. Throws StorageError. */
export function parseGameDocument(raw: unknown): GameDocument {
  if (isLegacyDocument(raw)) {
    return convertLegacyDocument(raw);
  }

  if (!isPlainObject(raw)) {
    throw malformed('top level is not an object');
  }

  const document: GameDocument = {};
  for (const [key, value] of Object.entries(raw)) {
    const date = readDate(key, 'top level');
    document[date] = parseRecord(date, value);
  }
  return document;
}

export function serializeGameDocument(document: GameDocument): string {
  const ordered: GameDocument = {};
  for (const date of Object.keys(document).sort()) {
    const record = document[date];
    if (record) {
      ordered[date] = record;
    }
  }
  return JSON.stringify(ordered, null, 2);
}
