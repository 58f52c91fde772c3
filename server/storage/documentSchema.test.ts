import { describe, expect, it } from 'vitest';
import type { GameDocument } from '@shared';
import { isLegacyDocument, parseGameDocument, serializeGameDocument } from './documentSchema.js';
import { StorageError } from './storageError.js';

function parseError(raw: unknown): StorageError {
  try {
    parseGameDocument(raw);
  } catch (err) {
    if (err instanceof StorageError) return err;
    throw err;
  }
  throw new Error('expected parseGameDocument to throw');
}

describe('parseGameDocument', () => {
  it('accepts the date-keyed layout', () => {
    const raw = {
      '2025-03-03': { guesses: { Gaurav: '17:00', Yatin: '16:50' }, actual_time: '17:05' },
      '2025-03-04': { guesses: { Upanshu: '18:10' } },
    };
    expect(parseGameDocument(raw)).toEqual(raw);
  });

  it('treats a null actual_time and missing guesses as absent', () => {
    expect(parseGameDocument({ '2025-03-03': { actual_time: null } })).toEqual({ '2025-03-03': { guesses: {} } });
  });

  it('reads an empty object as an empty document', () => {
    expect(parseGameDocument({})).toEqual({});
  });

  it('rejects keys that are not calendar dates', () => {
    const error = parseError({ today: { guesses: {} } });
    expect(error.code).toBe('STORAGE_UNAVAILABLE');
    expect(error.message).toBe('Data file is malformed: invalid date "today" at top level');
  });

  it('rejects non-object top levels and records', () => {
    expect(parseError([]).code).toBe('STORAGE_UNAVAILABLE');
    expect(parseError('nope').code).toBe('STORAGE_UNAVAILABLE');
    expect(parseError({ '2025-03-03': 5 }).code).toBe('STORAGE_UNAVAILABLE');
    expect(parseError({ '2025-03-03': { guesses: ['17:00'] } }).code).toBe('STORAGE_UNAVAILABLE');
  });

  it('reports stored times that are not HH:MM', () => {
    const error = parseError({ '2025-03-03': { guesses: { Gaurav: 'late' } } });
    expect(error.code).toBe('MALFORMED_TIME');
    expect(error.message).toBe('Malformed time "late" at 2025-03-03.guesses.Gaurav');

    expect(parseError({ '2025-03-03': { guesses: {}, actual_time: 1705 } }).code).toBe('MALFORMED_TIME');
  });

  it('keeps a "__proto__" participant as an own guess', () => {
    const document = parseGameDocument(JSON.parse('{"2025-03-03":{"guesses":{"__proto__":"17:00"}}}'));
    const record = document['2025-03-03'];

    expect(record && Object.hasOwn(record.guesses, '__proto__')).toBe(true);
    expect(record && Object.keys(record.guesses)).toEqual(['__proto__']);
  });

  it('converts the list-based layout, keeping the first entry per day and name', () => {
    const legacy = {
      guesses: [
        { date: '2025-02-10', name: 'Gaurav', guess_time: '16:10' },
        { date: '2025-02-10', name: 'Upanshu', guess_time: '16:20' },
        { date: '2025-02-10', name: 'Gaurav', guess_time: '19:00' },
        { date: '2025-02-11', name: 'Yatin', guess_time: '13:00' },
      ],
      actual_times: [
        { date: '2025-02-10', actual_time: '16:12' },
        { date: '2025-02-10', actual_time: '20:00' },
      ],
      initial_scores: { Gaurav: 0 },
    };

    expect(isLegacyDocument(legacy)).toBe(true);
    expect(parseGameDocument(legacy)).toEqual({
      '2025-02-10': { guesses: { Gaurav: '16:10', Upanshu: '16:20' }, actual_time: '16:12' },
      '2025-02-11': { guesses: { Yatin: '13:00' } },
    });
  });

  it('validates entries in the list-based layout', () => {
    expect(parseError({ guesses: [{ date: '2025-02-10', guess_time: '16:10' }], actual_times: [] }).code)
      .toBe('STORAGE_UNAVAILABLE');
    expect(parseError({ guesses: [], actual_times: [{ date: '2025-02-10', actual_time: '4pm' }] }).code)
      .toBe('MALFORMED_TIME');
  });
});

describe('serializeGameDocument', () => {
  it('writes dates in order with two-space indentation', () => {
    const document: GameDocument = {
      '2025-03-04': { guesses: { Gaurav: '17:00' } },
      '2025-03-03': { guesses: {}, actual_time: '17:05' },
    };

    expect(serializeGameDocument(document)).toBe([
      '{',
      '  "2025-03-03": {',
      '    "guesses": {},',
      '    "actual_time": "17:05"',
      '  },',
      '  "2025-03-04": {',
      '    "guesses": {',
      '      "Gaurav": "17:00"',
      '    }',
      '  }',
      '}',
    ].join('\n'));
  });

  it('round-trips through parseGameDocument', () => {
    const document: GameDocument = {
      '2025-03-03': { guesses: { Gaurav: '17:00', Upanshu: '17:15', Yatin: '16:50' }, actual_time: '17:05' },
      '2025-03-04': { guesses: { Yatin: '00:00' } },
      '2025-03-05': { guesses: {} },
    };
    expect(parseGameDocument(JSON.parse(serializeGameDocument(document)))).toEqual(document);
  });
});
