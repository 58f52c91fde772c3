import { describe, expect, it } from 'vitest';
import { getGuess, hasGuessed, withGuess } from './record';

describe('guess lookups', () => {
  it('only sees guesses that were made', () => {
    const record = { guesses: { Alice: '17:00' } };

    expect(getGuess(record, 'Alice')).toBe('17:00');
    expect(getGuess(record, 'constructor')).toBeUndefined();
    expect(hasGuessed(record, 'toString')).toBe(false);
  });

  it('adds a guess without changing the original', () => {
    const guesses = { Alice: '17:00' };
    const next = withGuess(guesses, '__proto__', '17:10');

    expect(Object.keys(next)).toEqual(['Alice', '__proto__']);
    expect(getGuess({ guesses: next }, '__proto__')).toBe('17:10');
    expect(guesses).toEqual({ Alice: '17:00' });
  });
});
