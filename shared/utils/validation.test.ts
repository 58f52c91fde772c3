import { describe, expect, it } from 'vitest';
import {
  validateDateKey,
  validateParticipantName,
  validateParticipants,
  validateTimeOfDay,
} from './validation';

describe('validateTimeOfDay', () => {
  it('accepts HH:MM', () => {
    expect(validateTimeOfDay('17:05')).toEqual({ valid: true });
  });

  it('explains what is wrong', () => {
    expect(validateTimeOfDay('  ')).toEqual({ valid: false, error: 'Time cannot be empty' });
    expect(validateTimeOfDay('25:00')).toEqual({
      valid: false,
      error: 'Invalid time format. Please use HH:MM format.',
    });
  });
});

describe('validateDateKey', () => {
  it('rejects impossible dates', () => {
    expect(validateDateKey('2025-03-03')).toEqual({ valid: true });
    expect(validateDateKey('2025-02-30')).toEqual({
      valid: false,
      error: 'Invalid date "2025-02-30". Please use YYYY-MM-DD format.',
    });
  });
});

describe('validateParticipantName', () => {
  it('allows letters, digits, spaces, underscore and hyphen', () => {
    expect(validateParticipantName('Ana-Maria 2')).toEqual({ valid: true });
    expect(validateParticipantName('Zoë')).toEqual({ valid: true });
  });

  it('rejects empty, long and punctuated names', () => {
    expect(validateParticipantName(' ').error).toBe('Participant name cannot be empty');
    expect(validateParticipantName('x'.repeat(33)).error).toBe('Participant name must be 32 characters or less');
    expect(validateParticipantName('a,b').error).toBe(
      'Participant name "a,b" can only contain letters, numbers, spaces, underscore, and hyphen'
    );
  });
});

describe('validateParticipants', () => {
  it('requires exactly three distinct names', () => {
    expect(validateParticipants(['Asha', 'Bruno', 'Chen'])).toEqual({ valid: true, errors: [] });
    expect(validateParticipants(['Asha', 'Bruno'])).toEqual({
      valid: false,
      errors: ['Exactly 3 participants are required, got 2'],
    });
  });

  it('treats names differing only by case as duplicates', () => {
    expect(validateParticipants(['Asha', 'Bruno', 'ASHA']).errors).toEqual([
      'Participant "ASHA" is listed more than once',
    ]);
  });
});
