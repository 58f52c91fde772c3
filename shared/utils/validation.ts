// Validation utilities

import { GAME_CONSTANTS } from '../constants/game';
import { isValidDateKey, parseTimeOfDay } from './time';

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export function validateTimeOfDay(value: string): ValidationResult {
  if (!value || value.trim().length === 0) {
    return { valid: false, error: 'Time cannot be empty' };
  }

  if (parseTimeOfDay(value) === null) {
    return { valid: false, error: 'Invalid time format. Please use HH:MM format.' };
  }

  return { valid: true };
}

export function validateDateKey(value: string): ValidationResult {
  if (!isValidDateKey(value)) {
    return { valid: false, error: `Invalid date "${value}". Please use YYYY-MM-DD format.` };
  }
  return { valid: true };
}

export function validateParticipantName(name: string): ValidationResult {
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    return { valid: false, error: 'Participant name cannot be empty' };
  }

  if (trimmed.length > GAME_CONSTANTS.MAX_PARTICIPANT_NAME_LENGTH) {
    return {
      valid: false,
      error: `Participant name must be ${GAME_CONSTANTS.MAX_PARTICIPANT_NAME_LENGTH} characters or less`,
    };
  }

  if (!/^[\p{L}\p{N} _-]+$/u.test(trimmed)) {
    return { valid: false, error: `Participant name "${trimmed}" can only contain letters, numbers, spaces, underscore, and hyphen` };
  }

  return { valid: true };
}

export function validateParticipants(names: readonly string[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (names.length !== GAME_CONSTANTS.PARTICIPANT_COUNT) {
    errors.push(`Exactly ${GAME_CONSTANTS.PARTICIPANT_COUNT} participants are required, got ${names.length}`);
  }

  for (const name of names) {
    const result = validateParticipantName(name);
    if (!result.valid && result.error) {
      errors.push(result.error);
    }
  }

  const seen = new Set<string>();
  for (const name of names) {
    const key = name.trim().toLowerCase();
    if (seen.has(key)) {
      errors.push(`Participant "${name.trim()}" is listed more than once`);
    }
    seen.add(key);
  }

  return { valid: errors.length === 0, errors };
}
