// Daily game types

/** Wall-clock time of day, `HH:MM` in 24-hour format. */
export type TimeOfDay = string;

/** Calendar date, `YYYY-MM-DD`. */
export type DateKey = string;

export interface DailyRecord {
  guesses: Record<string, TimeOfDay>;
  actual_time?: TimeOfDay;
}

export type GameDocument = Record<DateKey, DailyRecord>;

export type RecordPhase = 'empty' | 'guessing' | 'ready_to_reveal' | 'revealed';

export type GameErrorCode =
  | 'INVALID_PARTICIPANT'
  | 'DUPLICATE_GUESS'
  | 'ALREADY_REVEALED'
  | 'INCOMPLETE_GUESSES'
  | 'MALFORMED_TIME'
  | 'NO_GUESSES'
  | 'INVALID_DATE'
  | 'STORAGE_UNAVAILABLE';

export interface GameError {
  code: GameErrorCode;
  message: string;
}

export interface DocumentStats {
  dataFile: string;
  exists: boolean;
  totalDays: number;
  revealedDays: number;
  totalGuesses: number;
  totalActualTimes: number;
}
