import type { GameErrorCode } from '@shared';

export type StorageErrorCode = Extract<GameErrorCode, 'STORAGE_UNAVAILABLE' | 'MALFORMED_TIME'>;

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
  }
}
