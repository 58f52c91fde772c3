import fs from 'fs/promises';
import path from 'path';
import type { GameDocument } from '@shared';
import { isLegacyDocument, parseGameDocument, serializeGameDocument } from './documentSchema.js';
import { StorageError } from './storageError.js';
import { logger } from '../utils/logger.js';

export interface DocumentUpdate<T> {
  /** The document to write back, or null to leave the file untouched. */
  document: GameDocument | null;
  result: T;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Handle on the single JSON document. Every read goes to disk; every write
 * replaces the whole file.
 */
export class DocumentStore {
  private dataDir: string;
  private filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dataDir: string, fileName: string = 'data.json') {
    this.dataDir = path.resolve(dataDir);
    this.filePath = path.join(this.dataDir, fileName);
  }

  get path(): string {
    return this.filePath;
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
    } catch (err) {
      throw new StorageError('STORAGE_UNAVAILABLE', `Cannot create ${this.dataDir}: ${describe(err)}`, { cause: err });
    }

    console.log(`Storage initialized at ${this.filePath}`);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw new StorageError('STORAGE_UNAVAILABLE', `Cannot access ${this.filePath}: ${describe(err)}`, { cause: err });
    }
  }

  async load(): Promise<GameDocument> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return {};
      }
      throw new StorageError('STORAGE_UNAVAILABLE', `Cannot read ${this.filePath}: ${describe(err)}`, { cause: err });
    }

    if (contents.trim().length === 0) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (err) {
      throw new StorageError('STORAGE_UNAVAILABLE', `${this.filePath} is not valid JSON: ${describe(err)}`, { cause: err });
    }

    if (isLegacyDocument(raw)) {
      logger.log('STORAGE', 'Converting list-based data file', { file: this.filePath });
    }
    return parseGameDocument(raw);
  }

  async save(document: GameDocument): Promise<void> {
    // Write to temp file first, then rename (atomic)
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.writeFile(tempPath, serializeGameDocument(document), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      throw new StorageError('STORAGE_UNAVAILABLE', `Cannot write ${this.filePath}: ${describe(err)}`, { cause: err });
    }
    logger.log('STORAGE', 'Saved document', { days: Object.keys(document).length });
  }

  /**
   * Load, apply `mutate`, save. Calls are queued so one load/save pair
   * never interleaves with another inside this process.
   */
  update<T>(mutate: (document: GameDocument) => DocumentUpdate<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const current = await this.load();
      const { document, result } = mutate(current);
      if (document) {
        await this.save(document);
      }
      return result;
    });

    // Failures reach the caller through `run`; the queue only keeps order.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
