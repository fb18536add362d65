import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { PersistedProgressSchema, fromPersisted, toPersisted, type ProgressRecord } from '../domain/progress.js';
import type { ProgressStore } from '../scheduler/types.js';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * JSON file holding the single progress record.
 * Writes go to a temp file first and are renamed into place.
 */
export class FileProgressStore implements ProgressStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<ProgressRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      logger.warn('progress_state_unreadable', { file: this.filePath, err: String(err) });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn('progress_state_corrupt', { file: this.filePath, err: String(err) });
      return null;
    }

    const parsed = PersistedProgressSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('progress_state_invalid', {
        file: this.filePath,
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).slice(0, 5),
      });
      return null;
    }
    return fromPersisted(parsed.data);
  }

  async save(record: ProgressRecord): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    const tempFile = `${this.filePath}.tmp`;
    await fs.writeFile(tempFile, JSON.stringify(toPersisted(record), null, 2), 'utf-8');
    await fs.rename(tempFile, this.filePath);
  }
}
