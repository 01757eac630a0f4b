import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { UserRecords } from '../types/domain';
import { StorageError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { decodeUserRecords } from './recordCodec';
import type { StateStore } from './StateStore';

const log = logger.child('file-store');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private writeSeq = 0;

  constructor(private readonly filePath: string) {}

  async load(): Promise<UserRecords> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new StorageError(`Cannot read state file ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    if (!text.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new StorageError(`State file ${this.filePath} is not valid JSON`, { cause: error });
    }

    return decodeUserRecords(parsed);
  }

  async save(records: UserRecords): Promise<void> {
    this.writeSeq += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.writeSeq}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(records), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('Cannot remove temp state file', { tempPath, error: errorMessage(cleanupError) });
      });
      throw new StorageError(`Cannot write state file ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
