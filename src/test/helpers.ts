import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { IStoreFile } from '../interfaces/Storage';
import { Clock, Logger, StoreEntries } from '../common/Types';
import { StoreFileError } from '../common/Errors';
import { parseStoreDocument, serializeStoreDocument } from '../storage/file';

export const START_TIME = 1_700_000_000;

export interface FakeClock {
  now: Clock;
  advance(seconds: number): void;
}

export function createClock(start: number = START_TIME): FakeClock {
  let current = start;
  return {
    now: () => current,
    advance(seconds: number) {
      current += seconds;
    },
  };
}

export interface RecordingLogger extends Logger {
  readonly logs: string[];
  readonly warnings: string[];
}

export function createLogger(): RecordingLogger {
  const logs: string[] = [];
  const warnings: string[] = [];
  return {
    logs,
    warnings,
    log: (message: string) => {
      logs.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
  };
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'kvstore-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * IStoreFile kept in memory as serialized text, so every read hands back
 * fresh objects the way a real file would.
 */
export class MemoryStoreFile implements IStoreFile {
  public readonly filePath = 'memory://store';
  public content: string | null = null;
  public writes = 0;
  public failWrites = false;

  async read(): Promise<StoreEntries> {
    if (this.content === null) {
      return new Map();
    }
    const result = parseStoreDocument(this.content);
    return result.ok ? result.entries : new Map();
  }

  async write(entries: StoreEntries): Promise<void> {
    if (this.failWrites) {
      throw new StoreFileError(this.filePath, new Error('disk full'));
    }
    this.writes++;
    this.content = serializeStoreDocument(entries);
  }
}
