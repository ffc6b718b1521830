import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { IStoreFile } from '../../interfaces/Storage';
import { Logger, StoreEntries } from '../../common/Types';
import { StoreFileError } from '../../common/Errors';
import { STORE_FILE_INDENT, STORE_FILE_TEMP_SUFFIX, entrySchema } from './StoreFileTypes';

export interface StoreFileConfig {
  readonly filePath: string;
  readonly logger: Logger;
}

export type ParseResult =
  | { ok: true; entries: StoreEntries; droppedKeys: string[] }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Only unparseable JSON or a document that is not an object is rejected
 * as a whole. Entries that are not objects are dropped one by one.
 */
export function parseStoreDocument(content: string): ParseResult {
  if (content.trim().length === 0) {
    return { ok: true, entries: new Map(), droppedKeys: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }

  // Older writers store an empty mapping as `[]`.
  if (Array.isArray(raw) && raw.length === 0) {
    return { ok: true, entries: new Map(), droppedKeys: [] };
  }

  if (!isRecord(raw)) {
    return { ok: false, reason: 'expected a JSON object' };
  }

  const entries: StoreEntries = new Map();
  const droppedKeys: string[] = [];

  for (const [key, rawEntry] of Object.entries(raw)) {
    const parsed = entrySchema.safeParse(rawEntry);
    if (parsed.success) {
      entries.set(key, parsed.data);
    } else {
      droppedKeys.push(key);
    }
  }

  return { ok: true, entries, droppedKeys };
}

export function serializeStoreDocument(entries: StoreEntries): string {
  return JSON.stringify(Object.fromEntries(entries), null, STORE_FILE_INDENT) + '\n';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class StoreFile implements IStoreFile {
  public readonly filePath: string;
  private readonly logger: Logger;

  constructor(config: StoreFileConfig) {
    this.filePath = config.filePath;
    this.logger = config.logger;
  }

  public async read(): Promise<StoreEntries> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return new Map();
      }
      throw error;
    }

    const result = parseStoreDocument(content);
    if (!result.ok) {
      this.logger.warn(`StoreFile: Ignoring malformed ${this.filePath} (${result.reason}), starting empty`);
      return new Map();
    }

    const dropped = result.droppedKeys.length;
    if (dropped > 0) {
      this.logger.warn(
        `StoreFile: Dropped ${dropped} malformed ${dropped === 1 ? 'entry' : 'entries'} from ${this.filePath}: ${result.droppedKeys.join(', ')}`
      );
    }
    return result.entries;
  }

  /**
   * Replace the file contents. Each write goes through its own fsynced
   * temp file renamed over the target, so readers never observe a
   * partial write.
   */
  public async write(entries: StoreEntries): Promise<void> {
    const content = serializeStoreDocument(entries);
    const tempPath = `${this.filePath}.${process.pid}.${randomBytes(4).toString('hex')}${STORE_FILE_TEMP_SUFFIX}`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf8');

      const handle = await fs.open(tempPath, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await this.discardTemp(tempPath);
      throw new StoreFileError(this.filePath, error);
    }
  }

  private async discardTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupError) {
      this.logger.warn(`StoreFile: Could not remove ${tempPath}: ${String(cleanupError)}`);
    }
  }
}
