import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { FileRecord, Usage } from '../core/types';
import { SourceIOError } from '../core/errors';
import { log, errorMessage } from '../logging/logger';

/**
 * On-disk shape of one ledger entry
 */
export interface LedgerEntry {
  hash: string;
  last_translated: string;
  target_language?: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
    prompt_price: number;
    completion_price: number;
    total_price: number;
    currency: string | null;
  };
}

export interface ChangeLedgerOptions {
  /** Directory that ledger keys are relative to */
  sourceRoot: string;
  /** Records for any other language count as stale */
  targetLanguage: string;
  /** Clock override for tests */
  now?: () => Date;
}

/**
 * Normalize a relative path to the ledger's key form (forward slashes)
 */
export function toLedgerKey(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * SHA-256 hex digest of a file's bytes
 * @throws SourceIOError if the file cannot be read
 */
export async function hashFile(filePath: string): Promise<string> {
  let content: Buffer;
  try {
    content = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new SourceIOError(filePath, error);
  }
  return createHash('sha256').update(content).digest('hex');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function usageFromEntry(value: unknown): Usage | undefined {
  if (!isObject(value)) {
    return undefined;
  }
  return {
    promptTokens: numberField(value, 'prompt_tokens'),
    completionTokens: numberField(value, 'completion_tokens'),
    totalTokens: numberField(value, 'total_tokens'),
    promptPrice: numberField(value, 'prompt_price'),
    completionPrice: numberField(value, 'completion_price'),
    totalPrice: numberField(value, 'total_price'),
    currency: typeof value.currency === 'string' ? value.currency : null,
  };
}

/**
 * Decode one ledger entry. Returns null when the entry is malformed.
 */
export function recordFromEntry(key: string, value: unknown): FileRecord | null {
  if (!isObject(value) || typeof value.hash !== 'string' || typeof value.last_translated !== 'string') {
    return null;
  }

  const record: FileRecord = {
    path: key,
    contentHash: value.hash,
    lastTranslated: value.last_translated,
  };
  if (typeof value.target_language === 'string') {
    record.targetLanguage = value.target_language;
  }
  const usage = usageFromEntry(value.usage);
  if (usage) {
    record.usage = usage;
  }
  return record;
}

export function entryFromRecord(record: FileRecord): LedgerEntry {
  const entry: LedgerEntry = {
    hash: record.contentHash,
    last_translated: record.lastTranslated,
  };
  if (record.targetLanguage !== undefined) {
    entry.target_language = record.targetLanguage;
  }
  if (record.usage) {
    entry.usage = {
      prompt_tokens: record.usage.promptTokens,
      completion_tokens: record.usage.completionTokens,
      total_tokens: record.usage.totalTokens,
      prompt_price: record.usage.promptPrice,
      completion_price: record.usage.completionPrice,
      total_price: record.usage.totalPrice,
      currency: record.usage.currency,
    };
  }
  return entry;
}

/**
 * Change-detection ledger
 *
 * Flat JSON file keyed by relative source path. A record exists only for
 * files translated successfully since the ledger was last cleared; a file
 * needs translation when its record is missing, its source hash changed, or
 * it was translated into another language.
 *
 * Writes go through a queue so concurrent workers never interleave a
 * read-modify-write: each mutation updates memory, then rewrites the whole
 * file via a temp file and rename.
 */
export class ChangeLedger {
  private readonly filePath: string;
  private readonly sourceRoot: string;
  private readonly targetLanguage: string;
  private readonly now: () => Date;
  private records: Map<string, FileRecord> = new Map();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: ChangeLedgerOptions) {
    this.filePath = filePath;
    this.sourceRoot = options.sourceRoot;
    this.targetLanguage = options.targetLanguage;
    this.now = options.now ?? (() => new Date());
    this.load();
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Load the ledger from disk. A missing file is an empty ledger; an
   * unreadable one is logged and treated as empty.
   */
  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      log(`[Ledger] Failed to load ${this.filePath}, starting empty: ${errorMessage(error)}`);
      return;
    }

    if (!isObject(parsed)) {
      log(`[Ledger] ${this.filePath} is not a JSON object, starting empty`);
      return;
    }

    for (const [key, value] of Object.entries(parsed)) {
      const record = recordFromEntry(key, value);
      if (record) {
        this.records.set(key, record);
      } else {
        log(`[Ledger] Dropping malformed entry for ${key}`);
      }
    }
  }

  get(relativePath: string): FileRecord | undefined {
    return this.records.get(toLedgerKey(relativePath));
  }

  paths(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Check whether a source file must be (re)translated
   * @throws SourceIOError if the source file is unreadable
   */
  async needsTranslation(relativePath: string): Promise<boolean> {
    const currentHash = await hashFile(path.join(this.sourceRoot, relativePath));
    const record = this.get(relativePath);

    if (!record) {
      return true;
    }
    if (record.targetLanguage !== this.targetLanguage) {
      return true;
    }
    return record.contentHash !== currentHash;
  }

  /**
   * Record a successful translation. Hashes the source file (not the
   * translated output), stamps the current time and persists the ledger.
   */
  recordSuccess(relativePath: string, usage?: Usage): Promise<FileRecord> {
    return this.serialize(async () => {
      const key = toLedgerKey(relativePath);
      const record: FileRecord = {
        path: key,
        contentHash: await hashFile(path.join(this.sourceRoot, relativePath)),
        lastTranslated: this.now().toISOString(),
        targetLanguage: this.targetLanguage,
      };
      if (usage) {
        record.usage = { ...usage };
      }

      this.records.set(key, record);
      await this.persist();
      return record;
    });
  }

  /**
   * Reset to empty and persist immediately
   */
  clear(): Promise<void> {
    return this.serialize(async () => {
      this.records.clear();
      await this.persist();
    });
  }

  /**
   * Run a mutation after every previously queued one has settled. The
   * caller gets the mutation's own result or rejection; the queue itself
   * only tracks completion.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async persist(): Promise<void> {
    const data: Record<string, LedgerEntry> = {};
    for (const [key, record] of this.records) {
      data[key] = entryFromRecord(record);
    }

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.promises.rename(tempPath, this.filePath);
  }
}
