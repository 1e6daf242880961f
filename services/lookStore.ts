/**
 * Saved-look store
 *
 * Owns the in-memory look collection and mirrors it into a single storage entry.
 * The entry holds the JSON array of stored looks, compressed with LZ-String (UTF-16) unless
 * compression is turned off; plain JSON entries from older builds are still read.
 *
 * Every mutation rewrites the whole entry once. A failed write is logged and remembered
 * (see getSyncStatus) but never undoes the in-memory change.
 */

import LZString from 'lz-string';
import type { ImportResult, LookInput, LookRecord, LookSortKey, SyncStatus } from '../types/look';
import {
  ImportError,
  ParseError,
  PersistenceError,
  errorMessage,
} from './errors';
import {
  createLookRecord,
  parseStoredLooks,
  toStoredLook,
  type CreateLookOptions,
} from './lookRecord';
import { createLogger, type Logger } from './logger';
import type { StorageAdapter } from './storageAdapter';

export const DEFAULT_LOOKS_KEY = 'tryon-saved-looks';

export type LookStoreState = 'uninitialized' | 'ready';

export type LookStoreListener = () => void;

/**
 * Immutable view handed to subscribers; replaced after every change.
 */
export interface LookStoreSnapshot {
  looks: readonly LookRecord[];
  syncStatus: SyncStatus;
}

export interface LookStoreOptions extends CreateLookOptions {
  storage: StorageAdapter;
  key?: string;
  compress?: boolean;
  logger?: Logger;
}

// ============================================
// Sorting / filtering
// ============================================

const timeOf = (record: LookRecord) => Date.parse(record.createdAt);

const COMPARATORS: Record<LookSortKey, (a: LookRecord, b: LookRecord) => number> = {
  newest: (a, b) => timeOf(b) - timeOf(a),
  oldest: (a, b) => timeOf(a) - timeOf(b),
  name: (a, b) => a.name.localeCompare(b.name),
};

/**
 * Stable sort into a new array; ties keep their input order.
 */
export function sortLooks(records: readonly LookRecord[], sortKey: LookSortKey): LookRecord[] {
  const compare = COMPARATORS[sortKey] ?? COMPARATORS.newest;
  return [...records].sort(compare);
}

/**
 * A blank query matches everything; otherwise the query is matched as typed, spaces included.
 */
export function filterLooks(records: readonly LookRecord[], query?: string | null): LookRecord[] {
  const raw = query ?? '';
  if (!raw.trim()) return [...records];

  const needle = raw.toLowerCase();

  return records.filter(record =>
    record.name.toLowerCase().includes(needle)
    || record.notes.toLowerCase().includes(needle)
  );
}

const copyLook = (look: LookRecord): LookRecord => ({
  ...look,
  accessorySelection: { ...look.accessorySelection },
});

// ============================================
// Serialisation
// ============================================

function encodeCollection(looks: readonly LookRecord[], compress: boolean): string {
  const json = JSON.stringify(looks.map(toStoredLook));
  return compress ? LZString.compressToUTF16(json) : json;
}

function tryParseJson(text: string | null): { ok: true; value: unknown } | { ok: false } {
  if (text === null || text === '') return { ok: false };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Compressed entries are tried first unless the raw text already looks like a JSON array.
 */
function decodeCollection(raw: string): LookRecord[] {
  const decompress = () => {
    try {
      return LZString.decompressFromUTF16(raw);
    } catch {
      return null;
    }
  };
  const attempts = raw.trimStart().startsWith('[')
    ? [() => raw, decompress]
    : [decompress, () => raw];

  for (const attempt of attempts) {
    const parsed = tryParseJson(attempt());
    if (!parsed.ok) continue;

    const result = parseStoredLooks(parsed.value);
    if (result.ok) return result.looks;

    const detail = result.issues
      .map(issue => (issue.index >= 0 ? `#${issue.index}: ${issue.message}` : issue.message))
      .join(' | ');
    throw new ParseError(`Stored looks failed validation (${detail})`);
  }

  throw new ParseError('Stored looks are not valid JSON');
}

// ============================================
// Store
// ============================================

export class LookStore {
  private looks: LookRecord[] = [];
  private state: LookStoreState = 'uninitialized';
  private synced = true;
  private lastError: PersistenceError | undefined;
  private readonly listeners = new Set<LookStoreListener>();
  private snapshot: LookStoreSnapshot | undefined;

  private readonly storage: StorageAdapter;
  private readonly key: string;
  private readonly compress: boolean;
  private readonly logger: Logger;
  private readonly recordOptions: CreateLookOptions;

  constructor(options: LookStoreOptions) {
    this.storage = options.storage;
    this.key = options.key ?? DEFAULT_LOOKS_KEY;
    this.compress = options.compress ?? true;
    this.logger = options.logger ?? createLogger('LookStore');
    this.recordOptions = { now: options.now, generateId: options.generateId };

    this.load();
  }

  get status(): LookStoreState {
    return this.state;
  }

  get size(): number {
    return this.looks.length;
  }

  private load(): void {
    let raw: string | null = null;
    try {
      raw = this.storage.getItem(this.key);
    } catch (error) {
      this.logger.error('Failed to read saved looks, starting empty:', errorMessage(error));
    }

    if (raw === null) {
      this.looks = [];
    } else {
      try {
        this.looks = decodeCollection(raw);
        this.logger.debug(`Loaded ${this.looks.length} looks`);
      } catch (error) {
        const parseError = error instanceof ParseError
          ? error
          : new ParseError(errorMessage(error), { cause: error });
        this.logger.error('Discarding unreadable saved looks:', parseError.message);
        this.looks = [];
      }
    }

    this.state = 'ready';
  }

  private assertReady(): void {
    if (this.state !== 'ready') {
      throw new Error('LookStore used before it finished loading');
    }
  }

  /**
   * Writes the full collection; returns false (and records the error) when the write fails.
   */
  private persist(): boolean {
    const encoded = encodeCollection(this.looks, this.compress);
    try {
      this.storage.setItem(this.key, encoded);
      this.synced = true;
      this.lastError = undefined;
      this.logger.debug(`Saved ${this.looks.length} looks (${(encoded.length * 2 / 1024).toFixed(2)} KB)`);
      return true;
    } catch (error) {
      const persistenceError = error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to save looks: ${errorMessage(error)}`, { cause: error });
      this.synced = false;
      this.lastError = persistenceError;
      this.logger.error('Saving looks failed, changes are kept in memory only:', persistenceError.message);
      return false;
    }
  }

  private commit(): void {
    this.persist();
    this.emit();
  }

  private emit(): void {
    this.snapshot = undefined;
    for (const listener of this.listeners) {
      listener();
    }
  }

  subscribe(listener: LookStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSyncStatus(): SyncStatus {
    return this.lastError ? { synced: this.synced, lastError: this.lastError } : { synced: this.synced };
  }

  /**
   * Same object until the next change, so it can back useSyncExternalStore.
   */
  getSnapshot(): LookStoreSnapshot {
    this.assertReady();
    if (!this.snapshot) {
      this.snapshot = { looks: this.looks.map(copyLook), syncStatus: this.getSyncStatus() };
    }
    return this.snapshot;
  }

  /**
   * Retries writing the current collection.
   */
  flush(): boolean {
    this.assertReady();
    const ok = this.persist();
    this.emit();
    return ok;
  }

  // ---------- mutations ----------

  /**
   * @throws ValidationError when the name is blank; nothing is changed in that case
   */
  save(input: LookInput): LookRecord {
    this.assertReady();
    const record = createLookRecord(input, this.recordOptions);

    // ids from a custom generator are not trusted to be unique
    while (this.looks.some(look => look.id === record.id)) {
      record.id = `${record.id}-${this.looks.length}`;
    }

    this.looks.push(record);
    this.commit();
    this.logger.info(`Saved look "${record.name}" (${this.looks.length} total)`);
    return copyLook(record);
  }

  /**
   * Idempotent; returns whether a record was removed.
   */
  delete(id: string): boolean {
    this.assertReady();
    const before = this.looks.length;
    this.looks = this.looks.filter(look => look.id !== id);
    const removed = this.looks.length < before;
    this.commit();
    if (removed) {
      this.logger.info(`Deleted look ${id} (${this.looks.length} left)`);
    }
    return removed;
  }

  /**
   * Merges an exported blob by id: matching ids are overwritten in place, new ids appended.
   * @throws ImportError if the text is not a JSON array of valid looks; nothing is merged then
   */
  importMerge(serialized: string): ImportResult {
    this.assertReady();

    const parsed = tryParseJson(serialized);
    if (!parsed.ok) {
      throw new ImportError('Import file is not valid JSON', [{ index: -1, message: 'Invalid JSON' }]);
    }

    const result = parseStoredLooks(parsed.value);
    if (!result.ok) {
      const message = result.issues.length === 1 && result.issues[0].index === -1
        ? `Invalid format: ${result.issues[0].message}`
        : `Invalid look data in ${result.issues.length} record(s): `
          + result.issues.map(issue => `#${issue.index}`).join(', ');
      throw new ImportError(message, result.issues);
    }

    const merged = [...this.looks];
    const positions = new Map(merged.map((look, index) => [look.id, index]));
    let added = 0;

    for (const look of result.looks) {
      const position = positions.get(look.id);
      if (position === undefined) {
        positions.set(look.id, merged.length);
        merged.push(look);
        added++;
      } else {
        merged[position] = look;
      }
    }

    this.looks = merged;
    this.commit();

    const imported = result.looks.length;
    this.logger.info(`Imported ${imported} looks (${added} new, ${imported - added} updated)`);
    return { imported, added, updated: imported - added };
  }

  // ---------- queries ----------

  get(id: string): LookRecord | undefined {
    this.assertReady();
    const look = this.looks.find(l => l.id === id);
    return look ? copyLook(look) : undefined;
  }

  list(sortKey: LookSortKey = 'newest'): LookRecord[] {
    this.assertReady();
    return sortLooks(this.looks, sortKey).map(copyLook);
  }

  /**
   * Case-insensitive match on name or notes, in collection order.
   */
  search(query?: string | null): LookRecord[] {
    this.assertReady();
    return filterLooks(this.looks, query).map(copyLook);
  }

  /**
   * Pretty-printed JSON array in the stored shape (never compressed).
   */
  exportAll(): string {
    this.assertReady();
    return JSON.stringify(this.looks.map(toStoredLook), null, 2);
  }
}
