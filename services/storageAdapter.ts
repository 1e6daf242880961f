/**
 * Persistence adapters
 *
 * Synchronous string key/value storage consumed by the look store and session state.
 * `createBrowserStorage` wraps localStorage; `createMemoryStorage` keeps everything in a Map
 * and is used by tests and by hosts without Web Storage.
 */

import { PersistenceError, errorMessage } from './errors';

export interface StorageAdapter {
  /** Stored value, or null when the key is absent */
  getItem(key: string): string | null;
  /** @throws PersistenceError when the value cannot be written (e.g. quota exceeded) */
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

type WebStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

function isQuotaError(error: unknown): boolean {
  if (typeof DOMException !== 'undefined' && error instanceof DOMException) {
    // Firefox reports NS_ERROR_DOM_QUOTA_REACHED, older WebKit code 22
    return error.name === 'QuotaExceededError'
      || error.name === 'NS_ERROR_DOM_QUOTA_REACHED'
      || error.code === 22;
  }
  return false;
}

export function createBrowserStorage(storage: WebStorage): StorageAdapter {
  return {
    getItem(key) {
      return storage.getItem(key);
    },

    setItem(key, value) {
      try {
        storage.setItem(key, value);
      } catch (error) {
        if (isQuotaError(error)) {
          throw new PersistenceError(
            'Browser storage is full. Delete some looks or export them to a file to free space.',
            { cause: error, quotaExceeded: true }
          );
        }
        throw new PersistenceError(`Failed to write "${key}": ${errorMessage(error)}`, { cause: error });
      }
    },

    removeItem(key) {
      try {
        storage.removeItem(key);
      } catch (error) {
        throw new PersistenceError(`Failed to remove "${key}": ${errorMessage(error)}`, { cause: error });
      }
    },
  };
}

export interface MemoryStorage extends StorageAdapter {
  readonly entries: Map<string, string>;
}

/**
 * In-memory adapter. `quotaBytes` caps the total stored characters (UTF-16 code units x2),
 * which lets tests reproduce a full browser store.
 */
export function createMemoryStorage(
  initial: Record<string, string> = {},
  options: { quotaBytes?: number } = {}
): MemoryStorage {
  const entries = new Map<string, string>(Object.entries(initial));

  const usedBytes = (exceptKey: string) => {
    let total = 0;
    for (const [key, value] of entries) {
      if (key !== exceptKey) total += (key.length + value.length) * 2;
    }
    return total;
  };

  return {
    entries,

    getItem(key) {
      return entries.get(key) ?? null;
    },

    setItem(key, value) {
      if (options.quotaBytes !== undefined) {
        const needed = usedBytes(key) + (key.length + value.length) * 2;
        if (needed > options.quotaBytes) {
          throw new PersistenceError(
            `Storage quota exceeded: ${needed} of ${options.quotaBytes} bytes`,
            { quotaExceeded: true }
          );
        }
      }
      entries.set(key, value);
    },

    removeItem(key) {
      entries.delete(key);
    },
  };
}

/**
 * localStorage when the host has a working one, otherwise an in-memory adapter.
 */
export function createDefaultStorage(): StorageAdapter {
  try {
    if (typeof window !== 'undefined' && window.localStorage) {
      return createBrowserStorage(window.localStorage);
    }
  } catch (error) {
    // Accessing localStorage throws in some sandboxed iframes
    console.warn('[storage] localStorage unavailable, using memory storage:', errorMessage(error));
  }
  return createMemoryStorage();
}
