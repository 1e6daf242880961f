import { useCallback, useMemo, useState, useSyncExternalStore } from 'react';
import type { ImportResult, LookInput, LookRecord, LookSortKey } from '../../types/look';
import { ImportError, ValidationError, errorMessage } from '../../services/errors';
import { filterLooks, sortLooks, type LookStore } from '../../services/lookStore';
import { downloadTextFile, exportFileName, readFileAsText } from '../../utils/download';

export type ActionResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

/**
 * Saved-looks hook
 * Subscribes to the store and derives the visible list: search filter first, then the sort key.
 */
export function useLooks(store: LookStore) {
  const [query, setQuery] = useState('');
  const [sortKey, setSortKey] = useState<LookSortKey>('newest');

  const subscribe = useCallback((onChange: () => void) => store.subscribe(onChange), [store]);
  const getSnapshot = useCallback(() => store.getSnapshot(), [store]);
  const { looks: allLooks, syncStatus } = useSyncExternalStore(subscribe, getSnapshot);

  const looks = useMemo(
    () => sortLooks(filterLooks(allLooks, query), sortKey),
    [allLooks, query, sortKey]
  );

  /**
   * Save a look; validation failures come back as a message
   */
  const saveLook = useCallback((input: LookInput): ActionResult<LookRecord> => {
    try {
      return { ok: true, value: store.save(input) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { ok: false, message: error.message };
      }
      throw error;
    }
  }, [store]);

  const deleteLook = useCallback((id: string) => store.delete(id), [store]);

  const getLook = useCallback((id: string) => store.get(id), [store]);

  const importText = useCallback((text: string): ActionResult<ImportResult> => {
    try {
      return { ok: true, value: store.importMerge(text) };
    } catch (error) {
      if (error instanceof ImportError) {
        return { ok: false, message: `Error importing looks: ${error.message}` };
      }
      throw error;
    }
  }, [store]);

  const importFile = useCallback(async (file: Blob): Promise<ActionResult<ImportResult>> => {
    let text: string;
    try {
      text = await readFileAsText(file);
    } catch (error) {
      return { ok: false, message: `Error reading file: ${errorMessage(error)}` };
    }
    return importText(text);
  }, [importText]);

  const exportLooks = useCallback((now: Date = new Date()) => {
    const filename = exportFileName(now);
    downloadTextFile(filename, store.exportAll());
    return filename;
  }, [store]);

  const retrySync = useCallback(() => store.flush(), [store]);

  return {
    // state
    looks,
    totalCount: allLooks.length,
    query,
    sortKey,
    syncStatus,

    // methods
    setQuery,
    setSortKey,
    saveLook,
    deleteLook,
    getLook,
    importText,
    importFile,
    exportLooks,
    retrySync,
  };
}
