/**
 * String key/value persistence the settings and design services write through. The
 * host decides the medium (preferences file, browser storage, a database row).
 */
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

export type StoredValueLog = {
  level: 'warn';
  event: 'stored_value_invalid';
  key: string;
  issues: string[];
};

/**
 * Reads and JSON-decodes a key. Unreadable JSON is reported through `onInvalid` and
 * treated as absent; store failures propagate.
 */
export async function readJsonItem(
  store: KeyValueStore,
  key: string,
  onInvalid?: (entry: StoredValueLog) => void
): Promise<unknown> {
  const raw = await store.getItem(key);
  if (raw === null) {
    return null;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    onInvalid?.({
      level: 'warn',
      event: 'stored_value_invalid',
      key,
      issues: [error instanceof Error ? error.message : String(error)],
    });
    return null;
  }
}

export async function writeJsonItem(store: KeyValueStore, key: string, value: unknown): Promise<void> {
  await store.setItem(key, JSON.stringify(value));
}
