/**
 * Abstract Storage interface.
 *
 * Key-value persistence medium under the preference store.
 * Implementations must make save() atomic: a concurrent or later load()
 * sees either the previous value or the new one, never a mix.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The data if found, null otherwise
   */
  load(key: string): Promise<unknown>;

  /**
   * Replace the value stored under a key.
   */
  save(key: string, data: unknown): Promise<void>;

  /**
   * Delete data by key.
   * @returns true if deleted, false if key didn't exist
   */
  delete(key: string): Promise<boolean>;

  /**
   * Check if a key exists.
   */
  exists(key: string): Promise<boolean>;

  /**
   * List all keys with the given prefix (optional).
   */
  keys?(prefix?: string): Promise<string[]>;
}
