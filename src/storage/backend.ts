/**
 * Abstract storage backend interface.
 */

export interface StorageBackend {
  /** Write data to the given key. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** List all keys with the given prefix. */
  list(prefix: string): Promise<string[]>;
}
