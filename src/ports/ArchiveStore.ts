export type PutObjectOptions = {
  contentType?: string;
};

/**
 * Remote object store. `put` on an existing key overwrites it.
 * `storageKeyFor` returns the key an object given to `put` is stored under.
 */
export interface ArchiveStore {
  storageKeyFor(key: string): string;
  put(key: string, body: Buffer, options?: PutObjectOptions): Promise<void>;
}
