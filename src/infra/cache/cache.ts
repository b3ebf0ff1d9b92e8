/**
 * Plain key-value cache. Not used by the user workflows; the readiness probe
 * reports on it and it is available to new features.
 */
export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void>;
  del(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
