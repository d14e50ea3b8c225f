/**
 * Key-value/set store with per-key TTL holding the live (cell, bucket) state.
 * Every single command is atomic at the store.
 */
export type EphemeralCommand =
  | { readonly op: 'addUnique'; readonly key: string; readonly member: string }
  | { readonly op: 'count'; readonly key: string }
  | { readonly op: 'append'; readonly key: string; readonly value: string }
  | { readonly op: 'expire'; readonly key: string; readonly ttlSeconds: number };

export interface EphemeralStorePort {
  /** Add to a set; resolves to the set's cardinality afterwards. */
  addUnique(key: string, member: string): Promise<number>;
  count(key: string): Promise<number>;
  append(key: string, value: string): Promise<void>;
  readAll(key: string): Promise<string[]>;
  expire(key: string, ttlSeconds: number): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Atomic set-if-not-exists with expiry; true when this caller set it. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  /**
   * Run commands in one round trip. Results line up with `commands`:
   * cardinality for `addUnique` and `count`, null otherwise.
   */
  batch(commands: readonly EphemeralCommand[]): Promise<Array<number | null>>;
  ping(): Promise<boolean>;
}
