import type { ClockPort, EphemeralCommand, EphemeralStorePort } from '@congestion/domain';
import { SystemClock } from '../clock/deterministic-clock.js';

type Entry =
  | { kind: 'set'; members: Set<string>; expiresAtMs?: number }
  | { kind: 'list'; values: string[]; expiresAtMs?: number }
  | { kind: 'string'; value: string; expiresAtMs?: number };

/** Clock time between sweeps of expired keys. */
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/**
 * Single-process stand-in for Redis: same key semantics and TTL expiry
 * against the injected clock. Expired keys are dropped when read, and writes
 * sweep the whole map at most once per sweep interval, so closed buckets that
 * are never read again do not pile up. Used for local runs without Redis and
 * in tests.
 */
export class InMemoryEphemeralStore implements EphemeralStorePort {
  private readonly entries = new Map<string, Entry>();
  private nextSweepAtMs = 0;

  constructor(
    private readonly clock: ClockPort = new SystemClock(),
    private readonly sweepIntervalMs: number = DEFAULT_SWEEP_INTERVAL_MS,
  ) {}

  async addUnique(key: string, member: string): Promise<number> {
    return this.addUniqueSync(key, member);
  }

  async count(key: string): Promise<number> {
    return this.countSync(key);
  }

  async append(key: string, value: string): Promise<void> {
    this.appendSync(key, value);
  }

  async readAll(key: string): Promise<string[]> {
    const entry = this.live(key);
    return entry?.kind === 'list' ? [...entry.values] : [];
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    this.expireSync(key, ttlSeconds);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    this.sweepIfDue();
    if (this.live(key)) return false;
    this.entries.set(key, { kind: 'string', value, expiresAtMs: this.nowMs() + ttlSeconds * 1_000 });
    return true;
  }

  async batch(commands: readonly EphemeralCommand[]): Promise<Array<number | null>> {
    return commands.map((cmd) => {
      switch (cmd.op) {
        case 'addUnique':
          return this.addUniqueSync(cmd.key, cmd.member);
        case 'count':
          return this.countSync(cmd.key);
        case 'append':
          this.appendSync(cmd.key, cmd.value);
          return null;
        case 'expire':
          this.expireSync(cmd.key, cmd.ttlSeconds);
          return null;
      }
    });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Keys held in memory, including expired ones not yet swept. */
  get retainedKeys(): number {
    return this.entries.size;
  }

  /** Number of keys not yet expired. */
  size(): number {
    let n = 0;
    for (const key of [...this.entries.keys()]) {
      if (this.live(key)) n += 1;
    }
    return n;
  }

  private addUniqueSync(key: string, member: string): number {
    this.sweepIfDue();
    const entry = this.live(key);
    if (entry?.kind === 'set') {
      entry.members.add(member);
      return entry.members.size;
    }
    this.entries.set(key, { kind: 'set', members: new Set([member]) });
    return 1;
  }

  private countSync(key: string): number {
    const entry = this.live(key);
    return entry?.kind === 'set' ? entry.members.size : 0;
  }

  private appendSync(key: string, value: string): void {
    this.sweepIfDue();
    const entry = this.live(key);
    if (entry?.kind === 'list') {
      entry.values.push(value);
      return;
    }
    this.entries.set(key, { kind: 'list', values: [value] });
  }

  private expireSync(key: string, ttlSeconds: number): void {
    const entry = this.live(key);
    if (entry) entry.expiresAtMs = this.nowMs() + ttlSeconds * 1_000;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.nowMs()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private sweepIfDue(): void {
    const now = this.nowMs();
    if (now < this.nextSweepAtMs) return;
    this.nextSweepAtMs = now + this.sweepIntervalMs;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= now) this.entries.delete(key);
    }
  }

  private nowMs(): number {
    return this.clock.now().getTime();
  }
}
