import type { ClockPort } from '@congestion/domain';

/** Wall clock for live traffic. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/** Clock that only moves when told to; bucket boundaries in tests are exact. */
export class DeterministicClock implements ClockPort {
  constructor(private currentMs: number) {}

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

/**
 * Small seedable generator (xorshift32) so a simulated swarm replays the
 * same pings for the same seed. Not for anything security-related.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    // xorshift has a fixed point at zero
    this.state = seed >>> 0 || 0x9e3779b9;
  }

  /** Uniform in [0, 1). */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }

  /** Uniform in [min, max). */
  between(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Uniform in [-radius, radius). */
  offset(radius: number): number {
    return this.between(-radius, radius);
  }
}
