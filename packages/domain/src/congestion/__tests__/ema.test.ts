import { describe, it, expect } from '@jest/globals';
import type { EmaBaseline } from '../../entities/baseline.js';
import { UNCALIBRATED } from '../../entities/baseline.js';
import { foldEma } from '../ema.js';

const seeded: EmaBaseline = {
  kind: 'ema',
  avgSpeed: 50,
  avgCount: 20,
  speedVariance: 0,
  countVariance: 0,
  sampleCount: 10,
};

describe('foldEma', () => {
  it('seeds the baseline from the first bucket', () => {
    expect(foldEma(UNCALIBRATED, { count: 12, avgSpeed: 40 })).toEqual({
      kind: 'ema',
      avgCount: 12,
      avgSpeed: 40,
      countVariance: 0,
      speedVariance: 0,
      sampleCount: 1,
    });
  });

  it('moves one tenth of the way toward a new count', () => {
    const next = foldEma(seeded, { count: 30 });
    expect(next.avgCount).toBeCloseTo(21.0, 10);
    expect(next.countVariance).toBeCloseTo(10, 10);
    expect(next.sampleCount).toBe(11);
  });

  it('leaves speed statistics alone for a speedless bucket', () => {
    const next = foldEma(seeded, { count: 30 });
    expect(next.avgSpeed).toBe(50);
    expect(next.speedVariance).toBe(0);
  });

  it('blends speed variance from the pre-update mean', () => {
    const next = foldEma(seeded, { count: 20, avgSpeed: 30 });
    expect(next.avgSpeed).toBeCloseTo(48, 10);
    expect(next.speedVariance).toBeCloseTo(40, 10);
  });

  it('seeds speed directly when none was learned yet', () => {
    const next = foldEma({ ...seeded, avgSpeed: 0 }, { count: 20, avgSpeed: 55 });
    expect(next.avgSpeed).toBe(55);
    expect(next.speedVariance).toBe(0);
  });

  it('converges on a repeated count', () => {
    let baseline = foldEma(UNCALIBRATED, { count: 20 });
    for (let i = 0; i < 300; i++) baseline = foldEma(baseline, { count: 30 });
    expect(baseline.avgCount).toBeCloseTo(30, 6);
    expect(baseline.sampleCount).toBe(301);
  });

  it('accepts a custom alpha', () => {
    expect(foldEma(seeded, { count: 30 }, 0.5).avgCount).toBe(25);
  });
});
