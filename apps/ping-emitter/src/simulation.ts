import type { LatLng } from '@congestion/domain';
import { SeededRng } from '@congestion/adapters';

export type TrafficProfile = 'slow' | 'mixed' | 'fast';

/** Speed band (km/h) each device draws from on every tick. */
export const SPEED_RANGES: Readonly<Record<TrafficProfile, readonly [number, number]>> = {
  slow: [5, 15],
  mixed: [20, 40],
  fast: [50, 70],
};

/** 1-based: deviceName(7) === 'car_007'. */
export function deviceName(index: number): string {
  return `car_${String(index).padStart(3, '0')}`;
}

export interface SimulatedPing {
  deviceId: string;
  lat: number;
  lon: number;
  speedKmh: number;
}

export interface SwarmOptions {
  devices: number;
  profile: TrafficProfile;
  center: LatLng;
  seed: number;
  /** Max offset from the center in degrees; small enough to stay in one cell. */
  jitterDeg?: number;
}

/** A fixed set of devices circling one point, reproducible from its seed. */
export class DeviceSwarm {
  private readonly rng: SeededRng;
  private readonly jitter: number;
  readonly deviceIds: readonly string[];

  constructor(private readonly options: SwarmOptions) {
    this.rng = new SeededRng(options.seed);
    this.jitter = options.jitterDeg ?? 0.0002;
    this.deviceIds = Array.from({ length: options.devices }, (_, i) => deviceName(i + 1));
  }

  /** One ping per device. */
  tick(): SimulatedPing[] {
    const [min, max] = SPEED_RANGES[this.options.profile];
    const { lat, lon } = this.options.center;
    return this.deviceIds.map((deviceId) => ({
      deviceId,
      lat: lat + this.rng.offset(this.jitter),
      lon: lon + this.rng.offset(this.jitter),
      speedKmh: Math.round(this.rng.between(min, max) * 10) / 10,
    }));
  }
}
