import 'dotenv/config';
import { fetch } from 'undici';
import { z } from 'zod';
import { DeviceSwarm } from './simulation.js';

/**
 * Ping emitter: drives a simulated swarm against a running API.
 *
 * Env vars:
 *   API_BASE_URL         Base URL of the congestion API (default: http://localhost:3001)
 *   EMITTER_DEVICES      Devices in the swarm (default: 35)
 *   EMITTER_PROFILE      slow | mixed | fast (default: mixed)
 *   EMITTER_ROUNDS       Ticks to send; one ping per device per tick (default: 1)
 *   EMITTER_INTERVAL_MS  Delay between pings (default: 50)
 *   EMITTER_SEED         RNG seed (default: 42)
 *   CENTER_LAT / CENTER_LON  Swarm center (default: 40.758, -73.9855)
 */
const env = z
  .object({
    API_BASE_URL: z.string().url().default('http://localhost:3001'),
    EMITTER_DEVICES: z.coerce.number().int().min(1).max(999).default(35),
    EMITTER_PROFILE: z.enum(['slow', 'mixed', 'fast']).default('mixed'),
    EMITTER_ROUNDS: z.coerce.number().int().min(1).default(1),
    EMITTER_INTERVAL_MS: z.coerce.number().int().min(0).default(50),
    EMITTER_SEED: z.coerce.number().int().default(42),
    CENTER_LAT: z.coerce.number().min(-90).max(90).default(40.758),
    CENTER_LON: z.coerce.number().min(-180).max(180).default(-73.9855),
  })
  .parse(process.env);

const pingResponseSchema = z.object({ bucketCount: z.number(), level: z.string() });

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main(): Promise<void> {
  const swarm = new DeviceSwarm({
    devices: env.EMITTER_DEVICES,
    profile: env.EMITTER_PROFILE,
    center: { lat: env.CENTER_LAT, lon: env.CENTER_LON },
    seed: env.EMITTER_SEED,
  });

  console.log(
    `[emitter] ${env.EMITTER_DEVICES} devices, profile=${env.EMITTER_PROFILE}, rounds=${env.EMITTER_ROUNDS} → ${env.API_BASE_URL}`,
  );

  for (let round = 1; round <= env.EMITTER_ROUNDS; round++) {
    for (const ping of swarm.tick()) {
      try {
        const resp = await fetch(`${env.API_BASE_URL}/v1/pings`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(ping),
        });
        if (!resp.ok) {
          console.error(`[emitter] ${ping.deviceId} rejected ${resp.status}: ${await resp.text()}`);
        } else {
          const body = pingResponseSchema.parse(await resp.json());
          console.log(
            `[emitter] ${ping.deviceId} count=${body.bucketCount} speed=${ping.speedKmh.toFixed(1)} level=${body.level}`,
          );
        }
      } catch (err) {
        console.error(`[emitter] ${ping.deviceId} network error`, err instanceof Error ? err.message : err);
      }
      await sleep(env.EMITTER_INTERVAL_MS);
    }
  }

  const query = new URLSearchParams({
    lat: String(env.CENTER_LAT),
    lon: String(env.CENTER_LON),
    debug: 'true',
  });
  const resp = await fetch(`${env.API_BASE_URL}/v1/congestion?${query.toString()}`);
  console.log('[emitter] congestion verdict', JSON.stringify(await resp.json(), null, 2));
}

main().catch((err) => {
  console.error('[emitter] fatal error', err);
  process.exit(1);
});
