import type { Redis } from 'ioredis';
import type { EphemeralCommand, EphemeralStorePort } from '@congestion/domain';

type PipelineResults = Array<[Error | null, unknown]> | null;

/** Set/list/TTL primitives on Redis. Errors propagate; callers decide how to degrade. */
export class RedisEphemeralStore implements EphemeralStorePort {
  constructor(private readonly client: Redis) {}

  async addUnique(key: string, member: string): Promise<number> {
    const [count] = await this.batch([{ op: 'addUnique', key, member }]);
    return count ?? 0;
  }

  async count(key: string): Promise<number> {
    return this.client.scard(key);
  }

  async append(key: string, value: string): Promise<void> {
    await this.client.rpush(key, value);
  }

  async readAll(key: string): Promise<string[]> {
    return this.client.lrange(key, 0, -1);
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.client.expire(key, ttlSeconds);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    return (await this.client.set(key, value, 'EX', ttlSeconds, 'NX')) === 'OK';
  }

  async batch(commands: readonly EphemeralCommand[]): Promise<Array<number | null>> {
    const pipeline = this.client.pipeline();
    // Index into the pipeline replies that answers each command, or -1.
    const replyIndex: number[] = [];
    let queued = 0;

    for (const cmd of commands) {
      switch (cmd.op) {
        case 'addUnique':
          pipeline.sadd(cmd.key, cmd.member).scard(cmd.key);
          replyIndex.push(queued + 1);
          queued += 2;
          break;
        case 'count':
          pipeline.scard(cmd.key);
          replyIndex.push(queued);
          queued += 1;
          break;
        case 'append':
          pipeline.rpush(cmd.key, cmd.value);
          replyIndex.push(-1);
          queued += 1;
          break;
        case 'expire':
          pipeline.expire(cmd.key, cmd.ttlSeconds);
          replyIndex.push(-1);
          queued += 1;
          break;
      }
    }

    const replies = unwrap(await pipeline.exec());
    return replyIndex.map((idx) => (idx < 0 ? null : Number(replies[idx] ?? 0)));
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}

function unwrap(results: PipelineResults): unknown[] {
  if (!results) throw new Error('redis pipeline aborted');
  return results.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}
