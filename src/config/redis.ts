import { Redis } from 'ioredis';
import type { Env } from './env.js';

export function createRedisConnection(env: Pick<Env, 'REDIS_URL'>) {
  return new Redis(env.REDIS_URL ?? 'redis://127.0.0.1:6379', {
    maxRetriesPerRequest: null
  });
}
