import Redis from 'ioredis';
import { config } from '../config';

/**
 * Only needed when the run lock is enabled, so the client is created on demand.
 */
export const createRedisClient = (): Redis => {
    const redis = new Redis({
        host: config.redis.host,
        port: config.redis.port,
        password: config.redis.password,
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
            const delay = Math.min(times * 50, 2000);
            return delay;
        },
    });

    redis.on('connect', () => {
        console.log('✅ Redis connected successfully');
    });

    redis.on('error', (err) => {
        console.error('❌ Redis connection error:', err);
    });

    return redis;
};
