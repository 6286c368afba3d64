import { randomBytes } from 'crypto';
import type Redis from 'ioredis';

export interface RunLock {
    acquire(): Promise<boolean>;
    release(): Promise<void>;
}

// Delete only if we still own the key
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
else
    return 0
end`;

export class RedisRunLock implements RunLock {
    private token: string | null = null;

    constructor(
        private readonly redis: Pick<Redis, 'call'>,
        private readonly ttlMs: number,
        private readonly key = 'attribution:pipeline:lock'
    ) {}

    async acquire(): Promise<boolean> {
        const token = randomBytes(16).toString('hex');
        const reply = await this.redis.call('SET', this.key, token, 'PX', this.ttlMs, 'NX');
        if (reply !== 'OK') {
            return false;
        }
        this.token = token;
        return true;
    }

    async release(): Promise<void> {
        if (!this.token) return;
        const token = this.token;
        this.token = null;
        await this.redis.call('EVAL', RELEASE_SCRIPT, 1, this.key, token);
    }
}

/**
 * Used when locking is disabled; always grants the lock.
 */
export const noopRunLock: RunLock = {
    acquire: async () => true,
    release: async () => undefined,
};
