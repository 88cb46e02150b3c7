import { z } from 'zod';
import { CacheKeys, type CacheClient } from '../../cache/redis.client';
import type { SafeUser } from '../../types/auth';
import { createChildLogger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';

const logger = createChildLogger({ module: 'session-cache' });

export const USER_SNAPSHOT_TTL_SECONDS = 3600;
const DENYLIST_SENTINEL = '1';

export type DenylistStatus = 'denylisted' | 'clear' | 'unavailable';

const snapshotSchema = z.object({
    id: z.number().int(),
    username: z.string(),
    email: z.string(),
    confirmed: z.boolean(),
    avatar: z.string().nullable(),
    role: z.enum(['standard', 'admin']),
    created_at: z.coerce.date(),
});

function parseJson(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}

/**
 * Read-through cache of user snapshots plus the access-token denylist.
 * Every call is bounded by `timeoutMs`. Reads degrade to a miss when the
 * backend is slow or down; a denylist write that cannot be recorded is
 * reported to the caller.
 */
export class SessionCache {
    constructor(
        private readonly client: CacheClient,
        private readonly timeoutMs: number
    ) {}

    async getUserSnapshot(username: string): Promise<SafeUser | null> {
        let raw: string | null;
        try {
            raw = await withTimeout(this.client.get(CacheKeys.user(username)), this.timeoutMs, 'cache get');
        } catch (err) {
            logger.warn({ err }, 'User snapshot read failed, treating as miss');
            return null;
        }
        if (raw === null) return null;

        const parsed = snapshotSchema.safeParse(parseJson(raw));
        if (parsed.success) return parsed.data;
        logger.warn({ username }, 'Discarding malformed user snapshot');
        return null;
    }

    async putUserSnapshot(user: SafeUser, ttlSeconds = USER_SNAPSHOT_TTL_SECONDS): Promise<void> {
        const snapshot: SafeUser = {
            id: user.id,
            username: user.username,
            email: user.email,
            confirmed: user.confirmed,
            avatar: user.avatar,
            role: user.role,
            created_at: user.created_at,
        };
        try {
            await withTimeout(
                this.client.set(CacheKeys.user(user.username), JSON.stringify(snapshot), ttlSeconds),
                this.timeoutMs,
                'cache set'
            );
        } catch (err) {
            logger.warn({ err, userId: user.id }, 'User snapshot write failed');
        }
    }

    async denylistStatus(token: string): Promise<DenylistStatus> {
        try {
            const listed = await withTimeout(
                this.client.exists(CacheKeys.denylist(token)),
                this.timeoutMs,
                'cache exists'
            );
            return listed ? 'denylisted' : 'clear';
        } catch (err) {
            logger.error({ err }, 'Denylist lookup failed');
            return 'unavailable';
        }
    }

    async isDenylisted(token: string): Promise<boolean> {
        return (await this.denylistStatus(token)) === 'denylisted';
    }

    /** Entries with a non-positive TTL are skipped; the token is already dead. */
    async denylist(token: string, ttlSeconds: number): Promise<void> {
        if (ttlSeconds <= 0) return;
        try {
            await withTimeout(
                this.client.set(CacheKeys.denylist(token), DENYLIST_SENTINEL, ttlSeconds),
                this.timeoutMs,
                'cache set'
            );
        } catch (err) {
            logger.error({ err }, 'Failed to denylist access token');
            throw err;
        }
    }
}
