import { createClient } from 'redis';
import { logger } from '../utils/logger';

/** Key-value store with per-key TTL, as consumed by the session cache */
export interface CacheClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    exists(key: string): Promise<boolean>;
    ping(): Promise<boolean>;
}

type RedisClient = ReturnType<typeof createClient>;

export const CacheKeys = {
    user: (username: string) => `user:${username}`,
    denylist: (token: string) => `bl:${token}`,
} as const;

/**
 * Process-wide Redis resource. Created and connected once at startup,
 * closed at shutdown, and passed to whatever needs it.
 */
export class RedisCacheClient implements CacheClient {
    private readonly client: RedisClient;

    constructor(url: string, connectTimeoutMs = 5000) {
        this.client = createClient({
            url,
            // Commands fail immediately while disconnected instead of queueing
            disableOfflineQueue: true,
            socket: {
                connectTimeout: connectTimeoutMs,
                reconnectStrategy: (retries) => {
                    const delay = Math.min(retries * 200, 5000);
                    logger.warn({ attempt: retries, delay }, 'Redis reconnecting');
                    return delay;
                },
            },
        });

        this.client.on('ready', () => logger.info('Redis ready'));
        this.client.on('error', (err: Error) => {
            logger.error({ error: err.message }, 'Redis error');
        });
    }

    async connect(): Promise<void> {
        if (!this.client.isOpen) {
            await this.client.connect();
        }
    }

    async close(): Promise<void> {
        if (this.client.isOpen) {
            await this.client.quit();
            logger.info('Redis closed');
        }
    }

    get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.client.set(key, value, { EX: ttlSeconds });
    }

    async exists(key: string): Promise<boolean> {
        return (await this.client.exists(key)) > 0;
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.client.ping()) === 'PONG';
        } catch (err) {
            logger.warn({ err }, 'Redis ping failed');
            return false;
        }
    }
}
