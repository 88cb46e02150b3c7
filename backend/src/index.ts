import { config } from './config';
import { logger } from './utils/logger';
import { buildApp } from './app';
import { closePool, queryOne } from './db';
import { RedisCacheClient } from './cache/redis.client';
import { PgUserRepository } from './repositories/user.repository';
import { PgRefreshTokenRepository } from './repositories/refresh-token.repository';
import { GravatarLookup } from './services/avatar/gravatar';
import { LogNotificationDispatcher } from './services/notification';
import { createAuthEngine } from './services/auth';
import { withTimeout } from './utils/timeout';

async function main() {
    // ─── Resources ───
    const cache = new RedisCacheClient(config.redisUrl);
    try {
        await withTimeout(cache.connect(), 5000, 'redis connect');
    } catch (err) {
        // The session cache degrades to misses; the store stays authoritative
        logger.warn({ err }, 'Redis unavailable at startup, continuing without cache');
    }

    const engine = createAuthEngine(config, {
        cache,
        users: new PgUserRepository(),
        refreshTokens: new PgRefreshTokenRepository(),
        avatars: new GravatarLookup(),
        notifications: new LogNotificationDispatcher(),
    });

    const app = await buildApp({
        engine,
        refreshTokenExpireDays: config.refreshTokenExpireDays,
        secureCookies: config.nodeEnv === 'production',
        frontendUrl: config.frontendUrl,
        healthChecks: {
            cache: () => cache.ping(),
            database: async () => {
                try {
                    return (await queryOne('SELECT 1 AS ok')) !== null;
                } catch (err) {
                    logger.warn({ err }, 'Database health check failed');
                    return false;
                }
            },
        },
    });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: '0.0.0.0' });
        logger.info({ port: config.port, env: config.nodeEnv }, 'Contacts auth server started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        await cache.close();
        await closePool();
        process.exit(0);
    };
    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
