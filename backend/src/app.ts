import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import rateLimit from '@fastify/rate-limit';
import type { AuthEngine } from './services/auth/auth.engine';
import { authRoutes } from './routes/auth.routes';
import { userRoutes } from './routes/users.routes';
import { logger } from './utils/logger';

export interface AppDeps {
    engine: AuthEngine;
    refreshTokenExpireDays: number;
    secureCookies: boolean;
    frontendUrl?: string;
    /** Named readiness probes reported by GET /health */
    healthChecks?: Record<string, () => Promise<boolean>>;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    await app.register(cors, {
        origin: deps.frontendUrl
            ? [deps.frontendUrl, 'http://localhost:5173'] // production whitelist + local dev
            : true, // dev: allow all origins
        credentials: true,
    });
    await app.register(cookie);
    // Limits are opted into per route through `config.rateLimit`
    await app.register(rateLimit, { global: false });

    app.setErrorHandler((error, request, reply) => {
        logger.error({ err: error, url: request.url, method: request.method }, 'Request failed');
        reply.code(error.statusCode && error.statusCode < 500 ? error.statusCode : 500).send({
            error: error.statusCode && error.statusCode < 500 ? error.message : 'Internal server error',
        });
    });

    // ─── Routes ───
    await app.register(authRoutes, {
        engine: deps.engine,
        refreshCookieMaxAge: deps.refreshTokenExpireDays * 24 * 60 * 60,
        secureCookies: deps.secureCookies,
    });
    await app.register(userRoutes, { engine: deps.engine });

    // ─── Health Check ───
    app.get('/health', async (_request, reply) => {
        const services: Record<string, 'ok' | 'down'> = {};
        for (const [name, check] of Object.entries(deps.healthChecks ?? {})) {
            services[name] = (await check()) ? 'ok' : 'down';
        }
        const healthy = Object.values(services).every((status) => status === 'ok');
        reply.code(healthy ? 200 : 503);
        return {
            status: healthy ? 'ok' : 'degraded',
            timestamp: new Date().toISOString(),
            services,
        };
    });

    return app;
}
