import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AuthEngine } from '../services/auth/auth.engine';
import { createAuthenticate, sendAuthError } from '../middleware/auth.middleware';
import { logger } from '../utils/logger';

// ─── Validation Schemas ───

const signupSchema = z.object({
    username: z.string().min(2).max(50),
    email: z.string().email(),
    password: z.string().min(6).max(12),
});

const loginSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});

const refreshSchema = z.object({
    refreshToken: z.string().min(1).optional(),
});

export const REFRESH_COOKIE = 'refresh_token';
const COOKIE_PATH = '/api/auth';

export interface AuthRouteOptions {
    engine: AuthEngine;
    /** Lifetime of the refresh cookie, in seconds */
    refreshCookieMaxAge: number;
    secureCookies: boolean;
}

export function baseUrl(request: FastifyRequest): string {
    return `${request.protocol}://${request.hostname}`;
}

function clientMeta(request: FastifyRequest) {
    return { ip: request.ip, userAgent: request.headers['user-agent'] ?? null };
}

/** Cookie first, then an explicit body field for non-browser clients */
function presentedRefreshToken(request: FastifyRequest): string | undefined {
    const fromCookie = request.cookies[REFRESH_COOKIE];
    if (fromCookie) return fromCookie;
    const parsed = refreshSchema.safeParse(request.body ?? {});
    return parsed.success ? parsed.data.refreshToken : undefined;
}

export async function authRoutes(fastify: FastifyInstance, opts: AuthRouteOptions) {
    const { engine } = opts;
    const authenticate = createAuthenticate(engine);

    const setRefreshCookie = (reply: FastifyReply, token: string) => {
        reply.setCookie(REFRESH_COOKIE, token, {
            httpOnly: true,
            secure: opts.secureCookies,
            sameSite: 'strict',
            path: COOKIE_PATH,
            maxAge: opts.refreshCookieMaxAge,
        });
    };

    // ─── POST /api/auth/signup ───
    fastify.post('/api/auth/signup', async (request, reply) => {
        const parsed = signupSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const result = await engine.register(parsed.data);
        if (!result.ok) {
            sendAuthError(reply, result.error);
            return;
        }

        const sent = await engine.requestEmailVerification(result.value.email, baseUrl(request));
        if (!sent.ok) {
            logger.warn({ userId: result.value.id }, 'Verification email not sent after signup');
        }

        reply.code(201);
        return { user: result.value };
    });

    // ─── POST /api/auth/login ───
    fastify.post('/api/auth/login', async (request, reply) => {
        const parsed = loginSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const result = await engine.login(parsed.data.username, parsed.data.password, clientMeta(request));
        if (!result.ok) {
            sendAuthError(reply, result.error);
            return;
        }

        setRefreshCookie(reply, result.value.refreshToken);
        return {
            user: result.value.user,
            accessToken: result.value.accessToken,
            refreshToken: result.value.refreshToken,
            tokenType: 'bearer',
        };
    });

    // ─── POST /api/auth/refresh ───
    fastify.post('/api/auth/refresh', async (request, reply) => {
        const refreshToken = presentedRefreshToken(request);
        if (!refreshToken) {
            reply.code(401).send({ error: 'No refresh token provided' });
            return;
        }

        const result = await engine.rotateRefreshToken(refreshToken, clientMeta(request));
        if (!result.ok) {
            // Clear the bad cookie
            reply.clearCookie(REFRESH_COOKIE, { path: COOKIE_PATH });
            sendAuthError(reply, result.error);
            return;
        }

        setRefreshCookie(reply, result.value.refreshToken);
        return {
            accessToken: result.value.accessToken,
            refreshToken: result.value.refreshToken,
            tokenType: 'bearer',
        };
    });

    // ─── POST /api/auth/logout ───
    fastify.post('/api/auth/logout', { preHandler: [authenticate] }, async (request, reply) => {
        const accessToken = request.accessToken;
        if (!accessToken) {
            reply.code(401).send({ error: 'Authentication required' });
            return;
        }

        const result = await engine.logout(accessToken, presentedRefreshToken(request));
        if (!result.ok) {
            sendAuthError(reply, result.error);
            return;
        }

        reply.clearCookie(REFRESH_COOKIE, { path: COOKIE_PATH });
        return { message: 'Logged out' };
    });

    // ─── POST /api/auth/logout-all ───
    // Ends every session of the caller; other devices keep their access token until it expires
    fastify.post('/api/auth/logout-all', { preHandler: [authenticate] }, async (request, reply) => {
        const { authUser, accessToken } = request;
        if (!authUser || !accessToken) {
            reply.code(401).send({ error: 'Authentication required' });
            return;
        }

        const revokedSessions = await engine.revokeAllSessions(authUser.id);
        const result = await engine.revokeAccessToken(accessToken);
        if (!result.ok) {
            sendAuthError(reply, result.error);
            return;
        }

        reply.clearCookie(REFRESH_COOKIE, { path: COOKIE_PATH });
        return { message: 'Logged out everywhere', revokedSessions };
    });
}
