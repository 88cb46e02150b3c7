import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AuthEngine } from '../services/auth/auth.engine';
import { createAuthenticate, sendAuthError } from '../middleware/auth.middleware';
import { requireRole } from '../middleware/rbac.middleware';
import { baseUrl } from './auth.routes';

const emailSchema = z.object({
    email: z.string().email(),
});

const avatarSchema = z.object({
    avatar: z.string().url(),
});

const resetPasswordSchema = z.object({
    newPassword: z.string().min(6).max(12),
});

const INVALID_RESET_TOKEN = 'Invalid or expired token';

/** Per client IP */
const PROFILE_RATE_LIMIT = { max: 10, timeWindow: '1 minute' };

export interface UserRouteOptions {
    engine: AuthEngine;
}

export async function userRoutes(fastify: FastifyInstance, opts: UserRouteOptions) {
    const { engine } = opts;
    const authenticate = createAuthenticate(engine);

    // ─── GET /api/users/me ───
    fastify.get(
        '/api/users/me',
        { preHandler: [authenticate], config: { rateLimit: PROFILE_RATE_LIMIT } },
        async (request) => {
            return { user: request.authUser };
        }
    );

    // ─── GET /api/users/confirmed_email/:token ───
    fastify.get<{ Params: { token: string } }>('/api/users/confirmed_email/:token', async (request, reply) => {
        const result = await engine.confirmEmail(request.params.token);
        if (!result.ok) {
            reply.code(400).send({ error: 'Verification error' });
            return;
        }
        return {
            message: result.value === 'already_confirmed'
                ? 'Your email is already confirmed'
                : 'Email confirmed successfully',
        };
    });

    // ─── POST /api/users/request_email ───
    fastify.post('/api/users/request_email', async (request, reply) => {
        const parsed = emailSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const result = await engine.requestEmailVerification(parsed.data.email, baseUrl(request));
        if (!result.ok) {
            sendAuthError(reply, result.error);
            return;
        }
        return {
            message: result.value === 'already_confirmed'
                ? 'Your email is already confirmed'
                : 'Verification email sent successfully',
        };
    });

    // ─── PATCH /api/users/avatar ─── (admin only)
    fastify.patch(
        '/api/users/avatar',
        { preHandler: [authenticate, requireRole(['admin'])] },
        async (request, reply) => {
            const user = request.authUser;
            if (!user) {
                reply.code(401).send({ error: 'Authentication required' });
                return;
            }

            const parsed = avatarSchema.safeParse(request.body);
            if (!parsed.success) {
                reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
                return;
            }

            const result = await engine.updateAvatar(user.email, parsed.data.avatar);
            if (!result.ok) {
                sendAuthError(reply, result.error);
                return;
            }
            return { user: result.value };
        }
    );

    // ─── POST /api/users/request-password-reset ───
    // Unknown addresses get the same answer so the endpoint cannot be used to probe for accounts
    fastify.post('/api/users/request-password-reset', async (request, reply) => {
        const parsed = emailSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const result = await engine.requestPasswordReset(parsed.data.email, baseUrl(request));
        if (!result.ok && result.error.kind !== 'NOT_FOUND') {
            sendAuthError(reply, result.error);
            return;
        }
        return { message: 'Password reset email sent successfully' };
    });

    // ─── POST /api/users/reset-password/:token ───
    fastify.post<{ Params: { token: string } }>('/api/users/reset-password/:token', async (request, reply) => {
        const parsed = resetPasswordSchema.safeParse(request.body);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const email = engine.verifyPurposeToken(request.params.token, 'password_reset');
        if (!email.ok) {
            reply.code(400).send({ error: INVALID_RESET_TOKEN });
            return;
        }

        const result = await engine.resetPassword(email.value, parsed.data.newPassword);
        if (!result.ok) {
            reply.code(400).send({ error: INVALID_RESET_TOKEN });
            return;
        }
        return { message: 'Password reset successfully' };
    });
}
