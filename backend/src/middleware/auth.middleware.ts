import { FastifyRequest, FastifyReply } from 'fastify';
import type { AuthEngine } from '../services/auth/auth.engine';
import type { AuthError } from '../services/auth/auth.errors';
import type { SafeUser } from '../types/auth';
import { logger } from '../utils/logger';

// Extend Fastify request with auth user
declare module 'fastify' {
    interface FastifyRequest {
        authUser?: SafeUser;
        accessToken?: string;
    }
}

export function sendAuthError(reply: FastifyReply, error: AuthError): void {
    reply.code(error.statusCode).send({ error: error.message, code: error.kind });
}

/**
 * Builds the Fastify preHandler hook that validates the bearer token in the
 * Authorization header. On success, attaches `request.authUser` and
 * `request.accessToken`; on failure, replies 401.
 */
export function createAuthenticate(engine: AuthEngine) {
    return async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const authHeader = request.headers.authorization;
        if (!authHeader?.startsWith('Bearer ')) {
            reply.code(401).send({ error: 'Missing or malformed Authorization header' });
            return;
        }

        const token = authHeader.slice(7); // Remove 'Bearer '
        const result = await engine.validateAccessToken(token);
        if (!result.ok) {
            logger.debug({ kind: result.error.kind }, 'Access token rejected');
            sendAuthError(reply, result.error);
            return;
        }

        request.authUser = result.value;
        request.accessToken = token;
    };
}
