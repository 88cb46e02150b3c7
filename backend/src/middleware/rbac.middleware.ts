import { FastifyRequest, FastifyReply } from 'fastify';
import type { UserRole } from '../types/auth';

/**
 * Factory that returns a Fastify preHandler hook enforcing the role flag.
 * Must be used AFTER the authenticate hook so `request.authUser` is available.
 *
 * @example
 *   fastify.patch('/api/users/avatar', {
 *     preHandler: [authenticate, requireRole(['admin'])],
 *   }, handler);
 */
export function requireRole(allowedRoles: UserRole[]) {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const user = request.authUser;
        if (!user) {
            reply.code(401).send({ error: 'Authentication required' });
            return;
        }

        if (!allowedRoles.includes(user.role)) {
            reply.code(403).send({ error: 'Insufficient permissions' });
            return;
        }
    };
}
