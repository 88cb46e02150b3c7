export type AuthErrorKind = 'UNAUTHORIZED' | 'CONFLICT' | 'NOT_FOUND' | 'INVALID_TOKEN' | 'REVOKED';

const STATUS_BY_KIND: Record<AuthErrorKind, number> = {
    UNAUTHORIZED: 401,
    CONFLICT: 409,
    NOT_FOUND: 404,
    INVALID_TOKEN: 401,
    REVOKED: 401,
};

export class AuthError extends Error {
    public readonly kind: AuthErrorKind;
    public readonly statusCode: number;

    constructor(kind: AuthErrorKind, message: string) {
        super(message);
        this.name = 'AuthError';
        this.kind = kind;
        this.statusCode = STATUS_BY_KIND[kind];
    }
}

// ─── Factories ───

export const unauthorized = (message = 'Could not validate credentials') => new AuthError('UNAUTHORIZED', message);
export const conflict = (message: string) => new AuthError('CONFLICT', message);
export const notFound = (message = 'User not found') => new AuthError('NOT_FOUND', message);
export const invalidToken = (message = 'Invalid token') => new AuthError('INVALID_TOKEN', message);
export const revoked = (message = 'Token revoked') => new AuthError('REVOKED', message);
