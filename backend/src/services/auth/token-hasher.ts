import crypto from 'crypto';

const REFRESH_TOKEN_BYTES = 32;

/** sha256 hex digest; refresh tokens are stored only in this form */
export function hashToken(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
}

export function generateRefreshToken(): string {
    return crypto.randomBytes(REFRESH_TOKEN_BYTES).toString('base64url');
}
