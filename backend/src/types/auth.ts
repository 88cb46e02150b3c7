// ─── Auth Types ───

export type UserRole = 'standard' | 'admin';

export interface User {
    id: number;
    username: string;
    email: string;
    password_hash: string;
    confirmed: boolean;
    avatar: string | null;
    role: UserRole;
    created_at: Date;
}

/** User as exposed to clients and the cache, without password_hash */
export type SafeUser = Omit<User, 'password_hash'>;

export interface NewUser {
    username: string;
    email: string;
}

export interface RefreshTokenRecord {
    id: number;
    user_id: number;
    token_hash: string;
    expired_at: Date;
    revoked_at: Date | null;
    ip_address: string | null;
    user_agent: string | null;
    created_at: Date;
}

export interface NewRefreshToken {
    userId: number;
    tokenHash: string;
    expiredAt: Date;
    ipAddress: string | null;
    userAgent: string | null;
}

/** Discriminator for tokens that authorize a single flow instead of a session */
export type TokenPurpose = 'password_reset' | 'email_verification';

/** JWT access token payload */
export interface AccessTokenClaims {
    sub: string;        // username, or email for purpose tokens
    exp: number;        // seconds since epoch
    iat?: number;
    type?: TokenPurpose;
}

/** Provenance recorded with every refresh token */
export interface ClientMeta {
    ip?: string | null;
    userAgent?: string | null;
}

export interface TokenPair {
    accessToken: string;
    refreshToken: string;
}

export function toSafeUser(user: User): SafeUser {
    const { password_hash: _passwordHash, ...safe } = user;
    return safe;
}
