import { database, type Queryable } from '../db';
import { PgTable } from '../db/table';
import type { NewRefreshToken, RefreshTokenRecord } from '../types/auth';

/** A refresh token is active iff it was never revoked and `now` is before its expiry */
export function isRefreshTokenActive(record: RefreshTokenRecord, now: Date): boolean {
    return record.revoked_at === null && now.getTime() < record.expired_at.getTime();
}

export interface RefreshTokenStore {
    findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
    findActive(tokenHash: string, now: Date): Promise<RefreshTokenRecord | null>;
    save(token: NewRefreshToken): Promise<RefreshTokenRecord>;
    /** Stamps `revoked_at` unless already set; null when another caller revoked it first */
    revoke(record: RefreshTokenRecord, now: Date): Promise<RefreshTokenRecord | null>;
    revokeAllForUser(userId: number, now: Date): Promise<number>;
    deleteExpired(before: Date): Promise<number>;
}

export class PgRefreshTokenRepository implements RefreshTokenStore {
    private readonly tokens: PgTable<RefreshTokenRecord>;

    constructor(private readonly db: Queryable = database) {
        this.tokens = new PgTable<RefreshTokenRecord>(db, 'refresh_tokens');
    }

    findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
        return this.tokens.findOneBy('token_hash', tokenHash);
    }

    async findActive(tokenHash: string, now: Date): Promise<RefreshTokenRecord | null> {
        const rows = await this.db.query<RefreshTokenRecord>(
            `SELECT * FROM refresh_tokens
             WHERE token_hash = $1 AND expired_at > $2 AND revoked_at IS NULL
             LIMIT 1`,
            [tokenHash, now]
        );
        return rows[0] ?? null;
    }

    save(token: NewRefreshToken): Promise<RefreshTokenRecord> {
        return this.tokens.insert({
            user_id: token.userId,
            token_hash: token.tokenHash,
            expired_at: token.expiredAt,
            ip_address: token.ipAddress,
            user_agent: token.userAgent,
        });
    }

    async revoke(record: RefreshTokenRecord, now: Date): Promise<RefreshTokenRecord | null> {
        const rows = await this.db.query<RefreshTokenRecord>(
            'UPDATE refresh_tokens SET revoked_at = $2 WHERE id = $1 AND revoked_at IS NULL RETURNING *',
            [record.id, now]
        );
        return rows[0] ?? null;
    }

    async revokeAllForUser(userId: number, now: Date): Promise<number> {
        const rows = await this.db.query<{ id: number }>(
            'UPDATE refresh_tokens SET revoked_at = $2 WHERE user_id = $1 AND revoked_at IS NULL RETURNING id',
            [userId, now]
        );
        return rows.length;
    }

    async deleteExpired(before: Date): Promise<number> {
        const rows = await this.db.query<{ id: number }>(
            'DELETE FROM refresh_tokens WHERE expired_at <= $1 RETURNING id',
            [before]
        );
        return rows.length;
    }
}
