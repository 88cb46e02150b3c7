import jwt, { type Algorithm, type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { AccessTokenClaims, TokenPurpose } from '../../types/auth';
import { err, ok, type Result } from '../../types/result';
import { AuthError, invalidToken } from './auth.errors';
import { logger } from '../../utils/logger';

export type Clock = () => Date;

export interface AccessTokenCodecOptions {
    secret: string;
    algorithm: Algorithm;
    clock?: Clock;
}

const claimsSchema = z.object({
    sub: z.string().min(1),
    exp: z.number().int(),
    iat: z.number().int().optional(),
    type: z.enum(['password_reset', 'email_verification']).optional(),
});

/**
 * Signs and verifies short-lived bearer tokens. Pure function of the token,
 * the server secret and the clock; no store is consulted.
 */
export class AccessTokenCodec {
    private readonly secret: string;
    private readonly algorithm: Algorithm;
    private readonly clock: Clock;

    constructor(options: AccessTokenCodecOptions) {
        this.secret = options.secret;
        this.algorithm = options.algorithm;
        this.clock = options.clock ?? (() => new Date());
    }

    issue(claims: { sub: string; type?: TokenPurpose }, ttlSeconds: number): string {
        const now = this.nowSeconds();
        const payload: AccessTokenClaims = {
            sub: claims.sub,
            iat: now,
            exp: now + ttlSeconds,
            ...(claims.type && { type: claims.type }),
        };
        return jwt.sign(payload, this.secret, { algorithm: this.algorithm });
    }

    decodeAndValidate(token: string): Result<AccessTokenClaims, AuthError> {
        return this.verify(token, false);
    }

    /** Signature and shape only; used to work out how long a token has left. */
    decodeIgnoringExpiry(token: string): Result<AccessTokenClaims, AuthError> {
        return this.verify(token, true);
    }

    /** Seconds left before `exp`; zero or negative once the token has expired */
    remainingSeconds(claims: AccessTokenClaims): number {
        return claims.exp - this.nowSeconds();
    }

    private verify(token: string, ignoreExpiration: boolean): Result<AccessTokenClaims, AuthError> {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.secret, {
                algorithms: [this.algorithm],
                clockTimestamp: this.nowSeconds(),
                ignoreExpiration,
            });
        } catch (error) {
            logger.debug({ reason: error instanceof Error ? error.name : 'unknown' }, 'Access token rejected');
            return err(invalidToken());
        }

        const parsed = claimsSchema.safeParse(decoded);
        if (!parsed.success) {
            logger.debug('Access token payload is missing required claims');
            return err(invalidToken());
        }
        return ok(parsed.data);
    }

    private nowSeconds(): number {
        return Math.floor(this.clock().getTime() / 1000);
    }
}
