import type { UserDirectory } from '../../repositories/user.repository';
import { UniqueViolationError } from '../../repositories/user.repository';
import type { RefreshTokenStore } from '../../repositories/refresh-token.repository';
import type { AvatarLookup } from '../avatar/gravatar';
import type { NotificationDispatcher, Notification } from '../notification';
import type { ClientMeta, RefreshTokenRecord, SafeUser, TokenPair, TokenPurpose } from '../../types/auth';
import { toSafeUser } from '../../types/auth';
import { err, ok, type Result } from '../../types/result';
import { createChildLogger } from '../../utils/logger';
import type { AccessTokenCodec, Clock } from './access-token.codec';
import { AuthError, conflict, invalidToken, notFound, revoked, unauthorized } from './auth.errors';
import type { PasswordHasher } from './password-hasher';
import type { SessionCache } from './session-cache';
import { generateRefreshToken, hashToken } from './token-hasher';

const logger = createChildLogger({ module: 'auth-engine' });

const PASSWORD_RESET_TTL_SECONDS = 60 * 60;
const EMAIL_VERIFICATION_TTL_SECONDS = 7 * 24 * 60 * 60;
const DAY_MS = 24 * 60 * 60 * 1000;

const BAD_CREDENTIALS = 'Incorrect username or password';
const INVALID_REFRESH_TOKEN = 'Invalid refresh token';

export type DenylistFailurePolicy = 'open' | 'closed';

export interface AuthEngineSettings {
    accessTokenExpireMinutes: number;
    refreshTokenExpireDays: number;
    /** What to do when the denylist cannot be read: accept the token, or reject it */
    denylistFailurePolicy: DenylistFailurePolicy;
}

export interface AuthEngineDeps {
    users: UserDirectory;
    refreshTokens: RefreshTokenStore;
    sessionCache: SessionCache;
    passwords: PasswordHasher;
    accessTokens: AccessTokenCodec;
    avatars: AvatarLookup;
    notifications: NotificationDispatcher;
    settings: AuthEngineSettings;
    clock?: Clock;
}

export interface RegisterInput {
    username: string;
    email: string;
    password: string;
}

export interface LoginResult extends TokenPair {
    user: SafeUser;
}

export type AuthResult<T> = Result<T, AuthError>;

/**
 * Issues, validates, rotates and revokes session credentials.
 *
 * Holds no mutable state of its own: users and refresh tokens live in the
 * store, snapshots and the denylist in the session cache. Expected failures
 * come back as `AuthError` results; store outages are thrown.
 */
export class AuthEngine {
    private readonly users: UserDirectory;
    private readonly refreshTokens: RefreshTokenStore;
    private readonly sessionCache: SessionCache;
    private readonly passwords: PasswordHasher;
    private readonly accessTokens: AccessTokenCodec;
    private readonly avatars: AvatarLookup;
    private readonly notifications: NotificationDispatcher;
    private readonly settings: AuthEngineSettings;
    private readonly clock: Clock;

    constructor(deps: AuthEngineDeps) {
        this.users = deps.users;
        this.refreshTokens = deps.refreshTokens;
        this.sessionCache = deps.sessionCache;
        this.passwords = deps.passwords;
        this.accessTokens = deps.accessTokens;
        this.avatars = deps.avatars;
        this.notifications = deps.notifications;
        this.settings = deps.settings;
        this.clock = deps.clock ?? (() => new Date());
    }

    // ─── Credentials ───

    /**
     * Unknown user, unconfirmed email and wrong password all produce the same
     * message, so the response cannot be used to enumerate accounts.
     */
    async authenticate(username: string, password: string): Promise<AuthResult<SafeUser>> {
        const user = await this.users.findByUsername(username);
        if (!user) return err(unauthorized(BAD_CREDENTIALS));

        if (!(await this.passwords.verify(password, user.password_hash))) {
            return err(unauthorized(BAD_CREDENTIALS));
        }

        if (!user.confirmed) {
            logger.info({ userId: user.id }, 'Login refused, email not confirmed');
            return err(unauthorized(BAD_CREDENTIALS));
        }

        const safeUser = toSafeUser(user);
        await this.sessionCache.putUserSnapshot(safeUser);
        return ok(safeUser);
    }

    async register(input: RegisterInput): Promise<AuthResult<SafeUser>> {
        if (await this.users.findByUsername(input.username)) {
            return err(conflict('User already exists'));
        }
        if (await this.users.findByEmail(input.email)) {
            return err(conflict('Email already exists'));
        }

        let avatar: string | null = null;
        try {
            avatar = await this.avatars.lookup(input.email);
        } catch (error) {
            logger.warn({ error }, 'Avatar lookup failed, registering without avatar');
        }

        const passwordHash = await this.passwords.hash(input.password);
        try {
            const user = await this.users.create(
                { username: input.username, email: input.email },
                passwordHash,
                avatar
            );
            logger.info({ userId: user.id }, 'User registered');
            return ok(toSafeUser(user));
        } catch (error) {
            // Lost the check-then-create race to a concurrent registration
            if (error instanceof UniqueViolationError) return err(conflict('User already exists'));
            throw error;
        }
    }

    // ─── Token issuance ───

    issueAccessToken(username: string): string {
        return this.accessTokens.issue({ sub: username }, this.settings.accessTokenExpireMinutes * 60);
    }

    /** Returns the raw token; only its hash is persisted. */
    async issueRefreshToken(userId: number, meta: ClientMeta = {}): Promise<string> {
        const token = generateRefreshToken();
        const record = await this.refreshTokens.save({
            userId,
            tokenHash: hashToken(token),
            expiredAt: new Date(this.clock().getTime() + this.settings.refreshTokenExpireDays * DAY_MS),
            ipAddress: meta.ip ?? null,
            userAgent: meta.userAgent ?? null,
        });
        logger.debug({ userId, tokenId: record.id }, 'Refresh token issued');
        return token;
    }

    async login(username: string, password: string, meta: ClientMeta = {}): Promise<AuthResult<LoginResult>> {
        const authenticated = await this.authenticate(username, password);
        if (!authenticated.ok) return authenticated;

        const user = authenticated.value;
        const accessToken = this.issueAccessToken(user.username);
        const refreshToken = await this.issueRefreshToken(user.id, meta);

        logger.info({ userId: user.id, role: user.role }, 'User logged in');
        return ok({ user, accessToken, refreshToken });
    }

    // ─── Validation ───

    async validateAccessToken(token: string): Promise<AuthResult<SafeUser>> {
        const denylist = await this.sessionCache.denylistStatus(token);
        if (denylist === 'denylisted') return err(revoked());
        if (denylist === 'unavailable' && this.settings.denylistFailurePolicy === 'closed') {
            return err(unauthorized('Token revocation status unavailable'));
        }

        const decoded = this.accessTokens.decodeAndValidate(token);
        if (!decoded.ok) return err(decoded.error);
        // Purpose tokens authorize one flow only, never a session
        if (decoded.value.type) return err(invalidToken());

        const username = decoded.value.sub;
        const cached = await this.sessionCache.getUserSnapshot(username);
        if (cached) return ok(cached);

        const user = await this.users.findByUsername(username);
        if (!user) return err(unauthorized());

        const safeUser = toSafeUser(user);
        await this.sessionCache.putUserSnapshot(safeUser);
        return ok(safeUser);
    }

    async validateRefreshToken(token: string): Promise<AuthResult<SafeUser>> {
        const resolved = await this.resolveRefreshToken(token);
        if (!resolved.ok) return resolved;
        return ok(resolved.value.user);
    }

    /**
     * Exchanges an active refresh token for a new pair. The presented token
     * is revoked, so each refresh token is usable once.
     */
    async rotateRefreshToken(token: string, meta: ClientMeta = {}): Promise<AuthResult<LoginResult>> {
        const resolved = await this.resolveRefreshToken(token);
        if (!resolved.ok) return resolved;

        const { user, record } = resolved.value;
        // Only the caller whose revoke lands gets a new pair
        if (!(await this.refreshTokens.revoke(record, this.clock()))) {
            logger.warn({ userId: user.id, tokenId: record.id }, 'Refresh token already used');
            return err(invalidToken(INVALID_REFRESH_TOKEN));
        }

        const accessToken = this.issueAccessToken(user.username);
        const refreshToken = await this.issueRefreshToken(user.id, meta);
        logger.info({ userId: user.id, rotatedTokenId: record.id }, 'Refresh token rotated');
        return ok({ user, accessToken, refreshToken });
    }

    // ─── Revocation ───

    async revokeRefreshToken(token: string): Promise<void> {
        const record = await this.refreshTokens.findByHash(hashToken(token));
        if (!record || record.revoked_at !== null) return;

        if (await this.refreshTokens.revoke(record, this.clock())) {
            logger.info({ userId: record.user_id, tokenId: record.id }, 'Refresh token revoked');
        }
    }

    /**
     * Denylists the token for exactly the rest of its lifetime. A token that
     * has already expired needs no entry and is left alone.
     */
    async revokeAccessToken(token: string): Promise<AuthResult<void>> {
        const decoded = this.accessTokens.decodeIgnoringExpiry(token);
        if (!decoded.ok) return err(decoded.error);

        const remaining = this.accessTokens.remainingSeconds(decoded.value);
        if (remaining <= 0) return ok(undefined);

        await this.sessionCache.denylist(token, remaining);
        logger.info({ sub: decoded.value.sub, ttl: remaining }, 'Access token revoked');
        return ok(undefined);
    }

    async logout(accessToken: string, refreshToken?: string): Promise<AuthResult<void>> {
        if (refreshToken) {
            await this.revokeRefreshToken(refreshToken);
        }
        return this.revokeAccessToken(accessToken);
    }

    async revokeAllSessions(userId: number): Promise<number> {
        const count = await this.refreshTokens.revokeAllForUser(userId, this.clock());
        logger.info({ userId, count }, 'All refresh tokens revoked');
        return count;
    }

    // ─── Purpose tokens ───

    /** Checks signature, expiry and the `type` discriminator; yields the email in `sub`. */
    verifyPurposeToken(token: string, purpose: TokenPurpose): AuthResult<string> {
        const decoded = this.accessTokens.decodeAndValidate(token);
        if (!decoded.ok) return err(decoded.error);
        if (decoded.value.type !== purpose) return err(invalidToken('Invalid token type'));
        return ok(decoded.value.sub);
    }

    async createPasswordResetToken(email: string): Promise<AuthResult<string>> {
        const user = await this.users.findByEmail(email);
        if (!user) return err(notFound('User with this email not found'));

        return ok(this.accessTokens.issue({ sub: user.email, type: 'password_reset' }, PASSWORD_RESET_TTL_SECONDS));
    }

    async requestPasswordReset(email: string, baseUrl: string): Promise<AuthResult<void>> {
        const token = await this.createPasswordResetToken(email);
        if (!token.ok) return err(token.error);

        await this.dispatch({
            kind: 'password_reset',
            to: email,
            username: email,
            link: `${baseUrl}/api/users/reset-password/${token.value}`,
        });
        return ok(undefined);
    }

    async resetPassword(email: string, newPassword: string): Promise<AuthResult<SafeUser>> {
        const user = await this.users.findByEmail(email);
        if (!user) return err(notFound());

        const passwordHash = await this.passwords.hash(newPassword);
        const updated = toSafeUser(await this.users.setPasswordHash(user, passwordHash));
        await this.sessionCache.putUserSnapshot(updated);
        logger.info({ userId: user.id }, 'Password reset');
        return ok(updated);
    }

    createEmailVerificationToken(email: string): string {
        return this.accessTokens.issue({ sub: email, type: 'email_verification' }, EMAIL_VERIFICATION_TTL_SECONDS);
    }

    async requestEmailVerification(
        email: string,
        baseUrl: string
    ): Promise<AuthResult<'sent' | 'already_confirmed'>> {
        const user = await this.users.findByEmail(email);
        if (!user) return err(notFound());
        if (user.confirmed) return ok('already_confirmed');

        await this.dispatch({
            kind: 'email_verification',
            to: user.email,
            username: user.username,
            link: `${baseUrl}/api/users/confirmed_email/${this.createEmailVerificationToken(user.email)}`,
        });
        return ok('sent');
    }

    async confirmEmail(token: string): Promise<AuthResult<'confirmed' | 'already_confirmed'>> {
        const email = this.verifyPurposeToken(token, 'email_verification');
        if (!email.ok) return err(email.error);

        const user = await this.users.findByEmail(email.value);
        if (!user) return err(notFound());
        if (user.confirmed) return ok('already_confirmed');

        const updated = await this.users.setConfirmed(user.email);
        if (!updated) return err(notFound());
        await this.sessionCache.putUserSnapshot(toSafeUser(updated));
        logger.info({ userId: user.id }, 'Email confirmed');
        return ok('confirmed');
    }

    // ─── Profile ───

    async getUserByEmail(email: string): Promise<SafeUser | null> {
        const user = await this.users.findByEmail(email);
        return user ? toSafeUser(user) : null;
    }

    async updateAvatar(email: string, url: string): Promise<AuthResult<SafeUser>> {
        const updated = await this.users.setAvatar(email, url);
        if (!updated) return err(notFound());

        const safeUser = toSafeUser(updated);
        await this.sessionCache.putUserSnapshot(safeUser);
        return ok(safeUser);
    }

    // ─── Internals ───

    private async resolveRefreshToken(
        token: string
    ): Promise<AuthResult<{ user: SafeUser; record: RefreshTokenRecord }>> {
        const record = await this.refreshTokens.findActive(hashToken(token), this.clock());
        if (!record) return err(invalidToken(INVALID_REFRESH_TOKEN));

        // Same error whether the token or its owner is missing
        const user = await this.users.findById(record.user_id);
        if (!user) return err(invalidToken(INVALID_REFRESH_TOKEN));

        return ok({ user: toSafeUser(user), record });
    }

    private async dispatch(notification: Notification): Promise<void> {
        try {
            await this.notifications.send(notification);
        } catch (error) {
            logger.error({ error, to: notification.to, kind: notification.kind }, 'Notification dispatch failed');
        }
    }
}
