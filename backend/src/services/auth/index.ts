import type { AppConfig } from '../../config';
import type { CacheClient } from '../../cache/redis.client';
import type { UserDirectory } from '../../repositories/user.repository';
import type { RefreshTokenStore } from '../../repositories/refresh-token.repository';
import type { AvatarLookup } from '../avatar/gravatar';
import type { NotificationDispatcher } from '../notification';
import { AccessTokenCodec, type Clock } from './access-token.codec';
import { AuthEngine } from './auth.engine';
import { PasswordHasher } from './password-hasher';
import { SessionCache } from './session-cache';

export { AuthEngine } from './auth.engine';
export type { AuthEngineDeps, AuthEngineSettings, AuthResult, LoginResult, RegisterInput } from './auth.engine';
export { AuthError } from './auth.errors';
export type { AuthErrorKind } from './auth.errors';

type AuthConfig = Pick<
    AppConfig,
    | 'jwtSecret'
    | 'jwtAlgorithm'
    | 'accessTokenExpireMinutes'
    | 'refreshTokenExpireDays'
    | 'bcryptRounds'
    | 'denylistFailurePolicy'
    | 'cacheTimeoutMs'
>;

export interface AuthCollaborators {
    cache: CacheClient;
    users: UserDirectory;
    refreshTokens: RefreshTokenStore;
    avatars: AvatarLookup;
    notifications: NotificationDispatcher;
    clock?: Clock;
}

/** Wires the engine from process configuration and its external collaborators. */
export function createAuthEngine(config: AuthConfig, collaborators: AuthCollaborators): AuthEngine {
    return new AuthEngine({
        users: collaborators.users,
        refreshTokens: collaborators.refreshTokens,
        sessionCache: new SessionCache(collaborators.cache, config.cacheTimeoutMs),
        passwords: new PasswordHasher(config.bcryptRounds),
        accessTokens: new AccessTokenCodec({
            secret: config.jwtSecret,
            algorithm: config.jwtAlgorithm,
            clock: collaborators.clock,
        }),
        avatars: collaborators.avatars,
        notifications: collaborators.notifications,
        settings: {
            accessTokenExpireMinutes: config.accessTokenExpireMinutes,
            refreshTokenExpireDays: config.refreshTokenExpireDays,
            denylistFailurePolicy: config.denylistFailurePolicy,
        },
        clock: collaborators.clock,
    });
}
