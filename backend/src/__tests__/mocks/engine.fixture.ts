import { createAuthEngine } from '../../services/auth';
import type { AuthEngine } from '../../services/auth';
import type { AvatarLookup } from '../../services/avatar/gravatar';
import type { Notification, NotificationDispatcher } from '../../services/notification';
import { InMemoryCacheClient } from './cache.mock';
import { InMemoryRefreshTokenStore, InMemoryUserDirectory } from './stores.mock';

export const START = new Date('2026-03-01T12:00:00.000Z');

export class RecordingDispatcher implements NotificationDispatcher {
    readonly name = 'recording';
    sent: Notification[] = [];

    async send(notification: Notification): Promise<void> {
        this.sent.push(notification);
    }
}

export interface TestEngine {
    engine: AuthEngine;
    cache: InMemoryCacheClient;
    users: InMemoryUserDirectory;
    refreshTokens: InMemoryRefreshTokenStore;
    notifications: RecordingDispatcher;
    now: () => Date;
    advance: (seconds: number) => void;
}

export interface TestEngineOptions {
    avatars?: AvatarLookup;
    denylistFailurePolicy?: 'open' | 'closed';
}

/** Engine over in-memory collaborators and a clock that only moves when told to */
export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
    let current = START;
    const now = () => current;
    const advance = (seconds: number) => {
        current = new Date(current.getTime() + seconds * 1000);
    };

    const cache = new InMemoryCacheClient(() => now().getTime());
    const users = new InMemoryUserDirectory();
    const refreshTokens = new InMemoryRefreshTokenStore();
    const notifications = new RecordingDispatcher();

    const engine = createAuthEngine(
        {
            jwtSecret: 'test-secret',
            jwtAlgorithm: 'HS256',
            accessTokenExpireMinutes: 15,
            refreshTokenExpireDays: 7,
            bcryptRounds: 4,
            denylistFailurePolicy: options.denylistFailurePolicy ?? 'closed',
            cacheTimeoutMs: 50,
        },
        {
            cache,
            users,
            refreshTokens,
            avatars: options.avatars ?? { lookup: async (email) => `https://avatars.test/${email}` },
            notifications,
            clock: now,
        }
    );

    return { engine, cache, users, refreshTokens, notifications, now, advance };
}
