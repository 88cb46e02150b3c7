import { database, isUniqueViolation, type Queryable } from '../db';
import { PgTable } from '../db/table';
import type { NewUser, User } from '../types/auth';
import { logger } from '../utils/logger';

export class UniqueViolationError extends Error {
    constructor(message = 'Username or email already exists') {
        super(message);
        this.name = 'UniqueViolationError';
    }
}

/**
 * Source of truth for user records. Uniqueness of username and email is
 * enforced by the store itself; callers pre-check only to give a friendly error.
 */
export interface UserDirectory {
    findByUsername(username: string): Promise<User | null>;
    findByEmail(email: string): Promise<User | null>;
    findById(id: number): Promise<User | null>;
    create(data: NewUser, passwordHash: string, avatar: string | null): Promise<User>;
    setConfirmed(email: string): Promise<User | null>;
    setAvatar(email: string, url: string): Promise<User | null>;
    setPasswordHash(user: User, passwordHash: string): Promise<User>;
}

export class PgUserRepository implements UserDirectory {
    private readonly users: PgTable<User>;

    constructor(db: Queryable = database) {
        this.users = new PgTable<User>(db, 'users');
    }

    findByUsername(username: string): Promise<User | null> {
        return this.users.findOneBy('username', username);
    }

    findByEmail(email: string): Promise<User | null> {
        return this.users.findOneBy('email', email);
    }

    findById(id: number): Promise<User | null> {
        return this.users.findOneBy('id', id);
    }

    async create(data: NewUser, passwordHash: string, avatar: string | null): Promise<User> {
        try {
            const user = await this.users.insert({
                username: data.username,
                email: data.email,
                password_hash: passwordHash,
                avatar,
            });
            logger.info({ userId: user.id }, 'User created');
            return user;
        } catch (err) {
            if (isUniqueViolation(err)) throw new UniqueViolationError();
            throw err;
        }
    }

    async setConfirmed(email: string): Promise<User | null> {
        const [user] = await this.users.updateBy('email', email, { confirmed: true });
        return user ?? null;
    }

    async setAvatar(email: string, url: string): Promise<User | null> {
        const [user] = await this.users.updateBy('email', email, { avatar: url });
        return user ?? null;
    }

    async setPasswordHash(user: User, passwordHash: string): Promise<User> {
        const [updated] = await this.users.updateBy('id', user.id, { password_hash: passwordHash });
        if (!updated) throw new Error(`User ${user.id} disappeared during password update`);
        return updated;
    }
}
