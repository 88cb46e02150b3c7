import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { PasswordHasher } from '../services/auth/password-hasher';
import { createTestEngine, type TestEngine } from './mocks/engine.fixture';

function tokenFromLink(link: string): string {
    return link.slice(link.lastIndexOf('/') + 1);
}

describe('HTTP API', () => {
    let t: TestEngine;
    let app: FastifyInstance;

    beforeEach(async () => {
        t = createTestEngine();
        app = await buildApp({
            engine: t.engine,
            refreshTokenExpireDays: 7,
            secureCookies: false,
            healthChecks: { cache: () => t.cache.ping() },
        });
    });

    afterEach(async () => {
        await app.close();
    });

    const signup = (username = 'carol', email = 'carol@example.test', password = 'secret1') =>
        app.inject({ method: 'POST', url: '/api/auth/signup', payload: { username, email, password } });

    const login = (username = 'carol', password = 'secret1') =>
        app.inject({ method: 'POST', url: '/api/auth/login', payload: { username, password } });

    async function signupConfirmed() {
        await signup();
        const link = t.notifications.sent[t.notifications.sent.length - 1].link;
        await app.inject({ method: 'GET', url: `/api/users/confirmed_email/${tokenFromLink(link)}` });
    }

    describe('signup and confirmation', () => {
        it('should create the user and send a verification email', async () => {
            const res = await signup();

            expect(res.statusCode).toBe(201);
            const body = res.json();
            expect(body.user).toMatchObject({ username: 'carol', email: 'carol@example.test', confirmed: false });
            expect(body.user).not.toHaveProperty('password_hash');
            expect(t.notifications.sent).toHaveLength(1);
            expect(t.notifications.sent[0].kind).toBe('email_verification');
        });

        it('should reject invalid input', async () => {
            const res = await signup('carol', 'carol@example.test', 'abc');

            expect(res.statusCode).toBe(400);
            expect(res.json().error).toBe('Invalid input');
        });

        it('should reject a duplicate registration', async () => {
            await signup();
            const res = await signup('carol2');

            expect(res.statusCode).toBe(409);
            expect(res.json()).toEqual({ error: 'Email already exists', code: 'CONFLICT' });
        });

        it('should confirm the email through the emailed link', async () => {
            await signup();
            const token = tokenFromLink(t.notifications.sent[0].link);

            const first = await app.inject({ method: 'GET', url: `/api/users/confirmed_email/${token}` });
            const second = await app.inject({ method: 'GET', url: `/api/users/confirmed_email/${token}` });

            expect(first.json()).toEqual({ message: 'Email confirmed successfully' });
            expect(second.json()).toEqual({ message: 'Your email is already confirmed' });
        });

        it('should reject a bad confirmation token', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/users/confirmed_email/garbage' });

            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Verification error' });
        });

        it('should resend verification only while unconfirmed', async () => {
            await signup();

            const resent = await app.inject({
                method: 'POST',
                url: '/api/users/request_email',
                payload: { email: 'carol@example.test' },
            });
            expect(resent.json()).toEqual({ message: 'Verification email sent successfully' });

            await t.users.setConfirmed('carol@example.test');
            const again = await app.inject({
                method: 'POST',
                url: '/api/users/request_email',
                payload: { email: 'carol@example.test' },
            });
            expect(again.json()).toEqual({ message: 'Your email is already confirmed' });
            expect(t.notifications.sent).toHaveLength(2);
        });
    });

    describe('sessions', () => {
        it('should refuse login before confirmation', async () => {
            await signup();
            const res = await login();

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'Incorrect username or password', code: 'UNAUTHORIZED' });
        });

        it('should log in, set the refresh cookie and serve the profile', async () => {
            await signupConfirmed();

            const res = await login();
            expect(res.statusCode).toBe(200);
            const body = res.json();
            expect(body.tokenType).toBe('bearer');
            expect(String(res.headers['set-cookie'])).toContain(`refresh_token=${body.refreshToken}`);

            const me = await app.inject({
                method: 'GET',
                url: '/api/users/me',
                headers: { authorization: `Bearer ${body.accessToken}` },
            });
            expect(me.statusCode).toBe(200);
            expect(me.json().user.username).toBe('carol');
        });

        it('should rate limit the profile to ten calls a minute per client', async () => {
            await signupConfirmed();
            const { accessToken } = (await login()).json();
            const me = () =>
                app.inject({
                    method: 'GET',
                    url: '/api/users/me',
                    headers: { authorization: `Bearer ${accessToken}` },
                });

            for (let i = 0; i < 10; i++) {
                expect((await me()).statusCode).toBe(200);
            }
            expect((await me()).statusCode).toBe(429);
            expect((await login()).statusCode).toBe(200);
        });

        it('should require a bearer token for the profile', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/users/me' });

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'Missing or malformed Authorization header' });
        });

        it('should rotate refresh tokens', async () => {
            await signupConfirmed();
            const { refreshToken } = (await login()).json();

            const rotated = await app.inject({ method: 'POST', url: '/api/auth/refresh', payload: { refreshToken } });
            expect(rotated.statusCode).toBe(200);
            expect(rotated.json().refreshToken).not.toBe(refreshToken);

            const replayed = await app.inject({ method: 'POST', url: '/api/auth/refresh', payload: { refreshToken } });
            expect(replayed.statusCode).toBe(401);
            expect(replayed.json()).toEqual({ error: 'Invalid refresh token', code: 'INVALID_TOKEN' });
        });

        it('should ask for a refresh token when none is presented', async () => {
            const res = await app.inject({ method: 'POST', url: '/api/auth/refresh', payload: {} });

            expect(res.statusCode).toBe(401);
            expect(res.json()).toEqual({ error: 'No refresh token provided' });
        });

        it('should revoke the session on logout', async () => {
            await signupConfirmed();
            const { accessToken, refreshToken } = (await login()).json();
            const headers = { authorization: `Bearer ${accessToken}` };

            const out = await app.inject({ method: 'POST', url: '/api/auth/logout', headers, payload: { refreshToken } });
            expect(out.json()).toEqual({ message: 'Logged out' });

            const me = await app.inject({ method: 'GET', url: '/api/users/me', headers });
            expect(me.statusCode).toBe(401);
            expect(me.json()).toEqual({ error: 'Token revoked', code: 'REVOKED' });

            const refreshed = await app.inject({ method: 'POST', url: '/api/auth/refresh', payload: { refreshToken } });
            expect(refreshed.statusCode).toBe(401);
        });
    });

    describe('logout everywhere', () => {
        it('should revoke every refresh token of the caller', async () => {
            await signupConfirmed();
            const first = (await login()).json();
            t.advance(1);
            const second = (await login()).json();

            const res = await app.inject({
                method: 'POST',
                url: '/api/auth/logout-all',
                headers: { authorization: `Bearer ${second.accessToken}` },
            });

            expect(res.json()).toEqual({ message: 'Logged out everywhere', revokedSessions: 2 });
            for (const refreshToken of [first.refreshToken, second.refreshToken]) {
                const refreshed = await app.inject({ method: 'POST', url: '/api/auth/refresh', payload: { refreshToken } });
                expect(refreshed.statusCode).toBe(401);
            }
        });
    });

    describe('password reset', () => {
        it('should reset the password through the emailed link', async () => {
            await signupConfirmed();

            const requested = await app.inject({
                method: 'POST',
                url: '/api/users/request-password-reset',
                payload: { email: 'carol@example.test' },
            });
            expect(requested.json()).toEqual({ message: 'Password reset email sent successfully' });

            const notification = t.notifications.sent[t.notifications.sent.length - 1];
            expect(notification.kind).toBe('password_reset');

            const reset = await app.inject({
                method: 'POST',
                url: `/api/users/reset-password/${tokenFromLink(notification.link)}`,
                payload: { newPassword: 'newpass1' },
            });
            expect(reset.json()).toEqual({ message: 'Password reset successfully' });

            expect((await login('carol', 'newpass1')).statusCode).toBe(200);
            expect((await login('carol', 'secret1')).statusCode).toBe(401);
        });

        it('should answer the same for an unknown email', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/api/users/request-password-reset',
                payload: { email: 'nobody@example.test' },
            });

            expect(res.statusCode).toBe(200);
            expect(res.json()).toEqual({ message: 'Password reset email sent successfully' });
            expect(t.notifications.sent).toHaveLength(0);
        });

        it('should reject a bad reset token', async () => {
            const res = await app.inject({
                method: 'POST',
                url: '/api/users/reset-password/garbage',
                payload: { newPassword: 'newpass1' },
            });

            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Invalid or expired token' });
        });
    });

    describe('avatar', () => {
        it('should forbid standard users', async () => {
            await signupConfirmed();
            const { accessToken } = (await login()).json();

            const res = await app.inject({
                method: 'PATCH',
                url: '/api/users/avatar',
                headers: { authorization: `Bearer ${accessToken}` },
                payload: { avatar: 'https://cdn.example.test/carol.png' },
            });

            expect(res.statusCode).toBe(403);
            expect(res.json()).toEqual({ error: 'Insufficient permissions' });
        });

        it('should let admins change their avatar', async () => {
            t.users.seed({
                username: 'root',
                email: 'root@example.test',
                role: 'admin',
                confirmed: true,
                password_hash: await new PasswordHasher(4).hash('rootpw1'),
            });
            const { accessToken } = (await login('root', 'rootpw1')).json();

            const res = await app.inject({
                method: 'PATCH',
                url: '/api/users/avatar',
                headers: { authorization: `Bearer ${accessToken}` },
                payload: { avatar: 'https://cdn.example.test/root.png' },
            });

            expect(res.statusCode).toBe(200);
            expect(res.json().user.avatar).toBe('https://cdn.example.test/root.png');
        });
    });

    describe('health', () => {
        it('should report each dependency', async () => {
            const up = await app.inject({ method: 'GET', url: '/health' });
            expect(up.statusCode).toBe(200);
            expect(up.json()).toMatchObject({ status: 'ok', services: { cache: 'ok' } });

            t.cache.failing = true;
            const down = await app.inject({ method: 'GET', url: '/health' });
            expect(down.statusCode).toBe(503);
            expect(down.json()).toMatchObject({ status: 'degraded', services: { cache: 'down' } });
        });
    });
});
