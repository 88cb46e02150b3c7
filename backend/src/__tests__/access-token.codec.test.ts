import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { AccessTokenCodec } from '../services/auth/access-token.codec';

const START = new Date('2026-03-01T12:00:00.000Z');
const START_SECONDS = START.getTime() / 1000;

describe('AccessTokenCodec', () => {
    let now: Date;
    let codec: AccessTokenCodec;

    const advance = (seconds: number) => {
        now = new Date(now.getTime() + seconds * 1000);
    };

    beforeEach(() => {
        now = START;
        codec = new AccessTokenCodec({ secret: 'test-secret', algorithm: 'HS256', clock: () => now });
    });

    it('should round-trip the subject with iat and exp from the clock', () => {
        const token = codec.issue({ sub: 'alice' }, 900);
        const result = codec.decodeAndValidate(token);

        expect(result).toEqual({ ok: true, value: { sub: 'alice', iat: START_SECONDS, exp: START_SECONDS + 900 } });
    });

    it('should carry the purpose discriminator', () => {
        const token = codec.issue({ sub: 'alice@example.test', type: 'password_reset' }, 3600);
        const result = codec.decodeAndValidate(token);

        expect(result.ok && result.value.type).toBe('password_reset');
    });

    it('should accept a token one second before expiry and reject it at expiry', () => {
        const token = codec.issue({ sub: 'alice' }, 900);

        advance(899);
        expect(codec.decodeAndValidate(token).ok).toBe(true);

        advance(1);
        const expired = codec.decodeAndValidate(token);
        expect(expired.ok).toBe(false);
        if (!expired.ok) expect(expired.error.kind).toBe('INVALID_TOKEN');
    });

    it('should reject a token signed with another secret', () => {
        const other = new AccessTokenCodec({ secret: 'other-secret', algorithm: 'HS256', clock: () => now });
        const result = codec.decodeAndValidate(other.issue({ sub: 'alice' }, 900));

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe('Invalid token');
    });

    it('should reject a token signed with a different algorithm', () => {
        const hs512 = new AccessTokenCodec({ secret: 'test-secret', algorithm: 'HS512', clock: () => now });
        expect(codec.decodeAndValidate(hs512.issue({ sub: 'alice' }, 900)).ok).toBe(false);
    });

    it('should reject a tampered signature', () => {
        const token = codec.issue({ sub: 'alice' }, 900);
        const [header, payload] = token.split('.');
        expect(codec.decodeAndValidate(`${header}.${payload}.invalidsignature`).ok).toBe(false);
    });

    it('should reject garbage', () => {
        expect(codec.decodeAndValidate('not.a.jwt').ok).toBe(false);
        expect(codec.decodeAndValidate('').ok).toBe(false);
    });

    it('should reject a correctly signed token without a subject', () => {
        const token = jwt.sign({ exp: START_SECONDS + 900 }, 'test-secret', { algorithm: 'HS256' });
        expect(codec.decodeAndValidate(token).ok).toBe(false);
    });

    it('should decode an expired token when asked to ignore expiry', () => {
        const token = codec.issue({ sub: 'alice' }, 900);
        advance(1000);

        const result = codec.decodeIgnoringExpiry(token);
        expect(result.ok).toBe(true);
        if (result.ok) expect(codec.remainingSeconds(result.value)).toBe(-100);
    });

    it('should report the seconds left before expiry', () => {
        const token = codec.issue({ sub: 'alice' }, 900);
        advance(60);

        const result = codec.decodeAndValidate(token);
        expect(result.ok && codec.remainingSeconds(result.value)).toBe(840);
    });
});
