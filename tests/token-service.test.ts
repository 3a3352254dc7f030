import { describe, expect, it } from 'vitest';

import type { JWTConfig } from '../src/config/loader';
import { buildSignerRegistry } from '../src/core/keys/services';
import { TokenService } from '../src/core/token/service';
import { isJWTError, type JWTErrorCode } from '../src/types/crypto';
import { decodeJWT } from '../src/utils/crypto/jwt';
import { createLogger } from '../src/utils/logger';

function expectJWTError(fn: () => unknown, code: JWTErrorCode): void {
    try {
        fn();
    } catch (error) {
        expect(isJWTError(error) ? error.code : error).toBe(code);
        return;
    }
    throw new Error(`expected ${code}`);
}

const jwtConfig: JWTConfig = {
    issuer: 'test-issuer',
    audience: 'api',
    accessTokenTTL: '15m',
    clockTolerance: 0,
    allowUnsigned: false,
};

const signers = buildSignerRegistry([
    {
        kid: 'hmac-1',
        algorithm: 'HS256',
        secret: 'test-secret',
        secretEncoding: 'utf8',
        default: true,
    },
    {
        kid: 'hmac-2',
        algorithm: 'HS512',
        secret: 'other-test-secret',
        secretEncoding: 'utf8',
        default: false,
    },
]);

// 2026-01-01T00:00:00Z
const now = new Date(1767225600 * 1000);
const minutes = (n: number) => new Date(now.getTime() + n * 60_000);

function captureLogs() {
    const lines: string[] = [];
    const log = createLogger(
        { level: 'warn', format: 'json', redactSensitive: true },
        { write: (line: string) => void lines.push(line) }
    );
    return { lines, log };
}

describe('TokenService', () => {
    const tokens = new TokenService(signers, jwtConfig);

    it('issues tokens with the registered claims', () => {
        const token = tokens.issueToken('user-1', { scope: 'read' }, { now });

        const { header, payload } = tokens.verifyToken(token, { now });

        expect(header).toEqual({ alg: 'HS256', typ: 'JWT', kid: 'hmac-1' });
        expect(payload.iss?.value).toBe('test-issuer');
        expect(payload.sub?.value).toBe('user-1');
        expect([...(payload.aud?.value ?? [])]).toEqual(['api']);
        expect(payload.iat?.value).toEqual(now);
        expect(payload.nbf?.value).toEqual(now);
        expect(payload.exp?.value).toEqual(minutes(15));
        expect(payload.jti?.value).toMatch(
            /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
        );
        expect(payload.extra).toEqual({ scope: 'read' });
    });

    it('writes claims as NumericDate seconds', () => {
        const token = tokens.issueToken('user-1', {}, { now });

        expect(decodeJWT(token).payload).toMatchObject({
            iss: 'test-issuer',
            sub: 'user-1',
            aud: 'api',
            iat: 1767225600,
            nbf: 1767225600,
            exp: 1767226500,
        });
    });

    it('gives every token its own jti', () => {
        const first = tokens.verifyToken(
            tokens.issueToken('user-1', {}, { now }),
            { now }
        );
        const second = tokens.verifyToken(
            tokens.issueToken('user-1', {}, { now }),
            { now }
        );

        expect(first.payload.jti?.value).not.toBe(second.payload.jti?.value);
    });

    it('honours expiresIn', () => {
        const token = tokens.issueToken('user-1', {}, {
            now,
            expiresIn: '2h',
        });

        const { payload } = tokens.verifyToken(token, { now });

        expect(payload.exp?.value).toEqual(minutes(120));
    });

    it('signs with the requested key', () => {
        const token = tokens.issueToken('user-1', {}, { now, kid: 'hmac-2' });

        const { header } = tokens.verifyToken(token, { now });

        expect(header).toEqual({ alg: 'HS512', typ: 'JWT', kid: 'hmac-2' });
    });

    it('rejects an unknown key', () => {
        expectJWTError(
            () => tokens.issueToken('user-1', {}, { now, kid: 'missing' }),
            'MISSING_SIGNER'
        );
    });

    it('rejects expired tokens', () => {
        const token = tokens.issueToken('user-1', {}, { now });

        expect(() =>
            tokens.verifyToken(token, { now: minutes(14) })
        ).not.toThrow();
        expectJWTError(
            () => tokens.verifyToken(token, { now: minutes(15) }),
            'TOKEN_EXPIRED'
        );
    });

    it('rejects tokens used before they were issued', () => {
        const token = tokens.issueToken('user-1', {}, { now });

        expectJWTError(
            () => tokens.verifyToken(token, { now: minutes(-1) }),
            'TOKEN_NOT_YET_VALID'
        );
    });

    it('applies the configured clock tolerance', () => {
        const lenient = new TokenService(signers, {
            ...jwtConfig,
            clockTolerance: 60,
        });
        const token = tokens.issueToken('user-1', {}, { now });

        expect(() =>
            lenient.verifyToken(token, { now: minutes(15) })
        ).not.toThrow();
        expectJWTError(
            () => lenient.verifyToken(token, { now: minutes(16) }),
            'TOKEN_EXPIRED'
        );
    });

    it('rejects tokens from another issuer', () => {
        const other = new TokenService(signers, {
            ...jwtConfig,
            issuer: 'other-issuer',
        });
        const token = other.issueToken('user-1', {}, { now });

        expectJWTError(
            () => tokens.verifyToken(token, { now }),
            'INVALID_ISSUER'
        );
    });

    it('rejects tokens for another audience', () => {
        const other = new TokenService(signers, {
            ...jwtConfig,
            audience: 'admin',
        });
        const token = other.issueToken('user-1', {}, { now });

        expectJWTError(
            () => tokens.verifyToken(token, { now }),
            'INVALID_AUDIENCE'
        );
    });

    it('logs failed verifications with the code and kid', () => {
        const { lines, log } = captureLogs();
        const logged = new TokenService(signers, jwtConfig, log);
        const token = logged.issueToken('user-1', {}, { now });

        expectJWTError(
            () => logged.verifyToken(token, { now: minutes(30) }),
            'TOKEN_EXPIRED'
        );

        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0] ?? '')).toMatchObject({
            level: 40,
            service: 'tokenward',
            code: 'TOKEN_EXPIRED',
            kid: 'hmac-1',
            msg: 'Token verification failed',
        });
    });

    it('does not log successful verifications', () => {
        const { lines, log } = captureLogs();
        const logged = new TokenService(signers, jwtConfig, log);

        logged.verifyToken(logged.issueToken('user-1', {}, { now }), { now });

        expect(lines).toEqual([]);
    });
});
