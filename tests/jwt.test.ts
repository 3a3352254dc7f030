import { generateKeyPairSync, type KeyObject } from 'node:crypto';
import * as jose from 'jose';
import { beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';

import {
    AudienceClaim,
    ExpirationClaim,
    IssuerClaim,
    NotBeforeClaim,
    numericDateSchema,
    StandardClaims,
    standardClaimsSchema,
    SubjectClaim,
} from '../src/core/claims';
import type {
    ClaimVerificationContext,
    JWTPayload,
} from '../src/types/claims';
import { isJWTError, JWTError, type JWTErrorCode } from '../src/types/crypto';
import { encodeBase64URL } from '../src/utils/crypto/base64url';
import {
    decodeJWT,
    getJWTKeyId,
    signJWT,
    verifyJWT,
} from '../src/utils/crypto/jwt';
import { SignerRegistry } from '../src/utils/crypto/registry';
import { JWTSigner } from '../src/utils/crypto/signer';

const now = new Date('2026-01-01T00:00:00.000Z');
const seconds = (offset: number) => new Date(now.getTime() + offset * 1000);
const hs256 = JWTSigner.hs256('test-secret');

function expectJWTError(fn: () => unknown, code: JWTErrorCode): void {
    try {
        fn();
    } catch (error) {
        expect(isJWTError(error) ? error.code : error).toBe(code);
        return;
    }
    throw new Error(`expected ${code}`);
}

function segment(value: unknown): string {
    return encodeBase64URL(JSON.stringify(value));
}

function claims(
    registered: ConstructorParameters<typeof StandardClaims>[0] = {},
    extra: Record<string, unknown> = {}
): StandardClaims {
    return new StandardClaims(registered, extra);
}

class SessionPayload implements JWTPayload {
    constructor(
        readonly sid: string,
        readonly expiresAt: Date
    ) {}

    verify(context: ClaimVerificationContext): void {
        if (this.expiresAt.getTime() <= context.now.getTime()) {
            throw new JWTError('Session expired', 'TOKEN_EXPIRED');
        }
    }
}

const sessionSchema = z
    .object({ sid: z.string(), expiresAt: numericDateSchema })
    .transform(({ sid, expiresAt }) => new SessionPayload(sid, expiresAt));

let rsa: { publicKey: KeyObject; privateKey: KeyObject };
let p256: { publicKey: KeyObject; privateKey: KeyObject };

beforeAll(() => {
    rsa = generateKeyPairSync('rsa', { modulusLength: 2048 });
    p256 = generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
});

describe('signJWT', () => {
    it('produces the compact serialization', () => {
        const token = signJWT(
            claims({
                sub: new SubjectClaim('user-1'),
                exp: new ExpirationClaim(new Date(1_700_000_000_000)),
            }),
            hs256
        );

        expect(token).toBe(
            'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.' +
                'eyJzdWIiOiJ1c2VyLTEiLCJleHAiOjE3MDAwMDAwMDB9.' +
                'Xitm1d4P1p0hNk_mBKBO2wPa0iPprb2soNRdxGeHMRY'
        );
    });

    it('stamps alg from the signer and writes kid and typ', () => {
        const token = signJWT(claims(), JWTSigner.es256(p256), {
            kid: 'key-1',
            typ: 'at+jwt',
        });

        expect(decodeJWT(token).header).toEqual({
            alg: 'ES256',
            typ: 'at+jwt',
            kid: 'key-1',
        });
    });

    it('writes dates anywhere in the payload as NumericDate', () => {
        const token = signJWT(
            new SessionPayload('session-1', new Date(1_767_225_660_400)),
            hs256
        );

        expect(decodeJWT(token).payload).toEqual({
            sid: 'session-1',
            expiresAt: 1767225660,
        });
    });

    it('signs with the registry default and stamps its kid', () => {
        const registry = new SignerRegistry()
            .register('key-1', hs256)
            .register('key-2', JWTSigner.rs256(rsa), { default: true });

        const token = signJWT(claims(), registry);
        expect(decodeJWT(token).header).toEqual({
            alg: 'RS256',
            typ: 'JWT',
            kid: 'key-2',
        });

        const explicit = signJWT(claims(), registry, { kid: 'key-1' });
        expect(getJWTKeyId(explicit)).toBe('key-1');
    });

    it('requires a kid when the registry has no default', () => {
        const registry = new SignerRegistry().register('key-1', hs256);
        expectJWTError(() => signJWT(claims(), registry), 'MISSING_KEY_ID');
        expectJWTError(
            () => signJWT(claims(), registry, { kid: 'key-9' }),
            'MISSING_SIGNER'
        );
    });

    it('refuses to sign with a verify-only signer', () => {
        expectJWTError(
            () => signJWT(claims(), JWTSigner.rs256(rsa.publicKey)),
            'KEY_UNSUITABLE'
        );
    });
});

describe('verifyJWT', () => {
    it('round-trips every algorithm family', () => {
        const signers = [
            JWTSigner.hs512('test-secret'),
            JWTSigner.rs384(rsa),
            JWTSigner.es256(p256),
        ];

        for (const signer of signers) {
            const token = signJWT(
                claims(
                    {
                        sub: new SubjectClaim('user-1'),
                        exp: new ExpirationClaim(seconds(60)),
                    },
                    { note: 'héllo ✓' }
                ),
                signer
            );
            const result = verifyJWT(token, {
                signer,
                payload: standardClaimsSchema,
                now,
            });

            expect(result.verified).toBe(true);
            expect(result.header.alg).toBe(signer.name);
            expect(result.payload.sub?.value).toBe('user-1');
            expect(result.payload.extra).toEqual({ note: 'héllo ✓' });
        }
    });

    it('verifies with a public-key-only signer', () => {
        const token = signJWT(claims(), JWTSigner.es256(p256));
        const { payload } = verifyJWT(token, {
            signer: JWTSigner.es256(p256.publicKey),
            payload: standardClaimsSchema,
        });
        expect(payload).toBeInstanceOf(StandardClaims);
    });

    it('dispatches on the header kid', () => {
        const registry = new SignerRegistry()
            .register('key-1', hs256)
            .register('key-2', JWTSigner.es256(p256));
        const token = signJWT(claims(), registry, { kid: 'key-2' });

        const { header } = verifyJWT(token, {
            signers: registry,
            payload: standardClaimsSchema,
        });
        expect(header).toEqual({ alg: 'ES256', typ: 'JWT', kid: 'key-2' });
    });

    it('keeps verifying tokens of a key rotated out of the default', () => {
        const registry = new SignerRegistry().register('key-1', hs256, {
            default: true,
        });
        const token = signJWT(claims(), registry);

        registry.register('key-2', JWTSigner.hs256('test-secret-2'), {
            default: true,
        });
        expect(
            verifyJWT(token, {
                signers: registry,
                payload: standardClaimsSchema,
            }).header.kid
        ).toBe('key-1');
    });

    it('hands the payload the verification context', () => {
        const token = signJWT(
            new SessionPayload('session-1', seconds(60)),
            hs256
        );

        expect(
            verifyJWT(token, { signer: hs256, payload: sessionSchema, now })
                .payload.sid
        ).toBe('session-1');
        expectJWTError(
            () =>
                verifyJWT(token, {
                    signer: hs256,
                    payload: sessionSchema,
                    now: seconds(60),
                }),
            'TOKEN_EXPIRED'
        );
    });

    describe('stage 1: format', () => {
        it.each(['', 'abc', 'a.b', 'a.b.c.d'])(
            'rejects %j as MALFORMED_TOKEN',
            (token) => {
                expectJWTError(
                    () =>
                        verifyJWT(token, {
                            signer: hs256,
                            payload: standardClaimsSchema,
                        }),
                    'MALFORMED_TOKEN'
                );
            }
        );
    });

    describe('stage 2: header', () => {
        const verify = (header: string) => () =>
            verifyJWT(`${header}.${segment({})}.`, {
                signer: hs256,
                payload: standardClaimsSchema,
            });

        it('rejects a header that is not base64url JSON', () => {
            expectJWTError(verify('e30='), 'INVALID_HEADER');
            expectJWTError(
                verify(encodeBase64URL('not json')),
                'INVALID_HEADER'
            );
        });

        it('rejects invalid UTF-8', () => {
            expectJWTError(
                verify(encodeBase64URL(Buffer.from([0x7b, 0xff, 0x7d]))),
                'INVALID_HEADER'
            );
        });

        it('rejects algorithms outside the supported set', () => {
            expectJWTError(verify(segment({ alg: 'HS999' })), 'INVALID_HEADER');
            expectJWTError(verify(segment({ typ: 'JWT' })), 'INVALID_HEADER');
            expectJWTError(verify(segment(['HS256'])), 'INVALID_HEADER');
        });

        it('rejects alg none before selecting a signer', () => {
            expectJWTError(verify(segment({ alg: 'none' })), 'UNSECURED_TOKEN');
        });
    });

    describe('stage 3: signer selection', () => {
        it('requires a kid without a default signer', () => {
            const registry = new SignerRegistry().register('key-1', hs256);
            const token = signJWT(claims(), hs256);

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signers: registry,
                        payload: standardClaimsSchema,
                    }),
                'MISSING_KEY_ID'
            );
        });

        it('rejects an unknown kid', () => {
            const registry = new SignerRegistry().register('key-1', hs256, {
                default: true,
            });
            const token = signJWT(claims(), hs256, { kid: 'key-9' });

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signers: registry,
                        payload: standardClaimsSchema,
                    }),
                'MISSING_SIGNER'
            );
        });
    });

    describe('stage 4: signature', () => {
        it('rejects a modified payload', () => {
            const token = signJWT(
                claims({ sub: new SubjectClaim('user-1') }),
                hs256
            );
            const [header, , signature] = token.split('.');
            const forged = `${header}.${segment({ sub: 'admin' })}.${signature}`;

            expectJWTError(
                () =>
                    verifyJWT(forged, {
                        signer: hs256,
                        payload: standardClaimsSchema,
                    }),
                'INVALID_SIGNATURE'
            );
        });

        const tamperCodes: JWTErrorCode[] = [
            'INVALID_HEADER',
            'INVALID_SIGNATURE',
        ];

        it.each([
            ['header', 0],
            ['payload', 1],
            ['signature', 2],
        ])('rejects a changed character in the %s', (_name, index) => {
            const token = signJWT(
                claims({ sub: new SubjectClaim('user-1') }),
                hs256,
                { kid: 'hmac-1' }
            );
            const segments = token.split('.');
            const original = segments[index] ?? '';

            for (const position of [0, original.length >> 1, -1]) {
                const at = position < 0 ? original.length - 1 : position;
                const char = original[at] === 'A' ? 'B' : 'A';
                const tampered = [...segments];
                tampered[index] =
                    original.slice(0, at) + char + original.slice(at + 1);

                try {
                    verifyJWT(tampered.join('.'), {
                        signer: hs256,
                        payload: standardClaimsSchema,
                    });
                } catch (error) {
                    expect(tamperCodes).toContain(
                        isJWTError(error) ? error.code : error
                    );
                    continue;
                }
                throw new Error(`accepted a change at ${index}:${at}`);
            }
        });

        it('rejects a different key', () => {
            const token = signJWT(claims(), hs256);
            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signer: JWTSigner.hs256('test-secret-2'),
                        payload: standardClaimsSchema,
                    }),
                'INVALID_SIGNATURE'
            );
        });

        it('rejects a signature segment that is not base64url', () => {
            const [header, payload] = signJWT(claims(), hs256).split('.');
            expectJWTError(
                () =>
                    verifyJWT(`${header}.${payload}.!!!`, {
                        signer: hs256,
                        payload: standardClaimsSchema,
                    }),
                'INVALID_SIGNATURE'
            );
        });

        it('rejects a token whose header names another algorithm', () => {
            // HMAC keyed with the RSA public key, replayed at an RS256 signer
            const publicPem = rsa.publicKey.export({
                type: 'spki',
                format: 'pem',
            });
            const token = signJWT(claims(), JWTSigner.hs256(publicPem));

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signer: JWTSigner.rs256(rsa.publicKey),
                        payload: standardClaimsSchema,
                    }),
                'INVALID_SIGNATURE'
            );
        });

        it('checks the signature before any claim', () => {
            const token = signJWT(
                claims({ exp: new ExpirationClaim(seconds(-60)) }),
                hs256
            );
            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signer: JWTSigner.hs256('test-secret-2'),
                        payload: standardClaimsSchema,
                        now,
                    }),
                'INVALID_SIGNATURE'
            );
        });
    });

    describe('unsigned tokens', () => {
        const unsigned = signJWT(claims(), JWTSigner.none());

        it('carries an empty signature', () => {
            expect(unsigned.endsWith('.')).toBe(true);
            expect(decodeJWT(unsigned).header.alg).toBe('none');
        });

        it('are rejected unless explicitly allowed', () => {
            expectJWTError(
                () =>
                    verifyJWT(unsigned, {
                        signer: JWTSigner.none(),
                        payload: standardClaimsSchema,
                    }),
                'UNSECURED_TOKEN'
            );
            expect(
                verifyJWT(unsigned, {
                    signer: JWTSigner.none(),
                    payload: standardClaimsSchema,
                    allowUnsigned: true,
                }).verified
            ).toBe(true);
        });

        it('never verify against a real signer', () => {
            expectJWTError(
                () =>
                    verifyJWT(unsigned, {
                        signer: hs256,
                        payload: standardClaimsSchema,
                        allowUnsigned: true,
                    }),
                'INVALID_SIGNATURE'
            );
        });

        it('are rejected when a none signer is picked from a registry', () => {
            const registry = new SignerRegistry().register(
                'key-1',
                JWTSigner.none(),
                { default: true }
            );
            const token = signJWT(claims(), registry);

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signers: registry,
                        payload: standardClaimsSchema,
                    }),
                'UNSECURED_TOKEN'
            );
        });
    });

    describe('stage 5: payload', () => {
        it('rejects a payload that is not JSON', () => {
            const header = segment({ alg: 'none' });
            const token = `${header}.${encodeBase64URL('nope')}.`;

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signer: JWTSigner.none(),
                        payload: standardClaimsSchema,
                        allowUnsigned: true,
                    }),
                'INVALID_PAYLOAD'
            );
        });

        it('rejects a payload the schema does not accept', () => {
            const token = signJWT(
                new SessionPayload('session-1', seconds(60)),
                hs256
            );

            expectJWTError(
                () =>
                    verifyJWT(token, {
                        signer: hs256,
                        payload: z
                            .object({ sid: z.number() })
                            .transform(() => claims()),
                    }),
                'INVALID_PAYLOAD'
            );
        });
    });

    describe('stage 6: claims', () => {
        const token = signJWT(
            claims({
                iss: new IssuerClaim('issuer-a'),
                aud: new AudienceClaim(['api', 'admin']),
                nbf: new NotBeforeClaim(seconds(-10)),
                exp: new ExpirationClaim(seconds(60)),
            }),
            hs256
        );
        const verify = (
            options: {
                now?: Date;
                issuer?: string;
                audience?: string;
                clockTolerance?: number;
            } = {}
        ) =>
            verifyJWT(token, {
                signer: hs256,
                payload: standardClaimsSchema,
                now,
                ...options,
            });

        it('accepts matching expectations', () => {
            expect(
                verify({ issuer: 'issuer-a', audience: 'admin' }).verified
            ).toBe(true);
        });

        it('reports each failing claim', () => {
            expectJWTError(() => verify({ now: seconds(60) }), 'TOKEN_EXPIRED');
            expectJWTError(
                () => verify({ now: seconds(-11) }),
                'TOKEN_NOT_YET_VALID'
            );
            expectJWTError(
                () => verify({ issuer: 'issuer-b' }),
                'INVALID_ISSUER'
            );
            expectJWTError(
                () => verify({ audience: 'billing' }),
                'INVALID_AUDIENCE'
            );
        });

        it('applies the clock tolerance', () => {
            expect(
                verify({ now: seconds(65), clockTolerance: 10 }).verified
            ).toBe(true);
        });
    });

    it('returns a frozen result', () => {
        const result = verifyJWT(signJWT(claims(), hs256), {
            signer: hs256,
            payload: standardClaimsSchema,
        });
        expect(Object.isFrozen(result)).toBe(true);
        expect(Object.isFrozen(result.header)).toBe(true);
    });
});

describe('decodeJWT', () => {
    it('decodes without checking the signature', () => {
        const [header, payload] = signJWT(claims(), hs256).split('.');
        const result = decodeJWT(`${header}.${payload}.garbage`);

        expect(result.verified).toBe(false);
        expect(result.payload).toEqual({});
    });

    it('applies an optional payload schema', () => {
        const token = signJWT(
            new SessionPayload('session-1', seconds(60)),
            hs256
        );
        const { payload } = decodeJWT(token, sessionSchema);

        expect(payload).toBeInstanceOf(SessionPayload);
        expect(payload.expiresAt.getTime()).toBe(seconds(60).getTime());
    });
});

describe('getJWTKeyId', () => {
    it('reads the kid of an unverified token', () => {
        expect(getJWTKeyId(signJWT(claims(), hs256, { kid: 'key-1' }))).toBe(
            'key-1'
        );
        expect(getJWTKeyId(signJWT(claims(), hs256))).toBeUndefined();
        expect(getJWTKeyId('not a token')).toBeUndefined();
    });
});

describe('interoperability with jose', () => {
    const secret = Buffer.from('test-secret-test-secret-test-sec');

    it('produces tokens jose verifies', async () => {
        const token = signJWT(
            claims({
                iss: new IssuerClaim('issuer-a'),
                sub: new SubjectClaim('user-1'),
                exp: new ExpirationClaim(new Date(Date.now() + 60_000)),
            }),
            JWTSigner.es256(p256),
            { kid: 'key-1' }
        );

        const { payload, protectedHeader } = await jose.jwtVerify(
            token,
            p256.publicKey,
            { issuer: 'issuer-a', algorithms: ['ES256'] }
        );
        expect(payload.sub).toBe('user-1');
        expect(protectedHeader.kid).toBe('key-1');

        const hmacToken = signJWT(claims(), JWTSigner.hs256(secret));
        await expect(jose.jwtVerify(hmacToken, secret)).resolves.toBeDefined();

        const rsaToken = signJWT(claims(), JWTSigner.rs256(rsa));
        await expect(
            jose.jwtVerify(rsaToken, rsa.publicKey)
        ).resolves.toBeDefined();
    });

    it('verifies tokens jose produces', async () => {
        const token = await new jose.SignJWT({ scope: 'read' })
            .setProtectedHeader({ alg: 'ES256', kid: 'key-1' })
            .setSubject('user-1')
            .setAudience('api')
            .setExpirationTime('1h')
            .sign(p256.privateKey);

        const registry = new SignerRegistry().register(
            'key-1',
            JWTSigner.es256(p256.publicKey)
        );
        const { payload } = verifyJWT(token, {
            signers: registry,
            payload: standardClaimsSchema,
            audience: 'api',
        });
        expect(payload.sub?.value).toBe('user-1');
        expect(payload.extra).toEqual({ scope: 'read' });

        const hmacToken = await new jose.SignJWT({})
            .setProtectedHeader({ alg: 'HS256' })
            .sign(secret);
        expect(
            verifyJWT(hmacToken, {
                signer: JWTSigner.hs256(secret),
                payload: standardClaimsSchema,
            }).verified
        ).toBe(true);
    });
});
