/**
 * @fileoverview JWT creation and verification over compact JWS serialization.
 * @module utils/crypto/jwt
 */

import { z } from 'zod';

import { SIGNING_ALGORITHMS } from '../../constants/crypto';
import { toNumericDate } from '../../core/claims/claims';
import type {
    JWTPayload,
    SignJWTOptions,
    UnverifiedJWT,
    VerifiedJWT,
    VerifyJWTOptions,
} from '../../types/claims';
import type { JWTHeader } from '../../types/crypto';
import { JWTError } from '../../types/crypto';
import { decodeBase64URL, encodeBase64URL } from './base64url';
import { SignerRegistry } from './registry';
import type { JWTSigner } from './signer';

// Unknown header members are dropped, never rejected.
const headerSchema = z.object({
    alg: z.enum(SIGNING_ALGORITHMS),
    kid: z.string().optional(),
    typ: z.string().optional(),
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// JWT CREATION
// ============================================================================

/**
 * Creates a signed JWT.
 *
 * The header is built here from the signer: `alg` is always the signer's
 * algorithm and cannot be supplied by the caller. Dates anywhere in the
 * payload are written as NumericDate seconds.
 *
 * @param payload - Payload to serialize
 * @param signer - Signer, or a registry resolved by `options.kid`
 * @param options - Header options
 * @returns Compact `header.payload.signature` string
 * @throws JWTError MISSING_KEY_ID / MISSING_SIGNER when a registry cannot
 * resolve a signer
 * @throws JWTError KEY_UNSUITABLE when the signer holds only a public key
 *
 * @example
 * ```typescript
 * const token = signJWT(
 *     new StandardClaims(
 *         { sub: new SubjectClaim(userId), exp: new ExpirationClaim(expiresAt) },
 *         { scope: 'read write' }
 *     ),
 *     signers,
 *     { kid: '2026-10-a3f9b2c1' }
 * );
 * ```
 */
export function signJWT(
    payload: JWTPayload,
    signer: JWTSigner | SignerRegistry,
    options: SignJWTOptions = {}
): string {
    const { resolved, kid } = resolveSigningSigner(signer, options.kid);

    const header: JWTHeader = {
        alg: resolved.name,
        typ: options.typ ?? 'JWT',
        ...(kid !== undefined && { kid }),
    };

    const headerBytes = Buffer.from(JSON.stringify(header), 'utf8');
    const payloadBytes = Buffer.from(serializePayload(payload), 'utf8');
    const signature = resolved.sign(headerBytes, payloadBytes);

    return [
        encodeBase64URL(headerBytes),
        encodeBase64URL(payloadBytes),
        encodeBase64URL(signature),
    ].join('.');
}

function resolveSigningSigner(
    source: JWTSigner | SignerRegistry,
    kid: string | undefined
): { resolved: JWTSigner; kid: string | undefined } {
    if (source instanceof SignerRegistry) {
        return {
            resolved: source.requireSigner(kid),
            kid: kid ?? source.defaultKid,
        };
    }
    return { resolved: source, kid };
}

function serializePayload(payload: JWTPayload): string {
    try {
        return JSON.stringify(payload, numericDateReplacer);
    } catch (error) {
        throw new JWTError(
            'Failed to serialize JWT payload',
            'INVALID_PAYLOAD',
            error
        );
    }
}

// Date.prototype.toJSON runs before the replacer, so read the original value
// from the holder.
function numericDateReplacer(
    this: unknown,
    key: string,
    value: unknown
): unknown {
    const original: unknown =
        typeof this === 'object' && this !== null
            ? Reflect.get(this, key)
            : undefined;
    return original instanceof Date ? toNumericDate(original) : value;
}

// ============================================================================
// JWT VERIFICATION
// ============================================================================

/**
 * Verifies a JWT and returns the decoded payload.
 *
 * Stages run in order and the first failure aborts:
 * 1. split into three segments (MALFORMED_TOKEN)
 * 2. decode the header (INVALID_HEADER, UNSECURED_TOKEN)
 * 3. select the signer, directly or by `kid` (MISSING_KEY_ID, MISSING_SIGNER)
 * 4. verify the signature over the raw segments (INVALID_SIGNATURE)
 * 5. decode the payload (INVALID_PAYLOAD)
 * 6. let the payload verify its claims (TOKEN_EXPIRED, INVALID_AUDIENCE, ...)
 *
 * @param token - JWT string to verify
 * @param options - Signer or registry, payload schema and claim expectations
 * @returns Verified JWT header and payload
 * @throws JWTError if any stage fails
 *
 * @example
 * ```typescript
 * try {
 *     const { payload } = verifyJWT(token, {
 *         signers,
 *         payload: standardClaimsSchema,
 *         issuer: 'tokenward',
 *         audience: 'api',
 *     });
 *     console.log('User ID:', payload.sub?.value);
 * } catch (error) {
 *     if (isJWTError(error)) {
 *         console.error('JWT error:', error.code, error.message);
 *     }
 * }
 * ```
 */
export function verifyJWT<P extends JWTPayload>(
    token: string,
    options: VerifyJWTOptions<P>
): VerifiedJWT<P> {
    const [headerSegment, payloadSegment, signatureSegment] =
        splitToken(token);

    const header = decodeJWTHeader(headerSegment);
    if (header.alg === 'none' && !options.allowUnsigned) {
        throw unsecuredTokenError();
    }

    const signer = selectSigner(options, header.kid);
    if (signer.name === 'none' && !options.allowUnsigned) {
        throw unsecuredTokenError();
    }

    const signatureValid =
        header.alg === signer.name &&
        verifyJWTSignature(
            signer,
            headerSegment,
            payloadSegment,
            signatureSegment
        );
    if (!signatureValid) {
        throw new JWTError('Invalid JWT signature', 'INVALID_SIGNATURE');
    }

    const payload = decodeJWTPayload(payloadSegment, options.payload);

    payload.verify({
        signer,
        now: options.now ?? new Date(),
        clockTolerance: options.clockTolerance ?? 0,
        issuer: options.issuer,
        audience: options.audience,
    });

    const result: VerifiedJWT<P> = { verified: true, header, payload };
    return Object.freeze(result);
}

function selectSigner<P extends JWTPayload>(
    options: VerifyJWTOptions<P>,
    kid: string | undefined
): JWTSigner {
    const { signer, signers } = options;
    if (signer) {
        return signer;
    }
    if (signers) {
        return signers.requireSigner(kid);
    }
    throw new JWTError(
        'verifyJWT requires either `signer` or `signers`',
        'MISSING_SIGNER'
    );
}

function verifyJWTSignature(
    signer: JWTSigner,
    headerSegment: string,
    payloadSegment: string,
    signatureSegment: string
): boolean {
    let signature: Buffer;
    try {
        signature = decodeBase64URL(signatureSegment);
    } catch {
        return false;
    }
    return signer.verify(signature, headerSegment, payloadSegment);
}

function unsecuredTokenError(): JWTError {
    return new JWTError(
        'Unsecured JWT (alg "none") rejected',
        'UNSECURED_TOKEN'
    );
}

// ============================================================================
// DECODING
// ============================================================================

function splitToken(token: string): [string, string, string] {
    const parts = token.split('.');
    const [header, payload, signature] = parts;

    if (
        parts.length !== 3 ||
        header === undefined ||
        payload === undefined ||
        signature === undefined
    ) {
        throw new JWTError(
            'Invalid JWT format: expected 3 parts separated by dots',
            'MALFORMED_TOKEN'
        );
    }

    return [header, payload, signature];
}

function decodeSegmentJSON(segment: string): unknown {
    return JSON.parse(utf8.decode(decodeBase64URL(segment)));
}

/**
 * Decodes and validates JWT header.
 */
function decodeJWTHeader(headerSegment: string): Readonly<JWTHeader> {
    try {
        const header: JWTHeader = headerSchema.parse(
            decodeSegmentJSON(headerSegment)
        );
        return Object.freeze(header);
    } catch (error) {
        throw new JWTError(
            'Failed to decode JWT header',
            'INVALID_HEADER',
            error
        );
    }
}

/**
 * Decodes JWT payload.
 */
function decodeJWTPayload<P>(
    payloadSegment: string,
    schema: z.ZodType<P>
): P {
    try {
        return schema.parse(decodeSegmentJSON(payloadSegment));
    } catch (error) {
        throw new JWTError(
            'Failed to decode JWT payload',
            'INVALID_PAYLOAD',
            error
        );
    }
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Decodes a JWT without verifying the signature or any claim.
 *
 * ⚠️ WARNING: Only use for debugging or to pick a key before verifying.
 * The result is marked `verified: false`; never trust it for authorization.
 *
 * @param token - JWT string to decode
 * @param schema - Optional payload schema; raw JSON is returned without one
 * @returns Decoded header and payload
 * @throws JWTError if token format, header or payload is invalid
 *
 * @example
 * ```typescript
 * const { header, payload } = decodeJWT(token);
 * console.log('Token algorithm:', header.alg);
 * console.log('Token kid:', header.kid);
 * ```
 */
export function decodeJWT(token: string): UnverifiedJWT;
export function decodeJWT<P>(
    token: string,
    schema: z.ZodType<P>
): UnverifiedJWT<P>;
export function decodeJWT<P>(
    token: string,
    schema?: z.ZodType<P>
): UnverifiedJWT<P> | UnverifiedJWT {
    const [headerSegment, payloadSegment] = splitToken(token);

    const header = decodeJWTHeader(headerSegment);

    if (schema) {
        const result: UnverifiedJWT<P> = {
            verified: false,
            header,
            payload: decodeJWTPayload(payloadSegment, schema),
        };
        return Object.freeze(result);
    }

    const result: UnverifiedJWT = {
        verified: false,
        header,
        payload: decodeJWTPayload(payloadSegment, z.unknown()),
    };
    return Object.freeze(result);
}

/**
 * Extracts the key ID (kid) from a JWT header without verification.
 *
 * Useful for determining which key to use for verification in a JWKS scenario.
 *
 * @param token - JWT string
 * @returns Key ID if present, undefined otherwise
 */
export function getJWTKeyId(token: string): string | undefined {
    const [headerSegment] = token.split('.');
    if (headerSegment === undefined) {
        return undefined;
    }
    try {
        return decodeJWTHeader(headerSegment).kid;
    } catch {
        return undefined;
    }
}
