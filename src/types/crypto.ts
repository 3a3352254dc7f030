/**
 * @fileoverview Cryptographic types and interfaces for Tokenward.
 * @module types/crypto
 */

import type { KeyObject } from 'node:crypto';

// ============================================================================
// ALGORITHM TYPES
// ============================================================================

/** HMAC with SHA-2, shared secret */
export type HMACAlgorithm = 'HS256' | 'HS384' | 'HS512';

/** RSASSA-PKCS1-v1_5 with SHA-2 */
export type RSAAlgorithm = 'RS256' | 'RS384' | 'RS512';

/** ECDSA over P-256, P-384 and P-521 */
export type ECDSAAlgorithm = 'ES256' | 'ES384' | 'ES512';

/** Asymmetric algorithms backed by a key pair */
export type AsymmetricAlgorithm = RSAAlgorithm | ECDSAAlgorithm;

/**
 * Supported JWS algorithms.
 *
 * `none` produces an empty signature. It is only accepted on verification
 * when the caller opts in with `allowUnsigned`.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7518#section-3.1
 */
export type SigningAlgorithm =
    | HMACAlgorithm
    | RSAAlgorithm
    | ECDSAAlgorithm
    | 'none';

/** Digest used by an algorithm, as named by `node:crypto` */
export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512';

// ============================================================================
// KEY INTERFACES
// ============================================================================

/**
 * Key pair held by an asymmetric algorithm.
 * A pair without `privateKey` can verify but not sign.
 */
export interface AsymmetricKey {
    publicKey: KeyObject;
    privateKey?: KeyObject;
}

/**
 * PEM key pair with metadata, as produced by key generation.
 */
export interface KeyPair {
    /** Public key in SPKI PEM format */
    publicKey: string;
    /** Private key in PKCS#8 PEM format */
    privateKey: string;
    /** Unique key identifier for JWKS/JWT headers */
    kid: string;
    /** Algorithm used for this key pair */
    algorithm: AsymmetricAlgorithm;
}

/**
 * Raw key material accepted when building a signer.
 * HMAC algorithms read `secret`; RSA and ECDSA read the PEM keys.
 */
export interface KeyMaterial {
    /** Shared secret (HMAC only) */
    secret?: Uint8Array | string;
    /** PKCS#8 or PKCS#1/SEC1 PEM private key */
    privateKey?: string;
    /** SPKI PEM public key, derived from the private key when omitted */
    publicKey?: string;
}

// ============================================================================
// JWT INTERFACES
// ============================================================================

/**
 * JWT header structure.
 *
 * `alg` is always stamped from the signer that produces the signature.
 */
export interface JWTHeader {
    /** Algorithm used for signing */
    alg: SigningAlgorithm;
    /** Key identifier */
    kid?: string;
    /** Token type */
    typ?: string;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * JWT error codes.
 */
export type JWTErrorCode =
    | 'MALFORMED_TOKEN'
    | 'INVALID_HEADER'
    | 'INVALID_PAYLOAD'
    | 'MISSING_KEY_ID'
    | 'MISSING_SIGNER'
    | 'INVALID_SIGNATURE'
    | 'UNSECURED_TOKEN'
    | 'KEY_UNSUITABLE'
    | 'TOKEN_EXPIRED'
    | 'TOKEN_NOT_YET_VALID'
    | 'TOKEN_TOO_OLD'
    | 'INVALID_AUDIENCE'
    | 'INVALID_ISSUER'
    | 'INVALID_SUBJECT';

/**
 * Error raised by every signing and verification stage.
 */
export class JWTError extends Error {
    constructor(
        message: string,
        public readonly code: JWTErrorCode,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'JWTError';
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
        };
    }
}

/**
 * Narrows an unknown error to a {@link JWTError}, optionally of one code.
 */
export function isJWTError(
    error: unknown,
    code?: JWTErrorCode
): error is JWTError {
    return (
        error instanceof JWTError && (code === undefined || error.code === code)
    );
}
