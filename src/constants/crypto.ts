/**
 * @fileoverview Cryptographic constants and algorithm tables.
 * @module constants/crypto
 */

import type {
    AsymmetricAlgorithm,
    ECDSAAlgorithm,
    HashAlgorithm,
    HMACAlgorithm,
    RSAAlgorithm,
    SigningAlgorithm,
} from '../types/crypto';

// ============================================================================
// ALGORITHM TABLES
// ============================================================================

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export const RSA_ALGORITHMS = ['RS256', 'RS384', 'RS512'] as const;
export const ECDSA_ALGORITHMS = ['ES256', 'ES384', 'ES512'] as const;

/** Every algorithm name accepted in a JWT header */
export const SIGNING_ALGORITHMS = [
    ...HMAC_ALGORITHMS,
    ...RSA_ALGORITHMS,
    ...ECDSA_ALGORITHMS,
    'none',
] as const satisfies readonly SigningAlgorithm[];

/**
 * Digest per algorithm. The suffix of the JWS name is the SHA-2 width.
 */
export const HASH_ALGORITHMS: Record<
    Exclude<SigningAlgorithm, 'none'>,
    HashAlgorithm
> = {
    HS256: 'sha256',
    HS384: 'sha384',
    HS512: 'sha512',
    RS256: 'sha256',
    RS384: 'sha384',
    RS512: 'sha512',
    ES256: 'sha256',
    ES384: 'sha384',
    ES512: 'sha512',
};

/**
 * Curve required by each ECDSA algorithm, as reported by
 * `KeyObject.asymmetricKeyDetails.namedCurve`.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7518#section-3.4
 */
export const ECDSA_CURVES: Record<ECDSAAlgorithm, string> = {
    ES256: 'prime256v1',
    ES384: 'secp384r1',
    ES512: 'secp521r1',
};

/** Minimum RSA modulus length accepted for signing keys */
export const RSA_MIN_MODULUS_LENGTH = 2048;

// ============================================================================
// DURATION PARSING
// ============================================================================

/**
 * Duration units in seconds for JWT expiration parsing.
 */
export const DURATION_UNITS: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
    w: 604800,
};

/**
 * Parses a duration string into seconds.
 *
 * @param duration - Duration string (e.g., '15m', '1h', '7d', '2w')
 * @returns Duration in seconds
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * parseDuration('15m'); // 900
 * parseDuration('1h');  // 3600
 * parseDuration('7d');  // 604800
 * ```
 */
export function parseDuration(duration: string): number {
    const match = /^(\d+)([smhdw])$/.exec(duration);
    const value = match?.[1];
    const unit = match?.[2];
    const multiplier = unit === undefined ? undefined : DURATION_UNITS[unit];

    if (value === undefined || multiplier === undefined) {
        throw new Error(
            `Invalid duration format: "${duration}". Expected format: number + unit (s/m/h/d/w)`
        );
    }

    return parseInt(value, 10) * multiplier;
}

// ============================================================================
// ALGORITHM TYPE GUARDS
// ============================================================================

function includes<T extends string>(
    list: readonly T[],
    value: string
): value is T {
    return list.some((item) => item === value);
}

/**
 * Type guard for any algorithm name this library understands.
 */
export function isSigningAlgorithm(value: string): value is SigningAlgorithm {
    return includes(SIGNING_ALGORITHMS, value);
}

/**
 * Type guard for the HMAC family (HS256, HS384, HS512).
 */
export function isHMACAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is HMACAlgorithm {
    return includes(HMAC_ALGORITHMS, algorithm);
}

/**
 * Type guard for the RSA family (RS256, RS384, RS512).
 */
export function isRSAAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is RSAAlgorithm {
    return includes(RSA_ALGORITHMS, algorithm);
}

/**
 * Type guard for the ECDSA family (ES256, ES384, ES512).
 */
export function isECDSAAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is ECDSAAlgorithm {
    return includes(ECDSA_ALGORITHMS, algorithm);
}

export function isAsymmetricAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is AsymmetricAlgorithm {
    return isRSAAlgorithm(algorithm) || isECDSAAlgorithm(algorithm);
}
