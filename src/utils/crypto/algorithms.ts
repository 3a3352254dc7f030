/**
 * @fileoverview JWS algorithm variants: HMAC, RSA, ECDSA and unsigned.
 * @module utils/crypto/algorithms
 *
 * Each variant is built explicitly with its own key shape and dispatched by
 * its `kind` tag. Nothing here reads a token header.
 */

import {
    createHmac,
    sign as cryptoSign,
    verify as cryptoVerify,
    timingSafeEqual,
} from 'node:crypto';
import type { KeyObject } from 'node:crypto';

import {
    ECDSA_CURVES,
    HASH_ALGORITHMS,
    RSA_MIN_MODULUS_LENGTH,
} from '../../constants/crypto';
import type {
    AsymmetricKey,
    ECDSAAlgorithm,
    HMACAlgorithm,
    RSAAlgorithm,
    SigningAlgorithm,
} from '../../types/crypto';
import { JWTError } from '../../types/crypto';

// ============================================================================
// VARIANTS
// ============================================================================

export interface HMACVariant {
    readonly kind: 'hmac';
    readonly name: HMACAlgorithm;
    readonly secret: Buffer;
}

export interface RSAVariant {
    readonly kind: 'rsa';
    readonly name: RSAAlgorithm;
    readonly key: Readonly<AsymmetricKey>;
}

export interface ECDSAVariant {
    readonly kind: 'ecdsa';
    readonly name: ECDSAAlgorithm;
    readonly key: Readonly<AsymmetricKey>;
}

export interface UnsignedVariant {
    readonly kind: 'none';
    readonly name: 'none';
}

/**
 * A signature algorithm bound to its key material.
 */
export type Algorithm =
    | HMACVariant
    | RSAVariant
    | ECDSAVariant
    | UnsignedVariant;

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * HMAC algorithm over a shared secret.
 *
 * @param secret - Raw secret bytes, or a UTF-8 string
 * @throws JWTError KEY_UNSUITABLE if the secret is empty
 */
export function hmacAlgorithm(
    name: HMACAlgorithm,
    secret: Uint8Array | string
): HMACVariant {
    const bytes =
        typeof secret === 'string'
            ? Buffer.from(secret, 'utf8')
            : Buffer.from(secret);

    if (bytes.length === 0) {
        throw new JWTError(
            `${name} requires a non-empty secret`,
            'KEY_UNSUITABLE'
        );
    }

    return Object.freeze({ kind: 'hmac', name, secret: bytes });
}

/**
 * RSASSA-PKCS1-v1_5 algorithm.
 *
 * @throws JWTError KEY_UNSUITABLE if a key is not RSA, not the expected
 * public/private type, or shorter than 2048 bits
 */
export function rsaAlgorithm(
    name: RSAAlgorithm,
    key: AsymmetricKey
): RSAVariant {
    assertKeyPair(name, key, (keyObject) => {
        if (keyObject.asymmetricKeyType !== 'rsa') {
            return `${name} requires an RSA key, got ${keyObject.asymmetricKeyType ?? 'unknown'}`;
        }
        const modulusLength =
            keyObject.asymmetricKeyDetails?.modulusLength ?? 0;
        if (modulusLength < RSA_MIN_MODULUS_LENGTH) {
            return `${name} requires a modulus of at least ${RSA_MIN_MODULUS_LENGTH} bits`;
        }
        return null;
    });

    return Object.freeze({
        kind: 'rsa',
        name,
        key: Object.freeze({ ...key }),
    });
}

/**
 * ECDSA algorithm on the curve that matches `name`.
 *
 * @throws JWTError KEY_UNSUITABLE if a key is not EC or is on another curve
 */
export function ecdsaAlgorithm(
    name: ECDSAAlgorithm,
    key: AsymmetricKey
): ECDSAVariant {
    const curve = ECDSA_CURVES[name];

    assertKeyPair(name, key, (keyObject) => {
        if (keyObject.asymmetricKeyType !== 'ec') {
            return `${name} requires an EC key, got ${keyObject.asymmetricKeyType ?? 'unknown'}`;
        }
        const namedCurve = keyObject.asymmetricKeyDetails?.namedCurve;
        if (namedCurve !== curve) {
            return `${name} requires curve ${curve}, got ${namedCurve ?? 'unknown'}`;
        }
        return null;
    });

    return Object.freeze({
        kind: 'ecdsa',
        name,
        key: Object.freeze({ ...key }),
    });
}

/**
 * The unsigned `none` algorithm. For interoperability testing only.
 */
export function unsignedAlgorithm(): UnsignedVariant {
    return Object.freeze({ kind: 'none', name: 'none' });
}

function assertKeyPair(
    name: SigningAlgorithm,
    key: AsymmetricKey,
    check: (keyObject: KeyObject) => string | null
): void {
    if (key.publicKey.type !== 'public') {
        throw new JWTError(
            `${name} public key must be a public KeyObject`,
            'KEY_UNSUITABLE'
        );
    }
    if (key.privateKey && key.privateKey.type !== 'private') {
        throw new JWTError(
            `${name} private key must be a private KeyObject`,
            'KEY_UNSUITABLE'
        );
    }

    for (const keyObject of [key.publicKey, key.privateKey]) {
        if (!keyObject) continue;
        const problem = check(keyObject);
        if (problem) {
            throw new JWTError(problem, 'KEY_UNSUITABLE');
        }
    }
}

// ============================================================================
// SIGNING
// ============================================================================

/**
 * Produces the signature of `message` with the algorithm's key.
 *
 * @throws JWTError KEY_UNSUITABLE for an asymmetric algorithm without a
 * private key
 */
export function signMessage(
    algorithm: Algorithm,
    message: Uint8Array
): Buffer {
    switch (algorithm.kind) {
        case 'hmac':
            return createHmac(HASH_ALGORITHMS[algorithm.name], algorithm.secret)
                .update(message)
                .digest();

        case 'rsa':
            return cryptoSign(
                HASH_ALGORITHMS[algorithm.name],
                message,
                requirePrivateKey(algorithm)
            );

        case 'ecdsa':
            return cryptoSign(HASH_ALGORITHMS[algorithm.name], message, {
                key: requirePrivateKey(algorithm),
                dsaEncoding: 'ieee-p1363',
            });

        case 'none':
            return Buffer.alloc(0);

        default:
            throw new Error(
                `Unsupported algorithm variant: ${algorithm satisfies never}`
            );
    }
}

function requirePrivateKey(
    algorithm: RSAVariant | ECDSAVariant
): KeyObject {
    if (!algorithm.key.privateKey) {
        throw new JWTError(
            `${algorithm.name} signer was built from a public key and cannot sign`,
            'KEY_UNSUITABLE'
        );
    }
    return algorithm.key.privateKey;
}

// ============================================================================
// SIGNATURE VERIFICATION
// ============================================================================

/**
 * Checks `signature` over `message`.
 *
 * HMAC signatures are recomputed and compared in constant time. RSA and
 * ECDSA delegate to `node:crypto`. The unsigned variant accepts only an
 * empty signature.
 *
 * @returns True if the signature is valid, false otherwise
 */
export function verifyMessage(
    algorithm: Algorithm,
    message: Uint8Array,
    signature: Uint8Array
): boolean {
    switch (algorithm.kind) {
        case 'hmac': {
            const expected = signMessage(algorithm, message);
            return (
                expected.length === signature.length &&
                timingSafeEqual(expected, signature)
            );
        }

        case 'rsa':
            return verifyAsymmetric(
                HASH_ALGORITHMS[algorithm.name],
                message,
                algorithm.key.publicKey,
                signature,
                'der'
            );

        case 'ecdsa':
            return verifyAsymmetric(
                HASH_ALGORITHMS[algorithm.name],
                message,
                algorithm.key.publicKey,
                signature,
                'ieee-p1363'
            );

        case 'none':
            return signature.length === 0;

        default:
            throw new Error(
                `Unsupported algorithm variant: ${algorithm satisfies never}`
            );
    }
}

function verifyAsymmetric(
    hash: string,
    message: Uint8Array,
    publicKey: KeyObject,
    signature: Uint8Array,
    dsaEncoding: 'der' | 'ieee-p1363'
): boolean {
    try {
        return cryptoVerify(
            hash,
            message,
            { key: publicKey, dsaEncoding },
            signature
        );
    } catch {
        // node:crypto throws on structurally invalid signatures
        return false;
    }
}
