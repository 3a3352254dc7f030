/**
 * @fileoverview Key generation and loading for HMAC, RSA and ECDSA signers.
 * @module utils/crypto/keys
 */

import {
    createPrivateKey,
    createPublicKey,
    type KeyObject,
    randomBytes,
} from 'node:crypto';
import * as jose from 'jose';

import {
    HASH_ALGORITHMS,
    isECDSAAlgorithm,
    isHMACAlgorithm,
    isRSAAlgorithm,
} from '../../constants/crypto';
import type {
    AsymmetricAlgorithm,
    HashAlgorithm,
    HMACAlgorithm,
    KeyMaterial,
    KeyPair,
    SigningAlgorithm,
} from '../../types/crypto';
import { JWTError } from '../../types/crypto';
import { decodeBase64URL, encodeBase64URL } from './base64url';
import { JWTSigner } from './signer';

const DIGEST_LENGTHS: Record<HashAlgorithm, number> = {
    sha256: 32,
    sha384: 48,
    sha512: 64,
};

/** Encodings accepted for configured HMAC secrets */
export type SecretEncoding = 'utf8' | 'base64' | 'base64url' | 'hex';

// ============================================================================
// KEY GENERATION
// ============================================================================

/**
 * Generates a key pair for an asymmetric signing algorithm.
 *
 * @param algorithm - RSA or ECDSA algorithm
 * @param kid - Optional key identifier (auto-generated if not provided)
 * @returns PEM-encoded key pair with metadata
 *
 * @example
 * ```typescript
 * const keys = await generateKeyPair('ES256');
 * const signer = createSigner('ES256', keys);
 * ```
 */
export async function generateKeyPair(
    algorithm: AsymmetricAlgorithm,
    kid?: string
): Promise<KeyPair> {
    const keyId = kid ?? generateKid();

    switch (algorithm) {
        case 'ES256':
        case 'ES384':
        case 'ES512':
            return exportKeyPair(
                keyId,
                algorithm,
                await jose.generateKeyPair(algorithm, { extractable: true })
            );

        case 'RS256':
        case 'RS384':
        case 'RS512':
            return exportKeyPair(
                keyId,
                algorithm,
                await jose.generateKeyPair(algorithm, {
                    modulusLength: 2048,
                    extractable: true,
                })
            );

        default:
            throw new Error(
                `Unsupported algorithm: ${algorithm satisfies never}`
            );
    }
}

async function exportKeyPair(
    kid: string,
    algorithm: AsymmetricAlgorithm,
    pair: jose.GenerateKeyPairResult
): Promise<KeyPair> {
    return {
        publicKey: await jose.exportSPKI(pair.publicKey),
        privateKey: await jose.exportPKCS8(pair.privateKey),
        kid,
        algorithm,
    };
}

/**
 * Generates a random HMAC secret as long as the algorithm's digest.
 *
 * @returns Secret encoded as base64url
 */
export function generateSecret(algorithm: HMACAlgorithm): string {
    const length = DIGEST_LENGTHS[HASH_ALGORITHMS[algorithm]];
    return encodeBase64URL(randomBytes(length));
}

/**
 * Generates a unique key identifier (kid).
 *
 * Format: YYYY-MM-XXXXXXXX (date prefix + random hex)
 * Example: 2026-10-a3f9b2c1
 */
export function generateKid(): string {
    const datePrefix = new Date().toISOString().slice(0, 7);
    const randomSuffix = randomBytes(4).toString('hex');
    return `${datePrefix}-${randomSuffix}`;
}

// ============================================================================
// KEY LOADING
// ============================================================================

/**
 * Parses a PEM private key (PKCS#8, PKCS#1 or SEC1).
 *
 * @throws JWTError KEY_UNSUITABLE if the PEM cannot be parsed
 */
export function loadPrivateKey(pem: string): KeyObject {
    try {
        return createPrivateKey(pem);
    } catch (error) {
        throw new JWTError(
            'Failed to parse private key',
            'KEY_UNSUITABLE',
            error
        );
    }
}

/**
 * Parses a PEM public key (SPKI or X.509 certificate).
 *
 * @throws JWTError KEY_UNSUITABLE if the PEM cannot be parsed
 */
export function loadPublicKey(pem: string): KeyObject {
    try {
        return createPublicKey(pem);
    } catch (error) {
        throw new JWTError(
            'Failed to parse public key',
            'KEY_UNSUITABLE',
            error
        );
    }
}

/**
 * Decodes a configured secret into raw bytes.
 */
export function decodeSecret(
    secret: string,
    encoding: SecretEncoding = 'utf8'
): Buffer {
    switch (encoding) {
        case 'utf8':
            return Buffer.from(secret, 'utf8');
        case 'base64':
            return Buffer.from(secret, 'base64');
        case 'base64url':
            return decodeBase64URL(secret);
        case 'hex':
            return Buffer.from(secret, 'hex');
        default:
            throw new Error(
                `Unsupported secret encoding: ${encoding satisfies never}`
            );
    }
}

/**
 * Builds a signer from key material.
 *
 * HMAC algorithms need `secret`. RSA and ECDSA take `privateKey` to sign,
 * or only `publicKey` for a verify-only signer. A `publicKey` given next to
 * `privateKey` must be its public half.
 *
 * @throws JWTError KEY_UNSUITABLE if the material does not fit the algorithm
 *
 * @example
 * ```typescript
 * const signer = createSigner('RS256', { publicKey: partnerPem });
 * signer.canSign; // false
 * ```
 */
export function createSigner(
    algorithm: SigningAlgorithm,
    material: KeyMaterial = {}
): JWTSigner {
    if (algorithm === 'none') {
        return JWTSigner.none();
    }

    if (isHMACAlgorithm(algorithm)) {
        if (material.secret === undefined) {
            throw new JWTError(
                `${algorithm} requires a secret`,
                'KEY_UNSUITABLE'
            );
        }
        return JWTSigner.hmac(algorithm, material.secret);
    }

    const privateKey = material.privateKey
        ? loadPrivateKey(material.privateKey)
        : undefined;
    const publicKey = material.publicKey
        ? loadPublicKey(material.publicKey)
        : undefined;

    if (
        privateKey &&
        publicKey &&
        !publicKey.equals(createPublicKey(privateKey))
    ) {
        throw new JWTError(
            'Public key does not match private key',
            'KEY_UNSUITABLE'
        );
    }

    const key = privateKey ?? publicKey;
    if (!key) {
        throw new JWTError(
            `${algorithm} requires a private or public key`,
            'KEY_UNSUITABLE'
        );
    }

    if (isRSAAlgorithm(algorithm)) {
        return JWTSigner.rsa(algorithm, key);
    }
    if (isECDSAAlgorithm(algorithm)) {
        return JWTSigner.ecdsa(algorithm, key);
    }

    throw new JWTError(`Unsupported algorithm: ${algorithm}`, 'KEY_UNSUITABLE');
}
