/**
 * @fileoverview JWKS (JSON Web Key Set) export and import.
 * @module utils/crypto/jwks
 */

import { createPublicKey, type KeyObject } from 'node:crypto';
import * as jose from 'jose';

import {
    isAsymmetricAlgorithm,
    isRSAAlgorithm,
    isSigningAlgorithm,
} from '../../constants/crypto';
import { JWTError } from '../../types/crypto';
import type { SignerRegistry } from './registry';
import { JWTSigner } from './signer';

// ============================================================================
// JWKS EXPORT (for public key distribution)
// ============================================================================

/**
 * Exports the public key of an asymmetric signer to JWK format.
 *
 * HMAC and unsigned signers have nothing publishable and yield `undefined`.
 *
 * @param signer - Signer whose public key to export
 * @param kid - Key identifier
 * @returns JWK for inclusion in a JWKS
 *
 * @example
 * ```typescript
 * const jwk = await exportToJWK(signer, '2026-10-a3f9b2c1');
 * ```
 */
export async function exportToJWK(
    signer: JWTSigner,
    kid: string
): Promise<jose.JWK | undefined> {
    const { algorithm } = signer;
    if (algorithm.kind !== 'rsa' && algorithm.kind !== 'ecdsa') {
        return undefined;
    }

    const jwk = await jose.exportJWK(algorithm.key.publicKey);

    return {
        ...jwk,
        kid,
        alg: algorithm.name,
        use: 'sig',
    };
}

/**
 * Creates a JWKS from every asymmetric signer in a registry.
 *
 * Keys appear in registration order. Verify-only signers are included so
 * that keys still being rotated out stay resolvable by clients.
 *
 * @example
 * ```typescript
 * const jwks = await createJWKS(signers);
 * await writeFile('jwks.json', JSON.stringify(jwks));
 * ```
 */
export async function createJWKS(
    registry: SignerRegistry
): Promise<{ keys: jose.JWK[] }> {
    const jwks = await Promise.all(
        registry.entries().map(([kid, signer]) => exportToJWK(signer, kid))
    );

    return {
        keys: jwks.filter((jwk): jwk is jose.JWK => jwk !== undefined),
    };
}

/**
 * Builds a verify-only signer from a published JWK, e.g. one entry of a
 * partner's JWKS. The JWK must name an RSA or ECDSA `alg`.
 *
 * @throws JWTError KEY_UNSUITABLE if `alg` is missing or not asymmetric, or
 * the key does not fit it
 *
 * @example
 * ```typescript
 * for (const jwk of jwks.keys) {
 *     if (jwk.kid) registry.register(jwk.kid, importFromJWK(jwk));
 * }
 * ```
 */
export function importFromJWK(jwk: jose.JWK): JWTSigner {
    const { alg } = jwk;
    if (alg === undefined || !isSigningAlgorithm(alg)) {
        throw new JWTError(
            'JWK must name a supported "alg"',
            'KEY_UNSUITABLE'
        );
    }
    if (!isAsymmetricAlgorithm(alg)) {
        throw new JWTError(
            `JWK algorithm ${alg} has no public key`,
            'KEY_UNSUITABLE'
        );
    }

    let publicKey: KeyObject;
    try {
        // Public members only, so a private JWK never yields a private key
        const { kty, n, e, crv, x, y } = jwk;
        publicKey = createPublicKey({
            key: { kty, n, e, crv, x, y },
            format: 'jwk',
        });
    } catch (error) {
        throw new JWTError('Failed to parse JWK', 'KEY_UNSUITABLE', error);
    }

    return isRSAAlgorithm(alg)
        ? JWTSigner.rsa(alg, publicKey)
        : JWTSigner.ecdsa(alg, publicKey);
}
