import type { JWK } from 'jose';

import type { SignerConfig } from '../../config/loader';
import { isHMACAlgorithm } from '../../constants/crypto';
import type {
    AsymmetricAlgorithm,
    HMACAlgorithm,
    SigningAlgorithm,
} from '../../types/crypto';
import {
    createJWKS,
    createSigner,
    decodeSecret,
    generateKeyPair,
    generateKid,
    generateSecret,
    type JWTSigner,
    SignerRegistry,
} from '../../utils/crypto';
import { logger } from '../../utils/logger';

// ============================================================================
// TYPES
// ============================================================================

/** Algorithms a fresh signing key can be generated for */
export type KeyAlgorithm = HMACAlgorithm | AsymmetricAlgorithm;

/** Options for generating a new signing key */
interface GenerateKeyOptions {
    /** Signing algorithm (default: ES256) */
    algorithm?: KeyAlgorithm;
    /** Custom key identifier (auto-generated if not provided) */
    kid?: string;
}

/** Options for key rotation */
interface RotateKeyOptions {
    /** Algorithm for the new key (default: same as the current default) */
    algorithm?: KeyAlgorithm;
    /** Custom key identifier for the new key */
    kid?: string;
    /** Reason for rotation (for the log) */
    reason?: string;
}

/** A freshly generated key and the signer built from it */
export interface GeneratedSigningKey {
    kid: string;
    algorithm: KeyAlgorithm;
    signer: JWTSigner;
    /** base64url HMAC secret, for HMAC algorithms */
    secret?: string;
    /** SPKI PEM, for asymmetric algorithms */
    publicKey?: string;
    /** PKCS#8 PEM, for asymmetric algorithms */
    privateKey?: string;
}

/** JWKS response structure */
interface JWKSResponse {
    keys: JWK[];
}

// ============================================================================
// REGISTRY FROM CONFIGURATION
// ============================================================================

/**
 * Builds a signer registry from configured signer entries.
 *
 * Entries register in order; the one flagged `default` also becomes the
 * signer for tokens without a `kid`.
 *
 * @param entries - Validated `signers` configuration section
 * @param registry - Registry to fill (default: a new one)
 * @throws JWTError KEY_UNSUITABLE if an entry's key does not fit its
 * algorithm
 *
 * @example
 * ```typescript
 * const config = configLoader.load();
 * const signers = buildSignerRegistry(config.signers);
 * ```
 */
export function buildSignerRegistry(
    entries: readonly SignerConfig[],
    registry: SignerRegistry = new SignerRegistry()
): SignerRegistry {
    for (const entry of entries) {
        const signer = createSigner(entry.algorithm, {
            secret:
                entry.secret === undefined
                    ? undefined
                    : decodeSecret(entry.secret, entry.secretEncoding),
            privateKey: entry.privateKey,
            publicKey: entry.publicKey,
        });

        registry.register(entry.kid, signer, { default: entry.default });

        logger.info(
            {
                kid: entry.kid,
                algorithm: signer.name,
                canSign: signer.canSign,
                default: entry.default,
            },
            'Registered signer'
        );
    }

    return registry;
}

// ============================================================================
// KEY GENERATION
// ============================================================================

/**
 * Generates a new signing key and the signer that uses it.
 *
 * HMAC algorithms get a random secret sized to the digest. RSA and ECDSA
 * algorithms get a PEM key pair.
 *
 * @param options - Key generation options
 * @returns Key material, kid and signer
 *
 * @example
 * ```typescript
 * // Generate a new ES256 key
 * const key = await generateSigningKey();
 *
 * // Generate an HMAC secret with a custom kid
 * const shared = await generateSigningKey({
 *   algorithm: 'HS512',
 *   kid: 'partner-2026-10',
 * });
 * ```
 */
export async function generateSigningKey(
    options: GenerateKeyOptions = {}
): Promise<GeneratedSigningKey> {
    const { algorithm = 'ES256', kid = generateKid() } = options;

    if (isHMACAlgorithm(algorithm)) {
        const secret = generateSecret(algorithm);
        const key: GeneratedSigningKey = {
            kid,
            algorithm,
            secret,
            signer: createSigner(algorithm, {
                secret: decodeSecret(secret, 'base64url'),
            }),
        };
        logger.info({ kid, algorithm }, 'Generated signing key');
        return key;
    }

    const keyPair = await generateKeyPair(algorithm, kid);
    const key: GeneratedSigningKey = {
        kid,
        algorithm,
        publicKey: keyPair.publicKey,
        privateKey: keyPair.privateKey,
        signer: createSigner(algorithm, { privateKey: keyPair.privateKey }),
    };

    logger.info({ kid, algorithm }, 'Generated signing key');
    return key;
}

// ============================================================================
// KEY ROTATION
// ============================================================================

/**
 * Rotates the default signing key of a registry.
 *
 * Generates a new key and registers it as the default. The previous key
 * stays registered, so tokens it signed keep verifying until it is retired
 * with {@link retireSigningKey}.
 *
 * @param registry - Registry to rotate
 * @param options - Rotation options
 * @returns The new key and the kid it replaced as default
 *
 * @example
 * ```typescript
 * const { newKey, previousKid } = await rotateSigningKey(signers, {
 *   reason: 'scheduled_rotation',
 * });
 * ```
 */
export async function rotateSigningKey(
    registry: SignerRegistry,
    options: RotateKeyOptions = {}
): Promise<{ newKey: GeneratedSigningKey; previousKid?: string }> {
    const { kid, reason = 'manual_rotation' } = options;
    const previousKid = registry.defaultKid;
    const algorithm =
        options.algorithm ?? rotationAlgorithm(registry.defaultSigner?.name);

    const newKey = await generateSigningKey({ algorithm, kid });
    registry.register(newKey.kid, newKey.signer, { default: true });

    logger.info(
        {
            oldKid: previousKid,
            newKid: newKey.kid,
            algorithm: newKey.algorithm,
            reason,
        },
        'Rotated signing key'
    );

    return { newKey, previousKid };
}

function rotationAlgorithm(
    current: SigningAlgorithm | undefined
): KeyAlgorithm {
    return current === undefined || current === 'none' ? 'ES256' : current;
}

// ============================================================================
// KEY RETIREMENT
// ============================================================================

/**
 * Removes a key from a registry. Tokens carrying its kid stop verifying.
 *
 * Retiring the default key leaves the registry without a default until the
 * next rotation.
 *
 * @param registry - Registry holding the key
 * @param kid - Key identifier to retire
 * @param reason - Reason for retirement (for the log)
 * @returns True if the key was registered
 *
 * @example
 * ```typescript
 * // Emergency removal of a compromised key
 * retireSigningKey(signers, '2026-07-0c4e1d2b', 'potential_compromise');
 * ```
 */
export function retireSigningKey(
    registry: SignerRegistry,
    kid: string,
    reason = 'manual_retirement'
): boolean {
    const wasDefault = registry.defaultKid === kid;
    const removed = registry.unregister(kid);

    if (!removed) {
        logger.warn({ kid, reason }, 'Signing key to retire not found');
        return false;
    }

    if (wasDefault) {
        logger.warn(
            { kid, reason },
            'Retired the default signing key; registry has no default'
        );
    } else {
        logger.info({ kid, reason }, 'Retired signing key');
    }

    return true;
}

// ============================================================================
// JWKS
// ============================================================================

/**
 * Builds the JWKS for the /.well-known/jwks.json document.
 *
 * Contains every asymmetric public key in the registry, including keys
 * still registered after a rotation. HMAC secrets are never published.
 *
 * @example
 * ```typescript
 * const jwks = await getJWKS(signers);
 * ```
 */
export async function getJWKS(
    registry: SignerRegistry
): Promise<JWKSResponse> {
    return createJWKS(registry);
}
