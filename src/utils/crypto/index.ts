/**
 * @fileoverview Cryptographic utilities for JWT signing and verification.
 *
 * Signers bind one algorithm to its key; the envelope functions build and
 * check compact tokens around them.
 *
 * @module utils/crypto
 *
 * @example
 * ```typescript
 * import {
 *   // Signers
 *   JWTSigner,
 *   SignerRegistry,
 *   createSigner,
 *
 *   // Key generation
 *   generateKeyPair,
 *   generateKid,
 *   generateSecret,
 *
 *   // JWT operations
 *   signJWT,
 *   verifyJWT,
 *   decodeJWT,
 *   getJWTKeyId,
 *
 *   // JWKS
 *   exportToJWK,
 *   createJWKS,
 * } from 'tokenward';
 * ```
 */

// ============================================================================
// CODEC
// ============================================================================

export {
    Base64URLDecodeError,
    decodeBase64URL,
    encodeBase64URL,
} from './base64url';

// ============================================================================
// ALGORITHMS & SIGNERS
// ============================================================================

export type {
    Algorithm,
    ECDSAVariant,
    HMACVariant,
    RSAVariant,
    UnsignedVariant,
} from './algorithms';
export {
    ecdsaAlgorithm,
    hmacAlgorithm,
    rsaAlgorithm,
    signMessage,
    unsignedAlgorithm,
    verifyMessage,
} from './algorithms';
export { JWTSigner } from './signer';
export { SignerRegistry } from './registry';

// ============================================================================
// KEYS
// ============================================================================

export type { SecretEncoding } from './keys';
export {
    createSigner,
    decodeSecret,
    generateKeyPair,
    generateKid,
    generateSecret,
    loadPrivateKey,
    loadPublicKey,
} from './keys';

// ============================================================================
// JWT OPERATIONS
// ============================================================================

export { decodeJWT, getJWTKeyId, signJWT, verifyJWT } from './jwt';

// ============================================================================
// JWKS
// ============================================================================

export { createJWKS, exportToJWK, importFromJWK } from './jwks';
