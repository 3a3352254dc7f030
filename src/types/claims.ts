/**
 * @fileoverview Payload contract and verification result types.
 * @module types/claims
 */

import type { z } from 'zod';

import type { JWTSigner } from '../utils/crypto/signer';
import type { SignerRegistry } from '../utils/crypto/registry';
import type { JWTHeader } from './crypto';

// ============================================================================
// PAYLOAD CONTRACT
// ============================================================================

/**
 * Context handed to a payload once its signature has been verified.
 */
export interface ClaimVerificationContext {
    /** Signer that authenticated the token */
    signer: JWTSigner;
    /** Reference time for time-based claims */
    now: Date;
    /** Leeway in seconds applied to `exp` and `nbf` */
    clockTolerance: number;
    /** Expected `iss`, when the caller requires one */
    issuer?: string;
    /** Expected member of `aud`, when the caller requires one */
    audience?: string;
}

/**
 * A token payload.
 *
 * Any object that serializes with `JSON.stringify` and can check its own
 * claims. Throw a {@link JWTError} from `verify` to reject the token.
 */
export interface JWTPayload {
    verify(context: ClaimVerificationContext): void;
}

/**
 * Zod schema turning decoded JSON into a payload instance.
 */
export type PayloadSchema<P extends JWTPayload> = z.ZodType<P>;

// ============================================================================
// SIGN / VERIFY OPTIONS
// ============================================================================

export interface SignJWTOptions {
    /** Key identifier written to the header */
    kid?: string;
    /** Token type header (default: 'JWT') */
    typ?: string;
}

interface VerifyJWTBaseOptions<P extends JWTPayload> {
    /** Schema used to decode the payload */
    payload: PayloadSchema<P>;
    /** Reference time (default: now) */
    now?: Date;
    /** Clock tolerance in seconds for exp/nbf validation (default: 0) */
    clockTolerance?: number;
    /** Expected issuer, passed to the payload's verification */
    issuer?: string;
    /** Expected audience, passed to the payload's verification */
    audience?: string;
    /**
     * Accept tokens signed with `alg: none`. Never enable this outside of
     * interoperability tests.
     */
    allowUnsigned?: boolean;
}

/**
 * Verification against one known signer.
 */
export interface VerifyWithSignerOptions<P extends JWTPayload>
    extends VerifyJWTBaseOptions<P> {
    signer: JWTSigner;
    signers?: never;
}

/**
 * Verification against a registry, dispatched by the header `kid`.
 */
export interface VerifyWithRegistryOptions<P extends JWTPayload>
    extends VerifyJWTBaseOptions<P> {
    signers: SignerRegistry;
    signer?: never;
}

export type VerifyJWTOptions<P extends JWTPayload> =
    | VerifyWithSignerOptions<P>
    | VerifyWithRegistryOptions<P>;

// ============================================================================
// RESULTS
// ============================================================================

/**
 * A token whose signature and claims have been verified.
 */
export interface VerifiedJWT<P extends JWTPayload> {
    readonly verified: true;
    readonly header: Readonly<JWTHeader>;
    readonly payload: P;
}

/**
 * A token decoded without any signature or claim check.
 * Never trust it for authorization.
 */
export interface UnverifiedJWT<P = unknown> {
    readonly verified: false;
    readonly header: Readonly<JWTHeader>;
    readonly payload: P;
}
