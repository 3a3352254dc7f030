import { z } from 'zod';

import type {
    ClaimVerificationContext,
    JWTPayload,
} from '../../types/claims';
import { JWTError } from '../../types/crypto';
import {
    type AudienceClaim,
    type ExpirationClaim,
    type IDClaim,
    type IssuedAtClaim,
    type IssuerClaim,
    type NotBeforeClaim,
    registeredClaimShape,
    type SubjectClaim,
} from './claims';

/**
 * Registered claims of RFC 7519, all optional.
 */
export interface RegisteredClaims {
    iss?: IssuerClaim;
    sub?: SubjectClaim;
    aud?: AudienceClaim;
    exp?: ExpirationClaim;
    nbf?: NotBeforeClaim;
    iat?: IssuedAtClaim;
    jti?: IDClaim;
}

const REGISTERED_CLAIM_NAMES: ReadonlySet<string> = new Set(
    Object.keys(registeredClaimShape)
);

/**
 * General-purpose payload: registered claims plus arbitrary private claims.
 *
 * `verify` rejects expired and not-yet-valid tokens, and checks `iss` and
 * `aud` when the verifying caller names an expected value.
 */
export class StandardClaims<
    Extra extends Record<string, unknown> = Record<string, unknown>,
> implements JWTPayload, RegisteredClaims
{
    readonly iss?: IssuerClaim;
    readonly sub?: SubjectClaim;
    readonly aud?: AudienceClaim;
    readonly exp?: ExpirationClaim;
    readonly nbf?: NotBeforeClaim;
    readonly iat?: IssuedAtClaim;
    readonly jti?: IDClaim;
    /** Private claims, written next to the registered ones */
    readonly extra: Readonly<Extra>;

    /**
     * @throws JWTError INVALID_PAYLOAD when `extra` reuses a registered
     * claim name
     */
    constructor(claims: RegisteredClaims, extra: Extra) {
        const collision = Object.keys(extra).find((name) =>
            REGISTERED_CLAIM_NAMES.has(name)
        );
        if (collision !== undefined) {
            throw new JWTError(
                `Private claim "${collision}" collides with a registered claim`,
                'INVALID_PAYLOAD'
            );
        }

        this.iss = claims.iss;
        this.sub = claims.sub;
        this.aud = claims.aud;
        this.exp = claims.exp;
        this.nbf = claims.nbf;
        this.iat = claims.iat;
        this.jti = claims.jti;
        this.extra = Object.freeze({ ...extra });
        Object.freeze(this);
    }

    verify(context: ClaimVerificationContext): void {
        const { now, clockTolerance } = context;

        this.exp?.verify(now, clockTolerance);
        this.nbf?.verify(now, clockTolerance);

        if (context.issuer !== undefined) {
            if (!this.iss) {
                throw new JWTError(
                    `Invalid issuer: expected "${context.issuer}", got none`,
                    'INVALID_ISSUER'
                );
            }
            this.iss.verify(context.issuer);
        }

        if (context.audience !== undefined) {
            if (!this.aud) {
                throw new JWTError(
                    `Invalid audience: expected "${context.audience}", got none`,
                    'INVALID_AUDIENCE'
                );
            }
            this.aud.verify(context.audience);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            ...this.extra,
            iss: this.iss,
            sub: this.sub,
            aud: this.aud,
            exp: this.exp,
            nbf: this.nbf,
            iat: this.iat,
            jti: this.jti,
        };
    }
}

/**
 * Decodes any JSON object into {@link StandardClaims}. Unknown members are
 * kept as private claims.
 */
export const standardClaimsSchema = z
    .looseObject(registeredClaimShape)
    .transform(
        ({ iss, sub, aud, exp, nbf, iat, jti, ...extra }) =>
            new StandardClaims({ iss, sub, aud, exp, nbf, iat, jti }, extra)
    );
