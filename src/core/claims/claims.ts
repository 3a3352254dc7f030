/**
 * @fileoverview Self-verifying registered claims (RFC 7519 §4.1) and their
 * zod codecs.
 * @module core/claims/claims
 */

import { z } from 'zod';

import { JWTError } from '../../types/crypto';

// ============================================================================
// NUMERIC DATE
// ============================================================================

/**
 * Converts a date to a NumericDate: whole seconds since the Unix epoch.
 */
export function toNumericDate(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

/**
 * Converts a NumericDate (seconds, possibly fractional) to a date.
 */
export function fromNumericDate(seconds: number): Date {
    return new Date(seconds * 1000);
}

/** Largest NumericDate magnitude a `Date` can hold (±8.64e15 ms). */
export const MAX_NUMERIC_DATE = 8.64e12;

/** Decodes a JSON NumericDate into a `Date` */
export const numericDateSchema = z
    .number()
    .min(-MAX_NUMERIC_DATE)
    .max(MAX_NUMERIC_DATE)
    .transform((seconds) => fromNumericDate(seconds));

function assertValidDate(claim: string, value: Date): void {
    if (Number.isNaN(value.getTime())) {
        throw new JWTError(`Invalid "${claim}" date`, 'INVALID_PAYLOAD');
    }
}

// ============================================================================
// CLAIMS
// ============================================================================

/**
 * A single claim value that knows its wire form.
 */
export interface JWTClaim<T> {
    readonly value: T;
    toJSON(): unknown;
}

/**
 * `exp`: the token must not be accepted on or after this time.
 */
export class ExpirationClaim implements JWTClaim<Date> {
    constructor(readonly value: Date) {
        assertValidDate('exp', value);
        Object.freeze(this);
    }

    /**
     * @param leeway - Clock tolerance in seconds
     * @throws JWTError TOKEN_EXPIRED when `value <= now - leeway`
     */
    verify(now: Date, leeway = 0): void {
        if (this.value.getTime() <= now.getTime() - leeway * 1000) {
            throw new JWTError(
                `Token expired at ${this.value.toISOString()}`,
                'TOKEN_EXPIRED'
            );
        }
    }

    toJSON(): number {
        return toNumericDate(this.value);
    }
}

/**
 * `nbf`: the token must not be accepted before this time.
 */
export class NotBeforeClaim implements JWTClaim<Date> {
    constructor(readonly value: Date) {
        assertValidDate('nbf', value);
        Object.freeze(this);
    }

    /**
     * @throws JWTError TOKEN_NOT_YET_VALID when `value > now + leeway`
     */
    verify(now: Date, leeway = 0): void {
        if (this.value.getTime() > now.getTime() + leeway * 1000) {
            throw new JWTError(
                `Token not valid before ${this.value.toISOString()}`,
                'TOKEN_NOT_YET_VALID'
            );
        }
    }

    toJSON(): number {
        return toNumericDate(this.value);
    }
}

/**
 * `iat`: informational. Policies that bound token age can call
 * {@link IssuedAtClaim.verifyMaxAge}.
 */
export class IssuedAtClaim implements JWTClaim<Date> {
    constructor(readonly value: Date) {
        assertValidDate('iat', value);
        Object.freeze(this);
    }

    /**
     * @throws JWTError TOKEN_TOO_OLD when the token is older than `maxAge`
     * seconds
     */
    verifyMaxAge(now: Date, maxAge: number): void {
        if (now.getTime() - this.value.getTime() > maxAge * 1000) {
            throw new JWTError(
                `Token issued at ${this.value.toISOString()} exceeds max age of ${maxAge}s`,
                'TOKEN_TOO_OLD'
            );
        }
    }

    toJSON(): number {
        return toNumericDate(this.value);
    }
}

/**
 * `aud`: the recipients the token is intended for.
 *
 * Written as a bare string when it holds one audience, as an array
 * otherwise.
 */
export class AudienceClaim implements JWTClaim<ReadonlySet<string>> {
    readonly value: ReadonlySet<string>;

    constructor(value: string | Iterable<string>) {
        this.value = new Set(typeof value === 'string' ? [value] : value);
        Object.freeze(this);
    }

    /**
     * @throws JWTError INVALID_AUDIENCE unless `expected` is a member
     */
    verify(expected: string): void {
        if (!this.value.has(expected)) {
            throw new JWTError(
                `Invalid audience: expected "${expected}", got [${[...this.value].join(', ')}]`,
                'INVALID_AUDIENCE'
            );
        }
    }

    toJSON(): string | string[] {
        const audiences = [...this.value];
        const [only] = audiences;
        return audiences.length === 1 && only !== undefined ? only : audiences;
    }
}

/**
 * `iss`: the principal that issued the token.
 */
export class IssuerClaim implements JWTClaim<string> {
    constructor(readonly value: string) {
        Object.freeze(this);
    }

    /**
     * @throws JWTError INVALID_ISSUER on mismatch
     */
    verify(expected: string): void {
        if (this.value !== expected) {
            throw new JWTError(
                `Invalid issuer: expected "${expected}", got "${this.value}"`,
                'INVALID_ISSUER'
            );
        }
    }

    toJSON(): string {
        return this.value;
    }
}

/**
 * `sub`: the principal the token is about.
 */
export class SubjectClaim implements JWTClaim<string> {
    constructor(readonly value: string) {
        Object.freeze(this);
    }

    /**
     * @throws JWTError INVALID_SUBJECT on mismatch
     */
    verify(expected: string): void {
        if (this.value !== expected) {
            throw new JWTError(
                `Invalid subject: expected "${expected}", got "${this.value}"`,
                'INVALID_SUBJECT'
            );
        }
    }

    toJSON(): string {
        return this.value;
    }
}

/**
 * `jti`: unique token identifier.
 */
export class IDClaim implements JWTClaim<string> {
    constructor(readonly value: string) {
        Object.freeze(this);
    }

    toJSON(): string {
        return this.value;
    }
}

// ============================================================================
// CLAIM SCHEMAS
// ============================================================================

export const expirationClaimSchema = numericDateSchema.transform(
    (date) => new ExpirationClaim(date)
);

export const notBeforeClaimSchema = numericDateSchema.transform(
    (date) => new NotBeforeClaim(date)
);

export const issuedAtClaimSchema = numericDateSchema.transform(
    (date) => new IssuedAtClaim(date)
);

export const audienceClaimSchema = z
    .union([z.string(), z.array(z.string())])
    .transform((audience) => new AudienceClaim(audience));

export const issuerClaimSchema = z
    .string()
    .transform((issuer) => new IssuerClaim(issuer));

export const subjectClaimSchema = z
    .string()
    .transform((subject) => new SubjectClaim(subject));

export const idClaimSchema = z.string().transform((id) => new IDClaim(id));

/**
 * Registered claims as an object shape, for composing payload schemas.
 *
 * @example
 * ```typescript
 * const sessionSchema = z
 *     .object({ ...registeredClaimShape, sid: z.string() })
 *     .transform((claims) => new SessionPayload(claims));
 * ```
 */
export const registeredClaimShape = {
    iss: issuerClaimSchema.optional(),
    sub: subjectClaimSchema.optional(),
    aud: audienceClaimSchema.optional(),
    exp: expirationClaimSchema.optional(),
    nbf: notBeforeClaimSchema.optional(),
    iat: issuedAtClaimSchema.optional(),
    jti: idClaimSchema.optional(),
};
