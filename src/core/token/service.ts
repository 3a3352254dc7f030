import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

import type { JWTConfig } from '../../config/loader';
import { parseDuration } from '../../constants/crypto';
import type { VerifiedJWT } from '../../types/claims';
import { isJWTError } from '../../types/crypto';
import {
    getJWTKeyId,
    type SignerRegistry,
    signJWT,
    verifyJWT,
} from '../../utils/crypto';
import { logger } from '../../utils/logger';
import {
    AudienceClaim,
    ExpirationClaim,
    IDClaim,
    IssuedAtClaim,
    IssuerClaim,
    NotBeforeClaim,
    StandardClaims,
    standardClaimsSchema,
    SubjectClaim,
} from '../claims';

export interface IssueTokenOptions {
    /** Lifetime such as '15m' (default: `accessTokenTTL`) */
    expiresIn?: string;
    /** Signer to use (default: the registry's default signer) */
    kid?: string;
    /** Issue time (default: now) */
    now?: Date;
}

export interface VerifyTokenOptions {
    /** Reference time (default: now) */
    now?: Date;
}

/**
 * Issues and verifies access tokens under the `jwt` configuration.
 *
 * @example
 * ```typescript
 * const tokens = new TokenService(signers, getJWTConfig());
 * const token = tokens.issueToken(userId, { scope: 'read' });
 * const { payload } = tokens.verifyToken(token);
 * ```
 */
export class TokenService {
    constructor(
        private readonly signers: SignerRegistry,
        private readonly jwtConfig: JWTConfig,
        private readonly log: Logger = logger
    ) {}

    /**
     * Signs a token for `subject` with `iss`, `aud`, `iat`, `nbf`, `exp`
     * and a random `jti`.
     *
     * @throws JWTError INVALID_PAYLOAD when `extra` names a registered claim
     */
    issueToken(
        subject: string,
        extra: Record<string, unknown> = {},
        options: IssueTokenOptions = {}
    ): string {
        const now = options.now ?? new Date();
        const ttl = parseDuration(
            options.expiresIn ?? this.jwtConfig.accessTokenTTL
        );

        const claims = new StandardClaims(
            {
                iss: new IssuerClaim(this.jwtConfig.issuer),
                sub: new SubjectClaim(subject),
                aud: new AudienceClaim(this.jwtConfig.audience),
                iat: new IssuedAtClaim(now),
                nbf: new NotBeforeClaim(now),
                exp: new ExpirationClaim(new Date(now.getTime() + ttl * 1000)),
                jti: new IDClaim(randomUUID()),
            },
            extra
        );

        return signJWT(claims, this.signers, { kid: options.kid });
    }

    /**
     * Verifies a token against the registry and the configured issuer,
     * audience, clock tolerance and unsigned-token policy.
     *
     * @throws JWTError from the failing verification stage
     */
    verifyToken(
        token: string,
        options: VerifyTokenOptions = {}
    ): VerifiedJWT<StandardClaims> {
        try {
            return verifyJWT(token, {
                signers: this.signers,
                payload: standardClaimsSchema,
                now: options.now,
                issuer: this.jwtConfig.issuer,
                audience: this.jwtConfig.audience,
                clockTolerance: this.jwtConfig.clockTolerance,
                allowUnsigned: this.jwtConfig.allowUnsigned,
            });
        } catch (error) {
            if (isJWTError(error)) {
                this.log.warn(
                    { code: error.code, kid: getJWTKeyId(token) },
                    'Token verification failed'
                );
            }
            throw error;
        }
    }
}
