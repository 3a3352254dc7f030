/**
 * @fileoverview Public entry point of tokenward.
 * @module tokenward
 */

export type {
    AsymmetricAlgorithm,
    AsymmetricKey,
    ECDSAAlgorithm,
    HashAlgorithm,
    HMACAlgorithm,
    JWTErrorCode,
    JWTHeader,
    KeyMaterial,
    KeyPair,
    RSAAlgorithm,
    SigningAlgorithm,
} from './types/crypto';
export { isJWTError, JWTError } from './types/crypto';

export type {
    ClaimVerificationContext,
    JWTPayload,
    PayloadSchema,
    SignJWTOptions,
    UnverifiedJWT,
    VerifiedJWT,
    VerifyJWTOptions,
    VerifyWithRegistryOptions,
    VerifyWithSignerOptions,
} from './types/claims';

export {
    isSigningAlgorithm,
    parseDuration,
    SIGNING_ALGORITHMS,
} from './constants/crypto';

export * from './core/claims';
export * from './utils/crypto';

export {
    buildSignerRegistry,
    generateSigningKey,
    getJWKS,
    retireSigningKey,
    rotateSigningKey,
} from './core/keys/services';
export type {
    GeneratedSigningKey,
    KeyAlgorithm,
} from './core/keys/services';
export { TokenService } from './core/token/service';
export type {
    IssueTokenOptions,
    VerifyTokenOptions,
} from './core/token/service';

export { ConfigLoader, configLoader, getConfig } from './config/loader';
export type {
    AppConfig,
    JWTConfig,
    LoggingConfig,
    SignerConfig,
} from './config/loader';
export { configureLogger, createLogger, logger } from './utils/logger';
export type { LoggerConfig, LogLevel } from './utils/logger';
