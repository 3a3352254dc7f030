import 'dotenv/config';
import fs, { readFileSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import {
    isAsymmetricAlgorithm,
    isHMACAlgorithm,
    SIGNING_ALGORITHMS,
} from '../constants/crypto';
import { LOG_LEVELS, logger } from '../utils/logger';

// ============================================================================
// CONFIGURATION SCHEMA WITH ZOD VALIDATION
// ============================================================================

const SigningAlgorithmSchema = z.enum(SIGNING_ALGORITHMS);

// Left behind by interpolation when the variable is unset
const UNRESOLVED_PLACEHOLDER = /\$\{[^}]+\}|^\$[A-Z_][A-Z0-9_]*$/;

const SignerConfigSchema = z
    .object({
        kid: z.string().min(1),
        algorithm: SigningAlgorithmSchema,
        secret: z.string().min(1).optional(),
        secretEncoding: z
            .enum(['utf8', 'base64', 'base64url', 'hex'])
            .default('utf8'),
        privateKey: z.string().min(1).optional(),
        publicKey: z.string().min(1).optional(),
        privateKeyFile: z.string().min(1).optional(),
        publicKeyFile: z.string().min(1).optional(),
        default: z.boolean().default(false),
    })
    .superRefine((signer, ctx) => {
        for (const field of ['secret', 'privateKey', 'publicKey'] as const) {
            if (UNRESOLVED_PLACEHOLDER.test(signer[field] ?? '')) {
                ctx.addIssue({
                    code: 'custom',
                    path: [field],
                    message: `${field} references an unset environment variable`,
                });
            }
        }
        if (isHMACAlgorithm(signer.algorithm) && !signer.secret) {
            ctx.addIssue({
                code: 'custom',
                path: ['secret'],
                message: `${signer.algorithm} signer requires a secret`,
            });
        }
        if (
            isAsymmetricAlgorithm(signer.algorithm) &&
            !signer.privateKey &&
            !signer.publicKey
        ) {
            ctx.addIssue({
                code: 'custom',
                path: ['privateKey'],
                message: `${signer.algorithm} signer requires a private or public key`,
            });
        }
    });

const SignersConfigSchema = z
    .array(SignerConfigSchema)
    .default([])
    .superRefine((signers, ctx) => {
        const seen = new Set<string>();
        signers.forEach((signer, index) => {
            if (seen.has(signer.kid)) {
                ctx.addIssue({
                    code: 'custom',
                    path: [index, 'kid'],
                    message: `Duplicate signer kid "${signer.kid}"`,
                });
            }
            seen.add(signer.kid);
        });

        if (signers.filter((signer) => signer.default).length > 1) {
            ctx.addIssue({
                code: 'custom',
                message: 'At most one signer can be the default',
            });
        }
    });

const JWTConfigSchema = z.object({
    issuer: z.string().min(1).default('tokenward'),
    audience: z.string().min(1).default('api'),
    accessTokenTTL: z
        .string()
        .regex(/^\d+[smhdw]$/, 'Expected a duration such as 15m or 1h')
        .default('15m'),
    clockTolerance: z.number().int().min(0).default(0),
    allowUnsigned: z.boolean().default(false),
});

const LoggingConfigSchema = z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    format: z.enum(['json', 'pretty']).default('json'),
    redactSensitive: z.boolean().default(true),
});

// Main configuration schema
const ConfigSchema = z.object({
    logging: LoggingConfigSchema.default({
        level: 'info',
        format: 'json',
        redactSensitive: true,
    }),
    jwt: JWTConfigSchema.default({
        issuer: 'tokenward',
        audience: 'api',
        accessTokenTTL: '15m',
        clockTolerance: 0,
        allowUnsigned: false,
    }),
    signers: SignersConfigSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type SignerConfig = AppConfig['signers'][number];
export type JWTConfig = AppConfig['jwt'];
export type LoggingConfig = AppConfig['logging'];

type RawConfig = Record<string, unknown>;

interface ConfigLoaderOptions {
    /** Environment to read overrides from (default: process.env) */
    env?: NodeJS.ProcessEnv;
    /** Directory searched for config files (default: process.cwd()) */
    cwd?: string;
}

// ============================================================================
// CONFIGURATION LOADER
// ============================================================================

export class ConfigLoader {
    private config: AppConfig | null = null;
    private readonly env: NodeJS.ProcessEnv;
    private readonly cwd: string;

    constructor(options: ConfigLoaderOptions = {}) {
        this.env = options.env ?? process.env;
        this.cwd = options.cwd ?? process.cwd();
    }

    /**
     * Load configuration from multiple sources with priority:
     * 1. Environment variables (highest priority)
     * 2. Config file (YAML/JSON)
     * 3. Default values (lowest priority)
     *
     * Key files named by `privateKeyFile` / `publicKeyFile` are read
     * relative to the config file.
     */
    load(): AppConfig {
        if (this.config) {
            return this.config;
        }

        // 1. Determine config file path
        const configPath = this.env.CONFIG_FILE
            ? path.resolve(this.cwd, this.env.CONFIG_FILE)
            : this.detectConfigFile();

        // 2. Load base config from file
        let fileConfig: RawConfig = {};
        if (configPath) {
            fileConfig = this.loadConfigFile(configPath);
            logger.debug({ configPath }, 'Loaded configuration file');
        }

        // 3. Merge with environment variables and inline key files
        const baseDir = configPath ? path.dirname(configPath) : this.cwd;
        const mergedConfig = this.readKeyFiles(
            this.mergeWithEnv(fileConfig),
            baseDir
        );

        // 4. Validate with Zod
        const result = ConfigSchema.safeParse(mergedConfig);
        if (!result.success) {
            logger.error('Configuration validation failed');
            result.error.issues.forEach((issue) => {
                logger.error(`  - ${issue.path.join('.')}: ${issue.message}`);
            });
            throw new Error('Invalid configuration');
        }

        this.config = result.data;
        logger.debug(
            { signers: this.config.signers.length },
            'Configuration validated successfully'
        );
        return this.config;
    }

    /**
     * Auto-detect config file in order of preference
     */
    private detectConfigFile(): string | null {
        const candidates = [
            'config.yaml',
            'config.yml',
            'config.json',
            'config/config.yaml',
            'config/config.yml',
            'config/config.json',
        ];

        for (const file of candidates) {
            const candidate = path.resolve(this.cwd, file);
            if (fs.existsSync(candidate)) {
                return candidate;
            }
        }

        return null;
    }

    /**
     * Load and parse config file (YAML or JSON)
     */
    private loadConfigFile(configPath: string): RawConfig {
        let content: string;
        try {
            content = readFileSync(configPath, 'utf-8');
        } catch (error) {
            throw new Error(`Failed to load config file: ${configPath}`, {
                cause: error,
            });
        }

        let parsed: unknown;
        if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
            parsed = parseYaml(content);
        } else if (configPath.endsWith('.json')) {
            parsed = JSON.parse(content);
        } else {
            throw new Error(`Unsupported config file format: ${configPath}`);
        }

        if (parsed === null || parsed === undefined) {
            return {};
        }
        if (!isRecord(parsed)) {
            throw new Error(
                `Config file must contain an object: ${configPath}`
            );
        }

        // Interpolate environment variables
        return this.interpolateRecord(parsed);
    }

    private interpolateRecord(record: RawConfig): RawConfig {
        const result: RawConfig = {};
        for (const [key, value] of Object.entries(record)) {
            result[key] = this.interpolateEnvVars(value);
        }
        return result;
    }

    /**
     * Recursively interpolate environment variables in config object
     * Replaces ${VAR_NAME} with the environment value
     */
    private interpolateEnvVars(value: unknown): unknown {
        if (typeof value === 'string') {
            // Replace ${VAR_NAME} or $VAR_NAME with environment variable
            return value.replace(
                /\$\{([^}]+)\}|\$([A-Z_][A-Z0-9_]*)/g,
                (
                    match: string,
                    braced: string | undefined,
                    bare: string | undefined
                ) => {
                    const varName = braced ?? bare ?? '';
                    const envValue = this.env[varName];
                    if (envValue === undefined) {
                        logger.warn(
                            `Environment variable ${varName} not found, keeping placeholder`
                        );
                        return match;
                    }
                    return envValue;
                }
            );
        }

        if (Array.isArray(value)) {
            return value.map((item) => this.interpolateEnvVars(item));
        }

        if (isRecord(value)) {
            return this.interpolateRecord(value);
        }

        return value;
    }

    /**
     * Merge file config with environment variables
     * Environment variables have higher priority
     */
    private mergeWithEnv(fileConfig: RawConfig): RawConfig {
        const env = this.env;
        const logging = isRecord(fileConfig.logging) ? fileConfig.logging : {};
        const jwt = isRecord(fileConfig.jwt) ? fileConfig.jwt : {};

        return {
            ...fileConfig,
            logging: {
                ...logging,
                ...(env.LOG_LEVEL ? { level: env.LOG_LEVEL } : {}),
                ...(env.LOG_FORMAT ? { format: env.LOG_FORMAT } : {}),
            },
            jwt: {
                ...jwt,
                ...(env.JWT_ISSUER ? { issuer: env.JWT_ISSUER } : {}),
                ...(env.JWT_AUDIENCE ? { audience: env.JWT_AUDIENCE } : {}),
                ...(env.ACCESS_TOKEN_TTL
                    ? { accessTokenTTL: env.ACCESS_TOKEN_TTL }
                    : {}),
                ...(env.JWT_CLOCK_TOLERANCE
                    ? { clockTolerance: Number(env.JWT_CLOCK_TOLERANCE) }
                    : {}),
                ...(env.JWT_ALLOW_UNSIGNED
                    ? {
                          allowUnsigned: parseBooleanFlag(
                              env.JWT_ALLOW_UNSIGNED
                          ),
                      }
                    : {}),
            },
        };
    }

    /**
     * Replaces `privateKeyFile` / `publicKeyFile` references with the PEM
     * they point at, unless the PEM is given inline.
     */
    private readKeyFiles(config: RawConfig, baseDir: string): RawConfig {
        if (!Array.isArray(config.signers)) {
            return config;
        }

        const readPem = (file: unknown): string | undefined => {
            if (typeof file !== 'string') {
                return undefined;
            }
            const keyPath = path.resolve(baseDir, file);
            try {
                return readFileSync(keyPath, 'utf-8');
            } catch (error) {
                throw new Error(`Failed to read key file: ${keyPath}`, {
                    cause: error,
                });
            }
        };

        return {
            ...config,
            signers: config.signers.map((signer: unknown) => {
                if (!isRecord(signer)) {
                    return signer;
                }
                return {
                    ...signer,
                    privateKey:
                        signer.privateKey ?? readPem(signer.privateKeyFile),
                    publicKey:
                        signer.publicKey ?? readPem(signer.publicKeyFile),
                };
            }),
        };
    }

    /**
     * Get current configuration
     */
    get(): AppConfig {
        if (!this.config) {
            throw new Error('Configuration not loaded. Call load() first.');
        }
        return this.config;
    }

    /**
     * Reload configuration
     */
    reload(): AppConfig {
        this.config = null;
        return this.load();
    }
}

function isRecord(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Unrecognized values pass through so the schema reports them.
function parseBooleanFlag(value: string): boolean | string {
    if (value === 'true') {
        return true;
    }
    if (value === 'false') {
        return false;
    }
    return value;
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

export const configLoader = new ConfigLoader();

// Helper to get config
export function getConfig(): AppConfig {
    return configLoader.get();
}

// ============================================================================
// CONFIGURATION EXPORT FOR SPECIFIC MODULES
// ============================================================================

export function getJWTConfig() {
    return getConfig().jwt;
}

export function getSignersConfig() {
    return getConfig().signers;
}

export function getLoggingConfig() {
    return getConfig().logging;
}
