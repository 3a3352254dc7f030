#!/usr/bin/env node

/**
 * Tokenward Configuration Management CLI
 *
 * Usage:
 *   npm run config validate              - Validate configuration and signers
 *   npm run config generate-key <alg>    - Generate a secret or key pair
 *   npm run config show                  - Show current config (safe)
 *   npm run config jwks                  - Print the JWKS of configured keys
 *   npm run config inspect <token>       - Decode a token WITHOUT verifying
 */

import { stringify as stringifyYaml } from 'yaml';

import { configLoader } from '../src/config/loader';
import { isSigningAlgorithm } from '../src/constants/crypto';
import {
    buildSignerRegistry,
    generateSigningKey,
    getJWKS,
    type KeyAlgorithm,
} from '../src/core/keys/services';
import { decodeJWT } from '../src/utils/crypto';
import { configureLogger } from '../src/utils/logger';

const command = process.argv[2];
const args = process.argv.slice(3);

// ============================================================================
// COMMANDS
// ============================================================================

function validateConfig() {
    console.log('🔍 Validating configuration...\n');

    try {
        const config = loadConfig();
        const registry = buildSignerRegistry(config.signers);

        console.log('✅ Configuration is valid!\n');
        console.log('Summary:');
        console.log(`  • Issuer: ${config.jwt.issuer}`);
        console.log(`  • Audience: ${config.jwt.audience}`);
        console.log(`  • Access token TTL: ${config.jwt.accessTokenTTL}`);
        console.log(`  • Clock tolerance: ${config.jwt.clockTolerance}s`);
        console.log(`  • Signers: ${registry.size}`);
        for (const [kid, signer] of registry.entries()) {
            const marker = kid === registry.defaultKid ? ' (default)' : '';
            const mode = signer.canSign ? 'sign+verify' : 'verify only';
            console.log(`      - ${kid}: ${signer.name}, ${mode}${marker}`);
        }
        if (config.jwt.allowUnsigned) {
            console.log('\n⚠️  allowUnsigned is enabled: alg "none" accepted!');
        }

        process.exit(0);
    } catch (error) {
        console.error('❌ Configuration validation failed:\n');
        console.error(error);
        process.exit(1);
    }
}

async function generateKey() {
    const [algorithm = 'ES256'] = args;

    if (!isKeyAlgorithm(algorithm)) {
        console.error(`❌ Unsupported algorithm: ${algorithm}`);
        console.error('   Use one of HS256/384/512, RS256/384/512, ES256/384/512');
        process.exit(1);
    }

    console.log(`🔑 Generating ${algorithm} signing key...\n`);

    const key = await generateSigningKey({ algorithm });

    console.log(`Key ID: ${key.kid}`);
    console.log('━'.repeat(60));
    if (key.secret) {
        console.log('Secret (base64url):');
        console.log(key.secret);
    } else {
        console.log(key.privateKey);
        console.log(key.publicKey);
    }
    console.log('━'.repeat(60));
    console.log('\nAdd to the signers section of your config:');
    console.log(
        stringifyYaml([
            {
                kid: key.kid,
                algorithm: key.algorithm,
                ...(key.secret
                    ? {
                          secret: '${SIGNING_SECRET}',
                          secretEncoding: 'base64url',
                      }
                    : { privateKeyFile: `keys/${key.kid}.pem` }),
            },
        ])
    );
    console.log('🔒 Never commit secrets or private keys to version control!');
}

function showConfig() {
    console.log('📋 Current Configuration\n');

    try {
        const config = loadConfig();

        // Remove sensitive data
        const safeConfig = {
            ...config,
            signers: config.signers.map((signer) => ({
                ...signer,
                secret: signer.secret ? '***REDACTED***' : undefined,
                privateKey: signer.privateKey ? '***REDACTED***' : undefined,
            })),
        };

        console.log(stringifyYaml(safeConfig));
    } catch (error) {
        console.error('❌ Failed to load configuration:', error);
        process.exit(1);
    }
}

async function printJWKS() {
    try {
        const config = loadConfig();
        const jwks = await getJWKS(buildSignerRegistry(config.signers));
        console.log(JSON.stringify(jwks, null, 2));
    } catch (error) {
        console.error('❌ Failed to build JWKS:', error);
        process.exit(1);
    }
}

function inspectToken() {
    const [token] = args;
    if (!token) {
        console.error('❌ Usage: npm run config inspect <token>');
        process.exit(1);
    }

    try {
        const { header, payload } = decodeJWT(token);

        console.log('⚠️  UNVERIFIED: signature and claims were NOT checked\n');
        console.log('Header:');
        console.log(JSON.stringify(header, null, 2));
        console.log('\nPayload:');
        console.log(JSON.stringify(payload, null, 2));
    } catch (error) {
        console.error('❌ Failed to decode token:', error);
        process.exit(1);
    }
}

// ============================================================================
// HELPERS
// ============================================================================

function loadConfig() {
    const config = configLoader.load();
    configureLogger(config.logging);
    return config;
}

function isKeyAlgorithm(value: string): value is KeyAlgorithm {
    return isSigningAlgorithm(value) && value !== 'none';
}

// ============================================================================
// CLI ROUTER
// ============================================================================

async function main() {
    switch (command) {
        case 'validate':
            validateConfig();
            break;

        case 'generate-key':
            await generateKey();
            break;

        case 'show':
            showConfig();
            break;

        case 'jwks':
            await printJWKS();
            break;

        case 'inspect':
            inspectToken();
            break;

        default:
            console.log('Tokenward Configuration Management CLI\n');
            console.log('Available commands:');
            console.log('  validate            - Validate config and signers');
            console.log('  generate-key <alg>  - Generate a secret or key pair');
            console.log('  show                - Show current config (redacted)');
            console.log('  jwks                - Print JWKS of configured keys');
            console.log('  inspect <token>     - Decode a token (unverified)');
            console.log('\nUsage: npm run config <command> [args]');
            process.exit(1);
    }
}

main().catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
});
