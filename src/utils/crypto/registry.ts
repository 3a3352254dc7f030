/**
 * @fileoverview Signer registry keyed by `kid`, with an optional default signer.
 * @module utils/crypto/registry
 */

import { JWTError } from '../../types/crypto';
import type { JWTSigner } from './signer';

interface RegistrySnapshot {
    readonly signers: ReadonlyMap<string, JWTSigner>;
    readonly defaultSigner?: JWTSigner;
    readonly defaultKid?: string;
}

interface RegisterOptions {
    /** Also make this signer the default for tokens without a `kid` */
    default?: boolean;
}

/**
 * Maps key identifiers to signers.
 *
 * Every mutation builds a new snapshot and swaps it in one assignment, so a
 * lookup sees the registry either entirely before or entirely after a
 * registration. Rotation replaces a `kid` by registering it again.
 *
 * @example
 * ```typescript
 * const signers = new SignerRegistry()
 *     .register('2026-10-a3f9b2c1', JWTSigner.es256(privateKey), {
 *         default: true,
 *     })
 *     .register('2026-07-0c4e1d2b', JWTSigner.es256(previousPublicKey));
 *
 * const { payload } = verifyJWT(token, { signers, payload: schema });
 * ```
 */
export class SignerRegistry {
    private snapshot: RegistrySnapshot = { signers: new Map() };

    /**
     * Registers `signer` under `kid`, replacing any signer already there.
     */
    register(kid: string, signer: JWTSigner, options: RegisterOptions = {}) {
        if (kid.length === 0) {
            throw new JWTError(
                'Signer kid must be a non-empty string',
                'MISSING_KEY_ID'
            );
        }

        const current = this.snapshot;
        const signers = new Map(current.signers);
        signers.set(kid, signer);

        const replacesDefault = current.defaultKid === kid;
        this.snapshot =
            options.default || replacesDefault
                ? { signers, defaultSigner: signer, defaultKid: kid }
                : {
                      signers,
                      defaultSigner: current.defaultSigner,
                      defaultKid: current.defaultKid,
                  };

        return this;
    }

    /**
     * Sets the signer used for tokens that carry no `kid`.
     * A signer set here is not reachable by any `kid`.
     */
    setDefault(signer: JWTSigner) {
        this.snapshot = {
            signers: this.snapshot.signers,
            defaultSigner: signer,
        };
        return this;
    }

    /**
     * Removes the signer registered under `kid`.
     *
     * @returns True if a signer was removed
     */
    unregister(kid: string): boolean {
        const current = this.snapshot;
        if (!current.signers.has(kid)) {
            return false;
        }

        const signers = new Map(current.signers);
        signers.delete(kid);

        this.snapshot =
            current.defaultKid === kid
                ? { signers }
                : {
                      signers,
                      defaultSigner: current.defaultSigner,
                      defaultKid: current.defaultKid,
                  };

        return true;
    }

    get(kid: string): JWTSigner | undefined {
        return this.snapshot.signers.get(kid);
    }

    has(kid: string): boolean {
        return this.snapshot.signers.has(kid);
    }

    /** Registered key identifiers, in registration order */
    kids(): string[] {
        return [...this.snapshot.signers.keys()];
    }

    entries(): Array<[string, JWTSigner]> {
        return [...this.snapshot.signers.entries()];
    }

    get size(): number {
        return this.snapshot.signers.size;
    }

    get defaultSigner(): JWTSigner | undefined {
        return this.snapshot.defaultSigner;
    }

    /** `kid` of the default signer, when it was registered under one */
    get defaultKid(): string | undefined {
        return this.snapshot.defaultKid;
    }

    /**
     * Resolves the signer for a token.
     *
     * Without a `kid` only the default signer is eligible; the registry never
     * falls back to an arbitrary registered signer.
     *
     * @throws JWTError MISSING_SIGNER if `kid` is not registered
     * @throws JWTError MISSING_KEY_ID if `kid` is absent and no default is set
     */
    requireSigner(kid?: string): JWTSigner {
        const { signers, defaultSigner } = this.snapshot;

        if (kid !== undefined) {
            const signer = signers.get(kid);
            if (!signer) {
                throw new JWTError(
                    `No signer registered for kid "${kid}"`,
                    'MISSING_SIGNER'
                );
            }
            return signer;
        }

        if (!defaultSigner) {
            throw new JWTError(
                '`kid` header property required to identify signer',
                'MISSING_KEY_ID'
            );
        }

        return defaultSigner;
    }
}
