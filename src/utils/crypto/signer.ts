/**
 * @fileoverview JWT signer: one algorithm bound to its key, signing the
 * `header.payload` input of a compact token.
 * @module utils/crypto/signer
 */

import { createPublicKey, KeyObject } from 'node:crypto';

import type {
    AsymmetricKey,
    ECDSAAlgorithm,
    HMACAlgorithm,
    RSAAlgorithm,
    SigningAlgorithm,
} from '../../types/crypto';
import {
    type Algorithm,
    ecdsaAlgorithm,
    hmacAlgorithm,
    rsaAlgorithm,
    signMessage,
    unsignedAlgorithm,
    verifyMessage,
} from './algorithms';
import { encodeBase64URL } from './base64url';

/**
 * Signs and verifies JWT signing inputs with a fixed algorithm.
 *
 * The algorithm is chosen when the signer is built. Verification never
 * consults the `alg` of a parsed header.
 *
 * @example
 * ```typescript
 * const signer = JWTSigner.hs256(secret);
 * const token = signJWT(payload, signer);
 * ```
 */
export class JWTSigner {
    readonly algorithm: Algorithm;

    constructor(algorithm: Algorithm) {
        this.algorithm = algorithm;
        Object.freeze(this);
    }

    /** Algorithm name stamped into the `alg` header of signed tokens */
    get name(): SigningAlgorithm {
        return this.algorithm.name;
    }

    /** True when this signer holds key material able to produce signatures */
    get canSign(): boolean {
        const { algorithm } = this;
        return algorithm.kind === 'rsa' || algorithm.kind === 'ecdsa'
            ? algorithm.key.privateKey !== undefined
            : true;
    }

    /**
     * Signs serialized header and payload JSON.
     *
     * @param header - UTF-8 JSON bytes of the header
     * @param payload - UTF-8 JSON bytes of the payload
     * @returns Raw signature over `base64url(header).base64url(payload)`
     */
    sign(header: Uint8Array, payload: Uint8Array): Buffer {
        return signMessage(
            this.algorithm,
            signingInput(encodeBase64URL(header), encodeBase64URL(payload))
        );
    }

    /**
     * Verifies a signature against the segments exactly as they appear on
     * the wire. Re-serialized JSON is never used here.
     *
     * @param signature - Decoded signature bytes
     * @param header - Raw base64url header segment
     * @param payload - Raw base64url payload segment
     */
    verify(signature: Uint8Array, header: string, payload: string): boolean {
        return verifyMessage(
            this.algorithm,
            signingInput(header, payload),
            signature
        );
    }

    // ------------------------------------------------------------------------
    // Factories
    // ------------------------------------------------------------------------

    static hs256(secret: Uint8Array | string): JWTSigner {
        return JWTSigner.hmac('HS256', secret);
    }

    static hs384(secret: Uint8Array | string): JWTSigner {
        return JWTSigner.hmac('HS384', secret);
    }

    static hs512(secret: Uint8Array | string): JWTSigner {
        return JWTSigner.hmac('HS512', secret);
    }

    static hmac(name: HMACAlgorithm, secret: Uint8Array | string): JWTSigner {
        return new JWTSigner(hmacAlgorithm(name, secret));
    }

    static rs256(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.rsa('RS256', key);
    }

    static rs384(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.rsa('RS384', key);
    }

    static rs512(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.rsa('RS512', key);
    }

    /**
     * RSA signer. A single public `KeyObject` gives a verify-only signer;
     * a single private one derives its public half.
     */
    static rsa(name: RSAAlgorithm, key: AsymmetricKey | KeyObject): JWTSigner {
        return new JWTSigner(rsaAlgorithm(name, toKeyPair(key)));
    }

    static es256(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.ecdsa('ES256', key);
    }

    static es384(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.ecdsa('ES384', key);
    }

    static es512(key: AsymmetricKey | KeyObject): JWTSigner {
        return JWTSigner.ecdsa('ES512', key);
    }

    static ecdsa(
        name: ECDSAAlgorithm,
        key: AsymmetricKey | KeyObject
    ): JWTSigner {
        return new JWTSigner(ecdsaAlgorithm(name, toKeyPair(key)));
    }

    /**
     * Unsigned signer. Tokens it produces verify only where the caller
     * passes `allowUnsigned: true`.
     */
    static none(): JWTSigner {
        return new JWTSigner(unsignedAlgorithm());
    }
}

function signingInput(header: string, payload: string): Buffer {
    return Buffer.from(`${header}.${payload}`, 'utf8');
}

function toKeyPair(key: AsymmetricKey | KeyObject): AsymmetricKey {
    if (!(key instanceof KeyObject)) {
        return key;
    }
    if (key.type === 'private') {
        return { privateKey: key, publicKey: createPublicKey(key) };
    }
    return { publicKey: key };
}
