/**
 * @fileoverview Unpadded URL-safe base64 (RFC 4648 §5) used by every JWT segment.
 * @module utils/crypto/base64url
 */

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Raised when a segment is not canonical base64url.
 */
export class Base64URLDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'Base64URLDecodeError';
    }
}

/**
 * Encodes bytes or a UTF-8 string as unpadded base64url.
 *
 * @example
 * ```typescript
 * encodeBase64URL(Buffer.from([0xfb, 0xff])); // '-_8'
 * ```
 */
export function encodeBase64URL(input: Uint8Array | string): string {
    const bytes =
        typeof input === 'string'
            ? Buffer.from(input, 'utf8')
            : Buffer.from(input);

    return bytes
        .toString('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=+$/, '');
}

/**
 * Decodes unpadded base64url.
 *
 * Padding is restored before handing the string to the base64 decoder.
 * Input with characters outside the alphabet, a length that no byte count
 * can produce, or non-zero trailing bits is rejected, so two different
 * strings never decode to the same bytes.
 *
 * @throws Base64URLDecodeError
 */
export function decodeBase64URL(input: string): Buffer {
    if (!BASE64URL_PATTERN.test(input)) {
        throw new Base64URLDecodeError(
            'Invalid base64url: unexpected character'
        );
    }

    if (input.length % 4 === 1) {
        throw new Base64URLDecodeError(
            `Invalid base64url: length ${input.length} cannot encode whole bytes`
        );
    }

    const padding = '='.repeat((4 - (input.length % 4)) % 4);
    const base64 = input.replace(/-/g, '+').replace(/_/g, '/') + padding;
    const decoded = Buffer.from(base64, 'base64');

    if (encodeBase64URL(decoded) !== input) {
        throw new Base64URLDecodeError(
            'Invalid base64url: non-canonical trailing bits'
        );
    }

    return decoded;
}
