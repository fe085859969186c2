/**
 * Intel HEX Utilities
 *
 * @module ihex
 *
 * Hex text <-> byte conversion shared by the record line helpers.
 */

import { FormatError } from './ihex/errors.js';

const HEX_TEXT = /^[0-9a-fA-F]*$/;

/**
 * Decode hex digit text (either case) into bytes.
 * Odd-length text or any non-hex character is a FormatError.
 */
export function hexToBytes(text: string): Uint8Array {
    if (text.length % 2 !== 0) {
        throw new FormatError(`odd length hex text (${text.length} characters)`);
    }
    if (!HEX_TEXT.test(text)) {
        throw new FormatError(`invalid hex text "${text}"`);
    }

    const out = new Uint8Array(text.length / 2);
    for (let i = 0; i < out.length; i++) {
        out[i] = Number.parseInt(text.slice(i * 2, i * 2 + 2), 16);
    }
    return out;
}

/**
 * Encode bytes as uppercase hex text.
 */
export function bytesToHex(bytes: Uint8Array): string {
    let out = '';
    for (const b of bytes) {
        out += b.toString(16).toUpperCase().padStart(2, '0');
    }
    return out;
}
