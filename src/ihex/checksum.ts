/**
 * Two's-complement record checksum: the byte that makes the sum of the
 * record (checksum included) zero modulo 256.
 */
export function checksum(bytes: Uint8Array): number {
    let sum = 0;
    for (const b of bytes) {
        sum = (sum + b) & 0xFF;
    }
    return (-sum) & 0xFF;
}
