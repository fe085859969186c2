import { RecordType, MAX_DATA_LENGTH } from './format.js';
import { createRecord, formatRecordLine, EOF_RECORD, type IntelHexRecord } from './record.js';
import { FormatError } from './errors.js';
import type { FormatOptions } from './types.js';

/**
 * Contiguous, absolutely addressed run of bytes resolved from one Data record.
 */
export interface Segment {
    /** Absolute 32-bit address. */
    address: number;
    data: Uint8Array;
}

export function compareSegments(a: Segment, b: Segment): number {
    return a.address - b.address;
}

/**
 * Returns a copy ordered by ascending address. Equal addresses keep their input order.
 */
export function sortSegments(segments: readonly Segment[]): Segment[] {
    return [...segments].sort(compareSegments);
}

/**
 * Bytes covered from the first segment's address to the end of the last one.
 * Assumes ascending, non-overlapping order; sort first.
 */
export function spanSize(segments: readonly Segment[]): number {
    if (segments.length === 0) return 0;
    if (segments.length === 1) return segments[0].data.length;

    const first = segments[0];
    const last = segments[segments.length - 1];
    return (last.address + last.data.length) - first.address;
}

/**
 * Inverse of scanning: Data records in address order, each preceded by an
 * Extended Linear Address record whenever the upper 16 bits change, then EOF.
 */
export function segmentsToRecords(segments: readonly Segment[]): IntelHexRecord[] {
    const records: IntelHexRecord[] = [];
    let linearBase = 0;

    for (const seg of sortSegments(segments)) {
        if (seg.data.length > MAX_DATA_LENGTH) {
            throw new FormatError(
                `segment at 0x${seg.address.toString(16).toUpperCase()} holds ${seg.data.length} bytes; a record carries at most ${MAX_DATA_LENGTH}`
            );
        }
        if (!Number.isInteger(seg.address) || seg.address < 0 || seg.address > 0xFFFFFFFF) {
            throw new FormatError(`segment address ${seg.address} is not a 32-bit address`);
        }

        const base = Math.floor(seg.address / 0x10000);
        if (base !== linearBase) {
            linearBase = base;
            records.push(createRecord(
                RecordType.ExtendedLinearAddress,
                0,
                new Uint8Array([(base >> 8) & 0xFF, base & 0xFF])
            ));
        }

        records.push(createRecord(RecordType.Data, seg.address % 0x10000, seg.data));
    }

    records.push({ ...EOF_RECORD });
    return records;
}

/**
 * Serializes segments to Intel HEX text, one uppercase record per line.
 */
export function formatSegments(segments: readonly Segment[], options: FormatOptions = {}): string {
    const lineEnding = options.lineEnding ?? '\n';

    let out = '';
    for (const record of segmentsToRecords(segments)) {
        out += formatRecordLine(record) + lineEnding;
    }
    return out;
}
