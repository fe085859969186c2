/**
 * ihex-kit Public API
 *
 * @module ihex
 */

import { scanSegments, splitLines, type HexLine } from './ihex/scanner.js';
import { formatSegments, sortSegments, type Segment } from './ihex/segments.js';
import { buildImage, type FlatImage } from './ihex/image.js';
import type { ScannerOptions, FormatOptions, ImageOptions } from './ihex/types.js';

export { START_CODE, RecordType, RECORD_TYPE_COUNT, isRecordType } from './ihex/format.js';
export { checksum } from './ihex/checksum.js';
export {
    decodeRecord, encodeRecord, createRecord, parseRecordLine, formatRecordLine, EOF_RECORD
} from './ihex/record.js';
export type { IntelHexRecord } from './ihex/record.js';
export { SegmentScanner, scanSegments, splitLines } from './ihex/scanner.js';
export type { AddressBase, HexLine } from './ihex/scanner.js';
export { compareSegments, sortSegments, spanSize, segmentsToRecords, formatSegments } from './ihex/segments.js';
export type { Segment } from './ihex/segments.js';
export { buildImage } from './ihex/image.js';
export type { FlatImage } from './ihex/image.js';
export { IMAGE_CODECS, imageCodecByName } from './ihex/image-codecs.js';
export type { ImageCodec, ImageCodecName } from './ihex/image-codecs.js';
export { readHexFile, writeHexFile } from './ihex/files.js';
export {
    IntelHexError, ChecksumError, InvalidRecordTypeError, FormatError,
    ByteCountMismatchError, IncompleteStreamError, EmptyImageError
} from './ihex/errors.js';
export type { IntelHexLogger, ScannerOptions, FormatOptions, ImageOptions } from './ihex/types.js';
export { hexToBytes, bytesToHex } from './ihex-utils.js';

// The IntelHex Namespace Object
export const IntelHex = {
    /**
     * Scans Intel HEX text (or any line source) into segments, in stream order.
     */
    parse: (input: string | Iterable<HexLine>, options?: ScannerOptions): Segment[] => {
        return scanSegments(typeof input === 'string' ? splitLines(input) : input, options);
    },

    /**
     * Serializes segments back to Intel HEX text.
     */
    stringify: (segments: readonly Segment[], options?: FormatOptions): string => {
        return formatSegments(segments, options);
    },

    /**
     * Parses Intel HEX text and lays it out as one flat image.
     */
    toImage: (input: string | Iterable<HexLine>, options?: ScannerOptions & ImageOptions): FlatImage => {
        const lines = typeof input === 'string' ? splitLines(input) : input;
        const segments = scanSegments(lines, { logger: options?.logger });
        return buildImage(segments, { fill: options?.fill });
    },

    /**
     * Returns segments ordered by address (stable copy).
     */
    sort: (segments: readonly Segment[]): Segment[] => sortSegments(segments),
};
