import {
    START_CODE, RecordType, RECORD_OVERHEAD, MAX_DATA_LENGTH, MAX_RECORD_ADDRESS,
    EXTENDED_ADDRESS_DATA_LENGTH, isRecordType, isExtendedAddressType
} from './format.js';
import { checksum } from './checksum.js';
import { ChecksumError, InvalidRecordTypeError, FormatError, ByteCountMismatchError } from './errors.js';
import { hexToBytes, bytesToHex } from '../ihex-utils.js';

/**
 * One decoded line of an Intel HEX stream.
 */
export interface IntelHexRecord {
    /** Declared data length (u8). */
    byteCount: number;
    /** 16-bit offset within the current bank. */
    address: number;
    recordType: RecordType;
    data: Uint8Array;
    checksum: number;
}

/**
 * Sequential big-endian reader over one record's bytes. Every read that runs
 * past the end is a FormatError naming the field.
 */
class FieldReader {
    private readonly view: DataView;
    private pos: number = 0;

    constructor(private readonly bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get remaining(): number {
        return this.bytes.length - this.pos;
    }

    uint8(field: string): number {
        this.require(1, field);
        return this.view.getUint8(this.pos++);
    }

    uint16(field: string): number {
        this.require(2, field);
        const value = this.view.getUint16(this.pos, false);
        this.pos += 2;
        return value;
    }

    take(length: number, field: string): Uint8Array {
        this.require(length, field);
        const out = this.bytes.slice(this.pos, this.pos + length);
        this.pos += length;
        return out;
    }

    private require(length: number, field: string): void {
        if (this.remaining < length) {
            throw new FormatError(
                `error decoding ${field} field: need ${length} bytes but only ${this.remaining} left`
            );
        }
    }
}

/**
 * Decodes one record from its raw bytes:
 * count(1) address(2, BE) type(1) data(count) checksum(1), exactly 5 + count bytes.
 *
 * @throws FormatError on underflow, trailing bytes or a bad extension byte count
 * @throws InvalidRecordTypeError when the type byte is 0x06 or above
 * @throws ChecksumError when the checksum field does not match
 */
export function decodeRecord(bytes: Uint8Array): IntelHexRecord {
    const reader = new FieldReader(bytes);

    const byteCount = reader.uint8('byte count');
    const address = reader.uint16('address');
    const recordType = reader.uint8('record type');
    if (!isRecordType(recordType)) {
        throw new InvalidRecordTypeError(recordType);
    }
    assertExtendedByteCount(recordType, byteCount);

    const data = reader.take(byteCount, 'data');
    const recordChecksum = reader.uint8('checksum');

    if (reader.remaining !== 0) {
        throw new FormatError(`unexpected ${reader.remaining} trailing bytes`);
    }

    const calculated = checksum(bytes.subarray(0, bytes.length - 1));
    if (calculated !== recordChecksum) {
        throw new ChecksumError(recordChecksum, calculated);
    }

    return { byteCount, address, recordType, data, checksum: recordChecksum };
}

/**
 * Serializes a record, computing the checksum over the bytes just written.
 * The record's own `checksum` field is not consulted.
 */
export function encodeRecord(record: Readonly<IntelHexRecord>): Uint8Array {
    const { byteCount, address, recordType, data } = record;

    if (!isRecordType(recordType)) {
        throw new InvalidRecordTypeError(recordType);
    }
    if (!Number.isInteger(byteCount) || byteCount < 0 || byteCount > MAX_DATA_LENGTH) {
        throw new FormatError(`byte count ${byteCount} does not fit in one record (max ${MAX_DATA_LENGTH})`);
    }
    if (!Number.isInteger(address) || address < 0 || address > MAX_RECORD_ADDRESS) {
        throw new FormatError(`record address ${address} is outside 0x0000-0xFFFF`);
    }
    if (data.length !== byteCount) {
        throw new ByteCountMismatchError(byteCount, data.length);
    }
    assertExtendedByteCount(recordType, byteCount);

    const out = new Uint8Array(RECORD_OVERHEAD + byteCount);
    const view = new DataView(out.buffer);

    let pos = 0;
    view.setUint8(pos++, byteCount);
    view.setUint16(pos, address, false); pos += 2;
    view.setUint8(pos++, recordType);
    out.set(data, pos); pos += byteCount;
    view.setUint8(pos, checksum(out.subarray(0, pos)));

    return out;
}

/**
 * Builds a record around a private copy of `data`, with byte count and
 * checksum filled in.
 */
export function createRecord(recordType: RecordType, address: number, data: Uint8Array): IntelHexRecord {
    const record: IntelHexRecord = {
        byteCount: data.length,
        address,
        recordType,
        data: data.slice(),
        checksum: 0,
    };
    const encoded = encodeRecord(record);
    record.checksum = encoded[encoded.length - 1];
    return record;
}

export const EOF_RECORD: Readonly<IntelHexRecord> = Object.freeze(
    createRecord(RecordType.EndOfFile, 0, new Uint8Array(0))
);

/**
 * Decodes one text line (`:` followed by hex digits, either case).
 */
export function parseRecordLine(line: string): IntelHexRecord {
    if (line.charAt(0) !== START_CODE) {
        const got = line.length === 0 ? 'end of line' : `'${line.charAt(0)}'`;
        throw new FormatError(`expected start code '${START_CODE}' but got ${got}`);
    }
    return decodeRecord(hexToBytes(line.slice(START_CODE.length)));
}

export function formatRecordLine(record: Readonly<IntelHexRecord>): string {
    return START_CODE + bytesToHex(encodeRecord(record));
}

function assertExtendedByteCount(recordType: RecordType, byteCount: number): void {
    if (isExtendedAddressType(recordType) && byteCount !== EXTENDED_ADDRESS_DATA_LENGTH) {
        const kind = recordType === RecordType.ExtendedSegmentAddress ? 'segment' : 'linear';
        throw new FormatError(
            `expected extended ${kind} address record to have byte count of 0x02 but got 0x${byteCount.toString(16).toUpperCase().padStart(2, '0')}`
        );
    }
}
