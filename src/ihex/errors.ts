export class IntelHexError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'IntelHexError';
    }
}

/**
 * Record checksum field does not match the checksum recomputed over its bytes.
 */
export class ChecksumError extends IntelHexError {
    constructor(public readonly expected: number, public readonly calculated: number) {
        super(`expected checksum 0x${hex2(expected)} but calculated 0x${hex2(calculated)}`);
        this.name = 'ChecksumError';
    }
}

export class InvalidRecordTypeError extends IntelHexError {
    constructor(public readonly recordType: number) {
        super(`invalid record type 0x${hex2(recordType)}`);
        this.name = 'InvalidRecordTypeError';
    }
}

/**
 * Malformed layout: bad start code, bad hex text, short or long records,
 * wrong byte count for the record type.
 */
export class FormatError extends IntelHexError {
    constructor(message: string) {
        super(message);
        this.name = 'FormatError';
    }
}

export class ByteCountMismatchError extends FormatError {
    constructor(public readonly byteCount: number, public readonly dataLength: number) {
        super(`byte count was ${byteCount} but data length was ${dataLength}`);
        this.name = 'ByteCountMismatchError';
    }
}

/** Line source ran out before an end-of-file record was seen. */
export class IncompleteStreamError extends FormatError {
    constructor(message: string = 'unexpected end of stream: missing end-of-file record') {
        super(message);
        this.name = 'IncompleteStreamError';
    }
}

export class EmptyImageError extends IntelHexError {
    constructor(message: string = 'No segments found.') {
        super(message);
        this.name = 'EmptyImageError';
    }
}

function hex2(value: number): string {
    return value.toString(16).toUpperCase().padStart(2, '0');
}
