export const START_CODE = ':';

export enum RecordType {
    Data = 0x00,
    EndOfFile = 0x01,
    ExtendedSegmentAddress = 0x02, // base = value << 4
    StartSegmentAddress = 0x03,    // CS:IP
    ExtendedLinearAddress = 0x04,  // base = value << 16
    StartLinearAddress = 0x05,     // EIP
}

export const RECORD_TYPE_COUNT = 0x06;

// Record layout:
// [byte_count (u8)] [address (u16 BE)] [record_type (u8)] [data (byte_count)] [checksum (u8)]
export const RECORD_HEADER_SIZE = 1 + 2 + 1;
export const RECORD_OVERHEAD = RECORD_HEADER_SIZE + 1;

export const MAX_DATA_LENGTH = 0xFF;
export const MAX_RECORD_ADDRESS = 0xFFFF;
export const EXTENDED_ADDRESS_DATA_LENGTH = 2;

export function isRecordType(value: number): value is RecordType {
    return Number.isInteger(value) && value >= 0 && value < RECORD_TYPE_COUNT;
}

export function isExtendedAddressType(recordType: RecordType): boolean {
    return recordType === RecordType.ExtendedSegmentAddress
        || recordType === RecordType.ExtendedLinearAddress;
}
