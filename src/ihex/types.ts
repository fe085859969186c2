export type IntelHexLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type ScannerOptions = {
    /** Optional logger hook; library code never writes to the console itself. */
    logger?: IntelHexLogger | null;
};

export type FormatOptions = {
    /** Terminator written after every record line. Default `'\n'`. */
    lineEnding?: '\n' | '\r\n';
};

export type ImageOptions = {
    /** Byte written into gaps between segments (0-255). Default 0xFF. */
    fill?: number;
};
