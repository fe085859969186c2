import { RecordType } from './format.js';
import { parseRecordLine, type IntelHexRecord } from './record.js';
import { IntelHexError, IncompleteStreamError } from './errors.js';
import type { Segment } from './segments.js';
import type { ScannerOptions } from './types.js';

/** One line from a line source; byte lines are read as latin1 text. */
export type HexLine = string | Uint8Array;

/**
 * Active address extension. Setting one kind always replaces the other.
 */
export type AddressBase =
    | { kind: 'none' }
    | { kind: 'segmented'; base: number }
    | { kind: 'linear'; base: number };

const NO_BASE: AddressBase = { kind: 'none' };

/**
 * Pull-based scanner turning Intel HEX lines into absolutely addressed segments.
 *
 * ```ts
 * const scanner = new SegmentScanner(splitLines(text));
 * while (scanner.scan()) use(scanner.segment);
 * if (scanner.err) throw scanner.err;
 * ```
 *
 * The source is opened on the first `scan()`. The first error, including one
 * thrown while opening the source, is terminal and sticky. Lines after the
 * end-of-file record are never read.
 */
export class SegmentScanner implements Iterable<Segment> {
    private readonly source: Iterable<HexLine>;
    private lines: Iterator<HexLine> | null = null;
    private readonly options: Required<ScannerOptions>;
    private base: AddressBase = NO_BASE;
    private current: Segment | null = null;
    private firstErr: Error | null = null;
    private finished: boolean = false;
    private lineNumber: number = 0;

    constructor(source: Iterable<HexLine>, options: ScannerOptions = {}) {
        this.source = source;
        this.options = {
            logger: options.logger ?? null,
        };
    }

    get err(): Error | null {
        return this.firstErr;
    }

    get addressBase(): AddressBase {
        return this.base;
    }

    /**
     * Segment produced by the last successful `scan()`.
     */
    get segment(): Segment {
        if (!this.current) {
            throw new IntelHexError('no segment available: scan() has not returned true');
        }
        return this.current;
    }

    /**
     * Advances to the next Data record. Returns false at the end-of-file
     * record or on error; check `err` to tell them apart.
     */
    scan(): boolean {
        this.current = null;
        if (this.finished) return false;

        for (;;) {
            let next: IteratorResult<HexLine>;
            try {
                if (!this.lines) this.lines = this.source[Symbol.iterator]();
                next = this.lines.next();
            } catch (e) {
                return this.fail(e instanceof Error ? e : new IntelHexError(`line source failed: ${String(e)}`, e));
            }
            if (next.done) {
                return this.fail(new IncompleteStreamError());
            }

            this.lineNumber++;
            const line = typeof next.value === 'string' ? next.value : Buffer.from(next.value).toString('latin1');
            if (line.length === 0) continue;

            let record: IntelHexRecord;
            try {
                record = parseRecordLine(line);
            } catch (e) {
                return this.fail(e instanceof Error ? e : new IntelHexError(String(e), e));
            }

            switch (record.recordType) {
                case RecordType.Data:
                    this.current = {
                        address: this.effectiveBase() + record.address,
                        data: record.data.slice(),
                    };
                    return true;

                case RecordType.EndOfFile:
                    this.finished = true;
                    return false;

                case RecordType.ExtendedSegmentAddress:
                    this.base = { kind: 'segmented', base: readUint16(record.data) * 0x10 };
                    break;

                case RecordType.ExtendedLinearAddress:
                    this.base = { kind: 'linear', base: readUint16(record.data) * 0x10000 };
                    break;

                case RecordType.StartSegmentAddress:
                case RecordType.StartLinearAddress:
                    this.options.logger?.info?.(
                        `line ${this.lineNumber}: start address record ignored (type 0x0${record.recordType})`
                    );
                    break;
            }
        }
    }

    *[Symbol.iterator](): Iterator<Segment> {
        while (this.scan()) {
            yield this.segment;
        }
        if (this.firstErr) {
            throw this.firstErr;
        }
    }

    private effectiveBase(): number {
        return this.base.kind === 'none' ? 0 : this.base.base;
    }

    private fail(err: Error): false {
        this.firstErr = err;
        this.finished = true;
        const where = err instanceof IncompleteStreamError ? 'end of input' : `line ${this.lineNumber}`;
        this.options.logger?.error?.(`scan stopped at ${where}: ${err.message}`);
        return false;
    }
}

function readUint16(data: Uint8Array): number {
    return (data[0] << 8) | data[1];
}

/**
 * Scans every segment of a stream, throwing the terminal error if any.
 */
export function scanSegments(source: Iterable<HexLine>, options: ScannerOptions = {}): Segment[] {
    return [...new SegmentScanner(source, options)];
}

/**
 * Lazy line source over text, splitting on `\n`, `\r\n` or `\r`.
 */
export function* splitLines(text: string): Generator<string> {
    let start = 0;
    for (let i = 0; i < text.length; i++) {
        const ch = text.charCodeAt(i);
        if (ch === 0x0A || ch === 0x0D) {
            yield text.slice(start, i);
            if (ch === 0x0D && text.charCodeAt(i + 1) === 0x0A) i++;
            start = i + 1;
        }
    }
    if (start < text.length) {
        yield text.slice(start);
    }
}
