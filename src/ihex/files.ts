import * as fs from 'fs/promises';
import { scanSegments, splitLines } from './scanner.js';
import { formatSegments, type Segment } from './segments.js';
import type { ScannerOptions, FormatOptions } from './types.js';

/**
 * Reads an Intel HEX file and returns its segments in file order.
 */
export async function readHexFile(filePath: string, options: ScannerOptions = {}): Promise<Segment[]> {
    const text = await fs.readFile(filePath, 'latin1');
    return scanSegments(splitLines(text), options);
}

/**
 * Writes segments to an Intel HEX file (address order, EOF record last).
 */
export async function writeHexFile(filePath: string, segments: readonly Segment[], options: FormatOptions = {}): Promise<void> {
    await fs.writeFile(filePath, formatSegments(segments, options), 'latin1');
}
