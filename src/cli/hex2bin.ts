/**
 * hex2bin: converts an Intel HEX stream into one flat binary image.
 *
 * Usage:  hex2bin [--fill 0xNN] [--codec none|zstd] [--level N] [--verbose] [src] [dest]
 *
 * Missing `src` reads stdin, missing `dest` writes stdout. Gaps between
 * segments are filled with the fill byte (default 0xFF, env IHEX_FILL_BYTE).
 * The image is written raw or zstd-compressed (env IHEX_CODEC).
 */

import * as fs from 'fs/promises';
import { scanSegments, splitLines } from '../ihex/scanner.js';
import { buildImage, type FlatImage } from '../ihex/image.js';
import { imageCodecByName, type ImageCodec } from '../ihex/image-codecs.js';
import { IntelHexError } from '../ihex/errors.js';
import type { Segment } from '../ihex/segments.js';
import type { IntelHexLogger } from '../ihex/types.js';

export interface Hex2BinOptions {
    src: string | null;
    dest: string | null;
    fill: number;
    codec: ImageCodec;
    level: number | undefined;
    verbose: boolean;
}

export interface Hex2BinIO {
    /** Reads the whole source; `null` means stdin. */
    read(src: string | null): Promise<string>;
    /** Writes the whole image; `null` means stdout. */
    write(dest: string | null, data: Uint8Array): Promise<void>;
    /** Diagnostic output (stderr). */
    error(msg: string): void;
}

export const nodeIO: Hex2BinIO = {
    async read(src) {
        if (src !== null) return fs.readFile(src, 'latin1');
        const chunks: Buffer[] = [];
        for await (const chunk of process.stdin) {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
        }
        return Buffer.concat(chunks).toString('latin1');
    },
    async write(dest, data) {
        if (dest !== null) {
            await fs.writeFile(dest, data);
            return;
        }
        await new Promise<void>((resolve, reject) => {
            process.stdout.write(data, (err) => (err ? reject(err) : resolve()));
        });
    },
    error(msg) {
        process.stderr.write(msg);
    },
};

const VALUE_FLAGS = new Set(['fill', 'codec', 'level']);

// An exported but blank variable counts as unset.
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

/**
 * Parses command-line flags, falling back to IHEX_FILL_BYTE / IHEX_CODEC.
 */
export function parseHex2BinArgs(args: readonly string[], env: NodeJS.ProcessEnv = process.env): Hex2BinOptions {
    const flags = new Map<string, string>();
    const positionals: string[] = [];
    let verbose = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--verbose' || arg === '-v') {
            verbose = true;
            continue;
        }
        if (arg.startsWith('--') && arg.length > 2) {
            const name = arg.slice(2);
            if (!VALUE_FLAGS.has(name)) {
                throw new IntelHexError(`Unknown option ${arg}`);
            }
            const value = args[i + 1];
            if (value === undefined) {
                throw new IntelHexError(`Option ${arg} needs a value`);
            }
            flags.set(name, value);
            i++;
            continue;
        }
        positionals.push(arg);
    }

    if (positionals.length > 2) {
        throw new IntelHexError(`Too many arguments: expected [src] [dest], got ${positionals.length}`);
    }

    const fillText = flags.get('fill') ?? envValue(env, 'IHEX_FILL_BYTE') ?? '0xFF';
    const fill = Number(fillText);
    if (fillText.trim() === '' || !Number.isInteger(fill) || fill < 0 || fill > 0xFF) {
        throw new IntelHexError(`Invalid fill byte "${fillText}"`);
    }

    const levelText = flags.get('level');
    let level: number | undefined;
    if (levelText !== undefined) {
        level = Number(levelText);
        if (!Number.isInteger(level) || level < 1 || level > 22) {
            throw new IntelHexError(`Invalid compression level "${levelText}" (1-22)`);
        }
    }

    return {
        src: positionals[0] ?? null,
        dest: positionals[1] ?? null,
        fill,
        codec: imageCodecByName(flags.get('codec') ?? envValue(env, 'IHEX_CODEC') ?? 'none'),
        level,
        verbose,
    };
}

/**
 * Runs the tool and returns the process exit code.
 */
export async function runHex2Bin(
    args: readonly string[],
    io: Hex2BinIO = nodeIO,
    env: NodeJS.ProcessEnv = process.env
): Promise<number> {
    const fatal = (prefix: string, e: unknown): number => {
        const msg = e instanceof Error ? e.message : String(e);
        io.error(prefix ? `${prefix}: ${msg}\n` : `${msg}\n`);
        return 1;
    };

    let options: Hex2BinOptions;
    try {
        options = parseHex2BinArgs(args, env);
    } catch (e) {
        return fatal('', e);
    }

    const logger: IntelHexLogger | null = options.verbose
        ? {
            info: (msg) => io.error(`[ihex] ${msg}\n`),
            warn: (msg) => io.error(`[ihex] WARN ${msg}\n`),
            error: (msg) => io.error(`[ihex] ERROR ${msg}\n`),
        }
        : null;

    let text: string;
    try {
        text = await io.read(options.src);
    } catch (e) {
        return fatal('Error opening source file', e);
    }

    let segments: Segment[];
    try {
        segments = scanSegments(splitLines(text), { logger });
    } catch (e) {
        return fatal('Error scanning source', e);
    }
    logger?.info?.(`${segments.length} segments scanned`);

    let image: FlatImage;
    try {
        image = buildImage(segments, { fill: options.fill });
    } catch (e) {
        return fatal('', e);
    }

    logger?.info?.(
        `image 0x${image.baseAddress.toString(16).toUpperCase().padStart(8, '0')}, ${image.data.length} bytes`
    );

    let output: Uint8Array;
    try {
        output = await options.codec.encode(image.data, options.level);
    } catch (e) {
        return fatal('Error encoding image', e);
    }

    try {
        await io.write(options.dest, output);
    } catch (e) {
        return fatal('Error writing to destination', e);
    }

    logger?.info?.(`wrote ${output.length} bytes (${options.codec.name})`);
    return 0;
}
