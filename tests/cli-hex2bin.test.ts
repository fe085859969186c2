import { runHex2Bin, parseHex2BinArgs, type Hex2BinIO } from '../src/cli/hex2bin.js';
import { IMAGE_CODECS } from '../src/ihex/image-codecs.js';
import { IntelHexError } from '../src/ihex/errors.js';
import { unzstd } from './helpers/test-utils.js';

const SOURCE = [':021000000102EB', ':0110040005E6', ':00000001FF', ''].join('\n');

function memoryIO(input: string): Hex2BinIO & { written: Map<string, Uint8Array>; stderr: string[]; sources: Array<string | null> } {
    const written = new Map<string, Uint8Array>();
    const stderr: string[] = [];
    const sources: Array<string | null> = [];
    return {
        written,
        stderr,
        sources,
        async read(src) {
            sources.push(src);
            return input;
        },
        async write(dest, data) {
            written.set(dest ?? '<stdout>', data);
        },
        error(msg) {
            stderr.push(msg);
        },
    };
}

describe('hex2bin', () => {

    describe('arguments', () => {
        it('defaults to stdin, stdout, 0xFF fill and a raw image', () => {
            const options = parseHex2BinArgs([], {});
            expect(options).toEqual({
                src: null,
                dest: null,
                fill: 0xFF,
                codec: IMAGE_CODECS.none,
                level: undefined,
                verbose: false,
            });
        });

        it('reads flags and positionals in any order', () => {
            const options = parseHex2BinArgs(['in.hex', '--fill', '0x00', '--codec', 'zstd', 'out.bin', '--level', '9', '-v'], {});
            expect(options.src).toBe('in.hex');
            expect(options.dest).toBe('out.bin');
            expect(options.fill).toBe(0);
            expect(options.codec).toBe(IMAGE_CODECS.zstd);
            expect(options.level).toBe(9);
            expect(options.verbose).toBe(true);
        });

        it('falls back to environment variables', () => {
            const options = parseHex2BinArgs([], { IHEX_FILL_BYTE: '0', IHEX_CODEC: 'zstd' });
            expect(options.fill).toBe(0);
            expect(options.codec).toBe(IMAGE_CODECS.zstd);
        });

        it('treats empty environment variables as unset', () => {
            const options = parseHex2BinArgs([], { IHEX_FILL_BYTE: '', IHEX_CODEC: '  ' });
            expect(options.fill).toBe(0xFF);
            expect(options.codec).toBe(IMAGE_CODECS.none);
        });

        it('prefers flags over the environment', () => {
            expect(parseHex2BinArgs(['--fill', '255'], { IHEX_FILL_BYTE: '0' }).fill).toBe(0xFF);
        });

        it('rejects bad input', () => {
            expect(() => parseHex2BinArgs(['--fill', '0x100'], {})).toThrow('Invalid fill byte "0x100"');
            expect(() => parseHex2BinArgs(['--fill', ''], {})).toThrow(IntelHexError);
            expect(() => parseHex2BinArgs(['--level', '0'], {})).toThrow('Invalid compression level "0" (1-22)');
            expect(() => parseHex2BinArgs(['--fill'], {})).toThrow('Option --fill needs a value');
            expect(() => parseHex2BinArgs(['--force'], {})).toThrow('Unknown option --force');
            expect(() => parseHex2BinArgs(['a', 'b', 'c'], {})).toThrow('Too many arguments: expected [src] [dest], got 3');
        });
    });

    describe('run', () => {
        it('writes the flat image to stdout', async () => {
            const io = memoryIO(SOURCE);
            expect(await runHex2Bin([], io, {})).toBe(0);
            expect(io.sources).toEqual([null]);
            expect([...(io.written.get('<stdout>') ?? [])]).toEqual([1, 2, 0xFF, 0xFF, 5]);
            expect(io.stderr).toEqual([]);
        });

        it('writes to the named destination with the chosen fill', async () => {
            const io = memoryIO(SOURCE);
            expect(await runHex2Bin(['in.hex', 'out.bin', '--fill', '0'], io, {})).toBe(0);
            expect(io.sources).toEqual(['in.hex']);
            expect([...(io.written.get('out.bin') ?? [])]).toEqual([1, 2, 0, 0, 5]);
        });

        it('compresses the image with zstd', async () => {
            const io = memoryIO(SOURCE);
            expect(await runHex2Bin(['--codec', 'zstd'], io, {})).toBe(0);
            const output = io.written.get('<stdout>') ?? new Uint8Array(0);
            const restored = await unzstd(output);
            expect([...restored]).toEqual([1, 2, 0xFF, 0xFF, 5]);
        });

        it('logs progress when verbose', async () => {
            const io = memoryIO(SOURCE);
            expect(await runHex2Bin(['--verbose'], io, {})).toBe(0);
            expect(io.stderr).toEqual([
                '[ihex] 2 segments scanned\n',
                '[ihex] image 0x00001000, 5 bytes\n',
                '[ihex] wrote 5 bytes (none)\n',
            ]);
        });

        it('fails when no segments are found', async () => {
            const io = memoryIO(':00000001FF\n');
            expect(await runHex2Bin([], io, {})).toBe(1);
            expect(io.stderr).toEqual(['No segments found.\n']);
            expect(io.written.size).toBe(0);
        });

        it('fails when the EOF record is missing', async () => {
            const io = memoryIO(':021000000102EB\n');
            expect(await runHex2Bin([], io, {})).toBe(1);
            expect(io.stderr).toEqual(['Error scanning source: unexpected end of stream: missing end-of-file record\n']);
        });

        it('fails on a bad argument before reading input', async () => {
            const io = memoryIO(SOURCE);
            expect(await runHex2Bin(['--codec', 'lz4'], io, {})).toBe(1);
            expect(io.sources).toEqual([]);
            expect(io.stderr).toEqual(['Unknown image codec "lz4" (expected one of: none, zstd)\n']);
        });

        it('reports source read failures', async () => {
            const io = memoryIO(SOURCE);
            io.read = async () => { throw new Error('permission denied'); };
            expect(await runHex2Bin(['in.hex'], io, {})).toBe(1);
            expect(io.stderr).toEqual(['Error opening source file: permission denied\n']);
        });

        it('reports destination write failures', async () => {
            const io = memoryIO(SOURCE);
            io.write = async () => { throw new Error('disk full'); };
            expect(await runHex2Bin([], io, {})).toBe(1);
            expect(io.stderr).toEqual(['Error writing to destination: disk full\n']);
        });
    });
});
