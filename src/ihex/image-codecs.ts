import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { IntelHexError } from './errors.js';

export type ImageCodecName = 'none' | 'zstd';

/**
 * Encoding applied to a flat image before it is written.
 */
export interface ImageCodec {
    name: ImageCodecName;
    encode(image: Uint8Array, level?: number): Promise<Uint8Array>;
}

const rawCodec: ImageCodec = {
    name: 'none',
    async encode(image) {
        return image;
    },
};

let zstdModule: Promise<ZstdModule> | null = null;

// The wasm module loads once, on first use.
function loadZstd(): Promise<ZstdModule> {
    if (!zstdModule) {
        zstdModule = new Promise((resolve) => ZstdCodec.run(resolve));
    }
    return zstdModule;
}

const zstdCodec: ImageCodec = {
    name: 'zstd',
    async encode(image, level = 3) {
        const zstd = await loadZstd();
        const frame = new zstd.Simple().compress(image, level);
        if (!frame) {
            throw new IntelHexError(`zstd could not encode ${image.length} bytes at level ${level}`);
        }
        return frame;
    },
};

/** Codecs selectable with `--codec` / IHEX_CODEC, keyed by name. */
export const IMAGE_CODECS: Readonly<Record<ImageCodecName, ImageCodec>> = {
    none: rawCodec,
    zstd: zstdCodec,
};

function isImageCodecName(name: string): name is ImageCodecName {
    return Object.prototype.hasOwnProperty.call(IMAGE_CODECS, name);
}

/**
 * Resolves a codec name, ignoring case.
 */
export function imageCodecByName(name: string): ImageCodec {
    const key = name.toLowerCase();
    if (!isImageCodecName(key)) {
        const known = Object.keys(IMAGE_CODECS).join(', ');
        throw new IntelHexError(`Unknown image codec "${name}" (expected one of: ${known})`);
    }
    return IMAGE_CODECS[key];
}
