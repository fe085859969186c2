import { sortSegments, type Segment } from './segments.js';
import { EmptyImageError, IntelHexError } from './errors.js';
import type { ImageOptions } from './types.js';

export interface FlatImage {
    /** Absolute address of `data[0]`. */
    baseAddress: number;
    data: Uint8Array;
}

/**
 * Lays segments out in one buffer spanning lowest to highest address.
 * Gaps hold the fill byte; where segments overlap, the later one in address
 * order wins.
 */
export function buildImage(segments: readonly Segment[], options: ImageOptions = {}): FlatImage {
    const fill = options.fill ?? 0xFF;

    if (!Number.isInteger(fill) || fill < 0 || fill > 0xFF) {
        throw new IntelHexError(`fill byte ${fill} is outside 0x00-0xFF`);
    }
    if (segments.length === 0) {
        throw new EmptyImageError();
    }

    const sorted = sortSegments(segments);
    const baseAddress = sorted[0].address;
    // With overlap, an earlier segment may end past the last one.
    let end = baseAddress;
    for (const seg of sorted) {
        end = Math.max(end, seg.address + seg.data.length);
    }
    const data = new Uint8Array(end - baseAddress).fill(fill);

    for (const seg of sorted) {
        data.set(seg.data, seg.address - baseAddress);
    }

    return { baseAddress, data };
}
