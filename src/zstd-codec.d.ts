// zstd-codec ships no type declarations and has no @types package.
declare module 'zstd-codec' {
    export interface ZstdSimple {
        /** Returns null when the frame cannot be produced. */
        compress(data: Uint8Array, level?: number): Uint8Array | null;
        decompress(data: Uint8Array): Uint8Array | null;
    }

    export interface ZstdModule {
        Simple: new () => ZstdSimple;
    }

    export const ZstdCodec: {
        run(onReady: (zstd: ZstdModule) => void): void;
    };
}
