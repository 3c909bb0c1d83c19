import { createAtrImage } from 'js/formats/atr';
import {
    AtariDOSVolume,
    formatVolume,
} from 'js/formats/atari_dos/atari_dos_volume';
import { GeometryName, MemoryImage } from 'js/formats/types';

export interface TestVolume {
    image: MemoryImage;
    volume: AtariDOSVolume;
}

/** Returns a freshly formatted, empty in-memory volume. */
export function blankVolume(geometry: GeometryName = 'standard'): TestVolume {
    const image = new MemoryImage(createAtrImage(geometry));
    const volume = formatVolume(image);
    return { image, volume };
}

/**
 * Returns `length` bytes of a repeating pattern that never contains the
 * ATASCII end of line character.
 */
export function patternData(length: number, seed = 0): Uint8Array {
    const data = new Uint8Array(length);
    for (let idx = 0; idx < length; idx++) {
        data[idx] = (idx * 7 + seed) % 0x9b;
    }
    return data;
}

/** Encodes ASCII text. */
export function text(value: string): Uint8Array {
    return new Uint8Array([...value].map((c) => c.charCodeAt(0)));
}

/** Returns whatever `fn` throws, or undefined. */
export function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}
