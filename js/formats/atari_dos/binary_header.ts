import type { word } from '../../types';

/**
 * Load information for an Atari DOS binary load file. These are only
 * guesses for display purposes.
 */
export interface BinaryInfo {
    loadStart: word;
    loadEnd: word;
    init?: word;
    run?: word;
}

/** Binary load files begin with $FFFF */
const BINARY_MAGIC = 0xff;

/** INITAD segment header: load $02E2..$02E3 */
const INITAD = [0xe2, 0x02, 0xe3, 0x02] as const;

/** RUNAD segment header: load $02E0..$02E1 */
const RUNAD = [0xe0, 0x02, 0xe1, 0x02] as const;

function readWord(data: Uint8Array, offset: number): word {
    return data[offset] | (data[offset + 1] << 8);
}

function matches(data: Uint8Array, offset: number, pattern: readonly number[]) {
    return offset >= 0 && pattern.every((value, idx) => data[offset + idx] === value);
}

/**
 * Reads the first segment header of a binary load file and looks for
 * INITAD and RUNAD segments in the last twelve bytes.
 *
 * @returns load information, or null if the data is not a binary load file
 */
export function sniffBinaryHeader(data: Uint8Array): BinaryInfo | null {
    const total = data.length;
    if (total <= 6 || data[0] !== BINARY_MAGIC || data[1] !== BINARY_MAGIC) {
        return null;
    }

    const info: BinaryInfo = {
        loadStart: readWord(data, 2),
        loadEnd: readWord(data, 4),
    };

    const tail = total - 6;
    if (matches(data, tail, INITAD)) {
        info.init = readWord(data, total - 2);
        if (total >= 12 && matches(data, total - 12, RUNAD)) {
            info.run = readWord(data, total - 8);
        }
    }
    if (matches(data, tail, RUNAD)) {
        info.run = readWord(data, total - 2);
        if (total >= 12 && matches(data, total - 12, INITAD)) {
            info.init = readWord(data, total - 8);
        }
    }

    return info;
}
