import type { byte } from '../../types';
import type { AtariDOSVolume } from './atari_dos_volume';
import {
    ATASCII_EOL,
    DATA_SIZE,
    LINE_FEED,
    SECTOR_SIZE,
    TRAILER_OFFSETS,
} from './constants';
import { DiskError } from './errors';

/**
 * Link and length information kept in the last three bytes of every data
 * sector.
 */
export interface SectorTrailer {
    /** Directory slot of the owning file, 0..63 */
    fileNumber: number;
    /** Next sector in the chain, 0 at the end */
    next: number;
    /** Valid data bytes in this sector, 0..125 */
    byteCount: byte;
}

export interface ChainLink {
    sector: number;
    trailer: SectorTrailer;
    data: Uint8Array;
}

export interface DecodeOptions {
    /** Convert ATASCII end of line to line feed */
    translate?: boolean;
}

export function readTrailer(data: Uint8Array): SectorTrailer {
    return {
        fileNumber: (data[TRAILER_OFFSETS.FILE_NUMBER] >> 2) & 0x3f,
        next:
            ((data[TRAILER_OFFSETS.NEXT_HIGH] & 0x03) << 8) |
            data[TRAILER_OFFSETS.NEXT_LOW],
        byteCount: data[TRAILER_OFFSETS.BYTE_COUNT],
    };
}

export function writeTrailer(data: Uint8Array, trailer: SectorTrailer) {
    data[TRAILER_OFFSETS.FILE_NUMBER] =
        ((trailer.fileNumber & 0x3f) << 2) | ((trailer.next >> 8) & 0x03);
    data[TRAILER_OFFSETS.NEXT_LOW] = trailer.next & 0xff;
    data[TRAILER_OFFSETS.BYTE_COUNT] = trailer.byteCount;
}

/** Number of data sectors needed for `length` bytes. Never less than 1. */
export function sectorsForLength(length: number) {
    return Math.max(1, Math.ceil(length / DATA_SIZE));
}

/**
 * Follows a chain from `first` until a zero next pointer. Every step is
 * checked against the addressable range, and the walk is bounded by the
 * number of addressable sectors so a looping chain ends in `CorruptChain`.
 */
export function* walkChain(
    volume: AtariDOSVolume,
    first: number
): Generator<ChainLink, void, undefined> {
    const limit = volume.geometry.addressableSectors;
    let sector = first;
    let steps = 0;

    do {
        if (sector < 1 || sector >= limit) {
            throw new DiskError(
                'CorruptChain',
                `Chain from sector ${first} points to sector ${sector}, outside 1..${limit - 1}`
            );
        }
        if (++steps > limit) {
            throw new DiskError(
                'CorruptChain',
                `Chain from sector ${first} is longer than ${limit} sectors`
            );
        }
        const data = volume.readSector(sector);
        const trailer = readTrailer(data);
        yield { sector, trailer, data };
        sector = trailer.next;
    } while (sector);
}

/**
 * Lazily yields the valid bytes of each sector in the chain starting at
 * `first`.
 */
export function* decodeChain(
    volume: AtariDOSVolume,
    first: number,
    { translate = false }: DecodeOptions = {}
): Generator<Uint8Array, void, undefined> {
    for (const { trailer, data } of walkChain(volume, first)) {
        const bytes = data.slice(0, Math.min(trailer.byteCount, DATA_SIZE));
        if (translate) {
            for (let idx = 0; idx < bytes.length; idx++) {
                if (bytes[idx] === ATASCII_EOL) {
                    bytes[idx] = LINE_FEED;
                }
            }
        }
        yield bytes;
    }
}

/**
 * Writes `content` over the pre-allocated `sectors`, 125 bytes per sector,
 * linking each to the next. The last sector holds the remainder, which is
 * a full 125 bytes when the length is an exact multiple.
 *
 * @returns first sector of the chain
 */
export function encodeChain(
    volume: AtariDOSVolume,
    content: Uint8Array,
    fileNumber: number,
    sectors: readonly number[]
): number {
    const needed = sectorsForLength(content.length);
    if (sectors.length < needed) {
        throw new DiskError(
            'InsufficientSpace',
            `${needed} sectors needed, ${sectors.length} allocated`
        );
    }

    let remaining = content.length;
    for (let idx = 0; idx < needed; idx++) {
        const data = new Uint8Array(SECTOR_SIZE);
        const offset = idx * DATA_SIZE;
        data.set(content.subarray(offset, offset + DATA_SIZE));
        const last = idx + 1 === needed;
        writeTrailer(data, {
            fileNumber,
            next: last ? 0 : sectors[idx + 1],
            byteCount: last ? remaining : DATA_SIZE,
        });
        remaining -= DATA_SIZE;
        volume.writeSector(sectors[idx], data);
    }

    return sectors[0];
}
