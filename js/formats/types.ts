import type { MemberOf } from '../types';

export const GEOMETRIES = ['standard', 'enhanced'] as const;

/**
 * Disk geometry. `standard` is DOS 2.0S single density (40 tracks of 18
 * sectors), `enhanced` is DOS 2.5 enhanced density (40 tracks of 26 sectors).
 */
export type GeometryName = MemberOf<typeof GEOMETRIES>;

export interface Geometry {
    name: GeometryName;
    /** Sectors physically present in the image */
    sectorCount: number;
    /**
     * Sectors reachable through the free-space bitmap, including the
     * non-existent sector 0.
     */
    addressableSectors: number;
    /** Usable sector total recorded in the VTOC of a formatted volume */
    usableSectors: number;
}

export const STANDARD_GEOMETRY: Geometry = {
    name: 'standard',
    sectorCount: 40 * 18,
    addressableSectors: 720,
    usableSectors: 707,
};

export const ENHANCED_GEOMETRY: Geometry = {
    name: 'enhanced',
    sectorCount: 40 * 26,
    addressableSectors: 1024,
    usableSectors: 1011,
};

export const GEOMETRY: Record<GeometryName, Geometry> = {
    standard: STANDARD_GEOMETRY,
    enhanced: ENHANCED_GEOMETRY,
};

/**
 * Backing store for a disk image. Offsets are absolute byte offsets into
 * the container, header included.
 */
export interface SectorImage {
    readonly byteLength: number;

    /** Reads `length` bytes at `offset`. Returns fewer bytes at end of image. */
    read(offset: number, length: number): Uint8Array;
    /** Writes `data` at `offset`, returning the number of bytes written. */
    write(offset: number, data: Uint8Array): number;
}

/**
 * Image held entirely in memory.
 */
export class MemoryImage implements SectorImage {
    constructor(readonly data: Uint8Array) {}

    get byteLength() {
        return this.data.byteLength;
    }

    read(offset: number, length: number): Uint8Array {
        // Slice so modifications do not apply to the image
        return this.data.slice(offset, offset + length);
    }

    write(offset: number, data: Uint8Array): number {
        const length = Math.max(0, Math.min(data.length, this.data.length - offset));
        this.data.set(data.subarray(0, length), offset);
        return length;
    }
}
