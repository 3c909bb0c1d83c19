import { DiskError } from './atari_dos/errors';
import { SECTOR_SIZE } from './atari_dos/constants';
import { GEOMETRY, Geometry, GeometryName } from './types';

/** Size of the ATR container header preceding the sector data */
export const ATR_HEADER_SIZE = 16;

/**
 * Offsets in bytes to the ATR header fields. All number fields are in
 * little-endian order.
 */
const OFFSETS = {
    /** Signature, $0296 (2 bytes) */
    SIGNATURE: 0x00,
    /** Data size in 16-byte paragraphs, low word (2 bytes) */
    PARAGRAPHS: 0x02,
    /** Sector size (2 bytes) */
    SECTOR_SIZE: 0x04,
    /** Data size in 16-byte paragraphs, high byte */
    PARAGRAPHS_HIGH: 0x06,
} as const;

const ATR_SIGNATURE = 0x0296;

/** Bytes of sector data for a geometry. */
export function dataSize(geometry: Geometry) {
    return geometry.sectorCount * SECTOR_SIZE;
}

/**
 * Chooses the geometry from the total image size, header included.
 */
export function geometryForImageSize(byteLength: number): Geometry {
    const size = byteLength - ATR_HEADER_SIZE;
    const geometry = Object.values(GEOMETRY).find((geometry) => dataSize(geometry) === size);
    if (!geometry) {
        throw new DiskError(
            'GeometryUnrecognized',
            `Unknown disk size ${byteLength}. Expected:\n` +
                Object.values(GEOMETRY)
                    .map((geometry) =>
                        `  ${ATR_HEADER_SIZE} + ${dataSize(geometry)} = ` +
                        `${ATR_HEADER_SIZE + dataSize(geometry)} bytes for ${geometry.name} density`
                    )
                    .join('\n')
        );
    }
    return geometry;
}

/**
 * Creates an empty, unformatted ATR image with a valid header.
 */
export function createAtrImage(name: GeometryName = 'standard'): Uint8Array {
    const geometry = GEOMETRY[name];
    const size = dataSize(geometry);
    const image = new Uint8Array(ATR_HEADER_SIZE + size);
    const header = new DataView(image.buffer);
    const paragraphs = size / 16;

    header.setUint16(OFFSETS.SIGNATURE, ATR_SIGNATURE, true);
    header.setUint16(OFFSETS.PARAGRAPHS, paragraphs & 0xffff, true);
    header.setUint16(OFFSETS.SECTOR_SIZE, SECTOR_SIZE, true);
    header.setUint8(OFFSETS.PARAGRAPHS_HIGH, paragraphs >> 16);

    return image;
}
