import { concat, debug, toHex } from '../../util';
import { ATR_HEADER_SIZE, geometryForImageSize } from '../atr';
import { Geometry, SectorImage } from '../types';
import { BitMap } from './bit_map';
import { CheckReport, checkVolume, reservedSectors } from './check';
import {
    DIRECTORY_SECTOR,
    DIRECTORY_SECTOR_COUNT,
    DOS_TYPE_CODE,
    SECTOR_SIZE,
    VTOC2_SECTOR,
    VTOC_OFFSETS,
    VTOC_SECTOR,
} from './constants';
import { Directory, DirectoryEntry } from './directory';
import { DiskError } from './errors';
import {
    DecodeOptions,
    decodeChain,
    encodeChain,
    sectorsForLength,
} from './file_chain';
import { normalizeName } from './utils';
import { VTOC } from './vtoc';

export interface FreeSpace {
    sectors: number;
    bytes: number;
}

/**
 * Atari DOS 2 volume. Holds the geometry and backing image for one open
 * disk; the bitmap and directory are always read from the image.
 */
export class AtariDOSVolume {
    private _vtoc: VTOC;
    private _directory: Directory;

    constructor(private _image: SectorImage, readonly geometry: Geometry) {
        this._vtoc = new VTOC(this);
        this._directory = new Directory(this);
    }

    /**
     * Opens an image, choosing the geometry from its size.
     */
    static open(image: SectorImage) {
        const geometry = geometryForImageSize(image.byteLength);
        debug(`${geometry.name} density disk, ${geometry.sectorCount} sectors`);
        return new AtariDOSVolume(image, geometry);
    }

    image() {
        return this._image;
    }

    vtoc() {
        return this._vtoc;
    }

    directory() {
        return this._directory;
    }

    private offset(sector: number) {
        if (sector === 0) {
            throw new DiskError('InvalidSectorZero', 'Requested sector 0');
        }
        if (!Number.isInteger(sector) || sector < 0 || sector > this.geometry.sectorCount) {
            throw new DiskError('IOFailure', `Sector ${sector} is outside the disk`);
        }
        return (sector - 1) * SECTOR_SIZE + ATR_HEADER_SIZE;
    }

    /**
     * Reads one sector. The returned data is a copy.
     */
    readSector(sector: number): Uint8Array {
        const offset = this.offset(sector);
        let data: Uint8Array;
        try {
            data = this._image.read(offset, SECTOR_SIZE);
        } catch (e) {
            throw new DiskError('IOFailure', `Error reading sector ${sector}`, e);
        }
        if (data.length !== SECTOR_SIZE) {
            throw new DiskError(
                'IOFailure',
                `Short read of sector ${sector}: ${data.length} bytes`
            );
        }
        return data;
    }

    writeSector(sector: number, data: Uint8Array) {
        const offset = this.offset(sector);
        if (data.length !== SECTOR_SIZE) {
            throw new DiskError(
                'IOFailure',
                `Sector data must be ${SECTOR_SIZE} bytes, got ${data.length}`
            );
        }
        let written: number;
        try {
            written = this._image.write(offset, data);
        } catch (e) {
            throw new DiskError('IOFailure', `Error writing sector ${sector}`, e);
        }
        if (written !== SECTOR_SIZE) {
            throw new DiskError(
                'IOFailure',
                `Short write of sector ${sector}: ${written} bytes`
            );
        }
    }

    /**
     * Creates a classic hex and ascii dump of a sector
     *
     * @param sector Sector to dump
     * @returns String representation of sector
     */
    dumpSector(sector: number) {
        let result = '';
        const data = this.readSector(sector);
        for (let idx = 0; idx < SECTOR_SIZE / 16; idx++) {
            result += toHex(idx << 4) + ': ';
            for (let jdx = 0; jdx < 16; jdx++) {
                result += toHex(data[idx * 16 + jdx]) + ' ';
            }
            result += '        ';
            for (let jdx = 0; jdx < 16; jdx++) {
                const b = data[idx * 16 + jdx] & 0x7f;
                result += b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : '.';
            }
            result += '\n';
        }
        return result;
    }

    /** In-use directory entries in storage order. */
    listEntries(): DirectoryEntry[] {
        return this._directory.entries().filter((entry) => entry.inUse);
    }

    /** Lazily reads the chain starting at `first`. */
    readChain(first: number, options?: DecodeOptions) {
        return decodeChain(this, first, options);
    }

    /**
     * Lazily reads a file by name, one sector's worth of bytes at a time.
     */
    readFile(fileName: string, options?: DecodeOptions) {
        const entry = this._directory.find(fileName);
        return this.readChain(entry.startSector, options);
    }

    /** Reads a whole file by name. */
    readFileData(fileName: string, options?: DecodeOptions): Uint8Array {
        return concat(...this.readFile(fileName, options));
    }

    /**
     * Writes a file, replacing any file of the same name. Space and a
     * directory slot are found against a copy of the bitmap with the old
     * file removed, so nothing changes on disk if either is missing.
     *
     * @returns the new directory entry
     */
    writeFile(fileName: string, data: Uint8Array): DirectoryEntry {
        const wanted = normalizeName(fileName);
        const existing = this._directory.lookup(wanted);

        const { bitMap } = this._vtoc.getBitMap();
        const working = bitMap.clone();
        if (existing) {
            this._vtoc.freeChain(working, existing.startSector);
        }

        const slot = this._directory.findEmptySlot(existing?.slot);

        const count = sectorsForLength(data.length);
        const sectors = working.allocate(count);
        debug(`Writing ${wanted} to slot ${slot}, sectors ${sectors.join(',')}`);

        if (existing && existing.slot !== slot) {
            this._directory.tombstone(existing.slot);
        }
        const first = encodeChain(this, data, slot, sectors);
        const entry = this._directory.writeEntry(slot, wanted, first, count);
        this._vtoc.putBitMap(working);
        return entry;
    }

    /**
     * Deletes a file by name. The directory entry is tombstoned before its
     * sectors are returned to the bitmap.
     *
     * @returns the deleted entry as it was before deletion
     */
    deleteFile(fileName: string): DirectoryEntry {
        const entry = this._directory.find(fileName, { remove: true });
        const { bitMap } = this._vtoc.getBitMap();
        this._vtoc.freeChain(bitMap, entry.startSector);
        this._vtoc.putBitMap(bitMap);
        return entry;
    }

    freeSpace(): FreeSpace {
        return this._vtoc.freeSpace();
    }

    check(): CheckReport {
        return checkVolume(this);
    }
}

/**
 * Initializes an empty DOS 2 file system: VTOC (and VTOC2 on enhanced
 * density disks) with only the reserved sectors in use, and an empty
 * directory. Boot sectors are left as they are.
 */
export function formatVolume(image: SectorImage): AtariDOSVolume {
    const volume = AtariDOSVolume.open(image);
    const { geometry } = volume;
    const empty = new Uint8Array(SECTOR_SIZE);

    for (let idx = 0; idx < DIRECTORY_SECTOR_COUNT; idx++) {
        volume.writeSector(DIRECTORY_SECTOR + idx, empty);
    }

    const vtoc = new Uint8Array(SECTOR_SIZE);
    vtoc[VTOC_OFFSETS.TYPE] = DOS_TYPE_CODE;
    vtoc[VTOC_OFFSETS.TOTAL_SECTORS] = geometry.usableSectors & 0xff;
    vtoc[VTOC_OFFSETS.TOTAL_SECTORS + 1] = geometry.usableSectors >> 8;
    volume.writeSector(VTOC_SECTOR, vtoc);
    if (geometry.name === 'enhanced') {
        volume.writeSector(VTOC2_SECTOR, empty);
    }

    const bitMap = new BitMap(geometry.addressableSectors);
    for (let sector = 0; sector < geometry.addressableSectors; sector++) {
        bitMap.setFree(sector, true);
    }
    for (const sector of reservedSectors()) {
        if (sector < geometry.addressableSectors) {
            bitMap.setFree(sector, false);
        }
    }
    volume.vtoc().putBitMap(bitMap);

    return volume;
}
