import type { AtariDOSVolume } from './atari_dos_volume';
import { BitMap } from './bit_map';
import {
    DOS_TYPE_CODE,
    ENHANCED_BITMAP_SIZE,
    SECTOR_SIZE,
    VTOC2_MIRROR_START,
    VTOC2_OFFSETS,
    VTOC2_SECTOR,
    VTOC_BITMAP_SIZE,
    VTOC_OFFSETS,
    VTOC_SECTOR,
} from './constants';
import { walkChain } from './file_chain';

/** Sectors covered by the VTOC bitmap */
const VTOC_SECTOR_RANGE = VTOC_BITMAP_SIZE * 8;

/**
 * Mismatch between the stored VTOC summary fields and the bitmap.
 */
export type VTOCFinding =
    | {
          kind: 'free-count';
          region: 'vtoc' | 'vtoc2';
          counted: number;
          stored: number;
      }
    | { kind: 'total-sectors'; expected: number; stored: number }
    | { kind: 'type-code'; expected: number; stored: number };

export interface BitMapResult {
    bitMap: BitMap;
    /** Always empty unless verification was requested */
    findings: VTOCFinding[];
}

function readWord(data: Uint8Array, offset: number) {
    return data[offset] | (data[offset + 1] << 8);
}

function writeWord(data: Uint8Array, offset: number, value: number) {
    data[offset] = value & 0xff;
    data[offset + 1] = value >> 8;
}

/**
 * Free space bitmap allocator. The bitmap is always read fresh from the
 * VTOC sectors and never cached.
 */
export class VTOC {
    constructor(private volume: AtariDOSVolume) {}

    private get enhanced() {
        return this.volume.geometry.name === 'enhanced';
    }

    /**
     * Reads the bitmap. When `verify` is set the stored free counts, usable
     * sector total and type code are checked, every mismatch being reported.
     */
    getBitMap(verify = false): BitMapResult {
        const { geometry } = this.volume;
        const findings: VTOCFinding[] = [];
        const bytes = new Uint8Array(ENHANCED_BITMAP_SIZE);

        const vtoc = this.volume.readSector(VTOC_SECTOR);
        bytes.set(
            vtoc.subarray(VTOC_OFFSETS.BITMAP, VTOC_OFFSETS.BITMAP + VTOC_BITMAP_SIZE)
        );
        const bitMap = new BitMap(geometry.addressableSectors, bytes);

        if (verify) {
            const counted = bitMap.countFree(0, VTOC_SECTOR_RANGE);
            const stored = readWord(vtoc, VTOC_OFFSETS.FREE_SECTORS);
            if (counted !== stored) {
                findings.push({ kind: 'free-count', region: 'vtoc', counted, stored });
            }
            const total = readWord(vtoc, VTOC_OFFSETS.TOTAL_SECTORS);
            if (total !== geometry.usableSectors) {
                findings.push({
                    kind: 'total-sectors',
                    expected: geometry.usableSectors,
                    stored: total,
                });
            }
            if (vtoc[VTOC_OFFSETS.TYPE] !== DOS_TYPE_CODE) {
                findings.push({
                    kind: 'type-code',
                    expected: DOS_TYPE_CODE,
                    stored: vtoc[VTOC_OFFSETS.TYPE],
                });
            }
        }

        if (this.enhanced) {
            const vtoc2 = this.volume.readSector(VTOC2_SECTOR);
            bitMap.bytes.set(
                vtoc2.subarray(VTOC2_OFFSETS.BITMAP, VTOC2_OFFSETS.FREE_SECTORS),
                VTOC_BITMAP_SIZE
            );
            if (verify) {
                const counted = bitMap.countFree(VTOC_SECTOR_RANGE);
                const stored = readWord(vtoc2, VTOC2_OFFSETS.FREE_SECTORS);
                if (counted !== stored) {
                    findings.push({ kind: 'free-count', region: 'vtoc2', counted, stored });
                }
            }
        }

        return { bitMap, findings };
    }

    /**
     * Writes the bitmap back along with recomputed free counts. Bytes of the
     * VTOC sectors outside the bitmap and counters are preserved.
     */
    putBitMap(bitMap: BitMap) {
        const bytes = new Uint8Array(bitMap.bytes);
        // Sector 0 does not exist
        bytes[0] &= 0x7f;
        const saved = new BitMap(bitMap.sectorCount, bytes);

        const vtoc = this.volume.readSector(VTOC_SECTOR);
        vtoc.set(bytes.subarray(0, VTOC_BITMAP_SIZE), VTOC_OFFSETS.BITMAP);
        writeWord(
            vtoc,
            VTOC_OFFSETS.FREE_SECTORS,
            saved.countFree(0, Math.min(VTOC_SECTOR_RANGE, saved.sectorCount))
        );
        this.volume.writeSector(VTOC_SECTOR, vtoc);

        if (this.enhanced) {
            const vtoc2 = this.volume.readSector(VTOC2_SECTOR);
            vtoc2.set(
                bytes.subarray(VTOC2_MIRROR_START, ENHANCED_BITMAP_SIZE),
                VTOC2_OFFSETS.MIRROR
            );
            writeWord(
                vtoc2,
                VTOC2_OFFSETS.FREE_SECTORS,
                saved.countFree(VTOC_SECTOR_RANGE)
            );
            this.volume.writeSector(VTOC2_SECTOR, vtoc2);
        }
    }

    /**
     * Marks every sector of the chain starting at `first` free in `bitMap`.
     * Sectors already free, or owned by another file, are freed regardless.
     */
    freeChain(bitMap: BitMap, first: number) {
        for (const { sector } of walkChain(this.volume, first)) {
            bitMap.setFree(sector, true);
        }
    }

    /** Number of free sectors and bytes. */
    freeSpace() {
        const { bitMap } = this.getBitMap();
        const sectors = bitMap.countFree();
        return { sectors, bytes: sectors * SECTOR_SIZE };
    }
}
