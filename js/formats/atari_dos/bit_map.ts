import { ENHANCED_BITMAP_SIZE } from './constants';
import { DiskError } from './errors';

/**
 * Free space bitmap, one bit per sector, 1 meaning free. Sector 0 is the
 * most significant bit of byte 0.
 */
export class BitMap {
    readonly bytes: Uint8Array;

    /**
     * @param sectorCount number of sectors covered, sector 0 included
     * @param bytes raw bitmap, copied
     */
    constructor(readonly sectorCount: number, bytes?: Uint8Array) {
        this.bytes = new Uint8Array(ENHANCED_BITMAP_SIZE);
        if (bytes) {
            this.bytes.set(bytes.subarray(0, ENHANCED_BITMAP_SIZE));
        }
    }

    clone() {
        return new BitMap(this.sectorCount, this.bytes);
    }

    isFree(sector: number) {
        return !!(this.bytes[sector >> 3] & (0x80 >> (sector & 7)));
    }

    setFree(sector: number, free: boolean) {
        if (sector < 0 || sector >= this.sectorCount) {
            throw new DiskError('IOFailure', `Sector ${sector} has no bitmap bit`);
        }
        const mask = 0x80 >> (sector & 7);
        if (free) {
            this.bytes[sector >> 3] |= mask;
        } else {
            this.bytes[sector >> 3] &= ~mask;
        }
    }

    /**
     * Counts free bits in the sector range `[start, end)`.
     */
    countFree(start = 0, end = this.sectorCount) {
        let count = 0;
        for (let sector = start; sector < end; sector++) {
            if (this.isFree(sector)) {
                count++;
            }
        }
        return count;
    }

    /** Lists free sectors in ascending order. */
    freeSectors() {
        const free: number[] = [];
        for (let sector = 0; sector < this.sectorCount; sector++) {
            if (this.isFree(sector)) {
                free.push(sector);
            }
        }
        return free;
    }

    /**
     * Allocates the `count` lowest numbered free sectors, sector 0 excluded.
     * The bitmap is left untouched when there is not enough space.
     *
     * @returns allocated sectors, ascending
     */
    allocate(count: number): number[] {
        const sectors: number[] = [];
        for (let sector = 1; sector < this.sectorCount && sectors.length < count; sector++) {
            if (this.isFree(sector)) {
                sectors.push(sector);
            }
        }
        if (sectors.length < count) {
            throw new DiskError(
                'InsufficientSpace',
                `Not enough space: ${count} sectors needed, ${sectors.length} free`
            );
        }
        for (const sector of sectors) {
            this.setFree(sector, false);
        }
        return sectors;
    }
}
