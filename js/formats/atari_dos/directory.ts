import type { byte, word } from '../../types';
import type { AtariDOSVolume } from './atari_dos_volume';
import {
    DIRECTORY_ENTRY_COUNT,
    DIRECTORY_SECTOR,
    ENTRIES_PER_SECTOR,
    ENTRY_FLAGS,
    ENTRY_OFFSETS,
    ENTRY_SIZE,
    EXTENSION_LENGTH,
    NAME_LENGTH,
} from './constants';
import { DiskError } from './errors';
import { fromAtariName, normalizeName, toAtariName } from './utils';

/**
 * Decoded directory entry.
 */
export interface DirectoryEntry {
    /** Slot 0..63, also the file number tagged on data sectors */
    slot: number;
    flags: byte;
    inUse: boolean;
    deleted: boolean;
    locked: boolean;
    /** 8 characters, space padded */
    name: string;
    /** 3 characters, space padded */
    ext: string;
    /** Lower case host name */
    fileName: string;
    startSector: word;
    sectorCount: word;
}

export interface FindOptions {
    /** Tombstone the matched entry */
    remove?: boolean;
}

function readString(data: Uint8Array, offset: number, length: number) {
    return String.fromCharCode(...data.subarray(offset, offset + length));
}

function writeString(data: Uint8Array, offset: number, value: string) {
    for (let idx = 0; idx < value.length; idx++) {
        data[offset + idx] = value.charCodeAt(idx) & 0xff;
    }
}

export function decodeEntry(data: Uint8Array, slot: number): DirectoryEntry {
    const flags = data[ENTRY_OFFSETS.FLAGS];
    const name = readString(data, ENTRY_OFFSETS.NAME, NAME_LENGTH);
    const ext = readString(data, ENTRY_OFFSETS.EXTENSION, EXTENSION_LENGTH);
    return {
        slot,
        flags,
        inUse: !!(flags & ENTRY_FLAGS.IN_USE),
        deleted: !!(flags & ENTRY_FLAGS.DELETED),
        locked: !!(flags & ENTRY_FLAGS.LOCKED),
        name,
        ext,
        fileName: fromAtariName({ name, ext }),
        sectorCount: data[ENTRY_OFFSETS.SECTOR_COUNT] | (data[ENTRY_OFFSETS.SECTOR_COUNT + 1] << 8),
        startSector: data[ENTRY_OFFSETS.START_SECTOR] | (data[ENTRY_OFFSETS.START_SECTOR + 1] << 8),
    };
}

export function encodeEntry(
    entry: Pick<DirectoryEntry, 'flags' | 'name' | 'ext' | 'startSector' | 'sectorCount'>
): Uint8Array {
    const data = new Uint8Array(ENTRY_SIZE);
    data[ENTRY_OFFSETS.FLAGS] = entry.flags;
    data[ENTRY_OFFSETS.SECTOR_COUNT] = entry.sectorCount & 0xff;
    data[ENTRY_OFFSETS.SECTOR_COUNT + 1] = entry.sectorCount >> 8;
    data[ENTRY_OFFSETS.START_SECTOR] = entry.startSector & 0xff;
    data[ENTRY_OFFSETS.START_SECTOR + 1] = entry.startSector >> 8;
    writeString(data, ENTRY_OFFSETS.NAME, entry.name);
    writeString(data, ENTRY_OFFSETS.EXTENSION, entry.ext);
    return data;
}

function checkSlot(slot: number) {
    if (!Number.isInteger(slot) || slot < 0 || slot >= DIRECTORY_ENTRY_COUNT) {
        throw new DiskError('IOFailure', `Directory slot ${slot} out of range`);
    }
}

function sectorForSlot(slot: number) {
    return DIRECTORY_SECTOR + Math.floor(slot / ENTRIES_PER_SECTOR);
}

function offsetForSlot(slot: number) {
    return (slot % ENTRIES_PER_SECTOR) * ENTRY_SIZE;
}

/**
 * The fixed table of 64 directory entries held in sectors 361..368.
 */
export class Directory {
    constructor(private volume: AtariDOSVolume) {}

    /**
     * Reads every slot, used or not, in storage order.
     */
    entries(): DirectoryEntry[] {
        const entries: DirectoryEntry[] = [];
        for (let idx = 0; idx < DIRECTORY_ENTRY_COUNT; idx += ENTRIES_PER_SECTOR) {
            const data = this.volume.readSector(sectorForSlot(idx));
            for (let jdx = 0; jdx < ENTRIES_PER_SECTOR; jdx++) {
                const slot = idx + jdx;
                const offset = offsetForSlot(slot);
                entries.push(decodeEntry(data.subarray(offset, offset + ENTRY_SIZE), slot));
            }
        }
        return entries;
    }

    /** Reads one slot. */
    entry(slot: number): DirectoryEntry {
        checkSlot(slot);
        const data = this.volume.readSector(sectorForSlot(slot));
        const offset = offsetForSlot(slot);
        return decodeEntry(data.subarray(offset, offset + ENTRY_SIZE), slot);
    }

    /**
     * Finds the first in-use entry named `fileName`, ignoring case. With
     * `remove` set the entry is tombstoned: its flags become `DELETED` alone,
     * which also clears the in-use flag.
     */
    find(fileName: string, { remove = false }: FindOptions = {}): DirectoryEntry {
        const entry = this.lookup(fileName);
        if (!entry) {
            throw new DiskError('NotFound', `File '${fileName}' not found`);
        }
        if (remove) {
            this.tombstone(entry.slot);
        }
        return entry;
    }

    /** Like `find`, but returns undefined for a missing name. */
    lookup(fileName: string): DirectoryEntry | undefined {
        const wanted = normalizeName(fileName);
        return this.entries().find((entry) => entry.inUse && entry.fileName === wanted);
    }

    /**
     * Returns the first slot without the in-use flag. `reusable` counts as
     * empty too, for a slot whose file is about to be replaced.
     */
    findEmptySlot(reusable?: number): number {
        const entry = this.entries().find(
            (entry) => !entry.inUse || entry.slot === reusable
        );
        if (!entry) {
            throw new DiskError('DirectoryFull', 'Directory is full');
        }
        return entry.slot;
    }

    /**
     * Writes a complete in-use entry into `slot`, replacing whatever was
     * there.
     */
    writeEntry(slot: number, fileName: string, startSector: word, sectorCount: word) {
        const { name, ext } = toAtariName(fileName);
        this.writeSlot(
            slot,
            encodeEntry({
                flags: ENTRY_FLAGS.IN_USE,
                name,
                ext,
                startSector,
                sectorCount,
            })
        );
        return this.entry(slot);
    }

    /** Marks `slot` deleted. */
    tombstone(slot: number) {
        checkSlot(slot);
        const sector = sectorForSlot(slot);
        const data = this.volume.readSector(sector);
        data[offsetForSlot(slot) + ENTRY_OFFSETS.FLAGS] = ENTRY_FLAGS.DELETED;
        this.volume.writeSector(sector, data);
    }

    private writeSlot(slot: number, entry: Uint8Array) {
        checkSlot(slot);
        const sector = sectorForSlot(slot);
        const data = this.volume.readSector(sector);
        data.set(entry, offsetForSlot(slot));
        this.volume.writeSector(sector, data);
    }
}
