import type { AtariDOSVolume } from './atari_dos_volume';
import { BinaryInfo, sniffBinaryHeader } from './binary_header';
import type { DirectoryEntry } from './directory';
import { concat } from '../../util';

/** Width of the terminal assumed by the column layout */
const SCREEN_WIDTH = 80;

/** Width of one column, name plus gap */
const COLUMN_WIDTH = 13;

export interface CatalogEntry {
    fileName: string;
    locked: boolean;
    /** Starting sector */
    sector: number;
    /** Sector count from the directory */
    sectors: number;
    /** Byte length found by walking the chain */
    size: number;
    isSystem: boolean;
    isCommand: boolean;
    binary: BinaryInfo | null;
}

export interface ListingOptions {
    /** Include .SYS files */
    all?: boolean;
    /** Long format */
    long?: boolean;
    /** One name per line */
    single?: boolean;
}

function compareNames(a: CatalogEntry, b: CatalogEntry) {
    if (a.fileName < b.fileName) {
        return -1;
    }
    return a.fileName > b.fileName ? 1 : 0;
}

function listedEntries(volume: AtariDOSVolume, all: boolean) {
    return volume.listEntries().filter((entry) => all || entry.ext !== 'SYS');
}

/**
 * Builds catalog entries for every in-use directory entry, sorted by name.
 * Every chain is walked to find the file sizes.
 */
export function readCatalog(
    volume: AtariDOSVolume,
    { all = false }: ListingOptions = {}
): CatalogEntry[] {
    return listedEntries(volume, all)
        .map((entry) => catalogEntry(volume, entry))
        .sort(compareNames);
}

/**
 * Sorted names of the listed files. Only the directory is read, so a
 * damaged chain does not hide the other names.
 */
export function readNames(volume: AtariDOSVolume, { all = false }: ListingOptions = {}) {
    return listedEntries(volume, all)
        .map((entry) => entry.fileName)
        .sort();
}

function catalogEntry(volume: AtariDOSVolume, entry: DirectoryEntry): CatalogEntry {
    const data = concat(...volume.readChain(entry.startSector));
    return {
        fileName: entry.fileName,
        locked: entry.locked,
        sector: entry.startSector,
        sectors: entry.sectorCount,
        size: data.length,
        isSystem: entry.ext === 'SYS',
        isCommand: entry.ext === 'COM',
        binary: sniffBinaryHeader(data),
    };
}

function hex(value: number) {
    return value.toString(16);
}

function describeBinary(info: BinaryInfo) {
    let result = `load_start=$${hex(info.loadStart)} load_end=$${hex(info.loadEnd)}`;
    if (info.init !== undefined) {
        result += ` init=$${hex(info.init)}`;
    }
    if (info.run !== undefined) {
        result += ` run=$${hex(info.run)}`;
    }
    return result;
}

/**
 * Formats one line of the long listing.
 */
export function formatLongEntry(entry: CatalogEntry) {
    const mode = [
        '-r',
        entry.locked ? '-' : 'w',
        entry.isCommand ? 'x' : '-',
        entry.isSystem ? 's' : '-',
    ].join('');
    const line =
        `${mode} ${String(entry.size).padStart(6)} ` +
        `(${String(entry.sectors).padStart(3)}) ${entry.fileName.padEnd(13)}`;
    return entry.binary ? `${line} (${describeBinary(entry.binary)})` : line;
}

/**
 * Lays names out in columns ordered top to bottom, then left to right,
 * like `ls`.
 */
export function formatColumns(names: string[]) {
    const cols = Math.floor(SCREEN_WIDTH / COLUMN_WIDTH);
    const rows = Math.ceil(names.length / cols);
    const lines: string[] = [];
    for (let row = 0; row < rows; row++) {
        let line = '';
        for (let col = 0; col < cols; col++) {
            const idx = row + col * rows;
            line += idx < names.length ? `${names[idx].padEnd(12)}  ` : ' '.repeat(COLUMN_WIDTH);
        }
        lines.push(line);
    }
    return lines;
}

/**
 * Renders a directory listing as lines of text.
 */
export function formatListing(volume: AtariDOSVolume, options: ListingOptions = {}): string[] {
    if (options.long) {
        const entries = readCatalog(volume, options);
        const lines = [''];
        let sectors = 0;
        let bytes = 0;
        for (const entry of entries) {
            lines.push(formatLongEntry(entry));
            sectors += entry.sectors;
            bytes += entry.size;
        }
        const free = volume.freeSpace();
        lines.push(
            '',
            `${entries.length} entries`,
            '',
            `${sectors} sectors, ${bytes} bytes`,
            '',
            formatFreeSpace(free),
            ''
        );
        return lines;
    }

    const names = readNames(volume, options);
    return options.single ? names : formatColumns(names);
}

export function formatFreeSpace({ sectors, bytes }: { sectors: number; bytes: number }) {
    return `${sectors} free sectors, ${bytes} free bytes`;
}
