import type { AtariDOSVolume } from './atari_dos_volume';
import {
    BOOT_SECTORS,
    DIRECTORY_SECTOR,
    DIRECTORY_SECTOR_COUNT,
    VTOC2_SECTOR,
    VTOC_SECTOR,
} from './constants';
import { readTrailer } from './file_chain';
import { VTOCFinding } from './vtoc';

/** Shadow map owner for reserved sectors */
export const RESERVED = 64;

/** Shadow map owner for sectors no file claims */
export const FREE = -1;

export type ChainFinding =
    | {
          kind: 'double-allocated';
          sector: number;
          /** Slot of the competing owner, or `RESERVED` */
          owner: number;
          /** Name of the competing owner, or 'reserved' */
          ownerName: string;
      }
    | { kind: 'sector-out-of-range'; sector: number }
    | { kind: 'chain-loop'; sector: number }
    | { kind: 'file-number'; sector: number; expected: number; found: number }
    | { kind: 'sector-count'; stored: number; counted: number };

export type BitMapFinding =
    | { kind: 'should-be-allocated'; sector: number }
    | { kind: 'should-be-free'; sector: number };

export interface CheckedFile {
    slot: number;
    fileName: string;
    /** Sectors actually walked */
    sectors: number;
    findings: ChainFinding[];
}

export interface CheckReport {
    files: CheckedFile[];
    /** Shadow map: owning slot per sector, `RESERVED` or `FREE` */
    owners: number[];
    usedSectors: number;
    freeSectors: number;
    vtocFindings: VTOCFinding[];
    bitMapFindings: BitMapFinding[];
}

/** Total number of problems in a report. */
export function countFindings(report: CheckReport) {
    return (
        report.files.reduce((count, file) => count + file.findings.length, 0) +
        report.vtocFindings.length +
        report.bitMapFindings.length
    );
}

/** Sectors never available to files. */
export function reservedSectors(): number[] {
    const reserved: number[] = [0, ...BOOT_SECTORS, VTOC_SECTOR, VTOC2_SECTOR];
    for (let idx = 0; idx < DIRECTORY_SECTOR_COUNT; idx++) {
        reserved.push(DIRECTORY_SECTOR + idx);
    }
    return reserved;
}

/**
 * Rebuilds sector ownership from the directory and compares it with the
 * stored bitmap. Nothing is written back; every problem found is reported.
 */
export function checkVolume(volume: AtariDOSVolume): CheckReport {
    const size = volume.geometry.addressableSectors;
    const owners = new Array<number>(size).fill(FREE);
    const names = new Array<string>(size).fill('');

    for (const sector of reservedSectors()) {
        if (sector < size) {
            owners[sector] = RESERVED;
        }
    }

    const files: CheckedFile[] = [];
    for (const entry of volume.directory().entries()) {
        if (!entry.inUse) {
            continue;
        }
        const findings: ChainFinding[] = [];
        let count = 0;
        let sector = entry.startSector;

        do {
            if (sector < 1 || sector >= size) {
                findings.push({ kind: 'sector-out-of-range', sector });
                break;
            }
            const owner = owners[sector];
            if (owner === entry.slot) {
                findings.push({ kind: 'chain-loop', sector });
                break;
            }
            if (owner !== FREE) {
                findings.push({
                    kind: 'double-allocated',
                    sector,
                    owner,
                    ownerName: owner === RESERVED ? 'reserved' : names[sector],
                });
            }
            owners[sector] = entry.slot;
            names[sector] = entry.fileName;
            count++;

            const trailer = readTrailer(volume.readSector(sector));
            if (trailer.fileNumber !== entry.slot) {
                findings.push({
                    kind: 'file-number',
                    sector,
                    expected: entry.slot,
                    found: trailer.fileNumber,
                });
            }
            sector = trailer.next;
        } while (sector);

        if (count !== entry.sectorCount) {
            findings.push({ kind: 'sector-count', stored: entry.sectorCount, counted: count });
        }
        files.push({ slot: entry.slot, fileName: entry.fileName, sectors: count, findings });
    }

    const usedSectors = owners.filter((owner) => owner !== FREE).length;

    const { bitMap, findings: vtocFindings } = volume.vtoc().getBitMap(true);
    const bitMapFindings: BitMapFinding[] = [];
    for (let sector = 0; sector < size; sector++) {
        const allocated = !bitMap.isFree(sector);
        if (allocated && owners[sector] === FREE) {
            bitMapFindings.push({ kind: 'should-be-free', sector });
        }
        if (!allocated && owners[sector] !== FREE) {
            bitMapFindings.push({ kind: 'should-be-allocated', sector });
        }
    }

    return {
        files,
        owners,
        usedSectors,
        freeSectors: size - usedSectors,
        vtocFindings,
        bitMapFindings,
    };
}

export function describeChainFinding(finding: ChainFinding, fileName: string) {
    switch (finding.kind) {
        case 'double-allocated':
            return `sector ${finding.sector} already in use by ${finding.ownerName} (${finding.owner})`;
        case 'sector-out-of-range':
            return `sector ${finding.sector} is outside the disk`;
        case 'chain-loop':
            return `chain loops back to sector ${finding.sector}`;
        case 'file-number':
            return `sector ${finding.sector} is tagged with file number ${finding.found}, expected ${finding.expected}`;
        case 'sector-count':
            return `size in directory (${finding.stored}) does not match size on disk (${finding.counted}) for file ${fileName}`;
    }
}

export function describeVTOCFinding(finding: VTOCFinding) {
    switch (finding.kind) {
        case 'free-count': {
            const label = finding.region === 'vtoc' ? 'VTOC' : 'VTOC2';
            return `It doesn't match: bitmap has ${finding.counted} free, but ${label} count is ${finding.stored}`;
        }
        case 'total-sectors':
            return `VTOC usable sector count should be ${finding.expected}, we found: ${finding.stored}`;
        case 'type-code':
            return `VTOC type code should be ${finding.expected}, we found: ${finding.stored}`;
    }
}

export function describeBitMapFinding(finding: BitMapFinding) {
    switch (finding.kind) {
        case 'should-be-free':
            return `VTOC shows sector ${finding.sector} allocated, but it should be free`;
        case 'should-be-allocated':
            return `VTOC shows sector ${finding.sector} free, but it should be allocated`;
    }
}

/**
 * Renders a report as the lines printed by the `check` command.
 */
export function formatCheckReport(report: CheckReport): string[] {
    const lines: string[] = [];
    for (const file of report.files) {
        lines.push(`Checking ${file.fileName} (file_no ${file.slot})`);
        for (const finding of file.findings) {
            lines.push(`  ** ${describeChainFinding(finding, file.fileName)}`);
        }
        lines.push(`  Found ${file.sectors} sectors`);
    }
    lines.push(`${report.usedSectors} sectors in use, ${report.freeSectors} sectors free`);
    lines.push('Checking VTOC...');
    if (report.vtocFindings.length) {
        for (const finding of report.vtocFindings) {
            lines.push(`  ** ${describeVTOCFinding(finding)}`);
        }
    } else {
        lines.push('  It\'s OK');
    }
    lines.push('Compare VTOC bitmap with reconstructed bitmap from files...');
    for (const finding of report.bitMapFindings) {
        lines.push(`  ** ${describeBitMapFinding(finding)}`);
    }
    const problems = countFindings(report);
    lines.push(problems ? `${problems} problems found.` : 'All done.');
    return lines;
}
