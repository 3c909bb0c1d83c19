import { createAtrImage } from 'js/formats/atr';
import { AtariDOSVolume } from 'js/formats/atari_dos/atari_dos_volume';
import { reservedSectors } from 'js/formats/atari_dos/check';
import { isDiskError } from 'js/formats/atari_dos/errors';
import { readTrailer, sectorsForLength } from 'js/formats/atari_dos/file_chain';
import { GeometryName, MemoryImage } from 'js/formats/types';
import { concat } from 'js/util';
import { blankVolume, caught, patternData, text } from '../testdata/atari_dos';

const LENGTHS = [0, 1, 124, 125, 126, 249, 10000];

describe('AtariDOSVolume', () => {
    describe('open', () => {
        it('detects the geometry', () => {
            const image = new MemoryImage(createAtrImage('enhanced'));
            expect(AtariDOSVolume.open(image).geometry.name).toBe('enhanced');
        });

        it('rejects an unknown size without touching the image', () => {
            const image = new MemoryImage(new Uint8Array(1000).fill(0x55));
            expect(isDiskError(caught(() => AtariDOSVolume.open(image)), 'GeometryUnrecognized')).toBe(
                true
            );
            expect(image.data.every((b) => b === 0x55)).toBe(true);
        });
    });

    describe('sector access', () => {
        it('maps sector 1 right after the header', () => {
            const { image, volume } = blankVolume();
            volume.writeSector(1, new Uint8Array(128).fill(0xaa));
            expect(image.data[15]).toBe(0x00);
            expect(image.data[16]).toBe(0xaa);
            expect(image.data[143]).toBe(0xaa);
            expect(image.data[144]).toBe(0x00);
        });

        it('maps the last sector to the end of the image', () => {
            const { image, volume } = blankVolume();
            volume.writeSector(720, new Uint8Array(128).fill(0x11));
            expect(image.data[92175]).toBe(0x11);
            expect(image.data[92048]).toBe(0x11);
            expect(image.data[92047]).toBe(0x00);
        });

        it('returns a copy', () => {
            const { image, volume } = blankVolume();
            volume.readSector(4)[0] = 0x12;
            expect(image.data[16 + 3 * 128]).toBe(0);
        });

        it('rejects sector 0', () => {
            const { volume } = blankVolume();
            expect(isDiskError(caught(() => volume.readSector(0)), 'InvalidSectorZero')).toBe(true);
            expect(
                isDiskError(caught(() => volume.writeSector(0, new Uint8Array(128))), 'InvalidSectorZero')
            ).toBe(true);
        });

        it('rejects sectors beyond the image', () => {
            const { volume } = blankVolume();
            expect(isDiskError(caught(() => volume.readSector(721)), 'IOFailure')).toBe(true);
        });

        it('rejects partial sectors', () => {
            const { volume } = blankVolume();
            expect(isDiskError(caught(() => volume.writeSector(4, new Uint8Array(10))), 'IOFailure')).toBe(
                true
            );
        });

        it('dumps a sector in hex', () => {
            const { volume } = blankVolume();
            const data = new Uint8Array(128);
            data.set(text('HI'), 0);
            volume.writeSector(4, data);
            const lines = volume.dumpSector(4).split('\n');
            expect(lines).toHaveLength(9);
            expect(lines[0]).toBe(
                '00: 48 49 00 00 00 00 00 00 00 00 00 00 00 00 00 00         HI..............'
            );
            expect(lines[7].startsWith('70: ')).toBe(true);
        });
    });

    describe.each<GeometryName>(['standard', 'enhanced'])('%s density files', (geometry) => {
        it.each(LENGTHS)('reads back %i bytes', (length) => {
            const { volume } = blankVolume(geometry);
            const data = patternData(length, length);
            const entry = volume.writeFile('file.bin', data);
            expect(entry.sectorCount).toBe(sectorsForLength(length));
            expect(volume.readFileData('file.bin')).toEqual(data);
            expect(volume.check().files[0].findings).toEqual([]);
        });
    });

    describe('writeFile', () => {
        it('stores a 300 byte file in three sectors', () => {
            const { volume } = blankVolume();
            const data = patternData(300);
            const entry = volume.writeFile('TEST.TXT', data);

            expect(entry).toMatchObject({
                slot: 0,
                fileName: 'test.txt',
                startSector: 4,
                sectorCount: 3,
            });
            expect(volume.readFileData('test.txt')).toEqual(data);
            expect(volume.freeSpace().sectors).toBe(704);
            expect(readTrailer(volume.readSector(6))).toEqual({
                fileNumber: 0,
                next: 0,
                byteCount: 50,
            });
        });

        it('tags data sectors with the directory slot', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(10));
            const entry = volume.writeFile('b.txt', patternData(10));
            expect(entry.slot).toBe(1);
            expect(entry.startSector).toBe(5);
            expect(readTrailer(volume.readSector(5)).fileNumber).toBe(1);
        });

        it('skips the VTOC and directory sectors', () => {
            const { volume } = blankVolume();
            volume.writeFile('big.bin', patternData(356 * 125));
            const entry = volume.writeFile('next.bin', patternData(1));
            expect(entry.startSector).toBe(369);
        });

        it('replaces an existing file in place', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(300));
            const entry = volume.writeFile('A.TXT', patternData(100, 1));

            expect(entry.slot).toBe(0);
            expect(entry.startSector).toBe(4);
            expect(volume.listEntries()).toHaveLength(1);
            expect(volume.readFileData('a.txt')).toEqual(patternData(100, 1));
            expect(volume.freeSpace().sectors).toBe(706);
            expect(volume.check().bitMapFindings).toEqual([]);
        });

        it('moves a replaced file to the first free slot', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(10));
            volume.writeFile('b.txt', patternData(10));
            volume.deleteFile('a.txt');

            const entry = volume.writeFile('b.txt', patternData(20, 3));
            expect(entry.slot).toBe(0);
            expect(volume.directory().entry(1).flags).toBe(0x80);
            expect(volume.listEntries().map((e) => e.fileName)).toEqual(['b.txt']);
            expect(volume.readFileData('b.txt')).toEqual(patternData(20, 3));
            expect(readTrailer(volume.readSector(entry.startSector)).fileNumber).toBe(0);
        });

        it('reuses the space of the file it replaces', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(300));
            volume.writeFile('a.txt', patternData(704 * 125 + 300));
            expect(volume.freeSpace().sectors).toBe(0);
        });

        it('changes nothing when the disk is full', () => {
            const { image, volume } = blankVolume();
            volume.writeFile('a.txt', patternData(300));
            const before = image.data.slice();

            const error = caught(() => volume.writeFile('a.txt', patternData(707 * 125 + 1)));
            expect(isDiskError(error, 'InsufficientSpace')).toBe(true);
            expect(image.data).toEqual(before);
            expect(volume.readFileData('a.txt')).toEqual(patternData(300));
        });

        it('changes nothing when the directory is full', () => {
            const { image, volume } = blankVolume();
            for (let idx = 0; idx < 64; idx++) {
                volume.writeFile(`f${idx}`, patternData(1));
            }
            const before = image.data.slice();

            const error = caught(() => volume.writeFile('one.more', patternData(1)));
            expect(isDiskError(error, 'DirectoryFull')).toBe(true);
            expect(image.data).toEqual(before);
        });

        it('reuses a deleted slot in a full directory', () => {
            const { volume } = blankVolume();
            for (let idx = 0; idx < 64; idx++) {
                volume.writeFile(`f${idx}`, patternData(1));
            }
            volume.deleteFile('f10');
            const entry = volume.writeFile('new', patternData(1));
            expect(entry.slot).toBe(10);
            expect(entry.startSector).toBe(14);
            expect(volume.check().files.every((file) => file.findings.length === 0)).toBe(true);
        });
    });

    describe('readFile', () => {
        it('fails for a missing file before reading', () => {
            const { volume } = blankVolume();
            expect(isDiskError(caught(() => volume.readFile('nope')), 'NotFound')).toBe(true);
        });

        it('reads sector by sector', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(130));
            expect([...volume.readFile('a.txt')].map((chunk) => chunk.length)).toEqual([125, 5]);
        });

        it('translates end of line', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', text('ONE\x9bTWO\x9b'));
            expect(concat(...volume.readFile('a.txt', { translate: true }))).toEqual(
                text('ONE\nTWO\n')
            );
        });
    });

    describe('deleteFile', () => {
        it('tombstones the entry and frees its sectors', () => {
            const { volume } = blankVolume();
            volume.writeFile('a.txt', patternData(300));
            const entry = volume.deleteFile('A.TXT');

            expect(entry.startSector).toBe(4);
            expect(volume.freeSpace().sectors).toBe(707);
            expect(volume.listEntries()).toEqual([]);
            expect(volume.directory().entry(0).flags).toBe(0x80);
            expect(isDiskError(caught(() => volume.readFileData('a.txt')), 'NotFound')).toBe(true);
        });

        it('fails for a missing file', () => {
            const { volume } = blankVolume();
            expect(isDiskError(caught(() => volume.deleteFile('nope')), 'NotFound')).toBe(true);
        });
    });

    it('keeps the bitmap in step with the files', () => {
        const { volume } = blankVolume();
        volume.writeFile('a.bin', patternData(1000));
        volume.writeFile('b.bin', patternData(10));
        volume.writeFile('c.bin', patternData(2000));
        volume.deleteFile('b.bin');
        volume.writeFile('d.bin', patternData(500));
        volume.writeFile('a.bin', patternData(50));

        const { bitMap } = volume.vtoc().getBitMap();
        const report = volume.check();
        const reserved = new Set(reservedSectors());
        for (let sector = 0; sector < 720; sector++) {
            const owned = reserved.has(sector) || report.owners[sector] !== -1;
            expect([sector, bitMap.isFree(sector)]).toEqual([sector, !owned]);
        }
        expect(report.bitMapFindings).toEqual([]);
        expect(report.vtocFindings).toEqual([]);
    });

    it('reports free space', () => {
        expect(blankVolume().volume.freeSpace()).toEqual({ sectors: 707, bytes: 90496 });
        expect(blankVolume('enhanced').volume.freeSpace()).toEqual({
            sectors: 1011,
            bytes: 129408,
        });
    });
});
