import {
    ATR_HEADER_SIZE,
    createAtrImage,
    geometryForImageSize,
} from 'js/formats/atr';
import { isDiskError } from 'js/formats/atari_dos/errors';

describe('ATR container', () => {
    describe('geometryForImageSize', () => {
        it('recognizes single density images', () => {
            const geometry = geometryForImageSize(92176);
            expect(geometry.name).toBe('standard');
            expect(geometry.addressableSectors).toBe(720);
        });

        it('recognizes enhanced density images', () => {
            const geometry = geometryForImageSize(133136);
            expect(geometry.name).toBe('enhanced');
            expect(geometry.addressableSectors).toBe(1024);
            expect(geometry.sectorCount).toBe(1040);
        });

        it('rejects other sizes', () => {
            expect(() => geometryForImageSize(92175)).toThrow(/Unknown disk size 92175/);
        });

        it('rejects with GeometryUnrecognized', () => {
            let error: unknown;
            try {
                geometryForImageSize(ATR_HEADER_SIZE);
            } catch (e) {
                error = e;
            }
            expect(isDiskError(error, 'GeometryUnrecognized')).toBe(true);
        });
    });

    describe('createAtrImage', () => {
        it('writes a single density header', () => {
            const image = createAtrImage('standard');
            expect(image.length).toBe(92176);
            expect([...image.subarray(0, 8)]).toEqual([
                0x96, 0x02, 0x80, 0x16, 0x80, 0x00, 0x00, 0x00,
            ]);
        });

        it('writes an enhanced density header', () => {
            const image = createAtrImage('enhanced');
            expect(image.length).toBe(133136);
            expect([...image.subarray(0, 8)]).toEqual([
                0x96, 0x02, 0x80, 0x20, 0x80, 0x00, 0x00, 0x00,
            ]);
        });

        it('leaves the sector data empty', () => {
            const image = createAtrImage();
            expect(image.subarray(ATR_HEADER_SIZE).every((b) => b === 0)).toBe(true);
        });
    });
});
