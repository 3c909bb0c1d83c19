import fs from 'fs';

import { AtariDOSVolume } from './atari_dos/atari_dos_volume';
import { DiskError } from './atari_dos/errors';
import { SectorImage } from './types';

function openFile(path: string, readOnly: boolean) {
    let fd: number;
    try {
        fd = fs.openSync(path, readOnly ? 'r' : 'r+');
    } catch (e) {
        throw new DiskError('IOFailure', `Couldn't open '${path}'`, e);
    }
    try {
        return { fd, size: fs.fstatSync(fd).size };
    } catch (e) {
        fs.closeSync(fd);
        throw new DiskError('IOFailure', `Couldn't get size of '${path}'`, e);
    }
}

/**
 * Image backed by an open host file. Reads and writes go straight to the
 * file; nothing is buffered.
 */
export class FileImage implements SectorImage {
    private fd: number | null;
    readonly byteLength: number;

    constructor(readonly path: string, readOnly = false) {
        const { fd, size } = openFile(path, readOnly);
        this.fd = fd;
        this.byteLength = size;
    }

    private handle() {
        if (this.fd === null) {
            throw new DiskError('IOFailure', `'${this.path}' is closed`);
        }
        return this.fd;
    }

    read(offset: number, length: number): Uint8Array {
        const data = new Uint8Array(length);
        const count = fs.readSync(this.handle(), data, 0, length, offset);
        return data.subarray(0, count);
    }

    write(offset: number, data: Uint8Array): number {
        return fs.writeSync(this.handle(), data, 0, data.length, offset);
    }

    close() {
        if (this.fd !== null) {
            const fd = this.fd;
            this.fd = null;
            fs.closeSync(fd);
        }
    }
}

/**
 * Opens the image at `path`, runs `fn` against its volume and closes the
 * file again however `fn` exits. The geometry is checked before `fn` runs,
 * so an unrecognized image is never modified.
 */
export function withAtrFile<T>(
    path: string,
    fn: (volume: AtariDOSVolume) => T,
    readOnly = false
): T {
    const image = new FileImage(path, readOnly);
    try {
        return fn(AtariDOSVolume.open(image));
    } finally {
        image.close();
    }
}
