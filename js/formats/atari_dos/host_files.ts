import fs from 'fs';

import { GeometryName, MemoryImage } from '../types';
import { createAtrImage } from '../atr';
import { AtariDOSVolume, formatVolume } from './atari_dos_volume';
import type { DirectoryEntry } from './directory';
import { DiskError } from './errors';
import { baseName } from './utils';

function writeHostFile(localPath: string, data: Uint8Array) {
    try {
        fs.writeFileSync(localPath, data);
    } catch (e) {
        throw new DiskError('IOFailure', `Couldn't write local file '${localPath}'`, e);
    }
}

/**
 * Copies a file from the volume to the host.
 *
 * @param localPath defaults to the Atari name
 * @returns number of bytes copied
 */
export function copyOut(volume: AtariDOSVolume, atariName: string, localPath = atariName) {
    const data = volume.readFileData(atariName);
    writeHostFile(localPath, data);
    return data.length;
}

/**
 * Copies a host file onto the volume, replacing any file of the same name.
 *
 * @param atariName defaults to the last segment of `localPath`
 */
export function copyIn(
    volume: AtariDOSVolume,
    localPath: string,
    atariName = baseName(localPath)
): DirectoryEntry {
    let data: Uint8Array;
    try {
        data = fs.readFileSync(localPath);
    } catch (e) {
        throw new DiskError('IOFailure', `Couldn't read '${localPath}'`, e);
    }
    return volume.writeFile(atariName, data);
}

/**
 * Writes a freshly formatted, empty image to `localPath`.
 */
export function createImageFile(localPath: string, geometry: GeometryName = 'standard') {
    const data = createAtrImage(geometry);
    formatVolume(new MemoryImage(data));
    writeHostFile(localPath, data);
    return data.length;
}
