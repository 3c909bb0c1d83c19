import { EXTENSION_LENGTH, NAME_LENGTH } from './constants';

export interface AtariName {
    /** Upper case, space padded to 8 characters */
    name: string;
    /** Upper case, space padded to 3 characters */
    ext: string;
}

function upper(name: string) {
    return name.replace(/[a-z]/g, (c) => c.toUpperCase());
}

function lower(name: string) {
    return name.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

/**
 * Converts a host file name into directory form. Characters beyond the
 * eighth before the dot, or the third after it, are dropped.
 *
 * @example
 * toAtariName('hello.txt'); // { name: 'HELLO   ', ext: 'TXT' }
 */
export function toAtariName(fileName: string): AtariName {
    const dot = fileName.indexOf('.');
    const base = dot === -1 ? fileName : fileName.slice(0, dot);
    const ext = dot === -1 ? '' : fileName.slice(dot + 1);

    return {
        name: upper(base.slice(0, NAME_LENGTH)).padEnd(NAME_LENGTH, ' '),
        ext: upper(ext.slice(0, EXTENSION_LENGTH)).padEnd(EXTENSION_LENGTH, ' '),
    };
}

/**
 * Converts a directory name into a lower case host name. An empty
 * extension is omitted along with its dot.
 */
export function fromAtariName({ name, ext }: AtariName): string {
    const base = lower(name).replace(/ +$/, '');
    const suffix = lower(ext).replace(/ +$/, '');
    return suffix ? `${base}.${suffix}` : base;
}

/**
 * Puts a user supplied name into the form `fromAtariName` returns, so two
 * spellings of the same directory name compare equal.
 */
export function normalizeName(fileName: string): string {
    return fromAtariName(toAtariName(fileName));
}

/** Returns the last path segment of a host path. */
export function baseName(path: string): string {
    const slash = path.lastIndexOf('/');
    return slash === -1 ? path : path.slice(slash + 1);
}
