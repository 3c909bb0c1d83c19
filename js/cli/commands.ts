import { formatCheckReport, countFindings } from '../formats/atari_dos/check';
import { copyIn, copyOut, createImageFile } from '../formats/atari_dos/host_files';
import { formatFreeSpace, formatListing } from '../formats/atari_dos/listing';
import { baseName } from '../formats/atari_dos/utils';
import { withAtrFile } from '../formats/file_image';
import { debug } from '../util';

/*eslint no-console: 0*/

/**
 * Where command output goes. Text lines and raw file data are kept apart
 * so `cat` can pass bytes through untouched.
 */
export interface Output {
    log(line: string): void;
    error(line: string): void;
    write(data: Uint8Array): void;
}

export const consoleOutput: Output = {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
    write: (data) => {
        process.stdout.write(data);
    },
};

export interface CommandOptions {
    /** Long directory listing */
    long: boolean;
    /** Show .SYS files */
    all: boolean;
    /** One name per line */
    single: boolean;
    /** Convert ATASCII end of line to line feed in `cat` */
    eol: boolean;
    /** Create enhanced density images */
    enhanced: boolean;
}

export const DEFAULT_OPTIONS: CommandOptions = {
    long: false,
    all: false,
    single: false,
    eol: false,
    enhanced: false,
};

class UsageError extends Error {}

function required(args: string[], idx: number, message: string) {
    const value = args[idx];
    if (value === undefined) {
        throw new UsageError(message);
    }
    return value;
}

function dispatch(
    image: string,
    command: string,
    args: string[],
    options: CommandOptions,
    out: Output
): number {
    switch (command) {
        case 'ls':
            for (const line of withAtrFile(image, (volume) => formatListing(volume, options), true)) {
                out.log(line);
            }
            return 0;
        case 'cat': {
            const name = required(args, 0, 'Missing file name to cat');
            withAtrFile(image, (volume) => {
                for (const chunk of volume.readFile(name, { translate: options.eol })) {
                    out.write(chunk);
                }
            }, true);
            return 0;
        }
        case 'get': {
            const name = required(args, 0, 'Missing file name to get');
            const bytes = withAtrFile(image, (volume) => copyOut(volume, name, args[1]), true);
            debug(`Copied ${bytes} bytes`);
            return 0;
        }
        case 'put': {
            const local = required(args, 0, 'Missing file name to put');
            const name = args[1] ?? baseName(local);
            out.log(name);
            withAtrFile(image, (volume) => copyIn(volume, local, name));
            return 0;
        }
        case 'free':
            out.log(formatFreeSpace(withAtrFile(image, (volume) => volume.freeSpace(), true)));
            return 0;
        case 'rm': {
            const name = required(args, 0, 'Missing name to delete');
            withAtrFile(image, (volume) => volume.deleteFile(name));
            return 0;
        }
        case 'check': {
            const report = withAtrFile(image, (volume) => volume.check(), true);
            for (const line of formatCheckReport(report)) {
                out.log(line);
            }
            return countFindings(report) ? 1 : 0;
        }
        case 'dump': {
            const sector = Number(required(args, 0, 'Missing sector number to dump'));
            out.log(withAtrFile(image, (volume) => volume.dumpSector(sector), true).trimEnd());
            return 0;
        }
        case 'create':
            createImageFile(image, options.enhanced ? 'enhanced' : 'standard');
            return 0;
        default:
            throw new UsageError(`Unknown command '${command}'`);
    }
}

/**
 * Runs one command against the image at `image`. With no command a
 * directory listing is produced.
 *
 * @returns process exit code
 */
export function runCommand(
    image: string,
    input: string[],
    options: Partial<CommandOptions> = {},
    out: Output = consoleOutput
): number {
    const [command = 'ls', ...args] = input;
    try {
        return dispatch(image, command, args, { ...DEFAULT_OPTIONS, ...options }, out);
    } catch (e) {
        out.error(e instanceof Error ? e.message : String(e));
        return 1;
    }
}
