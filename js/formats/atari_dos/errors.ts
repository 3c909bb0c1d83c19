import type { MemberOf } from '../../types';

export const DISK_ERROR_KINDS = [
    'NotFound',
    'InsufficientSpace',
    'DirectoryFull',
    'GeometryUnrecognized',
    'IOFailure',
    'InvalidSectorZero',
    'CorruptChain',
] as const;

export type DiskErrorKind = MemberOf<typeof DISK_ERROR_KINDS>;

export class DiskError extends Error {
    constructor(
        readonly kind: DiskErrorKind,
        message: string,
        readonly cause?: unknown
    ) {
        super(message);
        this.name = 'DiskError';
    }
}

/** Type guard for a `DiskError`, optionally of a given kind. */
export function isDiskError(e: unknown, kind?: DiskErrorKind): e is DiskError {
    return e instanceof DiskError && (!kind || e.kind === kind);
}
