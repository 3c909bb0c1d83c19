/**
 * Atari DOS 2.0S / 2.5 on-disk layout. See
 * http://atari.kensclassics.org/dos.htm for the format descriptions.
 */

/** Sector size in bytes */
export const SECTOR_SIZE = 128;

/** Boot sectors, always reserved */
export const BOOT_SECTORS = [1, 2, 3] as const;

/** VTOC / free space bitmap */
export const VTOC_SECTOR = 0x168;

/** Second VTOC, enhanced density only */
export const VTOC2_SECTOR = 0x400;

/** First directory sector */
export const DIRECTORY_SECTOR = 0x169;

/** Number of directory sectors */
export const DIRECTORY_SECTOR_COUNT = 8;

/** Size of a directory entry */
export const ENTRY_SIZE = 16;

export const ENTRIES_PER_SECTOR = SECTOR_SIZE / ENTRY_SIZE;

export const DIRECTORY_ENTRY_COUNT = DIRECTORY_SECTOR_COUNT * ENTRIES_PER_SECTOR;

/** DOS code stored in the VTOC */
export const DOS_TYPE_CODE = 2;

/**
 * VTOC sector offsets
 */
export const VTOC_OFFSETS = {
    TYPE: 0x00,
    TOTAL_SECTORS: 0x01,
    FREE_SECTORS: 0x03,
    BITMAP: 0x0a,
} as const;

/**
 * VTOC2 sector offsets. The first 84 bytes repeat bitmap bytes 6..89 of the
 * VTOC (sectors 48..719). They are written but never read.
 */
export const VTOC2_OFFSETS = {
    MIRROR: 0x00,
    BITMAP: 0x54,
    FREE_SECTORS: 0x7a,
} as const;

/** Bitmap bytes held in the VTOC, sectors 0..719 */
export const VTOC_BITMAP_SIZE = 90;

/** Bitmap bytes for enhanced density, sectors 0..1023 */
export const ENHANCED_BITMAP_SIZE = 128;

/** First bitmap byte mirrored into VTOC2 */
export const VTOC2_MIRROR_START = 6;

/**
 * Directory entry offsets
 */
export const ENTRY_OFFSETS = {
    FLAGS: 0x00,
    SECTOR_COUNT: 0x01,
    START_SECTOR: 0x03,
    NAME: 0x05,
    EXTENSION: 0x0d,
} as const;

export const NAME_LENGTH = 8;
export const EXTENSION_LENGTH = 3;

/**
 * Directory entry flag bits
 */
export const ENTRY_FLAGS = {
    NEVER_USED: 0x00,
    DELETED: 0x80,
    IN_USE: 0x40,
    LOCKED: 0x20,
    DOS2: 0x02,
    OPENED: 0x01,
} as const;

/** First 125 bytes of a data sector hold file data */
export const DATA_SIZE = 125;

/**
 * Data sector trailer offsets. Byte 125 holds the file number in its upper
 * six bits and the high two bits of the next sector in its lower two.
 */
export const TRAILER_OFFSETS = {
    FILE_NUMBER: 0x7d,
    NEXT_HIGH: 0x7d,
    NEXT_LOW: 0x7e,
    BYTE_COUNT: 0x7f,
} as const;

/** ATASCII end of line */
export const ATASCII_EOL = 0x9b;

/** ASCII line feed */
export const LINE_FEED = 0x0a;
