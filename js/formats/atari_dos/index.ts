export { AtariDOSVolume, formatVolume } from './atari_dos_volume';
export type { FreeSpace } from './atari_dos_volume';
export { BitMap } from './bit_map';
export { sniffBinaryHeader } from './binary_header';
export type { BinaryInfo } from './binary_header';
export { checkVolume, countFindings, formatCheckReport } from './check';
export type { CheckReport, CheckedFile, ChainFinding, BitMapFinding } from './check';
export { Directory } from './directory';
export type { DirectoryEntry } from './directory';
export { DiskError, isDiskError } from './errors';
export type { DiskErrorKind } from './errors';
export { decodeChain, encodeChain, readTrailer, writeTrailer } from './file_chain';
export type { SectorTrailer } from './file_chain';
export { copyIn, copyOut, createImageFile } from './host_files';
export { formatListing, readCatalog, readNames } from './listing';
export type { CatalogEntry, ListingOptions } from './listing';
export { fromAtariName, toAtariName } from './utils';
export { VTOC } from './vtoc';
export type { VTOCFinding } from './vtoc';
export { MemoryImage } from '../types';
export type { Geometry, GeometryName, SectorImage } from '../types';
export { createAtrImage } from '../atr';
export { withAtrFile } from '../file_image';
