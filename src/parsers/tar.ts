import type { TarEntry } from '../types';
import { ParseError } from '../errors';

/**
 * TAR Archive Reader
 *
 * Reads v7/ustar archives well enough to pull regular files out of a .deb
 * control tarball. Each member is a 512-byte header followed by its data
 * rounded up to 512 bytes; two zero blocks (or end of input) end the archive.
 */

const TAR_BLOCK_SIZE = 512;
const textDecoder = new TextDecoder('utf-8');

// Header type flags that carry metadata rather than file content
const SKIPPED_TYPES = new Set(['1', '2', '3', '4', '5', '6', 'L', 'K', 'x', 'g']);

/**
 * Parse a tar archive and return its regular files
 */
export function parseTar(bytes: Uint8Array): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;
  let pendingLongName: string | undefined;

  while (offset + TAR_BLOCK_SIZE <= bytes.byteLength) {
    const header = bytes.subarray(offset, offset + TAR_BLOCK_SIZE);
    if (isZeroBlock(header)) {
      break;
    }

    verifyChecksum(header, offset);

    const size = readOctal(header, 124, 12);
    const typeFlag = header[156] === 0 ? '0' : String.fromCharCode(header[156]);
    const dataStart = offset + TAR_BLOCK_SIZE;
    const dataEnd = dataStart + size;

    if (dataEnd > bytes.byteLength) {
      throw new ParseError(`invalid tar archive: entry at offset ${offset} extends beyond end of archive`);
    }

    if (typeFlag === 'L') {
      // GNU long name: the next header's real name is stored as this entry's data
      pendingLongName = readString(bytes.subarray(dataStart, dataEnd), 0, size);
    } else if (!SKIPPED_TYPES.has(typeFlag)) {
      entries.push({
        name: normalizeName(pendingLongName ?? readEntryName(header)),
        size,
        data: bytes.slice(dataStart, dataEnd),
      });
      pendingLongName = undefined;
    }

    offset = dataStart + Math.ceil(size / TAR_BLOCK_SIZE) * TAR_BLOCK_SIZE;
  }

  return entries;
}

function readEntryName(header: Uint8Array): string {
  const name = readString(header, 0, 100);
  const magic = textDecoder.decode(header.subarray(257, 262));
  if (magic === 'ustar') {
    const prefix = readString(header, 345, 155);
    if (prefix) {
      return `${prefix}/${name}`;
    }
  }
  return name;
}

function normalizeName(name: string): string {
  return name.replace(/^(\.\/)+/, '');
}

/**
 * Extract a NUL-terminated string from a header field
 */
function readString(block: Uint8Array, offset: number, length: number): string {
  const field = block.subarray(offset, offset + length);
  const end = field.indexOf(0);
  return textDecoder.decode(end === -1 ? field : field.subarray(0, end)).trim();
}

function readOctal(block: Uint8Array, offset: number, length: number): number {
  const text = readString(block, offset, length);
  if (!text) return 0;
  if (!/^[0-7]+$/.test(text)) {
    throw new ParseError(`invalid tar archive: bad octal field "${text}"`);
  }
  return parseInt(text, 8);
}

/**
 * The checksum is the byte sum of the header with the checksum field read as spaces
 */
function verifyChecksum(header: Uint8Array, offset: number): void {
  const expected = readOctal(header, 148, 8);
  let sum = 0;
  for (let i = 0; i < TAR_BLOCK_SIZE; i++) {
    sum += i >= 148 && i < 156 ? 0x20 : header[i];
  }
  if (sum !== expected) {
    throw new ParseError(`invalid tar archive: header checksum mismatch at offset ${offset}`);
  }
}

function isZeroBlock(block: Uint8Array): boolean {
  return block.every(b => b === 0);
}

/**
 * Find a file by name (matched with or without leading directories) or pattern
 */
export function findTarEntry(entries: TarEntry[], pattern: RegExp | string): TarEntry | undefined {
  if (typeof pattern === 'string') {
    return entries.find(e => e.name === pattern || e.name.endsWith('/' + pattern));
  }
  return entries.find(e => pattern.test(e.name));
}
