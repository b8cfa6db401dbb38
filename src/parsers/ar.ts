import type { ArEntry } from '../types';
import { ParseError } from '../errors';

/**
 * AR Archive Reader
 *
 * The outer container of a .deb file is an AR archive holding, in order:
 * - debian-binary (format version, "2.0\n")
 * - control.tar[.gz|.xz|.zst] (package metadata)
 * - data.tar[.gz|.xz|.zst|.bz2] (installed files, never inspected here)
 *
 * Member header layout (60 bytes, ASCII, space padded):
 *   name[16] mtime[12] uid[6] gid[6] mode[8] size[10] magic[2] = "`\n"
 * Member data is padded to an even offset.
 */

const AR_MAGIC = '!<arch>\n';
const AR_HEADER_SIZE = 60;
const asciiDecoder = new TextDecoder('ascii');

/**
 * Read every member header of an AR archive.
 * Member data is not copied; use `extractArMember` to get a view of it.
 */
export function parseArHeaders(bytes: Uint8Array): ArEntry[] {
  if (bytes.byteLength < AR_MAGIC.length) {
    throw new ParseError('invalid ar archive: file too short');
  }

  const magic = asciiDecoder.decode(bytes.subarray(0, AR_MAGIC.length));
  if (magic !== AR_MAGIC) {
    throw new ParseError('invalid ar archive: bad magic');
  }

  const entries: ArEntry[] = [];
  let offset = AR_MAGIC.length;

  while (offset < bytes.byteLength) {
    if (offset + AR_HEADER_SIZE > bytes.byteLength) {
      throw new ParseError(`invalid ar archive: truncated member header at offset ${offset}`);
    }

    const header = asciiDecoder.decode(bytes.subarray(offset, offset + AR_HEADER_SIZE));
    if (header.slice(58, 60) !== '`\n') {
      throw new ParseError(`invalid ar archive: bad member header magic at offset ${offset}`);
    }

    const size = parseDecimalField(header.slice(48, 58), 'size', offset);
    let dataOffset = offset + AR_HEADER_SIZE;
    let dataSize = size;
    let name = header.slice(0, 16).trim();

    // BSD long names: "#1/<len>", the name is stored at the start of the data
    if (name.startsWith('#1/')) {
      const nameLength = parseDecimalField(name.slice(3), 'name length', offset);
      if (nameLength > size) {
        throw new ParseError(`invalid ar archive: long name exceeds member at offset ${offset}`);
      }
      name = asciiDecoder
        .decode(bytes.subarray(dataOffset, dataOffset + nameLength))
        .replace(/\0+$/, '');
      dataOffset += nameLength;
      dataSize -= nameLength;
    } else if (name.endsWith('/') && name !== '/' && name !== '//') {
      // GNU terminates short names with "/"
      name = name.slice(0, -1);
    }

    if (dataOffset + dataSize > bytes.byteLength) {
      throw new ParseError(
        `invalid ar archive: member "${name}" extends beyond end of file ` +
          `(need ${dataOffset + dataSize} bytes, have ${bytes.byteLength})`
      );
    }

    entries.push({
      name,
      timestamp: parseInt(header.slice(16, 28).trim(), 10) || 0,
      ownerId: parseInt(header.slice(28, 34).trim(), 10) || 0,
      groupId: parseInt(header.slice(34, 40).trim(), 10) || 0,
      mode: parseInt(header.slice(40, 48).trim(), 8) || 0,
      size: dataSize,
      offset: dataOffset,
    });

    offset += AR_HEADER_SIZE + size;
    if (offset % 2 !== 0) {
      offset++;
    }
  }

  return entries;
}

function parseDecimalField(raw: string, field: string, headerOffset: number): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    throw new ParseError(`invalid ar archive: bad ${field} "${text}" at offset ${headerOffset}`);
  }
  return parseInt(text, 10);
}

/**
 * View of a member's data inside the archive bytes
 */
export function extractArMember(bytes: Uint8Array, entry: ArEntry): Uint8Array {
  return bytes.subarray(entry.offset, entry.offset + entry.size);
}

/**
 * Find a member by exact name or pattern
 */
export function findArEntry(entries: ArEntry[], pattern: RegExp | string): ArEntry | undefined {
  if (typeof pattern === 'string') {
    return entries.find(e => e.name === pattern);
  }
  return entries.find(e => pattern.test(e.name));
}
