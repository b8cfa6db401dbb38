import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { decompress as decompressZstd } from 'fzstd';
import { XzReadableStream } from 'xz-decompress';
import type { ControlStanza, ExtractedControl } from '../types';
import { ParseError, errorMessage } from '../errors';
import { parseArHeaders, extractArMember, findArEntry } from './ar';
import { parseTar, findTarEntry } from './tar';
import { parseControl, getField } from './control';
import { readStreamToBuffer } from '../utils/streams';

/**
 * Debian Package Extractor
 *
 * .deb files are AR archives containing:
 * - debian-binary (version string)
 * - control.tar[.gz|.xz|.zst] (package metadata) - THIS IS WHAT WE PARSE
 * - data.tar.* (actual files) - ignored
 */

const gunzipAsync = promisify(gunzip);

export const REQUIRED_FIELDS = ['Package', 'Version', 'Architecture', 'Description'] as const;

// Debian policy 5.6.1 / 5.6.8
const PACKAGE_NAME = /^[a-z0-9][a-z0-9+.-]+$/;
const ARCHITECTURE_NAME = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Extract and validate the control stanza of a .deb artifact
 */
export async function extractControl(bytes: Uint8Array): Promise<ExtractedControl> {
  const arEntries = parseArHeaders(bytes);

  const controlEntry = findArEntry(arEntries, /^control\.tar(\.(gz|xz|zst))?$/);
  if (!controlEntry) {
    throw new ParseError('no control archive found in .deb package');
  }

  const controlTar = await decompressMember(controlEntry.name, extractArMember(bytes, controlEntry));
  const controlFile = findTarEntry(parseTar(controlTar), /^control$/);
  if (!controlFile) {
    throw new ParseError(`no control file found in ${controlEntry.name}`);
  }

  let controlText: string;
  try {
    controlText = new TextDecoder('utf-8', { fatal: true }).decode(controlFile.data);
  } catch {
    throw new ParseError('control file is not valid UTF-8');
  }
  controlText = controlText.replace(/\r\n?/g, '\n');

  const stanza = parseControl(controlText);
  validateControl(stanza);

  return { stanza, controlText };
}

async function decompressMember(name: string, data: Uint8Array): Promise<Uint8Array> {
  try {
    if (name.endsWith('.gz')) {
      return new Uint8Array(await gunzipAsync(data));
    }
    if (name.endsWith('.xz')) {
      return await decompressXz(data);
    }
    if (name.endsWith('.zst')) {
      return decompressZstd(data);
    }
    return data;
  } catch (error) {
    throw new ParseError(`could not decompress ${name}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Decompress XZ data using xz-decompress (WASM-based, stream API)
 */
async function decompressXz(data: Uint8Array): Promise<Uint8Array> {
  const compressedStream = new Blob([data]).stream();
  const decompressedStream = new XzReadableStream(compressedStream);

  return readStreamToBuffer(decompressedStream);
}

/**
 * Check required fields and the fields that end up in file paths
 */
export function validateControl(stanza: ControlStanza): void {
  const missing = REQUIRED_FIELDS.filter(name => !getField(stanza, name));
  if (missing.length > 0) {
    throw new ParseError(`missing required fields: ${missing.join(', ')}`);
  }

  for (const name of ['Package', 'Version', 'Architecture'] as const) {
    if (getField(stanza, name)?.includes('\n')) {
      throw new ParseError(`field ${name} must be a single line`);
    }
  }

  const packageName = getField(stanza, 'Package') ?? '';
  if (!PACKAGE_NAME.test(packageName)) {
    throw new ParseError(`invalid package name "${packageName}"`);
  }

  const architecture = getField(stanza, 'Architecture') ?? '';
  if (!ARCHITECTURE_NAME.test(architecture)) {
    throw new ParseError(`invalid architecture "${architecture}"`);
  }
}
