/**
 * Digest and compression helpers.
 *
 * APT indices carry MD5, SHA1 and SHA256 side by side, so all three are
 * computed in one pass over the input with node:crypto.
 */

import { createHash } from 'node:crypto';
import { promisify } from 'node:util';
import { gzip, constants as zlibConstants } from 'node:zlib';
import * as lzma from 'lzma-native';
import type { FileDigests } from '../types';

const gzipAsync = promisify(gzip);

type Hashable = string | Uint8Array;

function toBytes(data: Hashable): Uint8Array {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}

/**
 * MD5, SHA1 and SHA256 of the complete input
 */
export function computeDigests(data: Hashable): FileDigests {
  const bytes = toBytes(data);
  const md5 = createHash('md5');
  const sha1 = createHash('sha1');
  const sha256 = createHash('sha256');

  md5.update(bytes);
  sha1.update(bytes);
  sha256.update(bytes);

  return {
    md5: md5.digest('hex'),
    sha1: sha1.digest('hex'),
    sha256: sha256.digest('hex'),
  };
}

/**
 * Description-md5 as published in Packages stanzas: the MD5 of the
 * Description value exactly as rendered after "Description: ", with
 * continuation lines and LF line endings.
 *
 * No trailing newline is hashed. apt-ftparchive and APT's translation lookup
 * hash the value followed by "\n", so their digest for the same package
 * differs from this one.
 */
export function descriptionMd5(description: string): string {
  const normalized = description.replace(/\r\n?/g, '\n');
  return createHash('md5').update(normalized, 'utf8').digest('hex');
}

/**
 * Gzip at maximum compression. node:zlib writes a zero mtime, so identical
 * input always yields identical bytes.
 */
export async function gzipCompress(data: Hashable): Promise<Uint8Array> {
  const compressed = await gzipAsync(toBytes(data), { level: zlibConstants.Z_BEST_COMPRESSION });
  return new Uint8Array(compressed);
}

/**
 * xz at preset 9, as dpkg-scanpackages and apt-ftparchive write Packages.xz.
 * The xz container carries no timestamp, so the output is deterministic too.
 */
export async function xzCompress(data: Hashable): Promise<Uint8Array> {
  const compressed = await lzma.compress(Buffer.from(toBytes(data)), { preset: 9 });
  return new Uint8Array(compressed);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function fromHex(hex: string): Buffer {
  return Buffer.from(hex, 'hex');
}
