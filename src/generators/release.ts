/**
 * Debian Release File Generator
 *
 * The Release file describes a distribution and lists every index file under
 * dists/<suite>/ with its size and digests, so clients can verify the
 * Packages files they download against a single (signed) document.
 */

import type { FileDigests, ReleaseConfig } from '../types';
import { computeDigests, gzipCompress, xzCompress } from '../utils/crypto';

/**
 * Index files published per architecture, in publication order
 */
export const INDEX_FILE_NAMES = ['Packages', 'Packages.gz', 'Packages.xz'] as const;

export interface ReleaseFileEntry extends FileDigests {
  /** Path relative to dists/<suite>/ */
  path: string;
  size: number;
}

/**
 * In-memory index file with its Release entry
 */
export interface IndexFile {
  entry: ReleaseFileEntry;
  data: Uint8Array;
}

/**
 * Generate Release file content
 */
export function generateReleaseFile(
  config: ReleaseConfig,
  architectures: string[],
  files: ReleaseFileEntry[],
  date: Date
): string {
  const lines: string[] = [];

  lines.push(`Origin: ${config.origin}`);
  lines.push(`Label: ${config.label}`);
  lines.push(`Suite: ${config.suite}`);
  if (config.version) {
    lines.push(`Version: ${config.version}`);
  }
  lines.push(`Codename: ${config.codename}`);
  lines.push(`Date: ${formatReleaseDate(date)}`);
  lines.push(`Architectures: ${[...architectures].sort().join(' ')}`);
  lines.push(`Components: ${config.component}`);
  lines.push(`Description: ${config.description}`);
  // by-hash copies are published for every index
  lines.push('Acquire-By-Hash: yes');

  const sections: [string, keyof FileDigests][] = [
    ['MD5Sum', 'md5'],
    ['SHA1', 'sha1'],
    ['SHA256', 'sha256'],
  ];
  for (const [title, digest] of sections) {
    lines.push(`${title}:`);
    for (const file of files) {
      lines.push(` ${file[digest]} ${file.size.toString().padStart(8)} ${file.path}`);
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Format date in Release file format (RFC 7231 HTTP-date)
 * Example: "Sat, 01 Jan 2024 00:00:00 GMT"
 */
export function formatReleaseDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Build the Packages, Packages.gz and Packages.xz index files for one architecture
 */
export async function buildIndexFilesForArch(
  packagesContent: string,
  component: string,
  architecture: string
): Promise<IndexFile[]> {
  const packagesPath = `${component}/binary-${architecture}/Packages`;
  const packages = new TextEncoder().encode(packagesContent);
  const [packagesGz, packagesXz] = await Promise.all([gzipCompress(packages), xzCompress(packages)]);

  return [
    { entry: describeFile(packagesPath, packages), data: packages },
    { entry: describeFile(`${packagesPath}.gz`, packagesGz), data: packagesGz },
    { entry: describeFile(`${packagesPath}.xz`, packagesXz), data: packagesXz },
  ];
}

export function describeFile(path: string, data: Uint8Array): ReleaseFileEntry {
  return { path, size: data.byteLength, ...computeDigests(data) };
}

/**
 * Path of the Acquire-By-Hash copy of an index file
 */
export function byHashPath(entry: ReleaseFileEntry): string {
  const dir = entry.path.slice(0, entry.path.lastIndexOf('/'));
  return `${dir}/by-hash/SHA256/${entry.sha256}`;
}
