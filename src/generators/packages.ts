import type { CatalogPackage, ControlStanza } from '../types';
import { parseControl, renderStanza, omitFields } from '../parsers/control';

/**
 * Fields that describe where and how the artifact is published rather than
 * the artifact itself. Any copy in the uploaded control text is dropped and
 * replaced by the catalog's values.
 */
export const LAYOUT_FIELDS = ['Filename', 'Size', 'Description-md5', 'MD5sum', 'SHA1', 'SHA256'] as const;

/**
 * Build the Packages stanza for one catalog row: the stored control fields in
 * their original order, then the layout fields.
 */
export function buildPackageStanza(pkg: CatalogPackage): ControlStanza {
  const stanza = omitFields(parseControl(pkg.control), LAYOUT_FIELDS);

  stanza.push(
    { name: 'Filename', value: pkg.filepath },
    { name: 'Size', value: String(pkg.size) },
    { name: 'Description-md5', value: pkg.descriptionMd5 },
    { name: 'MD5sum', value: pkg.digests.md5 },
    { name: 'SHA1', value: pkg.digests.sha1 },
    { name: 'SHA256', value: pkg.digests.sha256 }
  );

  return stanza;
}

/**
 * Generate a Debian Packages file entry for a single package
 */
export function generatePackageEntry(pkg: CatalogPackage): string {
  return renderStanza(buildPackageStanza(pkg));
}

/**
 * Generate a complete Packages file: every stanza followed by one blank line,
 * LF line endings throughout. Input order is preserved.
 */
export function generatePackagesFile(packages: CatalogPackage[]): string {
  return packages.map(pkg => `${generatePackageEntry(pkg)}\n\n`).join('');
}
