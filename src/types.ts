/**
 * A single `Key: Value` field of a Debian control stanza.
 *
 * `value` holds the first-line text followed by every continuation line
 * verbatim (leading whitespace included), joined by "\n".
 */
export interface ControlField {
  name: string;
  value: string;
}

/**
 * Ordered control stanza, as found in a .deb control file or a Packages entry
 */
export type ControlStanza = ControlField[];

/**
 * Lowercase hex digests of a byte sequence
 */
export interface FileDigests {
  md5: string;
  sha1: string;
  sha256: string;
}

/**
 * Natural key of a cataloged package
 */
export interface PackageKey {
  name: string;
  version: string;
  architecture: string;
}

/**
 * One catalog row describing an ingested .deb artifact.
 *
 * Not to be confused with this project's own npm package: a CatalogPackage is
 * always third-party content that was uploaded into the repository.
 */
export interface CatalogPackage extends PackageKey {
  /** Control file text as extracted from the artifact */
  control: string;
  size: number;
  /** Location of the artifact relative to the repository root */
  filepath: string;
  digests: FileDigests;
  descriptionMd5: string;
}

/**
 * Result of extracting a .deb upload
 */
export interface ExtractedControl {
  stanza: ControlStanza;
  controlText: string;
}

/**
 * AR archive file entry
 */
export interface ArEntry {
  name: string;
  timestamp: number;
  ownerId: number;
  groupId: number;
  mode: number;
  size: number;
  offset: number;
}

/**
 * TAR archive file entry
 */
export interface TarEntry {
  name: string;
  size: number;
  data: Uint8Array;
}

/**
 * Header fields of a generated Release file
 */
export interface ReleaseConfig {
  origin: string;
  label: string;
  suite: string;
  codename: string;
  version?: string;
  description: string;
  component: string;
}
