import type { PackageKey } from './types';

/**
 * Error taxonomy shared by every repository component.
 *
 * Components wrap low-level failures (fs, SQLite, decompression) into one of
 * these classes so that boundary code only has to switch on `code`.
 */
export abstract class RepositoryError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed archive container or control file. Nothing was persisted.
 */
export class ParseError extends RepositoryError {
  readonly code = 'PARSE_ERROR';
}

/**
 * The catalog already holds a row with the same (name, version, architecture).
 */
export class DuplicatePackage extends RepositoryError {
  readonly code = 'DUPLICATE_PACKAGE';
  readonly key: PackageKey;

  constructor(key: PackageKey, options?: { cause?: unknown }) {
    super(`package ${key.name} ${key.version} (${key.architecture}) already exists`, options);
    this.key = key;
  }
}

/**
 * I/O or database failure while storing an artifact or catalog row
 */
export class StorageError extends RepositoryError {
  readonly code = 'STORAGE_ERROR';
  override readonly retryable = true;
}

/**
 * Index regeneration failed before anything was renamed into place
 */
export class GenerationError extends RepositoryError {
  readonly code = 'GENERATION_ERROR';
}

export class ConfigError extends RepositoryError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * errno code (ENOENT, EBUSY, ...) of a failed fs call
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
