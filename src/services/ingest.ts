import type { CatalogPackage, FileDigests } from '../types';
import type { Catalog } from '../catalog/catalog';
import type { ArtifactStore } from '../storage/pool';
import { DuplicatePackage, ParseError, RepositoryError, StorageError, errorMessage } from '../errors';
import { extractControl } from '../parsers/deb';
import { getField } from '../parsers/control';
import { computeDigests, descriptionMd5 } from '../utils/crypto';
import { logger } from '../utils/logger';

export interface IngestOptions {
  /** Reject the artifact unless its Architecture field equals this */
  expectedArchitecture?: string;
  /** Report an existing (name, version, architecture) as success instead of DuplicatePackage */
  ignoreExisting?: boolean;
}

export interface IngestResult {
  name: string;
  version: string;
  architecture: string;
  filepath: string;
  size: number;
  digests: FileDigests;
  descriptionMd5: string;
  /** False when the key was already cataloged and `ignoreExisting` was set */
  created: boolean;
}

/**
 * Turns uploaded .deb bytes into a catalog row.
 *
 * extract control -> digests -> content-addressed store -> catalog insert.
 * A storage failure aborts before the insert, so no row ever points at a
 * missing artifact. On DuplicatePackage the stored artifact is left alone:
 * its path is derived from its own bytes and may be shared.
 */
export class IngestionService {
  private readonly catalog: Catalog;
  private readonly store: ArtifactStore;

  constructor(catalog: Catalog, store: ArtifactStore) {
    this.catalog = catalog;
    this.store = store;
  }

  async ingest(bytes: Uint8Array, options: IngestOptions = {}): Promise<IngestResult> {
    try {
      return await this.ingestArtifact(bytes, options);
    } catch (error) {
      if (error instanceof RepositoryError) {
        logger.warn('Upload rejected', { code: error.code, error: error.message });
        throw error;
      }
      logger.logError(error, 'Upload failed');
      throw new StorageError(`ingestion failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async ingestArtifact(bytes: Uint8Array, options: IngestOptions): Promise<IngestResult> {
    const { stanza, controlText } = await extractControl(bytes);

    // validated by extractControl
    const name = getField(stanza, 'Package') ?? '';
    const version = getField(stanza, 'Version') ?? '';
    const architecture = getField(stanza, 'Architecture') ?? '';
    const description = getField(stanza, 'Description') ?? '';

    if (options.expectedArchitecture !== undefined && options.expectedArchitecture !== architecture) {
      throw new ParseError(
        `artifact architecture ${architecture} does not match expected ${options.expectedArchitecture}`
      );
    }

    const digests = computeDigests(bytes);
    const stored = await this.store.put(bytes, digests.sha256);

    const pkg: CatalogPackage = {
      name,
      version,
      architecture,
      control: controlText,
      size: bytes.byteLength,
      filepath: stored.filepath,
      digests,
      descriptionMd5: descriptionMd5(description),
    };

    try {
      await this.catalog.insert(pkg);
    } catch (error) {
      if (error instanceof DuplicatePackage && options.ignoreExisting) {
        logger.info('Package already cataloged', { name, version, architecture });
        const existing = await this.catalog.get(error.key);
        return { ...toResult(existing ?? pkg), created: false };
      }
      throw error;
    }

    logger.info('Package cataloged', { name, version, architecture, filepath: stored.filepath });
    return { ...toResult(pkg), created: true };
  }
}

function toResult(pkg: CatalogPackage): Omit<IngestResult, 'created'> {
  return {
    name: pkg.name,
    version: pkg.version,
    architecture: pkg.architecture,
    filepath: pkg.filepath,
    size: pkg.size,
    digests: pkg.digests,
    descriptionMd5: pkg.descriptionMd5,
  };
}
