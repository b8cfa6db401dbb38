import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import pRetry from 'p-retry';
import { StorageError, errnoCode, errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { writeFileAtomic } from './atomic';

/**
 * Content-addressed artifact store.
 *
 * Artifacts live at pool/<aa>/<sha256>.deb under the repository root, where
 * <aa> is the first byte of the digest. The path depends only on the bytes,
 * so storing the same artifact twice is a no-op and two uploads racing on
 * the same bytes write the same file.
 */

// errno codes worth another attempt; anything else fails fast
const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

export interface ArtifactStoreOptions {
  /** Extra attempts after the first for transient write failures */
  retries?: number;
  minTimeout?: number;
  maxTimeout?: number;
}

export interface StoredArtifact {
  filepath: string;
  created: boolean;
}

export function poolPath(sha256: string): string {
  if (!/^[0-9a-f]{64}$/.test(sha256)) {
    throw new StorageError(`not a sha256 digest: ${sha256}`);
  }
  return `pool/${sha256.slice(0, 2)}/${sha256}.deb`;
}

export class ArtifactStore {
  private readonly root: string;
  private readonly options: Required<ArtifactStoreOptions>;

  constructor(root: string, options: ArtifactStoreOptions = {}) {
    this.root = root;
    this.options = {
      retries: options.retries ?? 3,
      minTimeout: options.minTimeout ?? 100,
      maxTimeout: options.maxTimeout ?? 2000,
    };
  }

  /**
   * Absolute path of a repository-relative file path
   */
  resolve(filepath: string): string {
    return path.join(this.root, ...filepath.split('/'));
  }

  /**
   * Store artifact bytes under their digest.
   * Resolves once the bytes are durable at the returned filepath.
   */
  async put(bytes: Uint8Array, sha256: string): Promise<StoredArtifact> {
    const filepath = poolPath(sha256);
    const target = this.resolve(filepath);

    if (await this.existsWithSize(target, bytes.byteLength)) {
      logger.debug('Artifact already stored', { filepath });
      return { filepath, created: false };
    }

    try {
      await pRetry(
        async () => {
          try {
            await writeFileAtomic(target, bytes);
          } catch (error) {
            if (!TRANSIENT_CODES.has(errnoCode(error) ?? '')) {
              throw new pRetry.AbortError(error instanceof Error ? error : new Error(String(error)));
            }
            throw error;
          }
        },
        {
          retries: this.options.retries,
          minTimeout: this.options.minTimeout,
          maxTimeout: this.options.maxTimeout,
          onFailedAttempt: error => {
            logger.warn('Artifact write failed, retrying', {
              filepath,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            });
          },
        }
      );
    } catch (error) {
      throw new StorageError(`could not store artifact ${filepath}: ${errorMessage(error)}`, { cause: error });
    }

    logger.debug('Artifact stored', { filepath, size: bytes.byteLength });
    return { filepath, created: true };
  }

  private async existsWithSize(target: string, size: number): Promise<boolean> {
    try {
      const stat = await fs.stat(target);
      return stat.isFile() && stat.size === size;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw new StorageError(`could not inspect ${target}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
