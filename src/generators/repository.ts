import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Dirent } from 'node:fs';
import type { ReleaseConfig } from '../types';
import type { Catalog } from '../catalog/catalog';
import type { SigningConfig } from '../config';
import { GenerationError, RepositoryError, errnoCode, errorMessage } from '../errors';
import { StagedPublication } from '../storage/atomic';
import { signCleartext, signDetached, extractPublicKey } from '../signing/gpg';
import { logger } from '../utils/logger';
import { generatePackagesFile } from './packages';
import { generateReleaseFile, buildIndexFilesForArch, byHashPath, INDEX_FILE_NAMES, type IndexFile } from './release';

export interface RepositoryGeneratorOptions {
  catalog: Catalog;
  /** Repository root; indices go to dists/<suite>/ beneath it */
  root: string;
  release: ReleaseConfig;
  signing?: SigningConfig;
  now?: () => Date;
}

export interface GenerationResult {
  suite: string;
  /** Package count per architecture */
  architectures: Record<string, number>;
  /** Published paths relative to the repository root, in rename order */
  files: string[];
  /** Index files of architectures that left the catalog, deleted after the renames */
  removed: string[];
  release: string;
}

/**
 * In-memory output of one generation pass
 */
export interface GeneratedIndices {
  architectures: Record<string, number>;
  indexFiles: IndexFile[];
  packagesByArch: Record<string, string>;
  release: string;
}

/**
 * Rebuilds the APT index files of the repository from the catalog.
 *
 * A pass reads one snapshot per architecture, renders everything in memory,
 * stages every file to a temp path and only then renames them into place:
 * by-hash copies first, then Packages files, then Release and its
 * signatures. Packages files of architectures no longer in the catalog are
 * deleted last; their by-hash copies stay. A failure before the renames
 * leaves the published tree as it was. Concurrent passes are independent;
 * the last rename wins.
 */
export class RepositoryGenerator {
  private readonly catalog: Catalog;
  private readonly root: string;
  private readonly release: ReleaseConfig;
  private readonly signing?: SigningConfig;
  private readonly now: () => Date;

  constructor(options: RepositoryGeneratorOptions) {
    this.catalog = options.catalog;
    this.root = options.root;
    this.release = options.release;
    this.signing = options.signing;
    this.now = options.now ?? (() => new Date());
  }

  get distPath(): string {
    return `dists/${this.release.suite}`;
  }

  /**
   * Render Packages and Release content for every cataloged architecture
   * without touching the filesystem
   */
  async render(): Promise<GeneratedIndices> {
    const architectures: Record<string, number> = {};
    const packagesByArch: Record<string, string> = {};
    const indexFiles: IndexFile[] = [];

    for (const architecture of await this.catalog.architectures()) {
      const packages = await this.catalog.list(architecture);
      const content = generatePackagesFile(packages);

      architectures[architecture] = packages.length;
      packagesByArch[architecture] = content;
      indexFiles.push(...(await buildIndexFilesForArch(content, this.release.component, architecture)));
    }

    const release = generateReleaseFile(
      this.release,
      Object.keys(architectures),
      indexFiles.map(f => f.entry),
      this.now()
    );

    return { architectures, indexFiles, packagesByArch, release };
  }

  /**
   * Regenerate and publish every index file
   */
  async generate(): Promise<GenerationResult> {
    logger.info('Regenerating repository indices', { suite: this.release.suite });

    let rendered: GeneratedIndices;
    try {
      rendered = await this.render();
    } catch (error) {
      throw this.wrap('could not render indices', error);
    }

    const publication = new StagedPublication(this.root);
    let removed: string[];
    try {
      removed = await this.stage(publication, rendered);
    } catch (error) {
      await publication.discard();
      throw this.wrap('could not stage indices', error);
    }

    let files: string[];
    try {
      files = await publication.commit();
    } catch (error) {
      throw this.wrap('could not publish indices', error);
    } finally {
      await publication.discard();
    }

    logger.info('Repository indices published', {
      suite: this.release.suite,
      architectures: rendered.architectures,
      files: files.length,
    });
    if (removed.length > 0) {
      logger.info('Removed indices of uncataloged architectures', { files: removed });
    }

    return {
      suite: this.release.suite,
      architectures: rendered.architectures,
      files,
      removed,
      release: rendered.release,
    };
  }

  /**
   * Stage every file and retire stale indices; resolves to the retired paths
   */
  private async stage(publication: StagedPublication, rendered: GeneratedIndices): Promise<string[]> {
    const dist = this.distPath;

    for (const file of rendered.indexFiles) {
      await publication.stage(`${dist}/${byHashPath(file.entry)}`, file.data);
    }
    for (const file of rendered.indexFiles) {
      await publication.stage(`${dist}/${file.entry.path}`, file.data);
    }

    await publication.stage(`${dist}/Release`, rendered.release);

    if (this.signing) {
      await publication.stage(`${dist}/InRelease`, await signCleartext(rendered.release, this.signing));
      await publication.stage(`${dist}/Release.gpg`, await signDetached(rendered.release, this.signing));
      await publication.stage('public.key', await extractPublicKey(this.signing.privateKey));
    }

    const stale = await this.staleIndices(Object.keys(rendered.architectures));
    for (const file of stale) {
      publication.retire(file);
    }
    return stale;
  }

  /**
   * Packages files under binary-* directories whose architecture has no
   * catalog rows
   */
  private async staleIndices(cataloged: string[]): Promise<string[]> {
    const componentPath = `${this.distPath}/${this.release.component}`;
    const componentDir = path.join(this.root, ...componentPath.split('/'));

    let entries: Dirent[];
    try {
      entries = await fs.readdir(componentDir, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const stale: string[] = [];
    for (const entry of entries) {
      const architecture = /^binary-(.+)$/.exec(entry.name)?.[1];
      if (!entry.isDirectory() || architecture === undefined || cataloged.includes(architecture)) {
        continue;
      }
      const present = new Set(await fs.readdir(path.join(componentDir, entry.name)));
      for (const name of INDEX_FILE_NAMES) {
        if (present.has(name)) {
          stale.push(`${componentPath}/${entry.name}/${name}`);
        }
      }
    }
    return stale.sort();
  }

  private wrap(context: string, error: unknown): GenerationError {
    logger.logError(error, `Repository generation failed (${context})`);
    if (error instanceof GenerationError) {
      return error;
    }
    const detail = error instanceof RepositoryError ? `${error.code}: ${error.message}` : errorMessage(error);
    return new GenerationError(`${context}: ${detail}`, { cause: error });
  }
}
