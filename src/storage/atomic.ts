import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Atomic file publication.
 *
 * Published paths are never written directly: content goes to a temp path in
 * the destination directory (same filesystem) and is renamed over the target,
 * so readers see either the old or the new bytes, never a partial file.
 */

function tempPathFor(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
}

/**
 * Scoped temp-path acquisition: `write` fills the temp path, which is renamed
 * onto `target` when it resolves. On every exit path the temp path is released.
 */
export async function withTempFile<T>(target: string, write: (tempPath: string) => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tempPath = tempPathFor(target);
  try {
    const result = await write(tempPath);
    await fs.rename(tempPath, target);
    return result;
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

export async function writeFileAtomic(target: string, data: Uint8Array | string): Promise<void> {
  await withTempFile(target, tempPath => fs.writeFile(tempPath, data));
}

interface StagedFile {
  target: string;
  tempPath: string;
}

/**
 * Two-phase publication of a set of files.
 *
 * `stage` writes each file to its own temp path; `commit` renames them into
 * place in staging order and only then deletes the paths passed to `retire`.
 * Nothing is renamed unless every stage succeeded, and `discard` (always safe
 * to call) removes whatever is still staged.
 */
export class StagedPublication {
  private staged: StagedFile[] = [];
  private retired: string[] = [];
  private committed = false;

  constructor(private readonly root: string) {}

  /**
   * Write `data` to a temp path beside `relativePath` under the root
   */
  async stage(relativePath: string, data: Uint8Array | string): Promise<void> {
    if (this.committed) {
      throw new Error('publication already committed');
    }
    const target = this.resolve(relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const tempPath = tempPathFor(target);
    this.staged.push({ target, tempPath });
    await fs.writeFile(tempPath, data);
  }

  /**
   * Delete `relativePath` under the root once every staged file is in place
   */
  retire(relativePath: string): void {
    if (this.committed) {
      throw new Error('publication already committed');
    }
    this.retired.push(this.resolve(relativePath));
  }

  /**
   * Rename every staged file onto its target, in staging order, then delete
   * the retired paths
   */
  async commit(): Promise<string[]> {
    this.committed = true;
    const published: string[] = [];
    while (this.staged.length > 0) {
      const [next] = this.staged;
      await fs.rename(next.tempPath, next.target);
      this.staged.shift();
      published.push(this.relative(next.target));
    }
    for (const target of this.retired.splice(0)) {
      await fs.rm(target, { force: true });
    }
    return published;
  }

  /**
   * Remove temp files that were staged but not committed and forget retirements
   */
  async discard(): Promise<void> {
    this.retired.splice(0);
    const leftovers = this.staged.splice(0);
    await Promise.all(leftovers.map(f => fs.rm(f.tempPath, { force: true })));
  }

  private relative(target: string): string {
    return path.relative(this.root, target).split(path.sep).join('/');
  }

  private resolve(relativePath: string): string {
    const target = path.resolve(this.root, relativePath);
    const relative = path.relative(this.root, target);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`refusing to publish outside the repository root: ${relativePath}`);
    }
    return target;
  }
}
