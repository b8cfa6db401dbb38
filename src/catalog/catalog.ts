import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import type { CatalogPackage, PackageKey } from '../types';
import { DuplicatePackage, StorageError, errorMessage } from '../errors';
import { fromHex, toHex } from '../utils/crypto';

/**
 * Package catalog: one immutable row per (name, version, architecture).
 *
 * The unique index is the only concurrency control for ingestion: of any
 * number of concurrent inserts for one key exactly one commits, the others
 * surface DuplicatePackage.
 */
export interface Catalog {
  /** Persist a new row, or fail with DuplicatePackage leaving the store unchanged */
  insert(pkg: CatalogPackage): Promise<void>;
  /** All rows for one architecture ordered by name, then version */
  list(architecture: string): Promise<CatalogPackage[]>;
  /** Distinct architectures, ascending */
  architectures(): Promise<string[]>;
  get(key: PackageKey): Promise<CatalogPackage | undefined>;
  close(): Promise<void>;
}

const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

interface PackageRow {
  name: string;
  version: string;
  architecture: string;
  control: string;
  size: number;
  filepath: string;
  md5: Buffer;
  description_md5: Buffer;
  sha1: Buffer;
  sha256: Buffer;
}

const COLUMNS = 'name, version, architecture, control, size, filepath, md5, description_md5, sha1, sha256';

function rowToPackage(row: PackageRow): CatalogPackage {
  return {
    name: row.name,
    version: row.version,
    architecture: row.architecture,
    control: row.control,
    size: row.size,
    filepath: row.filepath,
    digests: {
      md5: toHex(row.md5),
      sha1: toHex(row.sha1),
      sha256: toHex(row.sha256),
    },
    descriptionMd5: toHex(row.description_md5),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Catalog backed by a SQLite database (better-sqlite3).
 * Each instance owns its connection; `:memory:` gives an isolated catalog.
 */
export class SqliteCatalog implements Catalog {
  private db: Database.Database;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open (creating if needed) a catalog database and apply migrations
   */
  static open(databasePath: string): SqliteCatalog {
    let db: Database.Database;
    try {
      if (databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(databasePath), { recursive: true });
      }
      db = new Database(databasePath);
    } catch (error) {
      throw new StorageError(`could not open catalog ${databasePath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      if (databasePath !== ':memory:') {
        db.pragma('journal_mode = WAL');
        db.pragma('synchronous = NORMAL');
      }
      db.pragma('busy_timeout = 5000');
      migrate(db);
    } catch (error) {
      db.close();
      throw new StorageError(`could not migrate catalog ${databasePath}: ${errorMessage(error)}`, { cause: error });
    }

    return new SqliteCatalog(db);
  }

  async insert(pkg: CatalogPackage): Promise<void> {
    try {
      this.db.transaction((p: CatalogPackage) => {
        this.db
          .prepare(`INSERT INTO packages (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
          .run(
            p.name,
            p.version,
            p.architecture,
            p.control,
            p.size,
            p.filepath,
            fromHex(p.digests.md5),
            fromHex(p.descriptionMd5),
            fromHex(p.digests.sha1),
            fromHex(p.digests.sha256)
          );
      })(pkg);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicatePackage(
          { name: pkg.name, version: pkg.version, architecture: pkg.architecture },
          { cause: error }
        );
      }
      throw new StorageError(`catalog insert failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async list(architecture: string): Promise<CatalogPackage[]> {
    // A single statement reads one consistent snapshot
    const rows = this.query<PackageRow>(
      `SELECT ${COLUMNS} FROM packages WHERE architecture = ? ORDER BY name ASC, version ASC`,
      [architecture]
    );
    return rows.map(rowToPackage);
  }

  async architectures(): Promise<string[]> {
    const rows = this.query<{ architecture: string }>(
      'SELECT DISTINCT architecture FROM packages ORDER BY architecture ASC'
    );
    return rows.map(r => r.architecture);
  }

  async get(key: PackageKey): Promise<CatalogPackage | undefined> {
    const rows = this.query<PackageRow>(
      `SELECT ${COLUMNS} FROM packages WHERE name = ? AND version = ? AND architecture = ?`,
      [key.name, key.version, key.architecture]
    );
    return rows.length > 0 ? rowToPackage(rows[0]) : undefined;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      return this.db.prepare<unknown[], T>(sql).all(...params);
    } catch (error) {
      throw new StorageError(`catalog query failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Apply every migration in lexical order. Migrations are written to be
 * idempotent, so re-running them on an existing database is harmless.
 */
function migrate(db: Database.Database): void {
  const files = fs
    .readdirSync(MIGRATIONS_DIR)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const apply = db.transaction(() => {
    for (const file of files) {
      db.exec(fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8'));
    }
  });
  apply();
}
