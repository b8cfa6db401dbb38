import { type ServerType, serve } from '@hono/node-server';
import type { Config } from './config';
import { SqliteCatalog } from './catalog/catalog';
import { ArtifactStore } from './storage/pool';
import { IngestionService } from './services/ingest';
import { RepositoryGenerator } from './generators/repository';
import { createApp } from './index';
import { getKeyFingerprint } from './signing/gpg';
import { logger } from './utils/logger';

/**
 * Components shared by the HTTP listener and the command line
 */
export interface Repository {
  catalog: SqliteCatalog;
  store: ArtifactStore;
  ingestion: IngestionService;
  generator: RepositoryGenerator;
}

export function openRepository(config: Config): Repository {
  const catalog = SqliteCatalog.open(config.databasePath);
  const store = new ArtifactStore(config.repoRoot, { retries: config.storeRetries });

  return {
    catalog,
    store,
    ingestion: new IngestionService(catalog, store),
    generator: new RepositoryGenerator({
      catalog,
      root: config.repoRoot,
      release: config.release,
      signing: config.signing,
    }),
  };
}

export interface RunningServer {
  server: ServerType;
  stop(): Promise<void>;
}

/**
 * Start the HTTP listener. Resolves once the port is bound.
 */
export async function startServer(config: Config): Promise<RunningServer> {
  if (config.signing) {
    logger.info('Release signing enabled', { fingerprint: await getKeyFingerprint(config.signing.privateKey) });
  } else {
    logger.warn('No signing key configured; clients need [trusted=yes]');
  }

  const repository = openRepository(config);
  const handler = createApp({
    ingestion: repository.ingestion,
    generator: repository.generator,
    signing: config.signing,
  });

  return new Promise(resolve => {
    const options = { fetch: (request: Request) => handler.fetch(request), port: config.port, hostname: config.host };
    const server = serve(options, info => {
      logger.info('Listening', { host: config.host, port: info.port, root: config.repoRoot });

      const stop = (): Promise<void> =>
        new Promise<void>(done => {
          server.close(() => {
            repository.catalog
              .close()
              .catch(error => logger.logError(error, 'Closing catalog failed'))
              .finally(() => done());
          });
        });

      resolve({ server, stop });
    });
  });
}
