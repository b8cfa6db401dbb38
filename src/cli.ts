#!/usr/bin/env node

import * as fs from 'node:fs/promises';
import { Command, CommanderError } from 'commander';
import { loadConfig, type Config } from './config';
import { errorMessage } from './errors';
import { openRepository, startServer } from './server';
import type { GenerationResult } from './generators/repository';
import type { IngestResult } from './services/ingest';
import { logger } from './utils/logger';

const VERSION = '1.0.0';

interface PublishOptions {
  architecture: string;
}

export interface PublishOutcome {
  ingested: IngestResult;
  generated: GenerationResult;
}

function configure(env: NodeJS.ProcessEnv): Config {
  const config = loadConfig(env);
  logger.setLevel(config.logLevel);
  return config;
}

/**
 * Ingest one artifact and regenerate the indices. An artifact whose
 * (name, version, architecture) is already cataloged counts as published.
 */
export async function publish(config: Config, debPath: string, architecture: string): Promise<PublishOutcome> {
  const bytes = await fs.readFile(debPath);
  const repository = openRepository(config);
  try {
    const ingested = await repository.ingestion.ingest(new Uint8Array(bytes), {
      expectedArchitecture: architecture,
      ignoreExisting: true,
    });
    const generated = await repository.generator.generate();
    return { ingested, generated };
  } finally {
    await repository.catalog.close();
  }
}

export async function regenerate(config: Config): Promise<GenerationResult> {
  const repository = openRepository(config);
  try {
    return await repository.generator.generate();
  } finally {
    await repository.catalog.close();
  }
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('debhost')
    .description('Ingest .deb artifacts and publish an APT repository')
    .version(VERSION, '-v, --version')
    // commander reports through exceptions handled in main()
    .exitOverride();

  program
    .command('publish')
    .description('Ingest a .deb artifact and regenerate the repository indices')
    .argument('<deb>', 'path to the .deb file')
    .requiredOption('-a, --architecture <arch>', 'architecture the artifact must declare')
    .action(async (debPath: string, options: PublishOptions) => {
      const { ingested, generated } = await publish(configure(env), debPath, options.architecture);
      logger.info(ingested.created ? 'Published package' : 'Package was already published', {
        name: ingested.name,
        version: ingested.version,
        architecture: ingested.architecture,
        filepath: ingested.filepath,
        files: generated.files.length,
      });
    });

  program
    .command('regenerate')
    .description('Rebuild Packages and Release for every cataloged architecture')
    .action(async () => {
      const result = await regenerate(configure(env));
      logger.info('Regenerated repository', { suite: result.suite, architectures: result.architectures });
    });

  program
    .command('serve')
    .description('Start the HTTP upload and regeneration endpoint')
    .action(async () => {
      const running = await startServer(configure(env));
      const shutdown = (signal: string): void => {
        logger.info('Shutting down', { signal });
        running.stop().then(
          () => process.exit(0),
          error => {
            logger.logError(error, 'Shutdown failed');
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its message
      return error.exitCode;
    }
    logger.error(errorMessage(error));
    return 1;
  }
}

if (require.main === module) {
  void main().then(code => {
    process.exitCode = code;
  });
}
