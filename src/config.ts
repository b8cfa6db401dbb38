import * as path from 'node:path';
import { z } from 'zod';
import type { ReleaseConfig } from './types';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './utils/logger';

/**
 * Environment-driven configuration.
 *
 * Every variable is optional; defaults suit a local checkout. Values are
 * validated once at startup and passed explicitly to each component.
 */

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value : undefined));

const segment = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be a single path segment');

export const EnvSchema = z.object({
  REPO_ROOT: z.string().min(1).default('./repo'),
  DATABASE_PATH: z.string().min(1).default('./catalog.db'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RELEASE_ORIGIN: z.string().min(1).default('debhost'),
  RELEASE_LABEL: z.string().min(1).default('debhost'),
  RELEASE_SUITE: segment.default('stable'),
  RELEASE_CODENAME: z.string().min(1).default('stable'),
  RELEASE_VERSION: optionalString,
  RELEASE_DESCRIPTION: z.string().min(1).default('APT repository served by debhost'),
  RELEASE_COMPONENT: segment.default('main'),
  GPG_PRIVATE_KEY: optionalString,
  GPG_PASSPHRASE: optionalString,
  STORE_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface SigningConfig {
  privateKey: string;
  passphrase?: string;
}

export interface Config {
  repoRoot: string;
  databasePath: string;
  host: string;
  port: number;
  release: ReleaseConfig;
  signing?: SigningConfig;
  storeRetries: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Validate environment variables into a Config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    repoRoot: path.resolve(vars.REPO_ROOT),
    databasePath: vars.DATABASE_PATH === ':memory:' ? vars.DATABASE_PATH : path.resolve(vars.DATABASE_PATH),
    host: vars.HOST,
    port: vars.PORT,
    release: {
      origin: vars.RELEASE_ORIGIN,
      label: vars.RELEASE_LABEL,
      suite: vars.RELEASE_SUITE,
      codename: vars.RELEASE_CODENAME,
      version: vars.RELEASE_VERSION,
      description: vars.RELEASE_DESCRIPTION,
      component: vars.RELEASE_COMPONENT,
    },
    signing: vars.GPG_PRIVATE_KEY
      ? { privateKey: vars.GPG_PRIVATE_KEY, passphrase: vars.GPG_PASSPHRASE }
      : undefined,
    storeRetries: vars.STORE_RETRIES,
    logLevel: vars.LOG_LEVEL,
  };
}
