import type { SigningConfig } from './config';
import type { IngestionService } from './services/ingest';
import type { RepositoryGenerator } from './generators/repository';
import { DuplicatePackage, ParseError, RepositoryError, StorageError, errorMessage } from './errors';
import { extractPublicKey } from './signing/gpg';
import { logger } from './utils/logger';

/**
 * debhost - APT repository ingestion and index generation
 *
 * Routes:
 * POST /upload[?ignore_exists=true]   - Ingest raw .deb bytes into the catalog
 * POST /regenerate                    - Rebuild Packages/Release for every architecture
 * GET  /public.key                    - Armored signing key (when configured)
 *
 * The published tree (dists/, pool/) is plain files under the repository
 * root and is served by whatever static file server fronts it.
 */

export type RouteType = 'upload' | 'regenerate' | 'public-key' | 'unknown';

export interface RouteInfo {
  type: RouteType;
  /** Methods accepted on this path */
  methods: string[];
}

export interface AppDependencies {
  ingestion: IngestionService;
  generator: RepositoryGenerator;
  signing?: SigningConfig;
}

export interface App {
  fetch(request: Request): Promise<Response>;
}

export function createApp(deps: AppDependencies): App {
  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url);
      const route = parseRoute(url.pathname);

      if (route.type === 'unknown') {
        return jsonResponse({ error: 'Not Found' }, 404);
      }
      if (!route.methods.includes(request.method)) {
        return jsonResponse({ error: 'Method Not Allowed' }, 405, { Allow: route.methods.join(', ') });
      }

      try {
        switch (route.type) {
          case 'upload':
            return await handleUpload(request, url, deps.ingestion);
          case 'regenerate':
            return await handleRegenerate(deps.generator);
          case 'public-key':
            return await handlePublicKey(deps.signing);
        }
      } catch (error) {
        return errorResponse(error);
      }
    },
  };
}

/**
 * Parse URL path into route information
 */
export function parseRoute(pathname: string): RouteInfo {
  const parts = pathname.split('/').filter(Boolean);

  if (parts.length !== 1) {
    return { type: 'unknown', methods: [] };
  }

  switch (parts[0]) {
    case 'upload':
      return { type: 'upload', methods: ['POST'] };
    case 'regenerate':
      return { type: 'regenerate', methods: ['POST'] };
    case 'public.key':
      return { type: 'public-key', methods: ['GET', 'HEAD'] };
    default:
      return { type: 'unknown', methods: [] };
  }
}

/**
 * Map a thrown value to an HTTP status
 */
export function statusForError(error: unknown): number {
  if (error instanceof ParseError) return 400;
  if (error instanceof DuplicatePackage) return 409;
  if (error instanceof StorageError) return 503;
  return 500;
}

function isTruthyParam(value: string | null): boolean {
  return value !== null && ['', '1', 'true', 'yes'].includes(value.toLowerCase());
}

async function handleUpload(request: Request, url: URL, ingestion: IngestionService): Promise<Response> {
  const body = new Uint8Array(await request.arrayBuffer());
  if (body.byteLength === 0) {
    throw new ParseError('request body is empty');
  }

  const result = await ingestion.ingest(body, {
    ignoreExisting: isTruthyParam(url.searchParams.get('ignore_exists')),
  });

  return jsonResponse(result, result.created ? 201 : 200);
}

async function handleRegenerate(generator: RepositoryGenerator): Promise<Response> {
  const { suite, architectures, files, removed } = await generator.generate();
  return jsonResponse({ suite, architectures, files, removed }, 200);
}

async function handlePublicKey(signing: SigningConfig | undefined): Promise<Response> {
  if (!signing) {
    return jsonResponse({ error: 'No GPG key configured' }, 404);
  }

  const publicKey = await extractPublicKey(signing.privateKey);
  return new Response(publicKey, {
    headers: {
      'Content-Type': 'application/pgp-keys',
      'Cache-Control': 'public, max-age=86400',
    },
  });
}

function errorResponse(error: unknown): Response {
  const status = statusForError(error);

  if (error instanceof RepositoryError) {
    const body: Record<string, unknown> = { error: error.message, code: error.code };
    if (error instanceof DuplicatePackage) {
      body.package = error.key;
    }
    if (error.retryable) {
      body.retryable = true;
    }
    return jsonResponse(body, status);
  }

  logger.logError(error, 'Unhandled request error');
  return jsonResponse({ error: `Internal Server Error: ${errorMessage(error)}` }, status);
}

function jsonResponse(body: unknown, status: number, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}
