/**
 * Locating and reading the root manifest for remote mode.
 *
 * `--repo` may name a local directory, a local manifest file, a GitHub
 * repository URL, a direct manifest URL, or any other base URL under which
 * `Cargo.toml` is served.
 */

import { join, resolve } from 'path';
import type { FetchFn } from '../../types/execution-context.js';
import { FILE_PATTERNS, GITHUB_HOSTS, DEFAULTS } from '../../constants/index.js';
import { isDirectory, readTextFile } from '../../utils/fs.js';
import { GraphSourceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type ManifestLocation =
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string };

const HTTP_URL = /^https?:\/\//i;

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Raw-content URL for a `https://github.com/<owner>/<repo>[/tree/<ref>]` URL,
 * or null when the URL does not point at a repository root.
 */
export function githubRawManifestUrl(url: URL): string | null {
  if (url.hostname !== GITHUB_HOSTS.WEB) return null;

  const segments = url.pathname.split('/').filter(Boolean);
  if (segments.length < 2) return null;

  const owner = segments[0];
  const repo = segments[1].replace(/\.git$/, '');
  let ref: string = GITHUB_HOSTS.DEFAULT_REF;

  if (segments.length > 2) {
    if (segments[2] !== 'tree' || segments.length < 4) return null;
    ref = segments.slice(3).join('/');
  }

  return `https://${GITHUB_HOSTS.RAW}/${owner}/${repo}/${ref}/${FILE_PATTERNS.CARGO_TOML}`;
}

export async function resolveManifestLocation(repo: string, cwd: string): Promise<ManifestLocation> {
  if (HTTP_URL.test(repo)) {
    const url = parseUrl(repo);
    if (!url) {
      throw new GraphSourceError(`invalid repository URL '${repo}'`, { repo });
    }

    const githubUrl = githubRawManifestUrl(url);
    if (githubUrl) {
      return { kind: 'url', url: githubUrl };
    }
    if (url.pathname.endsWith(FILE_PATTERNS.TOML_FILES)) {
      return { kind: 'url', url: url.toString() };
    }
    const base = url.toString().replace(/\/+$/, '');
    return { kind: 'url', url: `${base}/${FILE_PATTERNS.CARGO_TOML}` };
  }

  const localPath = resolve(cwd, repo);
  if (await isDirectory(localPath)) {
    return { kind: 'file', path: join(localPath, FILE_PATTERNS.CARGO_TOML) };
  }
  return { kind: 'file', path: localPath };
}

export function describeManifestLocation(location: ManifestLocation): string {
  return location.kind === 'file' ? location.path : location.url;
}

/**
 * Read the manifest text. Failure here means the graph cannot be built at
 * all, so it surfaces as a GraphSourceError.
 */
export async function fetchManifestText(
  location: ManifestLocation,
  fetchFn: FetchFn = fetch,
  userAgent: string = DEFAULTS.USER_AGENT
): Promise<string> {
  if (location.kind === 'file') {
    try {
      return await readTextFile(location.path);
    } catch (error) {
      throw new GraphSourceError(`cannot read manifest '${location.path}'`, { path: location.path, error });
    }
  }

  logger.debug(`Fetching manifest from ${location.url}`);

  let response: Response;
  try {
    response = await fetchFn(location.url, { headers: { 'User-Agent': userAgent } });
  } catch (error) {
    throw new GraphSourceError(`cannot fetch manifest '${location.url}'`, { url: location.url, error });
  }

  if (!response.ok) {
    throw new GraphSourceError(
      `cannot fetch manifest '${location.url}' (HTTP ${response.status})`,
      { url: location.url, status: response.status }
    );
  }

  try {
    return await response.text();
  } catch (error) {
    throw new GraphSourceError(`cannot read manifest '${location.url}'`, { url: location.url, error });
  }
}
