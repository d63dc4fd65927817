// src/core/inventory/normalize.ts

/**
 * Dedup key for tool names: lower-case, every run of non-alphanumerics
 * collapsed to one underscore. "My-Tool!!" becomes "my_tool_".
 */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9]+/g, '_');
}

/**
 * Dedup key for repository URLs. Returns undefined for blank input.
 */
export function normalizeUrl(url: string | undefined | null): string | undefined {
  if (!url) return undefined;

  let normalized = url.trim().toLowerCase();
  if (!normalized) return undefined;

  if (!/^[a-z][a-z0-9+.-]*:\/\//.test(normalized)) {
    normalized = `https://${normalized}`;
  }

  // Strip in a loop: "repo.git/" and "repo/.git" both occur upstream
  let previous: string;
  do {
    previous = normalized;
    normalized = normalized.replace(/\/+$/, '');
    if (normalized.endsWith('.git')) {
      normalized = normalized.slice(0, -'.git'.length);
    }
  } while (normalized !== previous);

  return normalized;
}

/**
 * Repository host, or undefined if the URL cannot be parsed
 */
export function urlHost(url: string): string | undefined {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return undefined;
  }
}

export function isGitHostUrl(url: string | undefined): boolean {
  if (!url) return false;
  const host = urlHost(url);
  return host !== undefined && (host.includes('git') || host.includes('bitbucket'));
}

export interface RepositoryCoordinates {
  host: string;
  owner: string;
  repo: string;
}

export function repositoryCoordinates(url: string): RepositoryCoordinates | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }

  const [owner, repo] = parsed.pathname.split('/').filter(Boolean);
  if (!owner || !repo) return undefined;

  return { host: parsed.hostname.toLowerCase(), owner, repo };
}

/**
 * `owner/name` for github.com repositories, undefined for anything else
 */
export function githubRepository(url: string | undefined): string | undefined {
  if (!url) return undefined;
  const coordinates = repositoryCoordinates(url);
  if (!coordinates || coordinates.host !== 'github.com') return undefined;
  return `${coordinates.owner}/${coordinates.repo}`;
}
