// user@host:path, as written for scp-style git remotes
const SCP_LIKE = /^[^@/\s]+@[^:/\s]+:/;

/**
 * Rewrite an HTTP(S) repository URL to its SSH clone address, e.g.
 * `https://git.example.com/org/repo` becomes `git@git.example.com:org/repo`.
 * SSH addresses, other schemes and anything unparseable come back unchanged,
 * so the result is safe to use as a cache key for any input.
 */
export function normalizeRepoUrl(repoURL: string): string {
  if (SCP_LIKE.test(repoURL)) {
    return repoURL;
  }

  let parsed: URL;
  try {
    parsed = new URL(repoURL);
  } catch {
    return repoURL;
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return repoURL;
  }

  return `git@${parsed.host}:${parsed.pathname.replace(/^\//, '')}`;
}

export function cacheKey(repoURL: string, revision: string): string {
  return `${normalizeRepoUrl(repoURL)}@${revision}`;
}
