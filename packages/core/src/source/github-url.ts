import { GitHubUrlShape, ParsedGitHubUrl } from '../types/index.js';

interface UrlPattern {
  shape: GitHubUrlShape;
  regex: RegExp;
}

/**
 * Ordered, first match wins. File and directory shapes come before the
 * repository root so that `/blob/...` and `/tree/...` are never read as a
 * bare repository.
 */
const GITHUB_URL_PATTERNS: readonly UrlPattern[] = [
  {
    shape: 'blob',
    regex: /github\.com\/(?<owner>[^/]+)\/(?<repo>[^/]+)\/blob\/(?<ref>[^/]+)\/(?<path>.+)$/i,
  },
  {
    shape: 'tree',
    regex: /github\.com\/(?<owner>[^/]+)\/(?<repo>[^/]+)\/tree\/(?<ref>[^/]+)(?:\/(?<path>.+))?$/i,
  },
  {
    shape: 'repository',
    regex: /github\.com[/:](?<owner>[^/]+)\/(?<repo>[^/]+?)\/?$/i,
  },
];

/**
 * Anything with a URL scheme, an scp-style git remote, or a github.com host
 * is remote. Remote targets are parsed or rejected, never opened as paths.
 */
export function isRemoteTarget(target: string): boolean {
  const trimmed = target.trim();
  return (
    /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ||
    /^git@/i.test(trimmed) ||
    trimmed.toLowerCase().includes('github.com')
  );
}

export function parseGitHubUrl(url: string): ParsedGitHubUrl | null {
  const cleaned = url.trim().replace(/[?#].*$/, '');

  for (const { shape, regex } of GITHUB_URL_PATTERNS) {
    const match = regex.exec(cleaned);
    const groups = match?.groups;
    if (!groups) {
      continue;
    }

    const owner = groups.owner;
    const repo = stripGitSuffix(groups.repo);
    if (!owner || !repo) {
      continue;
    }

    const parsed: ParsedGitHubUrl = { shape, owner, repo };
    if (groups.ref) {
      parsed.ref = decodeURIComponent(groups.ref);
    }
    const subpath = groups.path?.replace(/\/+$/, '');
    if (subpath) {
      parsed.path = decodeURIComponent(subpath);
    }
    return parsed;
  }

  return null;
}

function stripGitSuffix(repo: string | undefined): string | undefined {
  return repo?.replace(/\.git$/i, '');
}

export function buildCloneUrl(parsed: ParsedGitHubUrl): string {
  return `https://github.com/${parsed.owner}/${parsed.repo}.git`;
}

/**
 * Embed a token as URL userinfo. Only https remotes carry credentials this
 * way; anything else is returned unchanged.
 */
export function withToken(cloneUrl: string, token?: string): string {
  if (!token || !cloneUrl.startsWith('https://')) {
    return cloneUrl;
  }

  const url = new URL(cloneUrl);
  url.username = token;
  return url.toString();
}

/**
 * Strip any userinfo before a URL reaches a log line or an error message.
 */
export function redactUrl(url: string): string {
  return url.replace(/\/\/[^/@]+@/, '//');
}

export function buildBlobUrl(parsed: ParsedGitHubUrl, relativePath: string): string {
  const ref = parsed.ref ?? 'HEAD';
  const normalized = relativePath.split('\\').join('/');
  return `https://github.com/${parsed.owner}/${parsed.repo}/blob/${ref}/${normalized}`;
}
