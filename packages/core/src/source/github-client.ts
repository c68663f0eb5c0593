import * as path from 'path';
import { ResolutionError, errorMessage } from '../errors.js';
import { ParsedGitHubUrl } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export type FetchFn = typeof fetch;

export interface GitHubClientOptions {
  apiBaseUrl: string;
  rawBaseUrl: string;
  token?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export interface FetchedFile {
  content: string;
  fileName: string;
  source: 'api' | 'raw';
}

/**
 * Reads single files from GitHub without cloning: the contents API first,
 * the raw host as fallback (works without a token for public repositories).
 */
export class GitHubClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: GitHubClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? new Logger({ scope: 'github' });
  }

  async fetchFileContent(target: string, parsed: ParsedGitHubUrl, token?: string): Promise<FetchedFile> {
    const filePath = parsed.path;
    if (parsed.shape !== 'blob' || !filePath) {
      throw new ResolutionError(target, 'only file (blob) URLs can be fetched without cloning');
    }

    const fileName = path.posix.basename(filePath);
    const failures: string[] = [];

    try {
      const content = await this.fetchFromApi(parsed, filePath, token ?? this.options.token);
      return { content, fileName, source: 'api' };
    } catch (error) {
      failures.push(`contents API: ${errorMessage(error)}`);
      this.logger.debug('Contents API fetch failed, trying raw host', { error: errorMessage(error) });
    }

    try {
      const content = await this.fetchFromRawHost(parsed, filePath);
      return { content, fileName, source: 'raw' };
    } catch (error) {
      failures.push(`raw host: ${errorMessage(error)}`);
    }

    throw new ResolutionError(target, `could not fetch file (${failures.join('; ')})`);
  }

  private async fetchFromApi(parsed: ParsedGitHubUrl, filePath: string, token?: string): Promise<string> {
    const url = new URL(
      `${trimSlash(this.options.apiBaseUrl)}/repos/${parsed.owner}/${parsed.repo}/contents/${encodePath(filePath)}`
    );
    if (parsed.ref) {
      url.searchParams.set('ref', parsed.ref);
    }

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.raw',
      'User-Agent': 'symbolscope',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return this.getText(url.toString(), headers);
  }

  private async fetchFromRawHost(parsed: ParsedGitHubUrl, filePath: string): Promise<string> {
    const ref = parsed.ref ?? 'HEAD';
    const url = `${trimSlash(this.options.rawBaseUrl)}/${parsed.owner}/${parsed.repo}/${encodeURIComponent(ref)}/${encodePath(filePath)}`;
    return this.getText(url, { 'User-Agent': 'symbolscope' });
  }

  private async getText(url: string, headers: Record<string, string>): Promise<string> {
    const response = await this.fetchFn(url, {
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }

    return response.text();
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function encodePath(filePath: string): string {
  return filePath.split('/').map(encodeURIComponent).join('/');
}
