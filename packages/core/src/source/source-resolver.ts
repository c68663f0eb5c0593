import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RepositoryCache } from '../cache/repository-cache.js';
import { ResolutionError, errorMessage } from '../errors.js';
import { ParsedGitHubUrl, ResolvedSource } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { RepositoryCloner } from './git-cloner.js';
import { buildCloneUrl, isRemoteTarget, parseGitHubUrl } from './github-url.js';

export interface SourceResolverOptions {
  cache: RepositoryCache;
  /** Used for one-shot clones when the cache is bypassed */
  cloner: RepositoryCloner;
  logger?: Logger;
  /** Parent directory for one-shot clones */
  tempDir?: string;
}

export interface ResolveOptions {
  token?: string;
  useCache?: boolean;
}

const noop = async (): Promise<void> => undefined;

/**
 * Turns a local path or GitHub URL into a directory on disk.
 */
export class SourceResolver {
  private readonly logger: Logger;

  constructor(private readonly options: SourceResolverOptions) {
    this.logger = options.logger ?? new Logger({ scope: 'resolver' });
  }

  async resolve(target: string, options: ResolveOptions = {}): Promise<ResolvedSource> {
    if (!isRemoteTarget(target)) {
      return this.resolveLocal(target);
    }

    const parsed = parseGitHubUrl(target);
    if (!parsed) {
      throw new ResolutionError(target, 'not a GitHub repository, directory (tree) or file (blob) URL');
    }

    return this.resolveRemote(target, parsed, options);
  }

  private async resolveLocal(target: string): Promise<ResolvedSource> {
    const root = path.resolve(target);

    let stats;
    try {
      stats = await fs.stat(root);
    } catch (error) {
      throw new ResolutionError(target, 'path does not exist', { cause: error });
    }

    if (!stats.isDirectory()) {
      throw new ResolutionError(target, 'path is not a directory');
    }

    return {
      root,
      checkoutRoot: root,
      origin: { kind: 'local', path: root },
      release: noop,
    };
  }

  private async resolveRemote(
    target: string,
    parsed: ParsedGitHubUrl,
    options: ResolveOptions
  ): Promise<ResolvedSource> {
    const cloneUrl = buildCloneUrl(parsed);
    const cached = options.useCache ?? true;

    let checkoutRoot: string;
    let release = noop;

    try {
      if (cached) {
        checkoutRoot = await this.options.cache.resolve(cloneUrl, {
          ref: parsed.ref,
          token: options.token,
        });
      } else {
        const oneShot = await this.cloneOnce(cloneUrl, parsed, options);
        checkoutRoot = oneShot.checkoutRoot;
        release = oneShot.release;
      }
    } catch (error) {
      throw new ResolutionError(target, errorMessage(error), { cause: error });
    }

    let root = checkoutRoot;
    if (parsed.shape === 'tree' && parsed.path) {
      root = path.resolve(checkoutRoot, parsed.path);
      const inside = root === checkoutRoot || root.startsWith(checkoutRoot + path.sep);
      const stats = inside ? await fs.stat(root).catch(() => null) : null;

      if (!stats?.isDirectory()) {
        await release();
        throw new ResolutionError(target, `directory '${parsed.path}' not found in repository`);
      }
    }

    return {
      root,
      checkoutRoot,
      origin: { kind: 'remote', url: target, cloneUrl, parsed, cached },
      release,
    };
  }

  private async cloneOnce(
    cloneUrl: string,
    parsed: ParsedGitHubUrl,
    options: ResolveOptions
  ): Promise<{ checkoutRoot: string; release: () => Promise<void> }> {
    const tempRoot = await fs.mkdtemp(path.join(this.options.tempDir ?? os.tmpdir(), 'symbolscope-'));
    const checkoutRoot = path.join(tempRoot, 'repo');

    let released = false;
    const release = async (): Promise<void> => {
      if (released) {
        return;
      }
      released = true;

      try {
        await fs.rm(tempRoot, { recursive: true, force: true });
      } catch (error) {
        this.logger.warn('Failed to remove temporary clone', { path: tempRoot, error: errorMessage(error) });
      }
    };

    try {
      await this.options.cloner.clone({
        url: cloneUrl,
        destination: checkoutRoot,
        ref: parsed.ref,
        token: options.token,
        shallow: true,
      });
    } catch (error) {
      await release();
      throw error;
    }

    return { checkoutRoot, release };
  }
}
