import { RepositoryCache } from '../cache/repository-cache.js';
import { ScoutConfig } from '../config/types.js';
import { GitCloner, RepositoryCloner } from '../source/git-cloner.js';
import { FetchFn, GitHubClient } from '../source/github-client.js';
import { SourceResolver } from '../source/source-resolver.js';
import { Logger } from '../utils/logger.js';
import { CommandRunner, runCommand } from '../utils/process.js';

/**
 * Long-lived collaborators shared by every session of one process.
 */
export interface ScoutContext {
  config: ScoutConfig;
  logger: Logger;
  cache: RepositoryCache;
  resolver: SourceResolver;
  github: GitHubClient;
  runner: CommandRunner;
}

export interface ScoutContextOverrides {
  logger?: Logger;
  cloner?: RepositoryCloner;
  runner?: CommandRunner;
  fetchFn?: FetchFn;
  tempDir?: string;
}

export function createScoutContext(config: ScoutConfig, overrides: ScoutContextOverrides = {}): ScoutContext {
  const logger = overrides.logger ?? new Logger({ scope: 'symbolscope' });
  const runner = overrides.runner ?? runCommand;
  const cloner =
    overrides.cloner ??
    new GitCloner({ timeoutMs: config.git.cloneTimeoutMs, runner, logger: logger.child('git') });

  const cache = new RepositoryCache({
    dir: config.cache.dir,
    maxAgeHours: config.cache.maxAgeHours,
    maxSizeMb: config.cache.maxSizeMb,
    cloner,
    logger: logger.child('cache'),
  });

  return {
    config,
    logger,
    cache,
    resolver: new SourceResolver({ cache, cloner, logger: logger.child('resolver'), tempDir: overrides.tempDir }),
    github: new GitHubClient({
      apiBaseUrl: config.github.apiBaseUrl,
      rawBaseUrl: config.github.rawBaseUrl,
      token: config.github.token,
      fetchFn: overrides.fetchFn,
      logger: logger.child('github'),
    }),
    runner,
  };
}
