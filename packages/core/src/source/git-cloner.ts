import { CloneFailedError, CloneTimeoutError, CommandTimeoutError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { CommandRunner, runCommand } from '../utils/process.js';
import { redactUrl, withToken } from './github-url.js';

export interface CloneRequest {
  url: string;
  destination: string;
  ref?: string;
  token?: string;
  shallow: boolean;
}

/**
 * Populates `destination` with a checkout of `url`, or rejects with
 * CloneFailedError / CloneTimeoutError. Callers own cleanup of a partially
 * written destination.
 */
export interface RepositoryCloner {
  clone(request: CloneRequest): Promise<void>;
}

export interface GitClonerOptions {
  timeoutMs: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export class GitCloner implements RepositoryCloner {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: GitClonerOptions) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? new Logger({ scope: 'git' });
  }

  static buildArgs(request: CloneRequest): string[] {
    const args = ['clone'];

    if (request.shallow) {
      args.push('--depth', '1');
    }

    if (request.ref) {
      args.push('--branch', request.ref, '--single-branch');
    }

    args.push(withToken(request.url, request.token), request.destination);
    return args;
  }

  async clone(request: CloneRequest): Promise<void> {
    const safeUrl = redactUrl(request.url);
    this.logger.info('Cloning repository', {
      url: safeUrl,
      ref: request.ref,
      shallow: request.shallow,
    });

    let result;
    try {
      result = await this.runner('git', GitCloner.buildArgs(request), {
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new CloneTimeoutError(safeUrl, this.options.timeoutMs);
      }
      throw new CloneFailedError(safeUrl, null, redactUrl(errorMessage(error)));
    }

    if (result.exitCode !== 0) {
      throw new CloneFailedError(safeUrl, result.exitCode, redactUrl(result.stderr));
    }
  }
}
