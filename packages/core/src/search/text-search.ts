import { SearchToolError, errorMessage } from '../errors.js';
import { GrepMatch } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { CommandRunner, runCommand } from '../utils/process.js';

export interface TextSearchOptions {
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Recursive `grep -rn` below `root`, restricted to files matching `fileGlob`.
 * Any tool failure is logged and yields no matches.
 */
export async function grepSearch(
  root: string,
  pattern: string,
  fileGlob = '*.ts',
  options: TextSearchOptions = {}
): Promise<GrepMatch[]> {
  const runner = options.runner ?? runCommand;
  const logger = options.logger ?? new Logger({ scope: 'grep' });

  try {
    const result = await runner('grep', ['-rn', '--include', fileGlob, '-e', pattern, root], {
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    // 1 means no lines matched
    if (result.exitCode === 0 || result.exitCode === 1) {
      return parseGrepOutput(result.stdout);
    }

    throw new SearchToolError('grep', result.stderr.trim() || `exited with code ${result.exitCode ?? 'null'}`);
  } catch (error) {
    const failure = error instanceof SearchToolError ? error : new SearchToolError('grep', errorMessage(error));
    logger.error(failure.message, { root, pattern, fileGlob });
    return [];
  }
}

/**
 * Parse `file:line:content` lines. Only the first two colons split, so
 * content keeps its own colons; malformed lines are skipped.
 */
export function parseGrepOutput(output: string): GrepMatch[] {
  const matches: GrepMatch[] = [];

  for (const line of output.split('\n')) {
    const first = line.indexOf(':');
    if (first === -1) {
      continue;
    }
    const second = line.indexOf(':', first + 1);
    if (second === -1) {
      continue;
    }

    const lineNumber = line.slice(first + 1, second);
    if (!/^\d+$/.test(lineNumber)) {
      continue;
    }

    matches.push({
      file: line.slice(0, first),
      line: Number(lineNumber),
      content: line.slice(second + 1).trim(),
    });
  }

  return matches;
}
