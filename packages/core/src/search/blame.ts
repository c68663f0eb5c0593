import { SearchToolError, errorMessage } from '../errors.js';
import { BlameInfo } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { CommandRunner, runCommand } from '../utils/process.js';

export interface BlameOptions {
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Authorship of one line via `git blame --porcelain`, run inside `root`.
 * Returns null when git fails or the output lacks author, time or summary.
 */
export async function gitBlame(
  root: string,
  file: string,
  line: number,
  options: BlameOptions = {}
): Promise<BlameInfo | null> {
  const runner = options.runner ?? runCommand;
  const logger = options.logger ?? new Logger({ scope: 'blame' });

  try {
    const result = await runner('git', ['blame', '-L', `${line},${line}`, '--porcelain', file], {
      cwd: root,
      timeoutMs: options.timeoutMs ?? 60000,
    });

    if (result.exitCode !== 0) {
      throw new SearchToolError('git blame', result.stderr.trim() || `exited with code ${result.exitCode ?? 'null'}`);
    }

    const info = parseBlamePorcelain(result.stdout);
    if (!info) {
      logger.warn('git blame output is missing author, time or summary', { file, line });
    }
    return info;
  } catch (error) {
    const failure = error instanceof SearchToolError ? error : new SearchToolError('git blame', errorMessage(error));
    logger.error(failure.message, { root, file, line });
    return null;
  }
}

export function parseBlamePorcelain(output: string): BlameInfo | null {
  const lines = output.split('\n');
  const commit = lines[0]?.split(' ')[0] ?? '';

  let author: string | undefined;
  let authorMail: string | undefined;
  let authorTime: string | undefined;
  let summary: string | undefined;

  for (const line of lines) {
    if (line.startsWith('\t')) {
      break;
    }
    if (line.startsWith('author ')) {
      author = line.slice('author '.length);
    } else if (line.startsWith('author-mail ')) {
      authorMail = line.slice('author-mail '.length).replace(/^<|>$/g, '');
    } else if (line.startsWith('author-time ')) {
      authorTime = line.slice('author-time '.length);
    } else if (line.startsWith('summary ')) {
      summary = line.slice('summary '.length);
    }
  }

  const timestamp = Number(authorTime);
  if (!commit || author === undefined || summary === undefined || !authorTime || !Number.isFinite(timestamp)) {
    return null;
  }

  const info: BlameInfo = {
    commit,
    author,
    timestamp,
    date: new Date(timestamp * 1000).toISOString(),
    commitMessage: summary,
  };
  if (authorMail) {
    info.authorMail = authorMail;
  }
  return info;
}
