/**
 * Error taxonomy shared by the engine, the MCP server and the CLI.
 *
 * Each error carries an optional suggestion that front ends print beneath
 * the message.
 */
export class ScoutError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ScoutError';
  }
}

/**
 * A target could not be turned into a local root: malformed remote URL,
 * missing local path, failed or timed-out clone. Fatal to the request.
 */
export class ResolutionError extends ScoutError {
  constructor(
    public readonly target: string,
    public readonly reason: string,
    options: { cause?: unknown } = {}
  ) {
    super(
      `Could not resolve target '${target}': ${reason}`,
      'Check that the path exists or that the URL points at a GitHub repository, directory (tree) or file (blob).'
    );
    this.name = 'ResolutionError';
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class CloneFailedError extends ScoutError {
  constructor(
    public readonly url: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(
      `git clone of ${url} failed${exitCode !== null ? ` with exit code ${exitCode}` : ''}: ${stderr.trim() || 'no output'}`,
      'Verify the repository exists, the ref is valid and the token (if any) has read access.'
    );
    this.name = 'CloneFailedError';
  }
}

export class CloneTimeoutError extends ScoutError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(
      `git clone of ${url} exceeded ${timeoutMs}ms`,
      'The repository may be too large; try a narrower ref or raise git.cloneTimeoutMs.'
    );
    this.name = 'CloneTimeoutError';
  }
}

export class CommandTimeoutError extends ScoutError {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number
  ) {
    super(`${command} exceeded ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

/**
 * A single file could not be parsed. Recorded in the scan report, never
 * thrown out of a scan.
 */
export class ParseError extends ScoutError {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly line?: number
  ) {
    super(`${filePath}${line !== undefined ? `:${line}` : ''}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * grep or git blame failed. Logged and degraded to an empty result.
 */
export class SearchToolError extends ScoutError {
  constructor(
    public readonly tool: 'grep' | 'git blame',
    message: string
  ) {
    super(`${tool} failed: ${message}`);
    this.name = 'SearchToolError';
  }
}

export class ConfigurationError extends ScoutError {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Invalid configuration for ${key}: ${message}`, `Fix ${key} in .symbolscope.yaml or the environment.`);
    this.name = 'ConfigurationError';
  }
}

// fs and child_process errors can come from another realm under test runners
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
