import { SymbolScanner } from '../analysis/symbol-scanner.js';
import { ScoutError, errorMessage } from '../errors.js';
import { buildDependencyGraph } from '../graph/dependency-graph.js';
import { analyzeImpact } from '../graph/impact-analyzer.js';
import { MermaidOptions, renderMermaid } from '../graph/mermaid.js';
import { gitBlame } from '../search/blame.js';
import { grepSearch } from '../search/text-search.js';
import { buildBlobUrl, isRemoteTarget, parseGitHubUrl } from '../source/github-url.js';
import {
  BlameInfo,
  GrepMatch,
  ImpactReport,
  ParsedGitHubUrl,
  ResolvedSource,
  WireDependencyNode,
  WireUsage,
} from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { ScoutContext } from './context.js';
import { PathMapper } from './path-mapper.js';
import { formatGrepReport, formatSymbolUsageReport } from './reports.js';

export interface SessionOptions {
  token?: string;
  useCache?: boolean;
}

export interface ScanFailure {
  filePath: string;
  message: string;
  line?: number;
}

export interface ScanSummary {
  target: string;
  pattern: string;
  scannedFiles: number;
  failedFiles: number;
  totalSymbols: number;
  failures: ScanFailure[];
}

export interface ScanResult {
  summary: ScanSummary;
  symbols: Record<string, WireUsage[]>;
}

export interface UsageReportOptions {
  pattern?: string;
  maxResults?: number;
  includeGraph?: boolean;
}

export interface GrepReportOptions {
  fileGlob?: string;
  maxResults?: number;
}

type SingleFileTarget = ParsedGitHubUrl & { path: string };

/**
 * All operations over one target. The target is resolved once, each file
 * pattern is scanned at most once, and `close()` releases the checkout.
 *
 * A GitHub file (blob) URL is analyzed from the fetched file body without
 * cloning; grep and blame on such a target resolve the repository lazily.
 */
export class ScoutSession {
  private sourcePromise: Promise<ResolvedSource> | null = null;
  private resolved: ResolvedSource | null = null;
  private readonly scanners = new Map<string, Promise<SymbolScanner>>();
  private readonly singleFile: SingleFileTarget | null;
  private readonly logger: Logger;
  private closed = false;

  private constructor(
    readonly target: string,
    private readonly context: ScoutContext,
    private readonly options: SessionOptions
  ) {
    this.logger = context.logger.child('session');
    this.singleFile = isRemoteTarget(target) ? singleFileTarget(parseGitHubUrl(target)) : null;
  }

  static async open(target: string, context: ScoutContext, options: SessionOptions = {}): Promise<ScoutSession> {
    const session = new ScoutSession(target, context, options);
    if (!session.singleFile) {
      await session.source();
    }
    return session;
  }

  async scan(pattern?: string): Promise<ScanResult> {
    const effective = this.pattern(pattern);
    const scanner = await this.scanner(effective);
    const mapper = this.mapper();
    const report = scanner.report();

    const symbols: Record<string, WireUsage[]> = {};
    for (const [symbol, usages] of report.index) {
      symbols[symbol] = usages.map((usage) => mapper.usage(usage));
    }

    const failures: ScanFailure[] = [];
    for (const outcome of report.files) {
      if (outcome.status === 'parse-error') {
        failures.push({ filePath: mapper.toWirePath(outcome.filePath), message: outcome.message, line: outcome.line });
      }
    }

    return {
      summary: {
        target: this.target,
        pattern: effective,
        scannedFiles: report.scannedFiles,
        failedFiles: report.failedFiles,
        totalSymbols: report.totalSymbols,
        failures,
      },
      symbols,
    };
  }

  async findSymbol(symbol: string, pattern?: string): Promise<WireUsage[]> {
    const scanner = await this.scanner(this.pattern(pattern));
    const mapper = this.mapper();
    return scanner.findSymbol(symbol).map((usage) => mapper.usage(usage));
  }

  async buildGraph(pattern?: string): Promise<WireDependencyNode[]> {
    const scanner = await this.scanner(this.pattern(pattern));
    const graph = buildDependencyGraph(scanner.getIndex());
    return this.mapper().graph(graph);
  }

  async analyzeImpact(symbol: string, pattern?: string): Promise<ImpactReport> {
    const scanner = await this.scanner(this.pattern(pattern));
    const report = analyzeImpact(scanner.getIndex(), symbol);
    return this.mapper().impact(report);
  }

  async visualize(pattern?: string, options: MermaidOptions = {}): Promise<string> {
    return renderMermaid(await this.buildGraph(pattern), options);
  }

  async grep(pattern: string, fileGlob?: string): Promise<GrepMatch[]> {
    const source = await this.source();
    const matches = await grepSearch(source.root, pattern, this.pattern(fileGlob), {
      timeoutMs: this.context.config.git.commandTimeoutMs,
      runner: this.context.runner,
      logger: this.context.logger.child('grep'),
    });
    const mapper = this.mapper();
    return matches.map((match) => mapper.grepMatch(match));
  }

  /**
   * `file` is relative to the target root; a file URL target may omit it.
   */
  async blame(line: number, file?: string): Promise<BlameInfo | null> {
    const source = await this.source();
    const filePath = file ?? this.singleFile?.path;
    if (!filePath) {
      throw new ScoutError('A file path is required for git blame on this target', 'Pass the file path relative to the target root.');
    }

    return gitBlame(source.root, filePath, line, {
      timeoutMs: this.context.config.git.commandTimeoutMs,
      runner: this.context.runner,
      logger: this.context.logger.child('blame'),
    });
  }

  async symbolUsageReport(symbol: string, options: UsageReportOptions = {}): Promise<string> {
    const usages = await this.findSymbol(symbol, options.pattern);
    const impact = await this.analyzeImpact(symbol, options.pattern);

    return formatSymbolUsageReport({
      symbol,
      target: this.target,
      usages,
      impact,
      maxResults: options.maxResults ?? this.context.config.output.maxResults,
      includeGraph: options.includeGraph ?? true,
    });
  }

  async grepReport(pattern: string, options: GrepReportOptions = {}): Promise<string> {
    return formatGrepReport({
      pattern,
      target: this.target,
      matches: await this.grep(pattern, options.fileGlob),
      maxResults: options.maxResults ?? this.context.config.output.maxResults,
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.resolved?.release();
  }

  private pattern(pattern?: string): string {
    return pattern || this.context.config.defaultPattern;
  }

  private source(): Promise<ResolvedSource> {
    if (!this.sourcePromise) {
      this.sourcePromise = this.context.resolver
        .resolve(this.target, {
          token: this.token(),
          useCache: this.options.useCache ?? this.context.config.useCache,
        })
        .then((source) => {
          this.resolved = source;
          return source;
        });
    }
    return this.sourcePromise;
  }

  private scanner(pattern: string): Promise<SymbolScanner> {
    const key = this.singleFile ? '' : pattern;
    let pending = this.scanners.get(key);

    if (!pending) {
      pending = this.createScanner(pattern);
      this.scanners.set(key, pending);
    }
    return pending;
  }

  private async createScanner(pattern: string): Promise<SymbolScanner> {
    const scanner = new SymbolScanner({
      exclude: this.context.config.exclude,
      logger: this.context.logger.child('scanner'),
    });

    const singleFile = this.singleFile;
    if (singleFile) {
      const file = await this.context.github.fetchFileContent(this.target, singleFile, this.token());
      const logicalName = buildBlobUrl(singleFile, singleFile.path);
      this.logger.debug('Analyzing fetched file', { file: logicalName, source: file.source });
      scanner.analyzeSingleFile(file.content, logicalName);
      return scanner;
    }

    const source = await this.source();
    await scanner.scan(source.root, pattern);
    return scanner;
  }

  private mapper(): PathMapper {
    return new PathMapper(this.resolved);
  }

  private token(): string | undefined {
    return this.options.token ?? this.context.config.github.token;
  }
}

function singleFileTarget(parsed: ParsedGitHubUrl | null): SingleFileTarget | null {
  const filePath = parsed?.path;
  if (!parsed || parsed.shape !== 'blob' || !filePath) {
    return null;
  }
  return { ...parsed, path: filePath };
}

/**
 * Open a session, run `work`, and always release the target afterwards.
 * A release failure is logged and never replaces an error from `work`.
 */
export async function withSession<T>(
  target: string,
  context: ScoutContext,
  options: SessionOptions,
  work: (session: ScoutSession) => Promise<T>
): Promise<T> {
  const session = await ScoutSession.open(target, context, options);
  try {
    return await work(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      context.logger.warn('Failed to release target', { target, error: errorMessage(error) });
    }
  }
}
