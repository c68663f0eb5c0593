import { ScoutContext, SessionOptions, withSession } from '@symbolscope/core';
import { OutputFormatter } from '../utils/output-formatter.js';

export interface CommandOptions {
  token?: string;
  /** undefined leaves the configured default in place */
  useCache?: boolean;
  json: boolean;
}

export interface ScanCommandOptions extends CommandOptions {
  pattern?: string;
}

export interface FindCommandOptions extends ScanCommandOptions {
  report?: boolean;
  maxResults?: number;
}

export interface GraphCommandOptions extends ScanCommandOptions {
  mermaid?: boolean;
  maxNodes?: number;
  showFiles?: boolean;
}

export interface GrepCommandOptions extends CommandOptions {
  glob?: string;
  report?: boolean;
  maxResults?: number;
}

/**
 * Runs one CLI command against a target and returns the text to print.
 */
export class ScoutCommand {
  constructor(private readonly context: ScoutContext) {}

  async scan(target: string, options: ScanCommandOptions): Promise<string> {
    const result = await withSession(target, this.context, sessionOptions(options), session =>
      session.scan(options.pattern)
    );

    if (options.json) {
      return toJson(result);
    }

    const { summary } = result;
    return [
      OutputFormatter.header(`Scanning ${target}`),
      OutputFormatter.success(`Indexed ${summary.totalSymbols} symbols in ${summary.scannedFiles} files`),
      OutputFormatter.scanSummary(summary),
    ].join('\n');
  }

  async find(target: string, symbol: string, options: FindCommandOptions): Promise<string> {
    const maxResults = options.maxResults ?? this.context.config.output.maxResults;

    if (options.report) {
      return withSession(target, this.context, sessionOptions(options), session =>
        session.symbolUsageReport(symbol, { pattern: options.pattern, maxResults })
      );
    }

    const usages = await withSession(target, this.context, sessionOptions(options), session =>
      session.findSymbol(symbol, options.pattern)
    );

    if (options.json) {
      return toJson({ symbol, usages });
    }

    return [
      OutputFormatter.header(`Usages of '${symbol}' in ${target}`),
      OutputFormatter.info(`${usages.length} usages found`),
      OutputFormatter.usageList(usages, maxResults),
    ].join('\n');
  }

  async impact(target: string, symbol: string, options: ScanCommandOptions): Promise<string> {
    const report = await withSession(target, this.context, sessionOptions(options), session =>
      session.analyzeImpact(symbol, options.pattern)
    );

    return options.json ? toJson(report) : OutputFormatter.impact(report);
  }

  async graph(target: string, options: GraphCommandOptions): Promise<string> {
    if (options.mermaid) {
      return withSession(target, this.context, sessionOptions(options), session =>
        session.visualize(options.pattern, { maxNodes: options.maxNodes, showFiles: options.showFiles })
      );
    }

    const nodes = await withSession(target, this.context, sessionOptions(options), session =>
      session.buildGraph(options.pattern)
    );

    return options.json ? toJson({ totalSymbols: nodes.length, nodes }) : OutputFormatter.graph(nodes);
  }

  async grep(target: string, pattern: string, options: GrepCommandOptions): Promise<string> {
    const maxResults = options.maxResults ?? this.context.config.output.maxResults;

    if (options.report) {
      return withSession(target, this.context, sessionOptions(options), session =>
        session.grepReport(pattern, { fileGlob: options.glob, maxResults })
      );
    }

    const matches = await withSession(target, this.context, sessionOptions(options), session =>
      session.grep(pattern, options.glob)
    );

    if (options.json) {
      return toJson({ pattern, totalMatches: matches.length, matches });
    }

    return [
      OutputFormatter.header(`grep '${pattern}' in ${target}`),
      OutputFormatter.info(`${matches.length} matches found`),
      OutputFormatter.grepMatches(matches, maxResults),
    ].join('\n');
  }

  async blame(target: string, line: number, file: string | undefined, options: CommandOptions): Promise<string> {
    const info = await withSession(target, this.context, sessionOptions(options), session =>
      session.blame(line, file)
    );

    return options.json ? toJson(info) : OutputFormatter.blame(info, line);
  }

  async cacheInfo(options: Pick<CommandOptions, 'json'>): Promise<string> {
    const info = await this.context.cache.getInfo();
    return options.json ? toJson(info) : OutputFormatter.cacheInfo(info);
  }

  async cacheClear(key?: string): Promise<string> {
    await this.context.cache.invalidate(key);
    return OutputFormatter.success(key ? `Removed cache entry ${key}` : 'Cleared all cached repositories');
  }
}

function sessionOptions(options: CommandOptions): SessionOptions {
  return { token: options.token, useCache: options.useCache };
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
