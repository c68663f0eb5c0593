import * as path from 'path';
import { buildBlobUrl } from '../source/github-url.js';
import {
  DependencyGraph,
  GrepMatch,
  ImpactReport,
  ResolvedSource,
  UsageRecord,
  WireDependencyNode,
  WireUsage,
} from '../types/index.js';

/**
 * Converts engine records, which carry absolute paths, into their JSON wire
 * form: paths relative to the scan root for local targets, GitHub blob URLs
 * for remote ones. Paths that are not absolute (logical names such as a
 * fetched file's URL) pass through untouched.
 */
export class PathMapper {
  constructor(private readonly source: Pick<ResolvedSource, 'root' | 'checkoutRoot' | 'origin'> | null) {}

  toWirePath(filePath: string): string {
    const source = this.source;
    if (!source || !path.isAbsolute(filePath)) {
      return filePath;
    }

    if (source.origin.kind === 'local') {
      return relativeWithin(source.root, filePath) ?? filePath;
    }

    const relative = relativeWithin(source.checkoutRoot, filePath);
    return relative === undefined ? filePath : buildBlobUrl(source.origin.parsed, relative);
  }

  usage(record: UsageRecord): WireUsage {
    return {
      filePath: this.toWirePath(record.filePath),
      line: record.line,
      column: record.column,
      context: record.context,
      kind: record.kind,
    };
  }

  graph(graph: DependencyGraph): WireDependencyNode[] {
    return [...graph.values()].map((node) => ({
      symbol: node.symbol,
      filePath: this.toWirePath(node.filePath),
      dependencies: [...node.dependencies],
      dependents: [...node.dependents],
    }));
  }

  impact(report: ImpactReport): ImpactReport {
    return {
      ...report,
      affectedFiles: report.affectedFiles.map((file) => this.toWirePath(file)),
    };
  }

  grepMatch(match: GrepMatch): GrepMatch {
    return { ...match, file: this.toWirePath(match.file) };
  }
}

function relativeWithin(root: string, filePath: string): string | undefined {
  const relative = path.relative(root, filePath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return undefined;
  }
  return relative.split(path.sep).join('/');
}
