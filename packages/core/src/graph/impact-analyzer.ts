import { DependencyGraph, ImpactReport, ReadonlySymbolIndex } from '../types/index.js';
import { buildDependencyGraph } from './dependency-graph.js';

/**
 * Summarize what changing `symbol` would touch. Pure: reads the index and
 * builds the graph only when none is passed in. An unknown symbol yields a
 * report with zero counts and no graph fields.
 */
export function analyzeImpact(
  index: ReadonlySymbolIndex,
  symbol: string,
  graph?: DependencyGraph
): ImpactReport {
  const usages = index.get(symbol) ?? [];
  const affectedFiles = [...new Set(usages.map((usage) => usage.filePath))];

  const report: ImpactReport = {
    symbol,
    totalUsages: usages.length,
    affectedFiles,
    fileCount: affectedFiles.length,
    usageBreakdown: {
      imports: usages.filter((usage) => usage.kind === 'import').length,
      calls: usages.filter((usage) => usage.kind === 'call').length,
      references: usages.filter((usage) => usage.kind === 'reference').length,
      definitions: usages.filter((usage) => usage.kind === 'definition').length,
    },
  };

  if (usages.length === 0) {
    return report;
  }

  const node = (graph ?? buildDependencyGraph(index)).get(symbol);
  if (node) {
    report.dependencies = [...node.dependencies];
    report.dependents = [...node.dependents];
  }

  return report;
}
