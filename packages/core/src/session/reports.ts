import { GrepMatch, ImpactReport, WireUsage } from '../types/index.js';

export interface SymbolUsageReportInput {
  symbol: string;
  target: string;
  usages: readonly WireUsage[];
  impact: ImpactReport;
  maxResults: number;
  includeGraph: boolean;
}

export interface GrepReportInput {
  pattern: string;
  target: string;
  matches: readonly GrepMatch[];
  maxResults: number;
}

export function formatSymbolUsageReport(input: SymbolUsageReportInput): string {
  const { symbol, target, usages, impact, maxResults } = input;

  if (usages.length === 0) {
    return `No usages for '${symbol}' found in ${target}.`;
  }

  const breakdown = impact.usageBreakdown;
  const lines = [
    `Symbol usage report for '${symbol}'`,
    `Target: ${target}`,
    `Total usages: ${impact.totalUsages}`,
    `Breakdown: imports=${breakdown.imports}, calls=${breakdown.calls}, references=${breakdown.references}, definitions=${breakdown.definitions}`,
  ];

  if (input.includeGraph) {
    if (impact.dependencies && impact.dependencies.length > 0) {
      lines.push(`Depends on: ${[...impact.dependencies].sort().join(', ')}`);
    }
    if (impact.dependents && impact.dependents.length > 0) {
      lines.push(`Used by: ${[...impact.dependents].sort().join(', ')}`);
    }
  }

  lines.push('Top matches:');
  for (const usage of usages.slice(0, maxResults)) {
    lines.push(`- ${usage.filePath}:${usage.line} [${usage.kind}] ${usage.context}`);
  }

  if (usages.length > maxResults) {
    lines.push(`(trimmed to first ${maxResults} results)`);
  }

  return lines.join('\n');
}

export function formatGrepReport(input: GrepReportInput): string {
  const { pattern, target, matches, maxResults } = input;

  if (matches.length === 0) {
    return `No matches for '${pattern}' found in ${target}.`;
  }

  const lines = [`Grep results for '${pattern}'`, `Target: ${target}`, 'Matches:'];
  for (const match of matches.slice(0, maxResults)) {
    lines.push(`- ${match.file}:${match.line} ${match.content}`);
  }

  if (matches.length > maxResults) {
    lines.push(`(trimmed to first ${maxResults} results)`);
  }

  return lines.join('\n');
}
