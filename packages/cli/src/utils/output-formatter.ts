import {
  BlameInfo,
  CacheInfo,
  GrepMatch,
  ImpactReport,
  ScanSummary,
  WireDependencyNode,
  WireUsage,
} from '@symbolscope/core';

export class OutputFormatter {
  static header(message: string): string {
    return `\n🔍 ${message}`;
  }

  static info(message: string): string {
    return `ℹ️  ${message}`;
  }

  static success(message: string): string {
    return `✅ ${message}`;
  }

  static error(message: string, suggestion?: string): string {
    return suggestion ? `❌ ${message}\n   💡 ${suggestion}` : `❌ ${message}`;
  }

  static scanSummary(summary: ScanSummary): string {
    let output = `\n📊 Scan Statistics:\n`;
    output += `   • Pattern: ${summary.pattern}\n`;
    output += `   • Files scanned: ${summary.scannedFiles}\n`;
    output += `   • Files failed: ${summary.failedFiles}\n`;
    output += `   • Symbols: ${summary.totalSymbols}\n`;

    if (summary.failures.length > 0) {
      output += `   • Parse failures:\n`;
      summary.failures.forEach(failure => {
        const location = failure.line !== undefined ? `${failure.filePath}:${failure.line}` : failure.filePath;
        output += `     - ${location}: ${failure.message}\n`;
      });
    }

    return output;
  }

  static usageList(usages: readonly WireUsage[], maxResults: number = 20): string {
    if (usages.length === 0) {
      return `   No usages found.`;
    }

    let output = `\n📍 Usages:\n`;
    usages.slice(0, maxResults).forEach(usage => {
      output += `   • ${usage.filePath}:${usage.line}:${usage.column} [${usage.kind}] ${usage.context}\n`;
    });

    if (usages.length > maxResults) {
      output += `   ... and ${usages.length - maxResults} more usages\n`;
    }

    return output;
  }

  static impact(report: ImpactReport): string {
    const breakdown = report.usageBreakdown;
    let output = `\n💥 Impact of '${report.symbol}':\n`;
    output += `   • Total usages: ${report.totalUsages}\n`;
    output += `   • Files affected: ${report.fileCount}\n`;
    output += `   • Imports: ${breakdown.imports}, calls: ${breakdown.calls}, references: ${breakdown.references}, definitions: ${breakdown.definitions}\n`;

    if (report.dependencies && report.dependencies.length > 0) {
      output += `   • Depends on: ${report.dependencies.join(', ')}\n`;
    }
    if (report.dependents && report.dependents.length > 0) {
      output += `   • Used by: ${report.dependents.join(', ')}\n`;
    }

    if (report.affectedFiles.length > 0) {
      output += `\n📁 Affected files:\n`;
      report.affectedFiles.forEach(file => {
        output += `   • ${file}\n`;
      });
    }

    return output;
  }

  static graph(nodes: readonly WireDependencyNode[]): string {
    if (nodes.length === 0) {
      return `   No defined symbols found.`;
    }

    let output = `\n🕸️  Dependency graph (${nodes.length} symbols):\n`;
    nodes.forEach(node => {
      output += `   • ${node.symbol} (${node.filePath})\n`;
      if (node.dependencies.length > 0) {
        output += `     → depends on: ${node.dependencies.join(', ')}\n`;
      }
      if (node.dependents.length > 0) {
        output += `     ← used by: ${node.dependents.join(', ')}\n`;
      }
    });

    return output;
  }

  static grepMatches(matches: readonly GrepMatch[], maxResults: number = 50): string {
    if (matches.length === 0) {
      return `   No matches found.`;
    }

    let output = `\n🔎 Matches:\n`;
    matches.slice(0, maxResults).forEach(match => {
      output += `   • ${match.file}:${match.line} ${match.content}\n`;
    });

    if (matches.length > maxResults) {
      output += `   ... and ${matches.length - maxResults} more matches\n`;
    }

    return output;
  }

  static blame(info: BlameInfo | null, line: number): string {
    if (!info) {
      return `   No blame information for line ${line}.`;
    }

    let output = `\n🕵️  Line ${line}:\n`;
    output += `   • Commit: ${info.commit}\n`;
    output += `   • Author: ${info.author}${info.authorMail ? ` <${info.authorMail}>` : ''}\n`;
    output += `   • Date: ${info.date}\n`;
    output += `   • Message: ${info.commitMessage}\n`;
    return output;
  }

  static cacheInfo(info: CacheInfo): string {
    let output = `\n🗄️  Repository cache: ${info.cacheDir}\n`;
    output += `   • Repositories: ${info.totalRepos}\n`;
    output += `   • Size: ${info.totalSizeMb} MB of ${info.maxSizeMb} MB\n`;

    info.repos.forEach(repo => {
      output += `     - ${repo.key} (${repo.sizeMb} MB, ${repo.mtime})\n`;
    });

    return output;
  }
}
