import { describe, it, expect } from '@jest/globals';
import { ImpactReport, WireUsage } from '@symbolscope/core';
import { OutputFormatter } from '../src/utils/output-formatter';

describe('OutputFormatter', () => {
  describe('Basic formatting', () => {
    it('should format header messages', () => {
      expect(OutputFormatter.header('Scanning src')).toBe('\n🔍 Scanning src');
    });

    it('should format info messages', () => {
      expect(OutputFormatter.info('3 usages found')).toBe('ℹ️  3 usages found');
    });

    it('should format success messages', () => {
      expect(OutputFormatter.success('Done')).toBe('✅ Done');
    });

    it('should format error messages with an optional suggestion', () => {
      expect(OutputFormatter.error('Clone failed')).toBe('❌ Clone failed');
      expect(OutputFormatter.error('Clone failed', 'Check the URL.')).toBe('❌ Clone failed\n   💡 Check the URL.');
    });
  });

  describe('Scan statistics', () => {
    it('should list parse failures with their line', () => {
      const result = OutputFormatter.scanSummary({
        target: 'src',
        pattern: '*.ts',
        scannedFiles: 4,
        failedFiles: 1,
        totalSymbols: 12,
        failures: [{ filePath: 'bad.ts', message: "'}' expected.", line: 3 }],
      });

      expect(result).toBe(
        "\n📊 Scan Statistics:\n   • Pattern: *.ts\n   • Files scanned: 4\n   • Files failed: 1\n   • Symbols: 12\n   • Parse failures:\n     - bad.ts:3: '}' expected.\n"
      );
    });

    it('should omit the failure section when every file parsed', () => {
      const result = OutputFormatter.scanSummary({
        target: 'src',
        pattern: '*.ts',
        scannedFiles: 1,
        failedFiles: 0,
        totalSymbols: 2,
        failures: [],
      });

      expect(result).not.toContain('Parse failures');
    });
  });

  describe('Usage list', () => {
    const usages: WireUsage[] = [
      { filePath: 'a.ts', line: 1, column: 16, context: 'export function run() {', kind: 'definition' },
      { filePath: 'b.ts', line: 4, column: 0, context: 'run();', kind: 'call' },
      { filePath: 'c.ts', line: 9, column: 2, context: 'run();', kind: 'call' },
    ];

    it('should print one line per usage', () => {
      expect(OutputFormatter.usageList(usages)).toBe(
        '\n📍 Usages:\n   • a.ts:1:16 [definition] export function run() {\n   • b.ts:4:0 [call] run();\n   • c.ts:9:2 [call] run();\n'
      );
    });

    it('should note how many usages were cut', () => {
      expect(OutputFormatter.usageList(usages, 2)).toContain('   ... and 1 more usages\n');
    });

    it('should handle no usages', () => {
      expect(OutputFormatter.usageList([])).toBe('   No usages found.');
    });
  });

  describe('Impact', () => {
    it('should show counts, neighbours and affected files', () => {
      const report: ImpactReport = {
        symbol: 'run',
        totalUsages: 3,
        affectedFiles: ['a.ts', 'b.ts'],
        fileCount: 2,
        usageBreakdown: { imports: 0, calls: 2, references: 0, definitions: 1 },
        dependencies: ['Runner'],
        dependents: [],
      };

      expect(OutputFormatter.impact(report).split('\n')).toEqual([
        '',
        "💥 Impact of 'run':",
        '   • Total usages: 3',
        '   • Files affected: 2',
        '   • Imports: 0, calls: 2, references: 0, definitions: 1',
        '   • Depends on: Runner',
        '',
        '📁 Affected files:',
        '   • a.ts',
        '   • b.ts',
        '',
      ]);
    });
  });

  describe('Blame', () => {
    it('should print the commit details', () => {
      const result = OutputFormatter.blame(
        {
          commit: 'abc123',
          author: 'Test User',
          authorMail: 'test@example.com',
          timestamp: 0,
          date: '1970-01-01T00:00:00.000Z',
          commitMessage: 'Initial commit',
        },
        7
      );

      expect(result).toContain('   • Author: Test User <test@example.com>\n');
      expect(result).toContain('   • Message: Initial commit\n');
    });

    it('should say when nothing was found', () => {
      expect(OutputFormatter.blame(null, 7)).toBe('   No blame information for line 7.');
    });
  });

  describe('Cache info', () => {
    it('should list each cached repository', () => {
      const result = OutputFormatter.cacheInfo({
        cacheDir: '/tmp/symbolscope-cache',
        totalRepos: 1,
        totalSizeMb: 1.5,
        maxSizeMb: 5000,
        repos: [{ key: 'abc', sizeMb: 1.5, mtime: '2024-01-01T00:00:00.000Z' }],
      });

      expect(result).toBe(
        '\n🗄️  Repository cache: /tmp/symbolscope-cache\n   • Repositories: 1\n   • Size: 1.5 MB of 5000 MB\n     - abc (1.5 MB, 2024-01-01T00:00:00.000Z)\n'
      );
    });
  });
});
