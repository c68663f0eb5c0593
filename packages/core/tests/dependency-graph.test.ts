import { describe, it, expect } from '@jest/globals';
import { SymbolScanner } from '../src/analysis/symbol-scanner.js';
import { buildDependencyGraph } from '../src/graph/dependency-graph.js';
import { analyzeImpact } from '../src/graph/impact-analyzer.js';
import { SymbolIndex, UsageKind, UsageRecord } from '../src/types/index.js';
import { SAMPLE_PROJECT } from './helpers/test-utils.js';

function usage(filePath: string, line: number, kind: UsageKind, context: string): UsageRecord {
  return { filePath, line, column: 0, context, kind };
}

function createIndex(): SymbolIndex {
  return new Map([
    ['Runner', [usage('a.ts', 1, 'definition', 'class Runner {')]],
    [
      'run',
      [usage('a.ts', 2, 'definition', 'run() {'), usage('a.ts', 5, 'call', 'const r = new Runner(); r.run();')],
    ],
    [
      'helper',
      [
        usage('b.ts', 1, 'definition', 'function helper() {'),
        usage('b.ts', 3, 'call', 'helper(); runAll();'),
        usage('a.ts', 9, 'call', 'helper(); Runner;'),
      ],
    ],
    ['orphan', [usage('a.ts', 3, 'reference', 'orphan')]],
  ]);
}

describe('buildDependencyGraph', () => {
  it('creates nodes only for defined symbols, anchored at the first definition', () => {
    const graph = buildDependencyGraph(createIndex());

    expect([...graph.keys()]).toEqual(['Runner', 'run', 'helper']);
    expect(graph.get('helper')?.filePath).toBe('b.ts');
    expect(graph.has('orphan')).toBe(false);
  });

  it('links symbols that share a usage line in the defining file', () => {
    const graph = buildDependencyGraph(createIndex());

    expect([...(graph.get('run')?.dependencies ?? [])]).toEqual(['Runner']);
    expect([...(graph.get('Runner')?.dependents ?? [])]).toEqual(['run']);
  });

  it('follows textual substrings, including names that merely contain a symbol', () => {
    const graph = buildDependencyGraph(createIndex());

    // `runAll` is not `run`, but the line contains the text
    expect([...(graph.get('helper')?.dependencies ?? [])]).toEqual(['run']);
  });

  it('ignores usages outside the defining file', () => {
    const graph = buildDependencyGraph(createIndex());

    expect(graph.get('helper')?.dependencies.has('Runner')).toBe(false);
  });

  it('keeps edges symmetric', () => {
    const scanner = new SymbolScanner();
    scanner.analyzeSingleFile(
      [
        'function parse() {}',
        'function render() {}',
        'function main() {',
        '  render(parse());',
        '  main();',
        '}',
      ].join('\n'),
      'main.ts'
    );
    const graph = buildDependencyGraph(scanner.getIndex());

    let edges = 0;
    for (const [symbol, node] of graph) {
      expect(node.dependencies.has(symbol)).toBe(false);
      for (const dependency of node.dependencies) {
        edges++;
        expect(graph.get(dependency)?.dependents.has(symbol)).toBe(true);
      }
      for (const dependent of node.dependents) {
        expect(graph.get(dependent)?.dependencies.has(symbol)).toBe(true);
      }
    }
    expect(edges).toBeGreaterThan(0);
  });

  it('returns an empty graph for an empty index', () => {
    expect(buildDependencyGraph(new Map()).size).toBe(0);
  });
});

describe('analyzeImpact', () => {
  it('counts usages by kind and lists affected files', () => {
    const report = analyzeImpact(createIndex(), 'helper');

    expect(report).toEqual({
      symbol: 'helper',
      totalUsages: 3,
      affectedFiles: ['b.ts', 'a.ts'],
      fileCount: 2,
      usageBreakdown: { imports: 0, calls: 2, references: 0, definitions: 1 },
      dependencies: ['run'],
      dependents: [],
    });
  });

  it('omits graph fields for symbols without a definition', () => {
    const report = analyzeImpact(createIndex(), 'orphan');

    expect(report.totalUsages).toBe(1);
    expect(report.usageBreakdown.references).toBe(1);
    expect('dependencies' in report).toBe(false);
    expect('dependents' in report).toBe(false);
  });

  it('returns zero counts for an unknown symbol', () => {
    const report = analyzeImpact(createIndex(), 'missing');

    expect(report).toEqual({
      symbol: 'missing',
      totalUsages: 0,
      affectedFiles: [],
      fileCount: 0,
      usageBreakdown: { imports: 0, calls: 0, references: 0, definitions: 0 },
    });
    expect('dependencies' in report).toBe(false);
  });

  it('uses a provided graph instead of building one', () => {
    const index = createIndex();
    const graph = buildDependencyGraph(index);
    graph.get('run')?.dependents.add('extra');

    expect(analyzeImpact(index, 'run', graph).dependents).toEqual(['helper', 'extra']);
  });

  it('agrees with the scanner on total usages', async () => {
    const scanner = new SymbolScanner();
    await scanner.scan(SAMPLE_PROJECT);

    for (const symbol of ['add', 'multiply', 'Calculator', 'calculator', 'value']) {
      const report = analyzeImpact(scanner.getIndex(), symbol);
      const { imports, calls, references, definitions } = report.usageBreakdown;

      expect(report.totalUsages).toBe(scanner.findSymbol(symbol).length);
      expect(imports + calls + references + definitions).toBe(report.totalUsages);
    }
  });
});
