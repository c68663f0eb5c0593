import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { SymbolScanner } from '../src/analysis/symbol-scanner.js';
import { buildDependencyGraph } from '../src/graph/dependency-graph.js';
import { analyzeImpact } from '../src/graph/impact-analyzer.js';
import { UsageRecord } from '../src/types/index.js';
import { BROKEN_PROJECT, SAMPLE_PROJECT } from './helpers/test-utils.js';

function summarize(usages: readonly UsageRecord[]): Array<[string, string, number, number]> {
  return usages.map((usage): [string, string, number, number] => [
    usage.kind,
    path.relative(SAMPLE_PROJECT, usage.filePath).split(path.sep).join('/'),
    usage.line,
    usage.column,
  ]);
}

describe('SymbolScanner', () => {
  describe('single file analysis', () => {
    it('records a definition and a call for a declared and invoked function', () => {
      const scanner = new SymbolScanner();
      const index = scanner.analyzeSingleFile('function foo() {}\nfoo();\n', 'foo.ts');

      expect(index.get('foo')).toEqual([
        { filePath: 'foo.ts', line: 1, column: 9, context: 'function foo() {}', kind: 'definition' },
        { filePath: 'foo.ts', line: 2, column: 0, context: 'foo();', kind: 'call' },
      ]);

      const impact = analyzeImpact(index, 'foo');
      expect(impact.totalUsages).toBe(2);
      expect(impact.usageBreakdown).toEqual({ imports: 0, calls: 1, references: 0, definitions: 1 });
    });

    it('keeps call and reference apart for method calls', () => {
      const scanner = new SymbolScanner();
      const index = scanner.analyzeSingleFile('const obj = { m() {} };\nobj.m();\n', 'obj.ts');

      expect(index.get('m')?.map((usage) => [usage.kind, usage.line, usage.column])).toEqual([
        ['definition', 1, 14],
        ['call', 2, 0],
      ]);
      expect(index.get('obj')?.map((usage) => [usage.kind, usage.line, usage.column])).toEqual([
        ['reference', 1, 6],
        ['reference', 2, 0],
      ]);
    });

    it('defines arrow functions, function expressions and accessors', () => {
      const scanner = new SymbolScanner();
      const source = [
        'export const parse = (s: string) => s;',
        "export const render = () => parse('x');",
        'class K {',
        '  get g() { return 1; }',
        '  handle = () => 1;',
        '}',
        'const legacy = function () { return 0; };',
        'const count = 1;',
      ].join('\n');
      const index = scanner.analyzeSingleFile(source, 'defs.ts');

      const kinds = (symbol: string) => index.get(symbol)?.map((usage) => [usage.kind, usage.line, usage.column]);
      expect(kinds('parse')).toEqual([
        ['definition', 1, 13],
        ['call', 2, 28],
      ]);
      expect(kinds('render')).toEqual([['definition', 2, 13]]);
      expect(kinds('g')).toEqual([['definition', 4, 6]]);
      expect(kinds('handle')).toEqual([['definition', 5, 2]]);
      expect(kinds('legacy')).toEqual([['definition', 7, 6]]);
      expect(kinds('count')).toEqual([['reference', 8, 6]]);
      expect([...buildDependencyGraph(index).keys()]).toEqual(['parse', 'render', 'K', 'g', 'handle', 'legacy']);
    });

    it('records imported names but not aliases or module specifiers', () => {
      const scanner = new SymbolScanner();
      const source = [
        "import def, { a as b, c } from 'mod';",
        "import * as ns from 'other';",
        "import legacy = require('legacy');",
      ].join('\n');
      const index = scanner.analyzeSingleFile(source, 'imports.ts');

      expect([...index.keys()]).toEqual(['def', 'a', 'c', 'ns', 'legacy']);
      expect(index.get('ns')).toEqual([
        { filePath: 'imports.ts', line: 2, column: 0, context: "import * as ns from 'other';", kind: 'import' },
      ]);
    });

    it('does not treat declaration names, members or labels as references', () => {
      const scanner = new SymbolScanner();
      const source = [
        'interface Shape { width: number }',
        'type Alias = Shape;',
        'enum Color { Red }',
        'outer: for (;;) { break outer; }',
      ].join('\n');
      const index = scanner.analyzeSingleFile(source, 'decls.ts');

      expect([...index.keys()]).toEqual(['Shape']);
      expect(index.get('Shape')).toEqual([
        { filePath: 'decls.ts', line: 2, column: 13, context: 'type Alias = Shape;', kind: 'reference' },
      ]);
    });

    it('records a parse error and leaves the index untouched', () => {
      const scanner = new SymbolScanner();
      const index = scanner.analyzeSingleFile('function (', 'broken.ts');

      expect(index.size).toBe(0);
      const report = scanner.report();
      expect(report.failedFiles).toBe(1);
      expect(report.files[0]).toMatchObject({ status: 'parse-error', filePath: 'broken.ts' });
    });
  });

  describe('directory scans', () => {
    it('indexes files in sorted path order', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(SAMPLE_PROJECT, '*.ts');

      expect(summarize(scanner.findSymbol('add'))).toEqual([
        ['import', 'src/calculator.ts', 1, 0],
        ['call', 'src/calculator.ts', 7, 41],
        ['definition', 'src/math.ts', 1, 16],
        ['call', 'src/math.ts', 8, 12],
      ]);
      expect(summarize(scanner.findSymbol('Calculator'))).toEqual([
        ['import', 'src/app.ts', 1, 0],
        ['call', 'src/app.ts', 4, 21],
        ['definition', 'src/calculator.ts', 3, 13],
      ]);
      expect(summarize(scanner.findSymbol('calculator'))).toEqual([
        ['reference', 'src/app.ts', 4, 8],
        ['reference', 'src/app.ts', 5, 9],
      ]);
    });

    it('stores the trimmed source line as context', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(SAMPLE_PROJECT);

      const [, call] = scanner.findSymbol('add');
      expect(call?.context).toBe('return values.reduce((acc, value) => add(acc, value), 0);');
    });

    it('never records member or parameter declarations', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(SAMPLE_PROJECT);

      expect(scanner.findSymbol('memory')).toEqual([]);
      expect(summarize(scanner.findSymbol('value'))).toEqual([
        ['reference', 'src/calculator.ts', 7, 50],
        ['reference', 'src/calculator.ts', 11, 27],
        ['reference', 'src/calculator.ts', 11, 34],
      ]);
    });

    it('produces identical indices from fresh scanners', async () => {
      const first = await new SymbolScanner().scan(SAMPLE_PROJECT);
      const second = await new SymbolScanner().scan(SAMPLE_PROJECT);

      expect([...second.entries()]).toEqual([...first.entries()]);
    });

    it('accumulates usages across scans on one scanner', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(SAMPLE_PROJECT);
      await scanner.scan(SAMPLE_PROJECT);

      expect(scanner.findSymbol('main')).toHaveLength(2);
      expect(scanner.report().scannedFiles).toBe(6);
    });

    it('matches slash-free patterns against basenames only', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(SAMPLE_PROJECT, 'math.ts');

      expect(scanner.report().scannedFiles).toBe(1);
      expect(scanner.findSymbol('Calculator')).toEqual([]);
    });

    it('skips excluded files', async () => {
      const scanner = new SymbolScanner({ exclude: ['**/calculator.ts'] });
      await scanner.scan(SAMPLE_PROJECT);

      expect(scanner.report().scannedFiles).toBe(2);
      expect(scanner.findSymbol('sum')).toEqual([]);
    });

    it('continues past files that fail to parse', async () => {
      const scanner = new SymbolScanner();
      await scanner.scan(BROKEN_PROJECT);
      const report = scanner.report();

      expect(report.scannedFiles).toBe(2);
      expect(report.failedFiles).toBe(1);
      expect(report.files[0]).toMatchObject({ status: 'parse-error', filePath: path.join(BROKEN_PROJECT, 'bad.ts') });
      expect(report.files[1]).toEqual({ status: 'ok', filePath: path.join(BROKEN_PROJECT, 'good.ts'), usages: 2 });
      expect(scanner.findSymbol('ok').map((usage) => usage.kind)).toEqual(['definition', 'call']);
    });

    it('lets other callbacks run between files', async () => {
      const scanner = new SymbolScanner();
      const seen: number[] = [];
      let done = false;

      const scanning = scanner.scan(SAMPLE_PROJECT).then(() => {
        done = true;
      });
      while (!done) {
        await new Promise((resolve) => setImmediate(resolve));
        seen.push(scanner.report().scannedFiles);
      }
      await scanning;

      expect(seen).toEqual(expect.arrayContaining([1, 2]));
      expect(seen[seen.length - 1]).toBe(3);
    });

    it('returns an empty index when nothing matches', async () => {
      const scanner = new SymbolScanner();
      const index = await scanner.scan(SAMPLE_PROJECT, '*.py');

      expect(index.size).toBe(0);
      expect(scanner.report().scannedFiles).toBe(0);
    });
  });
});
