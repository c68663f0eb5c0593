import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandRunner, ScoutContext, createScoutContext, getDefaultConfig } from '@symbolscope/core';
import { ScoutCommand } from '../src/commands/scout-command';

const GREETER = path.join(__dirname, 'fixtures', 'greeter');

describe('ScoutCommand', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'symbolscope-cli-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createCommand(runner?: CommandRunner): ScoutCommand {
    const defaults = getDefaultConfig();
    const context: ScoutContext = createScoutContext(
      { ...defaults, cache: { ...defaults.cache, dir: path.join(tempDir, 'cache') } },
      {
        runner,
        tempDir,
        cloner: {
          clone: async () => {
            throw new Error('tests never clone');
          },
        },
      }
    );
    return new ScoutCommand(context);
  }

  it('prints scan statistics', async () => {
    const output = await createCommand().scan(GREETER, { json: false });

    expect(output.split('\n').slice(0, 3)).toEqual(['', `🔍 Scanning ${GREETER}`, '✅ Indexed 2 symbols in 1 files']);
  });

  it('lists usages of a symbol', async () => {
    const output = await createCommand().find(GREETER, 'greet', { json: false });

    expect(output).toBe(
      [
        '',
        `🔍 Usages of 'greet' in ${GREETER}`,
        'ℹ️  2 usages found',
        '',
        '📍 Usages:',
        '   • greet.ts:1:16 [definition] export function greet(name: string): string {',
        "   • greet.ts:5:0 [call] greet('world');",
        '',
      ].join('\n')
    );
  });

  it('prints JSON when asked', async () => {
    const output = await createCommand().impact(GREETER, 'greet', { json: true });

    expect(JSON.parse(output)).toEqual({
      symbol: 'greet',
      totalUsages: 2,
      affectedFiles: ['greet.ts'],
      fileCount: 1,
      usageBreakdown: { imports: 0, calls: 1, references: 0, definitions: 1 },
      dependencies: [],
      dependents: [],
    });
  });

  it('prints the usage report', async () => {
    const output = await createCommand().find(GREETER, 'greet', { json: false, report: true, maxResults: 1 });

    expect(output.split('\n')).toEqual([
      "Symbol usage report for 'greet'",
      `Target: ${GREETER}`,
      'Total usages: 2',
      'Breakdown: imports=0, calls=1, references=0, definitions=1',
      'Top matches:',
      '- greet.ts:1 [definition] export function greet(name: string): string {',
      '(trimmed to first 1 results)',
    ]);
  });

  it('prints the graph', async () => {
    const output = await createCommand().graph(GREETER, { json: false });

    expect(output).toBe('\n🕸️  Dependency graph (1 symbols):\n   • greet (greet.ts)\n');
  });

  it('passes the glob to grep', async () => {
    const calls: Array<readonly string[]> = [];
    const runner: CommandRunner = async (_command, args) => {
      calls.push(args);
      return { stdout: '', stderr: '', exitCode: 1 };
    };

    const output = await createCommand(runner).grep(GREETER, 'Hello', { json: false, glob: '*.tsx' });

    expect(calls).toEqual([['-rn', '--include', '*.tsx', '-e', 'Hello', GREETER]]);
    expect(output.split('\n').slice(-1)).toEqual(['   No matches found.']);
  });

  it('clears the cache', async () => {
    await expect(createCommand().cacheClear()).resolves.toBe('✅ Cleared all cached repositories');
    expect(fs.readdirSync(path.join(tempDir, 'cache'))).toEqual([]);
  });
});
