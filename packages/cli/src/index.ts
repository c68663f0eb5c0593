#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { Logger, ScoutError, createScoutContext, errorMessage, loadConfig } from '@symbolscope/core';
import { CommandOptions, ScoutCommand } from './commands/scout-command.js';
import { OutputFormatter } from './utils/output-formatter.js';

// Load environment variables
dotenv.config();

type GlobalOptions = {
  verbose?: boolean;
  token?: string;
  cache: boolean;
  json?: boolean;
};

const program = new Command();

// Global options
program
  .name('symbolscope')
  .description('Symbol usages, dependency graphs and impact analysis for local and GitHub codebases')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-t, --token <token>', 'GitHub token for private repositories (default: GITHUB_TOKEN)')
  .option('--no-cache', 'Clone remote repositories into a temporary directory instead of the cache')
  .option('--json', 'Print JSON instead of formatted output');

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function run(work: (command: ScoutCommand, options: CommandOptions) => Promise<string>): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  const logger = new Logger({ scope: 'cli', verbose: globalOpts.verbose ?? false });

  try {
    const context = createScoutContext(loadConfig(), { logger });
    const output = await work(new ScoutCommand(context), {
      token: globalOpts.token,
      useCache: globalOpts.cache ? undefined : false,
      json: globalOpts.json ?? false,
    });
    logger.log(output);
  } catch (error) {
    logger.log(OutputFormatter.error(errorMessage(error), error instanceof ScoutError ? error.suggestion : undefined));

    logger.debug('Command failed', {
      error: error instanceof Error ? error.stack : String(error),
    });

    process.exit(1);
  }
}

program
  .command('scan')
  .description('Index every symbol usage under a target')
  .argument('<target>', 'Local directory or GitHub URL')
  .option('-p, --pattern <pattern>', 'File pattern to scan (default: *.ts)')
  .action(async (target: string, options: { pattern?: string }) => {
    await run((command, common) => command.scan(target, { ...common, pattern: options.pattern }));
  });

program
  .command('find')
  .description('Find the definitions, imports, calls and references of a symbol')
  .argument('<target>', 'Local directory or GitHub URL')
  .argument('<symbol>', 'Symbol name')
  .option('-p, --pattern <pattern>', 'File pattern to scan (default: *.ts)')
  .option('-r, --report', 'Print the symbol usage report')
  .option('-m, --max-results <n>', 'Rows to print', parsePositiveInt)
  .action(async (target: string, symbol: string, options: { pattern?: string; report?: boolean; maxResults?: number }) => {
    await run((command, common) => command.find(target, symbol, { ...common, ...options }));
  });

program
  .command('impact')
  .description('Show what changing a symbol would touch')
  .argument('<target>', 'Local directory or GitHub URL')
  .argument('<symbol>', 'Symbol name')
  .option('-p, --pattern <pattern>', 'File pattern to scan (default: *.ts)')
  .action(async (target: string, symbol: string, options: { pattern?: string }) => {
    await run((command, common) => command.impact(target, symbol, { ...common, pattern: options.pattern }));
  });

program
  .command('graph')
  .description('Build the symbol dependency graph')
  .argument('<target>', 'Local directory or GitHub URL')
  .option('-p, --pattern <pattern>', 'File pattern to scan (default: *.ts)')
  .option('--mermaid', 'Render the graph as a Mermaid diagram')
  .option('--max-nodes <n>', 'Most connected symbols to draw', parsePositiveInt)
  .option('--show-files', 'Show the defining file under each symbol')
  .action(
    async (
      target: string,
      options: { pattern?: string; mermaid?: boolean; maxNodes?: number; showFiles?: boolean }
    ) => {
      await run((command, common) => command.graph(target, { ...common, ...options }));
    }
  );

program
  .command('grep')
  .description('Search file contents with grep')
  .argument('<target>', 'Local directory or GitHub URL')
  .argument('<pattern>', 'Regular expression')
  .option('-g, --glob <glob>', 'Only search files matching this glob (default: *.ts)')
  .option('-r, --report', 'Print the grep report')
  .option('-m, --max-results <n>', 'Rows to print', parsePositiveInt)
  .action(async (target: string, pattern: string, options: { glob?: string; report?: boolean; maxResults?: number }) => {
    await run((command, common) => command.grep(target, pattern, { ...common, ...options }));
  });

program
  .command('blame')
  .description('Show the last commit that touched a line')
  .argument('<target>', 'Local directory or GitHub URL')
  .argument('<line>', '1-based line number', parsePositiveInt)
  .argument('[file]', 'File relative to the target (optional for file URLs)')
  .action(async (target: string, line: number, file: string | undefined) => {
    await run((command, common) => command.blame(target, line, file, common));
  });

const cache = program.command('cache').description('Inspect or clear the repository cache');

cache
  .command('info')
  .description('List cached repositories and their sizes')
  .action(async () => {
    await run((command, common) => command.cacheInfo(common));
  });

cache
  .command('clear')
  .description('Remove one cached repository, or all of them')
  .argument('[key]', 'Cache key from `cache info`')
  .action(async (key: string | undefined) => {
    await run(command => command.cacheClear(key));
  });

// Configure help
program.configureHelp({
  sortSubcommands: true,
});
program.showHelpAfterError();

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(OutputFormatter.error(errorMessage(error)));
  process.exit(1);
});
