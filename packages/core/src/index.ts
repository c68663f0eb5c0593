// Types
export * from './types/index.js';

// Errors
export {
  ScoutError,
  ResolutionError,
  CloneFailedError,
  CloneTimeoutError,
  CommandTimeoutError,
  ParseError,
  SearchToolError,
  ConfigurationError,
  errorMessage,
} from './errors.js';

// Configuration
export { getConfig, loadConfig, reloadConfig, getConfigPath, getDefaultConfig } from './config/config-loader.js';
export type { ScoutConfig, CacheConfig, GitConfig, GitHubConfig, OutputConfig, PartialScoutConfig } from './config/types.js';

// Utilities
export { Logger } from './utils/logger.js';
export { runCommand } from './utils/process.js';
export type { CommandRunner, CommandOptions, CommandResult } from './utils/process.js';

// Analysis
export { SymbolScanner } from './analysis/symbol-scanner.js';
export type { SymbolScannerOptions } from './analysis/symbol-scanner.js';
export { buildDependencyGraph } from './graph/dependency-graph.js';
export { analyzeImpact } from './graph/impact-analyzer.js';
export { renderMermaid, EMPTY_GRAPH_MESSAGE } from './graph/mermaid.js';
export type { MermaidOptions } from './graph/mermaid.js';

// Search
export { grepSearch, parseGrepOutput } from './search/text-search.js';
export { gitBlame, parseBlamePorcelain } from './search/blame.js';

// Sources
export { RepositoryCache, directorySize } from './cache/repository-cache.js';
export type { RepositoryCacheOptions, CacheResolveOptions } from './cache/repository-cache.js';
export { GitCloner } from './source/git-cloner.js';
export type { CloneRequest, RepositoryCloner } from './source/git-cloner.js';
export { GitHubClient } from './source/github-client.js';
export type { FetchFn, FetchedFile } from './source/github-client.js';
export { SourceResolver } from './source/source-resolver.js';
export type { ResolveOptions } from './source/source-resolver.js';
export { parseGitHubUrl, isRemoteTarget, buildCloneUrl, buildBlobUrl, redactUrl } from './source/github-url.js';

// Sessions
export { createScoutContext } from './session/context.js';
export type { ScoutContext, ScoutContextOverrides } from './session/context.js';
export { ScoutSession, withSession } from './session/scout-session.js';
export type { SessionOptions, ScanResult, ScanSummary, ScanFailure } from './session/scout-session.js';
export { PathMapper } from './session/path-mapper.js';
export { formatSymbolUsageReport, formatGrepReport } from './session/reports.js';
