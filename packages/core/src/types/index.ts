// Symbol usage types

export type UsageKind = 'definition' | 'import' | 'call' | 'reference';

/**
 * One observed occurrence of a symbol.
 * Records are frozen when created and never mutated afterwards.
 */
export interface UsageRecord {
  readonly filePath: string;
  /** 1-based */
  readonly line: number;
  /** 0-based */
  readonly column: number;
  /** Trimmed source line the occurrence sits on */
  readonly context: string;
  readonly kind: UsageKind;
}

/**
 * Symbol name -> usages in parse order.
 */
export type SymbolIndex = Map<string, UsageRecord[]>;

export type ReadonlySymbolIndex = ReadonlyMap<string, readonly UsageRecord[]>;

// Scan report types

export interface FileScanSuccess {
  status: 'ok';
  filePath: string;
  usages: number;
}

export interface FileScanFailure {
  status: 'parse-error';
  filePath: string;
  message: string;
  line?: number;
}

export type FileScanOutcome = FileScanSuccess | FileScanFailure;

export interface ScanReport {
  index: ReadonlySymbolIndex;
  files: readonly FileScanOutcome[];
  scannedFiles: number;
  failedFiles: number;
  totalSymbols: number;
}

// Dependency graph types

export interface DependencyNode {
  symbol: string;
  /** File of the symbol's first definition */
  filePath: string;
  dependencies: Set<string>;
  dependents: Set<string>;
}

export type DependencyGraph = Map<string, DependencyNode>;

export interface UsageBreakdown {
  imports: number;
  calls: number;
  references: number;
  definitions: number;
}

export interface ImpactReport {
  symbol: string;
  totalUsages: number;
  affectedFiles: string[];
  fileCount: number;
  usageBreakdown: UsageBreakdown;
  dependencies?: string[];
  dependents?: string[];
}

// Search types

export interface GrepMatch {
  file: string;
  line: number;
  content: string;
}

export interface BlameInfo {
  commit: string;
  author: string;
  authorMail?: string;
  /** Unix seconds */
  timestamp: number;
  /** ISO-8601 rendering of timestamp */
  date: string;
  commitMessage: string;
}

// Source resolution types

export type GitHubUrlShape = 'blob' | 'tree' | 'repository';

export interface ParsedGitHubUrl {
  shape: GitHubUrlShape;
  owner: string;
  repo: string;
  ref?: string;
  path?: string;
}

export type SourceOrigin =
  | { kind: 'local'; path: string }
  | {
      kind: 'remote';
      url: string;
      cloneUrl: string;
      parsed: ParsedGitHubUrl;
      cached: boolean;
    };

export interface ResolvedSource {
  /** Directory analysis runs against */
  root: string;
  /** Top of the checkout (equals root unless a tree URL narrowed it) */
  checkoutRoot: string;
  origin: SourceOrigin;
  release(): Promise<void>;
}

// Cache types

export interface CacheEntryInfo {
  key: string;
  sizeMb: number;
  mtime: string;
}

export interface CacheInfo {
  cacheDir: string;
  totalRepos: number;
  totalSizeMb: number;
  maxSizeMb: number;
  repos: CacheEntryInfo[];
}

// Wire formats

export interface WireUsage {
  filePath: string;
  line: number;
  column: number;
  context: string;
  kind: UsageKind;
}

export interface WireDependencyNode {
  symbol: string;
  filePath: string;
  dependencies: string[];
  dependents: string[];
}

// Logging types

export interface LogEntry {
  timestamp: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  scope?: string;
  message: string;
  context?: Record<string, unknown>;
}
