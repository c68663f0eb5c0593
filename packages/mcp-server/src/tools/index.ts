import { ScoutContext } from "@symbolscope/core";
import { JsonSchemaProperty, Tool, ToolDefinition, ToolResult } from "../types/index.js";
import { AnalyzeImpactTool } from "./analyze-impact.js";
import { BuildDependencyGraphTool } from "./build-dependency-graph.js";
import { FindSymbolTool } from "./find-symbol.js";
import { GitBlameTool } from "./git-blame.js";
import { GrepReportTool } from "./grep-report.js";
import { GrepSearchTool } from "./grep-search.js";
import { RepositoryCacheTool } from "./repository-cache.js";
import { ScanDirectoryTool } from "./scan-directory.js";
import { SymbolUsageReportTool } from "./symbol-usage-report.js";
import { VisualizeDependencyGraphTool } from "./visualize-dependency-graph.js";
import { errorResult } from "./tool-result.js";

export const TOOL_NAMES = [
  "scan_directory",
  "find_symbol",
  "analyze_impact",
  "build_dependency_graph",
  "visualize_dependency_graph",
  "grep_search",
  "git_blame",
  "symbol_usage_report",
  "grep_report",
  "repository_cache",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolRegistry = Record<ToolName, Tool>;

export function createTools(context: ScoutContext): ToolRegistry {
  return {
    scan_directory: new ScanDirectoryTool(context),
    find_symbol: new FindSymbolTool(context),
    analyze_impact: new AnalyzeImpactTool(context),
    build_dependency_graph: new BuildDependencyGraphTool(context),
    visualize_dependency_graph: new VisualizeDependencyGraphTool(context),
    grep_search: new GrepSearchTool(context),
    git_blame: new GitBlameTool(context),
    symbol_usage_report: new SymbolUsageReportTool(context),
    grep_report: new GrepReportTool(context),
    repository_cache: new RepositoryCacheTool(context),
  };
}

function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

/**
 * Dispatch a tool call. Unknown tools, invalid arguments and engine errors
 * all come back as `isError` results.
 */
export async function callTool(
  tools: ToolRegistry,
  name: string,
  args: unknown,
  context: ScoutContext
): Promise<ToolResult> {
  try {
    if (!isToolName(name)) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return await tools[name].execute(args ?? {});
  } catch (error) {
    context.logger.error("Error handling tool call", {
      tool: name,
      error: error instanceof Error ? error.message : String(error),
    });
    return errorResult(error);
  }
}

// Tool listing

const TARGET_PROPERTIES: Record<string, JsonSchemaProperty> = {
  target: {
    type: "string",
    description: "Local directory path or GitHub repository, directory (tree) or file (blob) URL",
  },
  githubToken: {
    type: "string",
    description: "GitHub token for private repositories (defaults to GITHUB_TOKEN)",
  },
  useCache: {
    type: "boolean",
    description: "Reuse cached clones of remote repositories",
  },
};

const PATTERN: JsonSchemaProperty = {
  type: "string",
  description: "File pattern to scan",
  default: "*.ts",
};

const SYMBOL: JsonSchemaProperty = {
  type: "string",
  description: "Symbol name (function, class, method or variable)",
};

const MAX_RESULTS: JsonSchemaProperty = {
  type: "integer",
  description: "Rows shown before the report is trimmed",
};

const GREP_PATTERN: JsonSchemaProperty = {
  type: "string",
  description: "Regular expression passed to grep",
};

const FILE_GLOB: JsonSchemaProperty = {
  type: "string",
  description: "Only search files whose names match this glob",
  default: "*.ts",
};

function targetTool(
  name: ToolName,
  description: string,
  properties: Record<string, JsonSchemaProperty>,
  required: string[]
): ToolDefinition {
  return {
    name,
    description,
    inputSchema: {
      type: "object",
      properties: { ...TARGET_PROPERTIES, ...properties },
      required: ["target", ...required],
    },
  };
}

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  targetTool(
    "scan_directory",
    "Scan a local directory or GitHub repository and index every symbol usage (definitions, imports, calls, references). Returns a summary with parse failures and the full index.",
    { pattern: PATTERN },
    []
  ),
  targetTool(
    "find_symbol",
    "Find every definition, import, call and reference of a symbol. Returns file, line, column, kind and the source line of each usage.",
    { symbol: SYMBOL, pattern: PATTERN },
    ["symbol"]
  ),
  targetTool(
    "analyze_impact",
    "Estimate the blast radius of changing a symbol: total usages, affected files, a breakdown by kind, and what it depends on and is used by.",
    { symbol: SYMBOL, pattern: PATTERN },
    ["symbol"]
  ),
  targetTool(
    "build_dependency_graph",
    "Build a symbol-level dependency graph. Each defined symbol lists the symbols it depends on and those that depend on it.",
    { pattern: PATTERN },
    []
  ),
  targetTool(
    "visualize_dependency_graph",
    "Render the symbol dependency graph as a Mermaid diagram with a legend and statistics.",
    {
      pattern: PATTERN,
      maxNodes: { type: "integer", description: "Most connected symbols to draw", default: 50 },
      showFiles: { type: "boolean", description: "Show the defining file under each symbol", default: false },
    },
    []
  ),
  targetTool(
    "grep_search",
    "Search file contents with grep. Returns file, line and the matched line for every hit.",
    { pattern: GREP_PATTERN, fileGlob: FILE_GLOB },
    ["pattern"]
  ),
  targetTool(
    "git_blame",
    "Show the last commit that touched one line: commit, author, date and message.",
    {
      file: { type: "string", description: "File relative to the target root (optional for file URLs)" },
      line: { type: "integer", description: "1-based line number" },
    },
    ["line"]
  ),
  targetTool(
    "symbol_usage_report",
    "Human-readable report of a symbol's usages with totals, breakdown, dependencies and the top matches.",
    {
      symbol: SYMBOL,
      pattern: PATTERN,
      maxResults: MAX_RESULTS,
      includeGraph: { type: "boolean", description: "Include 'Depends on' and 'Used by' lines", default: true },
    },
    ["symbol"]
  ),
  targetTool(
    "grep_report",
    "Human-readable grep report listing the top matches.",
    { pattern: GREP_PATTERN, fileGlob: FILE_GLOB, maxResults: MAX_RESULTS },
    ["pattern"]
  ),
  {
    name: "repository_cache",
    description: "Inspect or clear the cache of cloned repositories.",
    inputSchema: {
      type: "object",
      properties: {
        action: {
          type: "string",
          description: "'info' lists cached clones with sizes, 'clear' removes them",
          enum: ["info", "clear"],
          default: "info",
        },
        key: { type: "string", description: "Entry to remove with 'clear'; every entry when omitted" },
      },
      required: [],
    },
  },
];
