import { z } from "zod";

// Shared target fields
const TargetSchema = z.object({
  target: z.string().min(1).describe("Local directory or GitHub repository, directory (tree) or file (blob) URL"),
  githubToken: z.string().optional().describe("Token for private repositories; overrides GITHUB_TOKEN"),
  useCache: z.boolean().optional().describe("Reuse cached clones of remote repositories"),
});

const pattern = z.string().optional().describe("File pattern to scan, e.g. *.ts or src/**/*.tsx");
const symbol = z.string().min(1).describe("Symbol name to look up");
const maxResults = z.number().int().positive().optional().describe("Rows shown before the report is trimmed");

// Tool input schemas
export const ScanDirectorySchema = TargetSchema.extend({
  pattern,
});

export const FindSymbolSchema = TargetSchema.extend({
  symbol,
  pattern,
});

export const AnalyzeImpactSchema = TargetSchema.extend({
  symbol,
  pattern,
});

export const BuildDependencyGraphSchema = TargetSchema.extend({
  pattern,
});

export const VisualizeDependencyGraphSchema = TargetSchema.extend({
  pattern,
  maxNodes: z.number().int().positive().default(50).describe("Most connected symbols to draw"),
  showFiles: z.boolean().default(false).describe("Show the defining file under each symbol"),
});

export const GrepSearchSchema = TargetSchema.extend({
  pattern: z.string().min(1).describe("Regular expression passed to grep"),
  fileGlob: z.string().optional().describe("Restrict the search to file names matching this glob"),
});

export const GitBlameSchema = TargetSchema.extend({
  file: z.string().optional().describe("File relative to the target root; optional for file URLs"),
  line: z.number().int().positive().describe("1-based line number"),
});

export const SymbolUsageReportSchema = TargetSchema.extend({
  symbol,
  pattern,
  maxResults,
  includeGraph: z.boolean().default(true).describe("Include what the symbol depends on and what uses it"),
});

export const GrepReportSchema = TargetSchema.extend({
  pattern: z.string().min(1).describe("Regular expression passed to grep"),
  fileGlob: z.string().optional().describe("Restrict the search to file names matching this glob"),
  maxResults,
});

export const RepositoryCacheSchema = z.object({
  action: z.enum(["info", "clear"]).default("info").describe("Report cache contents or remove entries"),
  key: z.string().optional().describe("Cache entry to remove; all entries when omitted"),
});

export type TargetArgs = z.infer<typeof TargetSchema>;

// Tool results

export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};

export interface Tool {
  execute(args: unknown): Promise<ToolResult>;
}

// Tool listing

export type JsonSchemaProperty = {
  type: "string" | "number" | "integer" | "boolean";
  description: string;
  enum?: string[];
  default?: string | number | boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
};
