import { ScoutError, SessionOptions, errorMessage } from "@symbolscope/core";
import { ZodError } from "zod";
import { TargetArgs, ToolResult } from "../types/index.js";

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

/**
 * Failed tool calls are reported in-band so the client sees the message and,
 * for engine errors, the suggestion printed beneath it.
 */
export function errorResult(error: unknown): ToolResult {
  let text: string;

  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`);
    text = `Error: Invalid arguments\n${issues.map((issue) => `- ${issue}`).join("\n")}`;
  } else if (error instanceof ScoutError && error.suggestion) {
    text = `Error: ${error.message}\nSuggestion: ${error.suggestion}`;
  } else {
    text = `Error: ${errorMessage(error)}`;
  }

  return { content: [{ type: "text", text }], isError: true };
}

export function sessionOptions(args: TargetArgs): SessionOptions {
  return { token: args.githubToken, useCache: args.useCache };
}
