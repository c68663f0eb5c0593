import { ScoutContext, withSession } from "@symbolscope/core";
import { GrepSearchSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions } from "./tool-result.js";

export class GrepSearchTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = GrepSearchSchema.parse(args);
    this.context.logger.info("grep_search", { target: validated.target, pattern: validated.pattern });

    const matches = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.grep(validated.pattern, validated.fileGlob)
    );

    return jsonResult({ pattern: validated.pattern, totalMatches: matches.length, matches });
  }
}
