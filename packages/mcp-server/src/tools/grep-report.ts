import { ScoutContext, withSession } from "@symbolscope/core";
import { GrepReportSchema, Tool, ToolResult } from "../types/index.js";
import { sessionOptions, textResult } from "./tool-result.js";

export class GrepReportTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = GrepReportSchema.parse(args);
    this.context.logger.info("grep_report", { target: validated.target, pattern: validated.pattern });

    const report = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.grepReport(validated.pattern, { fileGlob: validated.fileGlob, maxResults: validated.maxResults })
    );

    return textResult(report);
  }
}
