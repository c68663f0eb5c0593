import { ScoutContext, withSession } from "@symbolscope/core";
import { SymbolUsageReportSchema, Tool, ToolResult } from "../types/index.js";
import { sessionOptions, textResult } from "./tool-result.js";

export class SymbolUsageReportTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = SymbolUsageReportSchema.parse(args);
    this.context.logger.info("symbol_usage_report", { target: validated.target, symbol: validated.symbol });

    const report = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.symbolUsageReport(validated.symbol, {
        pattern: validated.pattern,
        maxResults: validated.maxResults,
        includeGraph: validated.includeGraph,
      })
    );

    return textResult(report);
  }
}
