import { ScoutContext, withSession } from "@symbolscope/core";
import { AnalyzeImpactSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions } from "./tool-result.js";

export class AnalyzeImpactTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = AnalyzeImpactSchema.parse(args);
    this.context.logger.info("analyze_impact", { target: validated.target, symbol: validated.symbol });

    const report = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.analyzeImpact(validated.symbol, validated.pattern)
    );

    return jsonResult(report);
  }
}
