import { ScoutContext, withSession } from "@symbolscope/core";
import { FindSymbolSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions } from "./tool-result.js";

export class FindSymbolTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = FindSymbolSchema.parse(args);
    this.context.logger.info("find_symbol", { target: validated.target, symbol: validated.symbol });

    const usages = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.findSymbol(validated.symbol, validated.pattern)
    );

    return jsonResult({ symbol: validated.symbol, usages });
  }
}
