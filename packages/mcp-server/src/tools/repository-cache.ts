import { ScoutContext } from "@symbolscope/core";
import { RepositoryCacheSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, textResult } from "./tool-result.js";

export class RepositoryCacheTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = RepositoryCacheSchema.parse(args);

    if (validated.action === "info") {
      return jsonResult(await this.context.cache.getInfo());
    }

    await this.context.cache.invalidate(validated.key);
    this.context.logger.info("Cleared repository cache", { key: validated.key ?? "all" });
    return textResult(validated.key ? `Removed cache entry ${validated.key}.` : "Cleared all cached repositories.");
  }
}
