import { ScoutContext, withSession } from "@symbolscope/core";
import { ScanDirectorySchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions } from "./tool-result.js";

export class ScanDirectoryTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = ScanDirectorySchema.parse(args);
    this.context.logger.info("scan_directory", { target: validated.target, pattern: validated.pattern });

    const result = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.scan(validated.pattern)
    );

    return jsonResult(result);
  }
}
