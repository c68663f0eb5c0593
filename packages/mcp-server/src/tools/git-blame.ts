import { ScoutContext, withSession } from "@symbolscope/core";
import { GitBlameSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions, textResult } from "./tool-result.js";

export class GitBlameTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = GitBlameSchema.parse(args);
    this.context.logger.info("git_blame", { target: validated.target, file: validated.file, line: validated.line });

    const info = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.blame(validated.line, validated.file)
    );

    if (!info) {
      return textResult(`No blame information for line ${validated.line}.`);
    }
    return jsonResult(info);
  }
}
