import { ScoutContext, withSession } from "@symbolscope/core";
import { BuildDependencyGraphSchema, Tool, ToolResult } from "../types/index.js";
import { jsonResult, sessionOptions } from "./tool-result.js";

export class BuildDependencyGraphTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = BuildDependencyGraphSchema.parse(args);
    this.context.logger.info("build_dependency_graph", { target: validated.target });

    const nodes = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.buildGraph(validated.pattern)
    );

    return jsonResult({ totalSymbols: nodes.length, nodes });
  }
}
