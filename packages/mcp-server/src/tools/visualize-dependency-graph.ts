import { ScoutContext, withSession } from "@symbolscope/core";
import { Tool, ToolResult, VisualizeDependencyGraphSchema } from "../types/index.js";
import { sessionOptions, textResult } from "./tool-result.js";

export class VisualizeDependencyGraphTool implements Tool {
  constructor(private readonly context: ScoutContext) {}

  async execute(args: unknown): Promise<ToolResult> {
    const validated = VisualizeDependencyGraphSchema.parse(args);
    this.context.logger.info("visualize_dependency_graph", {
      target: validated.target,
      maxNodes: validated.maxNodes,
    });

    const diagram = await withSession(validated.target, this.context, sessionOptions(validated), (session) =>
      session.visualize(validated.pattern, { maxNodes: validated.maxNodes, showFiles: validated.showFiles })
    );

    return textResult(diagram);
  }
}
