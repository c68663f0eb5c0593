import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ScoutContext } from "@symbolscope/core";
import { TOOL_DEFINITIONS, callTool, createTools } from "./tools/index.js";

export const SERVER_NAME = "symbolscope-mcp-server";
export const SERVER_VERSION = "0.1.0";

export function createServer(context: ScoutContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  const tools = createTools(context);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(tools, name, args, context);
  });

  return server;
}
