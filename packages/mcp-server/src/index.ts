#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Logger, createScoutContext, errorMessage, loadConfig } from "@symbolscope/core";
import dotenv from "dotenv";
import { SERVER_VERSION, createServer } from "./server.js";

// Load environment variables
dotenv.config();

const logger = new Logger({ scope: "mcp", verbose: process.env.SYMBOLSCOPE_VERBOSE === "true" });

async function main(): Promise<void> {
  const config = loadConfig();
  const server = createServer(createScoutContext(config, { logger }));
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info(`symbolscope MCP server v${SERVER_VERSION} running on stdio`, { cacheDir: config.cache.dir });
}

main().catch((error: unknown) => {
  logger.error("Fatal error", { error: errorMessage(error) });
  process.exit(1);
});
