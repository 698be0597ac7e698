#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { getProbeClient } from "./protocol/index.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = createServer(getProbeClient(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`SWD probe MCP server started (probe ${config.host}:${config.port})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
