#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { server, SERVER_VERSION } from './server.js';
import { ConfigError, ServerConfig, loadConfig } from "./config.js";
import { configureLogging, log } from "./logging.js";
import { registerTools } from "./tools/index.js";

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();

  configureLogging(config);
  registerTools();

  // Connect to stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);
  await log("info", `Workflow DSL MCP server ${SERVER_VERSION} initialized (log level: ${config.logLevel})`);
}

main().catch((error: unknown) => {
  console.error(`Failed to start MCP server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
