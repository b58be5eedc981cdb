#!/usr/bin/env node
/**
 * MCP server entry point for the Siteflow commands.
 * Uses stdio transport to communicate with the host.
 *
 * Usage: siteflow-mcp [--env-file <path>]
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import * as tools from './tools';
import { createSiteflowClient, loadConfig, loadEnvironment, type SiteflowConfig } from '../core';
import { getErrorMessage } from '../utils';

// Parse command-line arguments
// Expected: node server.js [--env-file <path>]
const args = process.argv.slice(2);
let envFile: string | undefined;

for (let i = 0; i < args.length; i++) {
  if (args[i] === '--env-file' && args[i + 1]) {
    envFile = args[i + 1];
    i++;
  }
}

// Configuration is validated before the transport starts, so a bad
// environment never reaches tool dispatch
const envPath = loadEnvironment(envFile);
let config: SiteflowConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(1);
}

const client = createSiteflowClient(config);

// Create MCP server
const server = new Server(
  { name: 'siteflow', version: '1.0.0' },
  { capabilities: { tools: {} } }
);

// Register tool list handler
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: tools.listToolDefinitions(),
}));

// Register tool call handler
server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: toolArgs } = request.params;
  return tools.callTool(client.dispatcher, name, toolArgs, extra.signal);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  // Use stderr for logging so it doesn't interfere with stdio protocol
  console.error(`Siteflow MCP server started`);
  console.error(`  Server: ${config.serverUrl}`);
  console.error(`  Project: ${config.projectId}`);
  console.error(`  Env file: ${envPath}`);
}

main().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
