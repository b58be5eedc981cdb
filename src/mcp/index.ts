/**
 * MCP module exports.
 * Provides tool definitions and the call handler for the Siteflow commands.
 *
 * Note: The server (server.ts) is an entry point and not exported here.
 * It should be compiled and run separately.
 */

export {
  listToolDefinitions,
  callTool,
  describeError,
  type ToolDefinition,
  type ToolResponse,
  type JsonSchemaProperty,
} from './tools';
