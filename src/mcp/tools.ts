/**
 * MCP tool definitions and the call handler for the Siteflow commands.
 * The server (server.ts) wires these to the MCP request handlers.
 */

import {
  listCommandDefinitions,
  type CommandArgument,
  type CommandDispatcher,
} from '../core';
import { SiteflowError } from '../errors';
import { getErrorMessage } from '../utils';

export type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'boolean';
  description: string;
  enum?: string[];
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
};

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function toSchemaProperty(argument: CommandArgument): JsonSchemaProperty {
  const allowed = argument.allowed ? ` (one of: ${argument.allowed.join(', ')})` : '';
  switch (argument.type) {
    case 'integer':
      return { type: 'integer', description: argument.description };
    case 'boolean':
      return { type: 'boolean', description: argument.description };
    case 'list':
      // Comma-separated string, so it can be filled the same way from the CLI
      return { type: 'string', description: `${argument.description}${allowed}` };
    case 'string':
      return argument.allowed
        ? { type: 'string', description: argument.description, enum: [...argument.allowed] }
        : { type: 'string', description: argument.description };
  }
}

/**
 * One tool per supported command.
 */
export function listToolDefinitions(): ToolDefinition[] {
  return listCommandDefinitions().map(definition => ({
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: 'object' as const,
      properties: Object.fromEntries(
        definition.arguments.map(argument => [argument.name, toSchemaProperty(argument)])
      ),
      required: definition.arguments.filter(argument => argument.required).map(argument => argument.name),
    },
  }));
}

/**
 * Structured failure payload reported to the host.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof SiteflowError) {
    return { error: error.userMessage, kind: error.kind, ...error.details() };
  }
  return { error: getErrorMessage(error) };
}

/**
 * Run one tool call. Never throws: failures come back with isError set.
 */
export async function callTool(
  dispatcher: CommandDispatcher,
  name: string,
  args: Record<string, unknown> | undefined,
  signal?: AbortSignal
): Promise<ToolResponse> {
  try {
    const result = await dispatcher.execute(name, args ?? {}, { signal });
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result.data, null, 2) }],
    };
  } catch (error) {
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(describeError(error)) }],
      isError: true,
    };
  }
}
