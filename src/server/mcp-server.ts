import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolDefinition, ToolResult, ToolSystem } from '../tools/tool-system.js';
import type { Logger } from '../logging/logger.js';

export interface McpServerInfo {
  name: string;
  version: string;
}

export const DEFAULT_SERVER_INFO: McpServerInfo = {
  name: 'qarnot',
  version: '0.1.0',
};

const ObjectJsonSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

/**
 * JSON schema an MCP client sees for a tool's arguments
 */
export function toMcpTool(definition: ToolDefinition): Tool {
  const generated = ObjectJsonSchema.parse(
    zodToJsonSchema(z.object(definition.inputSchema).strict(), { $refStrategy: 'none' })
  );
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: 'object',
      properties: generated.properties,
      ...(generated.required && generated.required.length > 0 ? { required: generated.required } : {}),
      additionalProperties: false,
    },
  };
}

/**
 * Renders a tool result as MCP content. Failures become a single text block
 * flagged with `isError`, so the agent reads the remote message.
 */
export function toCallToolResult(result: ToolResult): CallToolResult {
  if (result.success) {
    return { content: [{ type: 'text', text: result.output ?? '' }] };
  }
  return { content: [{ type: 'text', text: describeToolFailure(result) }], isError: true };
}

/**
 * Text an agent or a terminal user sees for a failed call
 */
export function describeToolFailure(result: ToolResult): string {
  const error = result.error;
  return error ? `Error (${error.errorType}): ${error.message}` : 'Error: tool call failed';
}

/**
 * Exposes every tool of a ToolSystem on a new MCP server.
 *
 * Call arguments go to the ToolSystem as the client sent them; its strict
 * validation is the only one applied.
 */
export function createMcpServer(toolSystem: ToolSystem, info: McpServerInfo = DEFAULT_SERVER_INFO): Server {
  const server = new Server(
    { name: info.name, version: info.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolSystem.list().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await toolSystem.execute({
      id: randomUUID(),
      name: request.params.name,
      arguments: request.params.arguments ?? {},
    });
    return toCallToolResult(result);
  });

  return server;
}

/**
 * Serves the server over stdin/stdout until the transport closes
 */
export async function serveStdio(server: Server, logger?: Logger): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  await logger?.info('MCP server listening on stdio');
}
