import { z } from 'zod';
import { isQarnotError, type QarnotErrorCode } from '../qarnot/errors.js';
import type { Logger } from '../logging/logger.js';

/**
 * Tool definition: the name and description an agent selects tools by, and
 * the shape of the arguments
 */
export interface ToolDefinition<S extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  description: string;
  inputSchema: S;
}

/**
 * Arguments a handler receives once they have passed validation
 */
export type ToolArgs<S extends z.ZodRawShape> = z.output<z.ZodObject<S, 'strict'>>;

export type ToolHandler<S extends z.ZodRawShape = z.ZodRawShape> = (args: ToolArgs<S>) => Promise<string>;

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  callId: string;
  success: boolean;
  output?: string;
  error?: ToolError;
}

export type ToolErrorType = 'unknown_tool' | 'validation' | 'execution' | QarnotErrorCode;

export interface ToolError {
  toolName: string;
  errorType: ToolErrorType;
  message: string;
  details?: unknown;
}

/**
 * Categories of failure that are an expected answer from the remote side
 * rather than a fault of this process
 */
const EXPECTED_FAILURES: ReadonlySet<ToolErrorType> = new Set(['not_found', 'invalid_state', 'validation']);

interface RegisteredTool {
  definition: ToolDefinition;
  validate: (args: Record<string, unknown>) => string[];
  run: (args: Record<string, unknown>) => Promise<string>;
}

/**
 * Turns zod issues into one message per problem
 */
function describeIssues(issues: z.ZodIssue[]): string[] {
  const messages: string[] = [];
  for (const issue of issues) {
    const key = issue.path.join('.');
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const unknownKey of issue.keys) {
        messages.push(`Unknown parameter: '${unknownKey}'`);
      }
    } else if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
      messages.push(`Missing required parameter: '${key}'`);
    } else {
      messages.push(`Parameter '${key}': ${issue.message}`);
    }
  }
  return messages;
}

/**
 * ToolSystem - Tool registration, argument validation and execution
 */
export class ToolSystem {
  private tools: Map<string, RegisteredTool> = new Map();

  constructor(private readonly logger?: Logger) {}

  /**
   * Registers a tool with its handler
   * @throws Error when a tool of the same name exists
   */
  register<S extends z.ZodRawShape>(definition: ToolDefinition<S>, handler: ToolHandler<S>): void {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }

    const schema = z.object(definition.inputSchema).strict();
    this.tools.set(definition.name, {
      definition,
      validate: (args) => {
        const result = schema.safeParse(args);
        return result.success ? [] : describeIssues(result.error.issues);
      },
      run: (args) => handler(schema.parse(args)),
    });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(t => t.definition);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  validateParameters(toolName: string, args: Record<string, unknown>): { valid: boolean; errors?: string[] } {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return { valid: false, errors: [`Tool '${toolName}' not found`] };
    }

    const errors = tool.validate(args);
    return errors.length > 0 ? { valid: false, errors } : { valid: true };
  }

  /**
   * Executes a tool call. Failures are returned as a structured error,
   * never thrown.
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    const tool = this.tools.get(call.name);
    const log = this.logger?.child({ toolName: call.name, callId: call.id });

    if (!tool) {
      await log?.warn('Unknown tool requested');
      return this.failure(call, {
        toolName: call.name,
        errorType: 'unknown_tool',
        message: `Tool '${call.name}' is not registered`,
      });
    }

    const validation = this.validateParameters(call.name, call.arguments);
    if (!validation.valid) {
      await log?.warn('Tool arguments rejected', { errors: validation.errors });
      return this.failure(call, {
        toolName: call.name,
        errorType: 'validation',
        message: `Parameter validation failed: ${validation.errors?.join('; ')}`,
        details: validation.errors,
      });
    }

    const startedAt = Date.now();
    await log?.debug('Tool call started', { arguments: call.arguments });

    try {
      const output = await tool.run(call.arguments);
      await log?.info('Tool call completed', { durationMs: Date.now() - startedAt });
      return { callId: call.id, success: true, output };
    } catch (error) {
      const toolError: ToolError = {
        toolName: call.name,
        errorType: isQarnotError(error) ? error.code : 'execution',
        message: error instanceof Error ? error.message : String(error),
        details: isQarnotError(error) && error.status !== undefined ? { status: error.status } : undefined,
      };

      const context = { durationMs: Date.now() - startedAt, errorType: toolError.errorType };
      if (EXPECTED_FAILURES.has(toolError.errorType)) {
        await log?.warn(`Tool call failed: ${toolError.message}`, context);
      } else {
        await log?.error('Tool call failed', error, context);
      }
      return this.failure(call, toolError);
    }
  }

  private failure(call: ToolCall, error: ToolError): ToolResult {
    return { callId: call.id, success: false, error };
  }
}
