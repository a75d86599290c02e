import { z } from 'zod';
import { LOG_LEVELS, type LogEntry, type LogLevel } from '../../logging/logger.js';
import type { ToolDefinition } from '../../tools/tool-system.js';

/**
 * Text listing of tools and their parameters, as printed by `tools`
 */
export function formatToolList(tools: ToolDefinition[]): string {
  const blocks = tools.map((tool) => {
    const lines = [tool.name, `  ${tool.description}`];
    for (const [param, schema] of Object.entries(tool.inputSchema)) {
      const optional = schema.isOptional() ? ' (optional)' : '';
      const description = schema.description ? `: ${schema.description}` : '';
      lines.push(`  - ${param}${optional}${description}`);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n');
}

/**
 * Parses the JSON argument object given to `call`
 * @throws Error when the text is not a JSON object
 */
export function parseToolArguments(text: string | undefined): Record<string, unknown> {
  if (text === undefined || text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`Arguments must be JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = z.record(z.unknown()).safeParse(parsed);
  if (!result.success || Array.isArray(parsed)) {
    throw new Error('Arguments must be a JSON object');
  }
  return result.data;
}

const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']),
  message: z.string(),
  context: z.object({
    toolName: z.string().optional(),
    callId: z.string().optional(),
  }).catchall(z.unknown()).optional(),
  stack: z.string().optional(),
});

/**
 * Parses one line of the log file, or null for a line that is not an entry
 */
export function parseLogLine(line: string): LogEntry | null {
  try {
    const result = LogEntrySchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function isAtLeast(entry: LogEntry, minLevel?: LogLevel): boolean {
  if (!minLevel) return true;
  return LOG_LEVELS[entry.level] >= LOG_LEVELS[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m',  // cyan
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';

/**
 * One entry as printed by `logs`, with its stack trace on following lines
 */
export function formatLogEntry(entry: LogEntry, color: boolean = true): string {
  const paint = (code: string, text: string): string => (color ? `${code}${text}${RESET}` : text);

  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const level = entry.level.toUpperCase().padEnd(5);

  let output = `${paint(LEVEL_COLORS[entry.level], `[${time}] ${level}`)} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${paint(GRAY, contextStr)}`;
  }

  if (entry.stack) {
    output += `\n${paint(GRAY, entry.stack)}`;
  }

  return output;
}
