import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ToolSystem, type ToolDefinition } from './tool-system.js';
import { QarnotError } from '../qarnot/errors.js';
import { Logger, type LogEntry } from '../logging/logger.js';

const ECHO_TOOL = {
  name: 'echo',
  description: 'Echo tool',
  inputSchema: {
    message: z.string(),
    times: z.number().int().min(1).optional(),
  },
} satisfies ToolDefinition;

describe('ToolSystem', () => {
  let toolSystem: ToolSystem;

  beforeEach(() => {
    toolSystem = new ToolSystem();
  });

  describe('registration', () => {
    it('should register a tool', () => {
      toolSystem.register(ECHO_TOOL, async ({ message }) => message);

      expect(toolSystem.has('echo')).toBe(true);
      expect(toolSystem.get('echo')).toBe(ECHO_TOOL);
    });

    it('should throw when registering a duplicate tool', () => {
      toolSystem.register(ECHO_TOOL, async ({ message }) => message);

      expect(() => toolSystem.register(ECHO_TOOL, async () => 'again'))
        .toThrow("Tool 'echo' is already registered");
    });

    it('should list tools in registration order', () => {
      toolSystem.register({ name: 'tool1', description: 'Tool 1', inputSchema: {} }, async () => '1');
      toolSystem.register({ name: 'tool2', description: 'Tool 2', inputSchema: {} }, async () => '2');

      expect(toolSystem.list().map(t => t.name)).toEqual(['tool1', 'tool2']);
    });

    it('should unregister a tool', () => {
      toolSystem.register(ECHO_TOOL, async ({ message }) => message);

      expect(toolSystem.unregister('echo')).toBe(true);
      expect(toolSystem.has('echo')).toBe(false);
      expect(toolSystem.unregister('echo')).toBe(false);
    });
  });

  describe('parameter validation', () => {
    beforeEach(() => {
      toolSystem.register(ECHO_TOOL, async ({ message }) => message);
    });

    it('should report missing required parameters', () => {
      const result = toolSystem.validateParameters('echo', {});
      expect(result).toEqual({ valid: false, errors: ["Missing required parameter: 'message'"] });
    });

    it('should accept valid parameters', () => {
      expect(toolSystem.validateParameters('echo', { message: 'hi', times: 2 })).toEqual({ valid: true });
    });

    it('should report wrong parameter types', () => {
      const result = toolSystem.validateParameters('echo', { message: 123 });
      expect(result.errors).toEqual(["Parameter 'message': Expected string, received number"]);
    });

    it('should report constraint violations', () => {
      const result = toolSystem.validateParameters('echo', { message: 'hi', times: 1.5 });
      expect(result.errors).toEqual(["Parameter 'times': Expected integer, received float"]);
    });

    it('should reject unknown parameters', () => {
      const result = toolSystem.validateParameters('echo', { message: 'hi', volume: 11 });
      expect(result.errors).toEqual(["Unknown parameter: 'volume'"]);
    });

    it('should return an error for an unknown tool', () => {
      const result = toolSystem.validateParameters('unknown_tool', {});
      expect(result).toEqual({ valid: false, errors: ["Tool 'unknown_tool' not found"] });
    });
  });

  describe('execution', () => {
    it('should run the handler with validated arguments', async () => {
      toolSystem.register(ECHO_TOOL, async ({ message, times }) => message.repeat(times ?? 1));

      const result = await toolSystem.execute({ id: 'call-1', name: 'echo', arguments: { message: 'ab', times: 3 } });

      expect(result).toEqual({ callId: 'call-1', success: true, output: 'ababab' });
    });

    it('should return unknown_tool for an unregistered tool', async () => {
      const result = await toolSystem.execute({ id: 'call-2', name: 'nope', arguments: {} });

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        toolName: 'nope',
        errorType: 'unknown_tool',
        message: "Tool 'nope' is not registered",
      });
    });

    it('should return a validation error without running the handler', async () => {
      let ran = false;
      toolSystem.register(ECHO_TOOL, async () => {
        ran = true;
        return 'ran';
      });

      const result = await toolSystem.execute({ id: 'call-3', name: 'echo', arguments: {} });

      expect(ran).toBe(false);
      expect(result.error?.errorType).toBe('validation');
      expect(result.error?.message).toBe("Parameter validation failed: Missing required parameter: 'message'");
      expect(result.error?.details).toEqual(["Missing required parameter: 'message'"]);
    });

    it('should classify service errors by their code', async () => {
      toolSystem.register(ECHO_TOOL, async () => {
        throw new QarnotError('not_found', 'Task not found.', { status: 404 });
      });

      const result = await toolSystem.execute({ id: 'call-4', name: 'echo', arguments: { message: 'x' } });

      expect(result.error).toEqual({
        toolName: 'echo',
        errorType: 'not_found',
        message: 'Task not found.',
        details: { status: 404 },
      });
    });

    it('should report other failures as execution errors', async () => {
      toolSystem.register(ECHO_TOOL, async () => {
        throw new Error('Handler crashed');
      });

      const result = await toolSystem.execute({ id: 'call-5', name: 'echo', arguments: { message: 'x' } });

      expect(result.error?.errorType).toBe('execution');
      expect(result.error?.message).toBe('Handler crashed');
      expect(result.error?.details).toBeUndefined();
    });
  });

  describe('logging', () => {
    let testDir: string;
    let logPath: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `qarnot-tools-log-${randomUUID()}`);
      await mkdir(testDir, { recursive: true });
      logPath = join(testDir, 'qarnot-mcp.log');
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    async function messages(): Promise<Array<{ level: string; message: string; toolName: unknown }>> {
      const content = await readFile(logPath, 'utf-8');
      return content.trim().split('\n').map((line) => {
        const entry: LogEntry = JSON.parse(line);
        return { level: entry.level, message: entry.message, toolName: entry.context?.toolName };
      });
    }

    it('should log start and completion of a call', async () => {
      const logged = new ToolSystem(new Logger({ level: 'debug', path: logPath }));
      logged.register(ECHO_TOOL, async ({ message }) => message);

      await logged.execute({ id: 'call-6', name: 'echo', arguments: { message: 'hi' } });

      expect(await messages()).toEqual([
        { level: 'debug', message: 'Tool call started', toolName: 'echo' },
        { level: 'info', message: 'Tool call completed', toolName: 'echo' },
      ]);
    });

    it('should log an expected remote failure as a warning', async () => {
      const logged = new ToolSystem(new Logger({ level: 'info', path: logPath }));
      logged.register(ECHO_TOOL, async () => {
        throw new QarnotError('invalid_state', 'Task is finished');
      });

      await logged.execute({ id: 'call-7', name: 'echo', arguments: { message: 'x' } });

      expect(await messages()).toEqual([
        { level: 'warn', message: 'Tool call failed: Task is finished', toolName: 'echo' },
      ]);
    });

    describe('with an unwritable log file', () => {
      let unwritable: Logger;

      beforeEach(async () => {
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        await writeFile(join(testDir, 'blocker'), 'a file, not a directory');
        unwritable = new Logger({ level: 'debug', path: join(testDir, 'blocker', 'qarnot-mcp.log') });
      });

      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('should still report a completed call as a success', async () => {
        const cancelled: string[] = [];
        const logged = new ToolSystem(unwritable);
        logged.register(ECHO_TOOL, async ({ message }) => {
          cancelled.push(message);
          return `Task ${message} has been cancelled.`;
        });

        const result = await logged.execute({ id: 'call-9', name: 'echo', arguments: { message: 't1' } });

        expect(cancelled).toEqual(['t1']);
        expect(result).toEqual({ callId: 'call-9', success: true, output: 'Task t1 has been cancelled.' });
      });

      it('should still return a failed call as a structured error', async () => {
        const logged = new ToolSystem(unwritable);
        logged.register(ECHO_TOOL, async () => {
          throw new QarnotError('service', 'Internal server error', { status: 500 });
        });

        const result = await logged.execute({ id: 'call-10', name: 'echo', arguments: { message: 'x' } });

        expect(result.error?.errorType).toBe('service');
        expect(result.error?.message).toBe('Internal server error');
      });

      it('should still reject unknown tools and bad arguments', async () => {
        const logged = new ToolSystem(unwritable);
        logged.register(ECHO_TOOL, async ({ message }) => message);

        expect((await logged.execute({ id: 'a', name: 'nope', arguments: {} })).error?.errorType).toBe('unknown_tool');
        expect((await logged.execute({ id: 'b', name: 'echo', arguments: {} })).error?.errorType).toBe('validation');
      });
    });

    it('should log an unexpected failure as an error', async () => {
      const logged = new ToolSystem(new Logger({ level: 'info', path: logPath }));
      logged.register(ECHO_TOOL, async () => {
        throw new QarnotError('service', 'Internal server error', { status: 500 });
      });

      await logged.execute({ id: 'call-8', name: 'echo', arguments: { message: 'x' } });

      expect(await messages()).toEqual([
        { level: 'error', message: 'Tool call failed', toolName: 'echo' },
      ]);
    });
  });
});
