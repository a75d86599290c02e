import { z } from 'zod';
import { QarnotError, codeForStatus } from './errors.js';
import type { QarnotTask, TaskOutputStream } from './types.js';

/**
 * Fetch signature used by the client, injectable for tests
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ComputeClientConfig {
  token: string;
  clusterUrl: string;
  fetch?: FetchFn;
}

const ActiveForwardSchema = z.object({
  applicationPort: z.number(),
  forwarderHost: z.string(),
  forwarderPort: z.number(),
});

const TaskSchema = z.object({
  uuid: z.string(),
  name: z.string(),
  state: z.string(),
  progress: z.number().optional(),
  instanceCount: z.number().optional(),
  runningInstanceCount: z.number().optional(),
  runningCoreCount: z.number().optional(),
  executionTime: z.string().optional(),
  wallTime: z.string().optional(),
  creationDate: z.string().optional(),
  endDate: z.string().nullable().optional(),
  status: z.object({
    runningInstancesInfo: z.object({
      perRunningInstanceInfo: z.array(z.object({
        instanceId: z.number(),
        activeForwards: z.array(ActiveForwardSchema).optional(),
      })).optional(),
    }).nullable().optional(),
  }).nullable().optional(),
});

const UserInfoSchema = z.object({
  email: z.string().min(1),
});

const SettingsSchema = z.object({
  storage: z.string().min(1),
});

const ErrorBodySchema = z.object({
  message: z.string(),
});

/**
 * ComputeClient - Minimal client for the Qarnot compute REST API
 *
 * Every request carries the account token in the `Authorization` header.
 * Non-2xx responses become {@link QarnotError}s carrying the remote message.
 */
export class ComputeClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchFn: FetchFn;

  constructor(config: ComputeClientConfig) {
    this.baseUrl = config.clusterUrl.replace(/\/+$/, '');
    this.token = config.token;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async listTasks(): Promise<QarnotTask[]> {
    const body = await this.requestJson('GET', '/tasks');
    return this.parse(z.array(TaskSchema), body, '/tasks');
  }

  async retrieveTask(uuid: string): Promise<QarnotTask> {
    const path = `/tasks/${encodeURIComponent(uuid)}`;
    const body = await this.requestJson('GET', path);
    return this.parse(TaskSchema, body, path);
  }

  /**
   * Reads the whole stdout or stderr of a task, or of one of its instances
   */
  async taskOutput(uuid: string, stream: TaskOutputStream, instanceId?: number): Promise<string> {
    let path = `/tasks/${encodeURIComponent(uuid)}/${stream}`;
    if (instanceId !== undefined) {
      path += `/${instanceId}`;
    }
    const response = await this.request('GET', path);
    try {
      return await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new QarnotError('service', `Failed to read GET ${path}: ${reason}`, { cause: error });
    }
  }

  async abortTask(uuid: string): Promise<void> {
    await this.request('POST', `/tasks/${encodeURIComponent(uuid)}/abort`);
  }

  /**
   * E-mail of the account, used as the storage access key
   */
  async userEmail(): Promise<string> {
    const body = await this.requestJson('GET', '/info');
    return this.parse(UserInfoSchema, body, '/info').email;
  }

  /**
   * Storage endpoint advertised by the cluster
   */
  async storageUrl(): Promise<string> {
    const body = await this.requestJson('GET', '/settings');
    return this.parse(SettingsSchema, body, '/settings').storage;
  }

  private async requestJson(method: string, path: string): Promise<unknown> {
    const response = await this.request(method, path);
    try {
      return await response.json();
    } catch (error) {
      throw new QarnotError('service', `Invalid JSON from ${method} ${path}`, { cause: error });
    }
  }

  private async request(method: string, path: string): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: this.token,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new QarnotError('service', `Request ${method} ${url} failed: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      const message = await this.errorMessage(response);
      throw new QarnotError(codeForStatus(response.status), message, { status: response.status });
    }
    return response;
  }

  private async errorMessage(response: Response): Promise<string> {
    const fallback = `HTTP ${response.status} ${response.statusText}`.trim();
    let text: string;
    try {
      text = await response.text();
    } catch {
      return fallback;
    }
    if (!text) return fallback;

    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data.message : text;
    } catch {
      return text;
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
      throw new QarnotError('service', `Unexpected response from ${path}: ${where}`);
    }
    return result.data;
  }
}
