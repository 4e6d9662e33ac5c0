import { z } from 'zod';
import { EnvironmentError, TransportError } from '../errors.js';
import type { HttpMethod, Invocation } from '../types.js';

export type TaskStatus = 'todo' | 'done';

export type TaskId = number | string;

/**
 * Request body for create and update calls. Fields are optional and
 * `status` is any string, so invalid payloads can be sent on purpose.
 */
export interface TaskPayload {
  title?: string;
  description?: string;
  status?: string;
}

/**
 * The HTTP surface of the task service as seen by the suite. Every call
 * resolves with the response status; transport failures reject.
 */
export interface TaskApi {
  readonly baseUrl: string;
  probe(): Promise<void>;
  createTask(payload: TaskPayload): Promise<Invocation>;
  createTaskRaw(body: string): Promise<Invocation>;
  listTasks(): Promise<Invocation>;
  getTask(id: TaskId): Promise<Invocation>;
  updateTask(id: TaskId, payload: TaskPayload): Promise<Invocation>;
  deleteTask(id: TaskId): Promise<Invocation>;
}

export interface HttpTaskApiOptions {
  baseUrl: string;
  timeoutMs: number;
  probeTimeoutMs: number;
}

const createdTaskSchema = z.object({
  id: z.number().int().positive().safe(),
});

interface RequestBody {
  json?: unknown;
  raw?: string;
}

export class HttpTaskApi implements TaskApi {
  readonly baseUrl: string;
  private timeoutMs: number;
  private probeTimeoutMs: number;

  constructor(options: HttpTaskApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.probeTimeoutMs = options.probeTimeoutMs;
  }

  async probe(): Promise<void> {
    try {
      await this.send('GET', '/tasks', {}, this.probeTimeoutMs);
    } catch (error) {
      const reason =
        error instanceof TransportError
          ? error.reason
          : error instanceof Error
            ? error.message
            : String(error);
      throw new EnvironmentError(this.baseUrl, reason);
    }
  }

  async createTask(payload: TaskPayload): Promise<Invocation> {
    const { statusCode, text } = await this.send('POST', '/tasks', {
      json: payload,
    });

    if (statusCode !== 201) {
      return { statusCode };
    }

    return { statusCode, id: decodeTaskId(text, '/tasks') };
  }

  async createTaskRaw(body: string): Promise<Invocation> {
    const { statusCode } = await this.send('POST', '/tasks', { raw: body });
    return { statusCode };
  }

  async listTasks(): Promise<Invocation> {
    const { statusCode } = await this.send('GET', '/tasks', {});
    return { statusCode };
  }

  async getTask(id: TaskId): Promise<Invocation> {
    const { statusCode } = await this.send('GET', taskPath(id), {});
    return { statusCode };
  }

  async updateTask(id: TaskId, payload: TaskPayload): Promise<Invocation> {
    const { statusCode } = await this.send('PUT', taskPath(id), {
      json: payload,
    });
    return { statusCode };
  }

  async deleteTask(id: TaskId): Promise<Invocation> {
    const { statusCode } = await this.send('DELETE', taskPath(id), {});
    return { statusCode };
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: RequestBody,
    timeoutMs = this.timeoutMs,
  ): Promise<{ statusCode: number; text: string }> {
    const headers: Record<string, string> = { accept: 'application/json' };
    let payload: string | undefined;

    if (body.raw !== undefined) {
      payload = body.raw;
      headers['content-type'] = 'application/json';
    } else if (body.json !== undefined) {
      payload = JSON.stringify(body.json);
      headers['content-type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      // Read the body so the connection is released before the next call
      const text = await response.text();
      return { statusCode: response.status, text };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(
          `request timed out after ${timeoutMs}ms`,
          method,
          path,
        );
      }
      throw new TransportError(errorMessage(error), method, path);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function taskPath(id: TaskId): string {
  return `/tasks/${id}`;
}

function decodeTaskId(text: string, path: string): number {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new TransportError(
      `invalid JSON in response body: ${errorMessage(e)}`,
      'POST',
      path,
    );
  }

  const result = createdTaskSchema.safeParse(parsed);
  if (!result.success) {
    throw new TransportError(
      'response body has no positive integer "id"',
      'POST',
      path,
    );
  }
  return result.data.id;
}

// fetch rejects with "fetch failed"; the socket error is the cause
function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error) {
      if (cause.message) return cause.message;
      if ('code' in cause && typeof cause.code === 'string') return cause.code;
    }
    return error.message;
  }
  return String(error);
}
