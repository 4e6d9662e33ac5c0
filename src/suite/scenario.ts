import type { TaskApi, TaskId, TaskStatus } from '../http/task-client.js';
import { taskPath } from '../http/task-client.js';
import { TransportError } from '../errors.js';
import type { Invocation, TestCase } from '../types.js';

export type TaskSlot = 'A' | 'B';

export const TASK_SLOTS: readonly TaskSlot[] = ['A', 'B'];

/** An id the service never hands out during a run. */
export const MISSING_TASK_ID = 9999;
export const INVALID_TASK_ID = 'abc';

/**
 * Task ids captured by the create cases and read by the cases that depend
 * on them. Only the create actions write to it.
 */
export class ScenarioContext {
  private slots = new Map<TaskSlot, number>();

  capture(slot: TaskSlot, id: number): void {
    this.slots.set(slot, id);
  }

  get(slot: TaskSlot): number | undefined {
    return this.slots.get(slot);
  }

  missingSlots(): TaskSlot[] {
    return TASK_SLOTS.filter((slot) => !this.slots.has(slot));
  }
}

export interface DependentIds {
  /** Task that is read and updated. */
  primary: TaskId;
  /** Task that is deleted. */
  disposable: TaskId;
}

// A 201 without an id is a failed create, not a pass.
function capturing(
  context: ScenarioContext,
  slot: TaskSlot,
  call: () => Promise<Invocation>,
): () => Promise<Invocation> {
  return async () => {
    const invocation = await call();
    if (invocation.statusCode !== 201) {
      return invocation;
    }
    if (invocation.id === undefined) {
      throw new TransportError(
        'response body has no positive integer "id"',
        'POST',
        '/tasks',
      );
    }
    context.capture(slot, invocation.id);
    return invocation;
  };
}

export function buildCreateCases(
  api: TaskApi,
  context: ScenarioContext,
): TestCase[] {
  return [
    {
      category: 'CREATE',
      name: 'Valid task with description',
      method: 'POST',
      path: '/tasks',
      expectedStatus: 201,
      action: capturing(context, 'A', () =>
        api.createTask({
          title: 'Complete project documentation',
          description: 'Write comprehensive API documentation',
        }),
      ),
    },
    {
      category: 'CREATE',
      name: 'Valid task without description',
      method: 'POST',
      path: '/tasks',
      expectedStatus: 201,
      action: capturing(context, 'B', () =>
        api.createTask({ title: 'Review pull requests' }),
      ),
    },
    {
      category: 'CREATE',
      name: 'Missing title (validation)',
      method: 'POST',
      path: '/tasks',
      expectedStatus: 400,
      action: () => api.createTask({ description: 'No title' }),
    },
    {
      category: 'CREATE',
      name: 'Empty title (validation)',
      method: 'POST',
      path: '/tasks',
      expectedStatus: 400,
      action: () => api.createTask({ title: '   ', description: 'Empty' }),
    },
    {
      category: 'CREATE',
      name: 'Malformed JSON',
      method: 'POST',
      path: '/tasks',
      expectedStatus: 400,
      action: () => api.createTaskRaw('invalid json'),
    },
  ];
}

function update(
  api: TaskApi,
  id: TaskId,
  title: string | undefined,
  description: string | undefined,
  status: TaskStatus | 'in-progress',
): () => Promise<Invocation> {
  return () => api.updateTask(id, { title, description, status });
}

export function buildDependentCases(
  api: TaskApi,
  ids: DependentIds,
): TestCase[] {
  const { primary, disposable } = ids;

  return [
    {
      category: 'LIST',
      name: 'Get all tasks',
      method: 'GET',
      path: '/tasks',
      expectedStatus: 200,
      action: () => api.listTasks(),
    },
    {
      category: 'GET',
      name: 'Get existing task',
      method: 'GET',
      path: taskPath(primary),
      expectedStatus: 200,
      action: () => api.getTask(primary),
    },
    {
      category: 'GET',
      name: 'Get non-existent task',
      method: 'GET',
      path: taskPath(MISSING_TASK_ID),
      expectedStatus: 404,
      action: () => api.getTask(MISSING_TASK_ID),
    },
    {
      category: 'GET',
      name: 'Invalid task ID',
      method: 'GET',
      path: taskPath(INVALID_TASK_ID),
      expectedStatus: 400,
      action: () => api.getTask(INVALID_TASK_ID),
    },
    {
      category: 'UPDATE',
      name: 'Update task to done',
      method: 'PUT',
      path: taskPath(primary),
      expectedStatus: 200,
      action: update(api, primary, 'Updated task', 'Updated desc', 'done'),
    },
    {
      category: 'UPDATE',
      name: 'Update task to todo',
      method: 'PUT',
      path: taskPath(primary),
      expectedStatus: 200,
      action: update(api, primary, 'Updated task', 'Back to todo', 'todo'),
    },
    {
      category: 'UPDATE',
      name: 'Invalid status (validation)',
      method: 'PUT',
      path: taskPath(primary),
      expectedStatus: 400,
      action: update(api, primary, 'Test', undefined, 'in-progress'),
    },
    {
      category: 'UPDATE',
      name: 'Missing title (validation)',
      method: 'PUT',
      path: taskPath(primary),
      expectedStatus: 400,
      action: update(api, primary, undefined, 'No title', 'done'),
    },
    {
      category: 'UPDATE',
      name: 'Update non-existent task',
      method: 'PUT',
      path: taskPath(MISSING_TASK_ID),
      expectedStatus: 404,
      action: update(api, MISSING_TASK_ID, 'Test', undefined, 'done'),
    },
    {
      category: 'DELETE',
      name: 'Delete existing task',
      method: 'DELETE',
      path: taskPath(disposable),
      expectedStatus: 204,
      action: () => api.deleteTask(disposable),
    },
    {
      category: 'DELETE',
      name: 'Verify task deleted',
      method: 'GET',
      path: taskPath(disposable),
      expectedStatus: 404,
      action: () => api.getTask(disposable),
    },
    {
      category: 'DELETE',
      name: 'Delete non-existent task',
      method: 'DELETE',
      path: taskPath(MISSING_TASK_ID),
      expectedStatus: 404,
      action: () => api.deleteTask(MISSING_TASK_ID),
    },
    {
      category: 'DELETE',
      name: 'Invalid task ID',
      method: 'DELETE',
      path: taskPath(INVALID_TASK_ID),
      expectedStatus: 400,
      action: () => api.deleteTask(INVALID_TASK_ID),
    },
  ];
}
