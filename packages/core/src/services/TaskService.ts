import type { Store } from '../database/store.js';
import { EntityNotFoundError } from '../errors/service.js';
import type { Label } from '../schemas/label.js';
import {
  type CreateTask,
  type Task,
  type UpdateTask,
  createTaskSchema,
  updateTaskSchema,
} from '../schemas/task.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Violation } from '../validation/field-validators.js';
import { checkSchema } from '../validation/schema-validation.js';
import {
  ViolationCollector,
  hasChanges,
  missingParent,
  readIntegers,
  readInteger,
  requireEntity,
} from './service-utils.js';

const logger = createModuleLogger('TaskService');

/**
 * TaskService - work items kept in a list and tagged with labels
 *
 * Tasks are identified by their auto-assigned task number. Labels are
 * attached by id; every id must name an existing label.
 */
export class TaskService {
  constructor(private readonly store: Store) {}

  async list(listId: number): Promise<Task[]> {
    return this.store.listTasks(listId);
  }

  async get(taskNo: number): Promise<Task> {
    return requireEntity('task', taskNo, await this.store.getTask(taskNo), 'get');
  }

  async getLabels(taskNo: number): Promise<Label[]> {
    await this.get(taskNo);
    return this.store.getTaskLabels(taskNo);
  }

  async listByLabel(labelId: number): Promise<Task[]> {
    return this.store.listTasksWithLabel(labelId);
  }

  async create(input: CreateTask): Promise<Task> {
    return this.createFrom(input);
  }

  async createFrom(input: unknown): Promise<Task> {
    const violations = new ViolationCollector();
    const parsed = checkSchema(createTaskSchema, input);
    violations.add(...parsed.violations);

    const listId = readInteger(input, 'listId');
    if (listId !== undefined && !(await this.store.getList(listId))) {
      violations.add(missingParent('listId', 'List', listId));
    }
    violations.add(...(await this.unknownLabels(readIntegers(input, 'labelIds'))));

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('task', 'create');
    }

    const task = await this.store.addTask({
      listId: parsed.data.listId,
      title: parsed.data.title,
      description: parsed.data.description ?? null,
      priority: parsed.data.priority,
      storyPoints: parsed.data.storyPoints,
      labelIds: parsed.data.labelIds,
    });
    logger.info({ taskNo: task.taskNo, listId: task.listId }, 'Task created');
    return task;
  }

  /**
   * Update a task. When labelIds is given it replaces the whole label set.
   */
  async update(taskNo: number, patch: UpdateTask): Promise<Task> {
    const existing = await this.get(taskNo);
    const violations = new ViolationCollector();
    const parsed = checkSchema(updateTaskSchema, patch);
    violations.add(...parsed.violations);

    const listId = readInteger(patch, 'listId');
    if (listId !== undefined && listId !== existing.listId && !(await this.store.getList(listId))) {
      violations.add(missingParent('listId', 'List', listId));
    }
    violations.add(...(await this.unknownLabels(readIntegers(patch, 'labelIds'))));

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('task', 'update');
    }
    if (!hasChanges(parsed.data)) {
      return existing;
    }

    const updated = await this.store.updateTask(taskNo, parsed.data);
    logger.info({ taskNo }, 'Task updated');
    return requireEntity('task', taskNo, updated, 'update');
  }

  async delete(taskNo: number): Promise<void> {
    if (!(await this.store.deleteTask(taskNo))) {
      throw new EntityNotFoundError('task', taskNo, 'delete');
    }
    logger.info({ taskNo }, 'Task deleted');
  }

  private async unknownLabels(labelIds: number[] | undefined): Promise<Violation[]> {
    if (!labelIds || labelIds.length === 0) {
      return [];
    }
    const found = new Set((await this.store.getLabels(labelIds)).map((label) => label.id));
    return [...new Set(labelIds)]
      .filter((id) => !found.has(id))
      .map((id) => missingParent('labelIds', 'Label', id));
  }
}
