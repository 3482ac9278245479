import type { Store } from '../database/store.js';
import { EntityNotFoundError } from '../errors/service.js';
import {
  type CreateLabel,
  type Label,
  type UpdateLabel,
  createLabelSchema,
  updateLabelSchema,
} from '../schemas/label.js';
import type { Task } from '../schemas/task.js';
import { createModuleLogger } from '../utils/logger.js';
import { checkSchema } from '../validation/schema-validation.js';
import {
  ViolationCollector,
  duplicate,
  hasChanges,
  missingParent,
  readInteger,
  readString,
  requireEntity,
} from './service-utils.js';

const logger = createModuleLogger('LabelService');

const DUPLICATE_TITLE = 'Label with this title already exists in the project.';

/**
 * LabelService - colored tags scoped to a project and attached to tasks
 */
export class LabelService {
  constructor(private readonly store: Store) {}

  async list(projectId: number): Promise<Label[]> {
    return this.store.listLabels(projectId);
  }

  async get(id: number): Promise<Label> {
    return requireEntity('label', id, await this.store.getLabel(id), 'get');
  }

  async tasks(id: number): Promise<Task[]> {
    await this.get(id);
    return this.store.listTasksWithLabel(id);
  }

  async create(input: CreateLabel): Promise<Label> {
    return this.createFrom(input);
  }

  async createFrom(input: unknown): Promise<Label> {
    const violations = new ViolationCollector();
    const parsed = checkSchema(createLabelSchema, input);
    violations.add(...parsed.violations);

    const projectId = readInteger(input, 'projectId');
    const title = readString(input, 'title');
    if (projectId !== undefined) {
      if (!(await this.store.getProject(projectId))) {
        violations.add(missingParent('projectId', 'Project', projectId));
      } else if (title && (await this.store.findLabel(projectId, title))) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('label', 'create');
    }

    const label = await this.store.addLabel(parsed.data);
    logger.info({ labelId: label.id, projectId: label.projectId }, 'Label created');
    return label;
  }

  async update(id: number, patch: UpdateLabel): Promise<Label> {
    const existing = await this.get(id);
    const violations = new ViolationCollector();
    const parsed = checkSchema(updateLabelSchema, patch);
    violations.add(...parsed.violations);

    const projectId = readInteger(patch, 'projectId') ?? existing.projectId;
    const title = readString(patch, 'title') ?? existing.title;
    if (projectId !== existing.projectId && !(await this.store.getProject(projectId))) {
      violations.add(missingParent('projectId', 'Project', projectId));
    } else if (projectId !== existing.projectId || title !== existing.title) {
      const clash = await this.store.findLabel(projectId, title);
      if (clash && clash.id !== id) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('label', 'update');
    }
    if (!hasChanges(parsed.data)) {
      return existing;
    }

    const updated = await this.store.updateLabel(id, parsed.data);
    logger.info({ labelId: id }, 'Label updated');
    return requireEntity('label', id, updated, 'update');
  }

  /**
   * Tasks carrying the label survive; only the association goes
   */
  async delete(id: number): Promise<void> {
    if (!(await this.store.deleteLabel(id))) {
      throw new EntityNotFoundError('label', id, 'delete');
    }
    logger.info({ labelId: id }, 'Label deleted');
  }
}
