import type { Store } from '../database/store.js';
import { EntityNotFoundError } from '../errors/service.js';
import {
  type Board,
  type CreateBoard,
  type UpdateBoard,
  createBoardSchema,
  describeBoard,
  updateBoardSchema,
} from '../schemas/board.js';
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

const logger = createModuleLogger('BoardService');

const DUPLICATE_TITLE = 'Board with this title already exists in the project.';

/**
 * BoardService - boards belong to one project; titles are unique per project
 */
export class BoardService {
  constructor(private readonly store: Store) {}

  async list(projectId: number): Promise<Board[]> {
    return this.store.listBoards(projectId);
  }

  async get(id: number): Promise<Board> {
    return requireEntity('board', id, await this.store.getBoard(id), 'get');
  }

  /**
   * "<project title> - <board title>"
   */
  async displayName(id: number): Promise<string> {
    const board = await this.get(id);
    const project = requireEntity(
      'project',
      board.projectId,
      await this.store.getProject(board.projectId),
      'displayName'
    );
    return describeBoard(board, project);
  }

  async create(input: CreateBoard): Promise<Board> {
    return this.createFrom(input);
  }

  async createFrom(input: unknown): Promise<Board> {
    const violations = new ViolationCollector();
    const parsed = checkSchema(createBoardSchema, input);
    violations.add(...parsed.violations);

    const projectId = readInteger(input, 'projectId');
    const title = readString(input, 'title');
    if (projectId !== undefined) {
      if (!(await this.store.getProject(projectId))) {
        violations.add(missingParent('projectId', 'Project', projectId));
      } else if (title && (await this.store.findBoard(projectId, title))) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('board', 'create');
    }

    const board = await this.store.addBoard(parsed.data);
    logger.info({ boardId: board.id, projectId: board.projectId }, 'Board created');
    return board;
  }

  async update(id: number, patch: UpdateBoard): Promise<Board> {
    const existing = await this.get(id);
    const violations = new ViolationCollector();
    const parsed = checkSchema(updateBoardSchema, patch);
    violations.add(...parsed.violations);

    const projectId = readInteger(patch, 'projectId') ?? existing.projectId;
    const title = readString(patch, 'title') ?? existing.title;
    if (projectId !== existing.projectId && !(await this.store.getProject(projectId))) {
      violations.add(missingParent('projectId', 'Project', projectId));
    } else if (projectId !== existing.projectId || title !== existing.title) {
      const clash = await this.store.findBoard(projectId, title);
      if (clash && clash.id !== id) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('board', 'update');
    }
    if (!hasChanges(parsed.data)) {
      return existing;
    }

    const updated = await this.store.updateBoard(id, parsed.data);
    logger.info({ boardId: id }, 'Board updated');
    return requireEntity('board', id, updated, 'update');
  }

  /**
   * Deletes the board with all of its lists and their tasks
   */
  async delete(id: number): Promise<void> {
    if (!(await this.store.deleteBoard(id))) {
      throw new EntityNotFoundError('board', id, 'delete');
    }
    logger.info({ boardId: id }, 'Board deleted');
  }
}
