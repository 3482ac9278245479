import type { Store } from '../database/store.js';
import { EntityNotFoundError } from '../errors/service.js';
import {
  type CreateList,
  type List,
  type UpdateList,
  createListSchema,
  updateListSchema,
} from '../schemas/list.js';
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

const logger = createModuleLogger('ListService');

const DUPLICATE_TITLE = 'List with this title already exists on the board.';

/**
 * ListService - ordered columns of a board
 */
export class ListService {
  constructor(private readonly store: Store) {}

  /**
   * Lists of a board in position order
   */
  async list(boardId: number): Promise<List[]> {
    return this.store.listLists(boardId);
  }

  async get(id: number): Promise<List> {
    return requireEntity('list', id, await this.store.getList(id), 'get');
  }

  async create(input: CreateList): Promise<List> {
    return this.createFrom(input);
  }

  /**
   * Without a position the list goes after the last one on its board
   */
  async createFrom(input: unknown): Promise<List> {
    const violations = new ViolationCollector();
    const parsed = checkSchema(createListSchema, input);
    violations.add(...parsed.violations);

    const boardId = readInteger(input, 'boardId');
    const title = readString(input, 'title');
    if (boardId !== undefined) {
      if (!(await this.store.getBoard(boardId))) {
        violations.add(missingParent('boardId', 'Board', boardId));
      } else if (title && (await this.store.findList(boardId, title))) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('list', 'create');
    }

    const { boardId: parentId, position } = parsed.data;
    const list = await this.store.addList({
      boardId: parentId,
      title: parsed.data.title,
      position: position ?? (await this.store.nextListPosition(parentId)),
    });
    logger.info({ listId: list.id, boardId: list.boardId, position: list.position }, 'List created');
    return list;
  }

  async update(id: number, patch: UpdateList): Promise<List> {
    const existing = await this.get(id);
    const violations = new ViolationCollector();
    const parsed = checkSchema(updateListSchema, patch);
    violations.add(...parsed.violations);

    const boardId = readInteger(patch, 'boardId') ?? existing.boardId;
    const title = readString(patch, 'title') ?? existing.title;
    if (boardId !== existing.boardId && !(await this.store.getBoard(boardId))) {
      violations.add(missingParent('boardId', 'Board', boardId));
    } else if (boardId !== existing.boardId || title !== existing.title) {
      const clash = await this.store.findList(boardId, title);
      if (clash && clash.id !== id) {
        violations.add(duplicate('title', DUPLICATE_TITLE, title));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('list', 'update');
    }
    if (!hasChanges(parsed.data)) {
      return existing;
    }

    const updated = await this.store.updateList(id, parsed.data);
    logger.info({ listId: id }, 'List updated');
    return requireEntity('list', id, updated, 'update');
  }

  /**
   * Deletes the list and every task in it
   */
  async delete(id: number): Promise<void> {
    if (!(await this.store.deleteList(id))) {
      throw new EntityNotFoundError('list', id, 'delete');
    }
    logger.info({ listId: id }, 'List deleted');
  }
}
