import type { Client } from '@libsql/client';
import { and, asc, eq, inArray, max } from 'drizzle-orm';
import type { BatchItem } from 'drizzle-orm/batch';
import { type EntityName, ValidationError } from '../errors/service.js';
import type { Board } from '../schemas/board.js';
import type { Label } from '../schemas/label.js';
import type { List } from '../schemas/list.js';
import type { Project } from '../schemas/project.js';
import type { Task, TaskPriority } from '../schemas/task.js';
import type { Violation } from '../validation/field-validators.js';
import type { DatabaseBackend, SqliteDrizzle } from './adapters/index.js';
import { wrapDatabaseError } from './errors.js';
import { boards, labels, lists, projects, taskLabels, tasks } from './schema.js';

export type NewProject = Omit<Project, 'id'>;
export type NewBoard = Omit<Board, 'id'>;
export type NewLabel = Omit<Label, 'id'>;
export type NewList = Omit<List, 'id'>;
export interface NewTask {
  listId: number;
  title: string;
  description: string | null;
  priority: TaskPriority;
  storyPoints: number;
  labelIds: number[];
}

export type TaskUpdates = Partial<Omit<NewTask, 'labelIds'>> & { labelIds?: number[] };

/**
 * Interface for the project-management database store.
 *
 * Every write enforces the declared unique indexes and cascade rules. A write
 * that hits a unique index or a missing parent rejects with a ValidationError
 * carrying UniquenessError or ReferentialError violations.
 */
export interface Store {
  /** Raw database client for direct SQL operations */
  readonly rawClient: Client;
  /** Native Drizzle ORM instance */
  readonly sql: SqliteDrizzle;

  // Project operations
  listProjects(): Promise<Project[]>;
  getProject(id: number): Promise<Project | null>;
  getProjectBySlug(slug: string): Promise<Project | null>;
  findProjectByTitle(title: string): Promise<Project | null>;
  addProject(data: NewProject): Promise<Project>;
  updateProject(id: number, updates: Partial<NewProject>): Promise<Project | null>;
  deleteProject(id: number): Promise<boolean>;

  // Board operations
  listBoards(projectId: number): Promise<Board[]>;
  getBoard(id: number): Promise<Board | null>;
  findBoard(projectId: number, title: string): Promise<Board | null>;
  addBoard(data: NewBoard): Promise<Board>;
  updateBoard(id: number, updates: Partial<NewBoard>): Promise<Board | null>;
  deleteBoard(id: number): Promise<boolean>;

  // Label operations
  listLabels(projectId: number): Promise<Label[]>;
  getLabel(id: number): Promise<Label | null>;
  getLabels(ids: number[]): Promise<Label[]>;
  findLabel(projectId: number, title: string): Promise<Label | null>;
  addLabel(data: NewLabel): Promise<Label>;
  updateLabel(id: number, updates: Partial<NewLabel>): Promise<Label | null>;
  deleteLabel(id: number): Promise<boolean>;

  // List operations
  listLists(boardId: number): Promise<List[]>;
  getList(id: number): Promise<List | null>;
  findList(boardId: number, title: string): Promise<List | null>;
  nextListPosition(boardId: number): Promise<number>;
  addList(data: NewList): Promise<List>;
  updateList(id: number, updates: Partial<NewList>): Promise<List | null>;
  deleteList(id: number): Promise<boolean>;

  // Task operations
  listTasks(listId: number): Promise<Task[]>;
  listTasksWithLabel(labelId: number): Promise<Task[]>;
  getTask(taskNo: number): Promise<Task | null>;
  getTaskLabels(taskNo: number): Promise<Label[]>;
  addTask(data: NewTask): Promise<Task>;
  updateTask(taskNo: number, updates: TaskUpdates): Promise<Task | null>;
  deleteTask(taskNo: number): Promise<boolean>;

  // System operations
  close(): Promise<void>;
}

// Unique index columns as SQLite reports them, mapped to the field to blame
const UNIQUE_CONSTRAINTS: Record<string, { field: string; message: string }> = {
  'projects.title': {
    field: 'title',
    message: 'Project with this title already exists.',
  },
  'projects.slug': {
    field: 'slug',
    message: 'Project with this slug already exists.',
  },
  'boards.project_id, boards.title': {
    field: 'title',
    message: 'Board with this title already exists in the project.',
  },
  'labels.project_id, labels.title': {
    field: 'title',
    message: 'Label with this title already exists in the project.',
  },
  'lists.board_id, lists.title': {
    field: 'title',
    message: 'List with this title already exists on the board.',
  },
};

const UNIQUE_FAILURE = /UNIQUE constraint failed: ([\w.]+(?:, [\w.]+)*)/;
const FOREIGN_KEY_FAILURE = /FOREIGN KEY constraint failed/;

function errorMessages(error: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = error;
  while (current instanceof Error) {
    messages.push(current.message);
    current = current.cause;
  }
  return messages;
}

/**
 * Turn a constraint failure raised by SQLite into the violation it stands for.
 * SQLite does not name the column of a failed foreign key, so the caller
 * passes the field holding the reference.
 */
export function constraintViolation(error: unknown, referenceField: string): Violation | null {
  for (const message of errorMessages(error)) {
    const unique = UNIQUE_FAILURE.exec(message);
    if (unique?.[1]) {
      const known = UNIQUE_CONSTRAINTS[unique[1]];
      return {
        field: known?.field ?? unique[1],
        kind: 'UniquenessError',
        message: known?.message ?? `Duplicate value for ${unique[1]}.`,
      };
    }
    if (FOREIGN_KEY_FAILURE.test(message)) {
      return {
        field: referenceField,
        kind: 'ReferentialError',
        message: 'Referenced parent entity does not exist.',
      };
    }
  }
  return null;
}

/**
 * Database store backed by drizzle-orm over libSQL
 */
export class DatabaseStore implements Store {
  public readonly rawClient: Client;
  public readonly sql: SqliteDrizzle;

  constructor(private readonly backend: DatabaseBackend<Client>) {
    this.rawClient = backend.rawClient;
    this.sql = backend.drizzle;
  }

  /**
   * Run a write and translate constraint failures into validation errors.
   * `referenceField` is blamed when a foreign key fails.
   */
  private async write<T>(
    entity: EntityName,
    operation: string,
    fn: () => Promise<T>,
    referenceField: string = entity
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const violation = constraintViolation(error, referenceField);
      if (violation) {
        throw new ValidationError(entity, operation, [violation], { cause: error });
      }
      throw wrapDatabaseError(error, this.backend.type, operation, { entity });
    }
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  async listProjects(): Promise<Project[]> {
    return this.sql.select().from(projects).orderBy(asc(projects.title));
  }

  async getProject(id: number): Promise<Project | null> {
    const rows = await this.sql.select().from(projects).where(eq(projects.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getProjectBySlug(slug: string): Promise<Project | null> {
    const rows = await this.sql.select().from(projects).where(eq(projects.slug, slug)).limit(1);
    return rows[0] ?? null;
  }

  async findProjectByTitle(title: string): Promise<Project | null> {
    const rows = await this.sql.select().from(projects).where(eq(projects.title, title)).limit(1);
    return rows[0] ?? null;
  }

  async addProject(data: NewProject): Promise<Project> {
    return this.write('project', 'create', async () => {
      const [row] = await this.sql.insert(projects).values(data).returning();
      return expectRow(row, 'projects');
    });
  }

  async updateProject(id: number, updates: Partial<NewProject>): Promise<Project | null> {
    if (Object.keys(updates).length > 0) {
      await this.write('project', 'update', () =>
        this.sql.update(projects).set(updates).where(eq(projects.id, id))
      );
    }
    return this.getProject(id);
  }

  async deleteProject(id: number): Promise<boolean> {
    const rows = await this.write('project', 'delete', () =>
      this.sql.delete(projects).where(eq(projects.id, id)).returning({ id: projects.id })
    );
    return rows.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Boards
  // ---------------------------------------------------------------------------

  async listBoards(projectId: number): Promise<Board[]> {
    return this.sql
      .select()
      .from(boards)
      .where(eq(boards.projectId, projectId))
      .orderBy(asc(boards.id));
  }

  async getBoard(id: number): Promise<Board | null> {
    const rows = await this.sql.select().from(boards).where(eq(boards.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async findBoard(projectId: number, title: string): Promise<Board | null> {
    const rows = await this.sql
      .select()
      .from(boards)
      .where(and(eq(boards.projectId, projectId), eq(boards.title, title)))
      .limit(1);
    return rows[0] ?? null;
  }

  async addBoard(data: NewBoard): Promise<Board> {
    return this.write('board', 'create', async () => {
      const [row] = await this.sql.insert(boards).values(data).returning();
      return expectRow(row, 'boards');
    }, 'projectId');
  }

  async updateBoard(id: number, updates: Partial<NewBoard>): Promise<Board | null> {
    if (Object.keys(updates).length > 0) {
      await this.write(
        'board',
        'update',
        () => this.sql.update(boards).set(updates).where(eq(boards.id, id)),
        'projectId'
      );
    }
    return this.getBoard(id);
  }

  async deleteBoard(id: number): Promise<boolean> {
    const rows = await this.write('board', 'delete', () =>
      this.sql.delete(boards).where(eq(boards.id, id)).returning({ id: boards.id })
    );
    return rows.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Labels
  // ---------------------------------------------------------------------------

  async listLabels(projectId: number): Promise<Label[]> {
    return this.sql
      .select()
      .from(labels)
      .where(eq(labels.projectId, projectId))
      .orderBy(asc(labels.title));
  }

  async getLabel(id: number): Promise<Label | null> {
    const rows = await this.sql.select().from(labels).where(eq(labels.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getLabels(ids: number[]): Promise<Label[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.sql.select().from(labels).where(inArray(labels.id, ids)).orderBy(asc(labels.title));
  }

  async findLabel(projectId: number, title: string): Promise<Label | null> {
    const rows = await this.sql
      .select()
      .from(labels)
      .where(and(eq(labels.projectId, projectId), eq(labels.title, title)))
      .limit(1);
    return rows[0] ?? null;
  }

  async addLabel(data: NewLabel): Promise<Label> {
    return this.write('label', 'create', async () => {
      const [row] = await this.sql.insert(labels).values(data).returning();
      return expectRow(row, 'labels');
    }, 'projectId');
  }

  async updateLabel(id: number, updates: Partial<NewLabel>): Promise<Label | null> {
    if (Object.keys(updates).length > 0) {
      await this.write(
        'label',
        'update',
        () => this.sql.update(labels).set(updates).where(eq(labels.id, id)),
        'projectId'
      );
    }
    return this.getLabel(id);
  }

  async deleteLabel(id: number): Promise<boolean> {
    const rows = await this.write('label', 'delete', () =>
      this.sql.delete(labels).where(eq(labels.id, id)).returning({ id: labels.id })
    );
    return rows.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Lists
  // ---------------------------------------------------------------------------

  async listLists(boardId: number): Promise<List[]> {
    return this.sql
      .select()
      .from(lists)
      .where(eq(lists.boardId, boardId))
      .orderBy(asc(lists.position), asc(lists.id));
  }

  async getList(id: number): Promise<List | null> {
    const rows = await this.sql.select().from(lists).where(eq(lists.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async findList(boardId: number, title: string): Promise<List | null> {
    const rows = await this.sql
      .select()
      .from(lists)
      .where(and(eq(lists.boardId, boardId), eq(lists.title, title)))
      .limit(1);
    return rows[0] ?? null;
  }

  async nextListPosition(boardId: number): Promise<number> {
    const [row] = await this.sql
      .select({ highest: max(lists.position) })
      .from(lists)
      .where(eq(lists.boardId, boardId));
    const highest = row?.highest;
    return highest === null || highest === undefined ? 0 : highest + 1;
  }

  async addList(data: NewList): Promise<List> {
    return this.write('list', 'create', async () => {
      const [row] = await this.sql.insert(lists).values(data).returning();
      return expectRow(row, 'lists');
    }, 'boardId');
  }

  async updateList(id: number, updates: Partial<NewList>): Promise<List | null> {
    if (Object.keys(updates).length > 0) {
      await this.write(
        'list',
        'update',
        () => this.sql.update(lists).set(updates).where(eq(lists.id, id)),
        'boardId'
      );
    }
    return this.getList(id);
  }

  async deleteList(id: number): Promise<boolean> {
    const rows = await this.write('list', 'delete', () =>
      this.sql.delete(lists).where(eq(lists.id, id)).returning({ id: lists.id })
    );
    return rows.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  async listTasks(listId: number): Promise<Task[]> {
    return this.sql
      .select()
      .from(tasks)
      .where(eq(tasks.listId, listId))
      .orderBy(asc(tasks.taskNo));
  }

  async listTasksWithLabel(labelId: number): Promise<Task[]> {
    const rows = await this.sql
      .select({ task: tasks })
      .from(taskLabels)
      .innerJoin(tasks, eq(taskLabels.taskNo, tasks.taskNo))
      .where(eq(taskLabels.labelId, labelId))
      .orderBy(asc(tasks.taskNo));
    return rows.map((row) => row.task);
  }

  async getTask(taskNo: number): Promise<Task | null> {
    const rows = await this.sql.select().from(tasks).where(eq(tasks.taskNo, taskNo)).limit(1);
    return rows[0] ?? null;
  }

  async getTaskLabels(taskNo: number): Promise<Label[]> {
    const rows = await this.sql
      .select({ label: labels })
      .from(taskLabels)
      .innerJoin(labels, eq(taskLabels.labelId, labels.id))
      .where(eq(taskLabels.taskNo, taskNo))
      .orderBy(asc(labels.title));
    return rows.map((row) => row.label);
  }

  async addTask(data: NewTask): Promise<Task> {
    const { labelIds, ...fields } = data;
    const task = await this.write('task', 'create', async () => {
      const [row] = await this.sql.insert(tasks).values(fields).returning();
      return expectRow(row, 'tasks');
    }, 'listId');

    const [clear, ...assign] = this.taskLabelStatements(task.taskNo, labelIds);
    if (assign.length > 0) {
      try {
        await this.write('task', 'labels', () => this.sql.batch([clear, ...assign]), 'labelIds');
      } catch (error) {
        // The task and its labels stand or fall together
        await this.sql.delete(tasks).where(eq(tasks.taskNo, task.taskNo));
        throw error;
      }
    }

    return task;
  }

  /**
   * Column changes and the label swap run in one batch, so a failing label
   * reference leaves the task untouched.
   */
  async updateTask(taskNo: number, updates: TaskUpdates): Promise<Task | null> {
    const { labelIds, ...fields } = updates;
    const statements: BatchItem<'sqlite'>[] = [];
    if (Object.keys(fields).length > 0) {
      statements.push(this.sql.update(tasks).set(fields).where(eq(tasks.taskNo, taskNo)));
    }
    if (labelIds !== undefined) {
      statements.push(...this.taskLabelStatements(taskNo, labelIds));
    }

    const [first, ...rest] = statements;
    if (first) {
      const referenceField =
        labelIds !== undefined && fields.listId === undefined ? 'labelIds' : 'listId';
      await this.write('task', 'update', () => this.sql.batch([first, ...rest]), referenceField);
    }
    return this.getTask(taskNo);
  }

  async deleteTask(taskNo: number): Promise<boolean> {
    const rows = await this.write('task', 'delete', () =>
      this.sql.delete(tasks).where(eq(tasks.taskNo, taskNo)).returning({ taskNo: tasks.taskNo })
    );
    return rows.length > 0;
  }

  /**
   * Statements that swap the whole label set of a task: a delete, then an
   * insert when any labels remain
   */
  private taskLabelStatements(
    taskNo: number,
    labelIds: number[]
  ): [BatchItem<'sqlite'>, ...BatchItem<'sqlite'>[]] {
    const unique = [...new Set(labelIds)];
    const clear = this.sql.delete(taskLabels).where(eq(taskLabels.taskNo, taskNo));
    if (unique.length === 0) {
      return [clear];
    }
    return [clear, this.sql.insert(taskLabels).values(unique.map((labelId) => ({ taskNo, labelId })))];
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}

function expectRow<T>(row: T | undefined, table: string): T {
  if (row === undefined) {
    throw new Error(`Insert into ${table} returned no row`);
  }
  return row;
}
