/**
 * Store-level constraint handling. These go straight at the store so the
 * database indexes are hit without the service pre-checks.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createInMemoryDatabase } from '../src/database/index.js';
import { type Store, constraintViolation } from '../src/database/store.js';
import { ValidationError } from '../src/errors/service.js';
import { captureError } from './helpers.js';

let store: Store;

beforeEach(async () => {
  store = await createInMemoryDatabase('store');
});

afterEach(async () => {
  await store.close();
});

async function seedProject(title = 'Apollo') {
  return store.addProject({ title, description: '', image: null, slug: title.toLowerCase() });
}

async function seedList() {
  const project = await seedProject();
  const board = await store.addBoard({ projectId: project.id, title: 'Sprint 1' });
  const list = await store.addList({ boardId: board.id, title: 'Todo', position: 0 });
  return { project, board, list };
}

async function addPlainTask(listId: number, title: string) {
  return store.addTask({
    listId,
    title,
    description: null,
    priority: 'ME',
    storyPoints: 5,
    labelIds: [],
  });
}

describe('unique indexes', () => {
  it('turns a board title collision into a uniqueness violation', async () => {
    const project = await seedProject();
    await store.addBoard({ projectId: project.id, title: 'Sprint 1' });

    const error = await captureError(store.addBoard({ projectId: project.id, title: 'Sprint 1' }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.violations).toEqual([
        {
          field: 'title',
          kind: 'UniquenessError',
          message: 'Board with this title already exists in the project.',
        },
      ]);
    }
  });

  it('guards project slugs', async () => {
    await seedProject('Apollo');

    const error = await captureError(
      store.addProject({ title: 'Other', description: '', image: null, slug: 'apollo' })
    );

    expect(error instanceof ValidationError && error.violations[0]?.field).toBe('slug');
  });

  it('blames the field holding a missing parent', async () => {
    const error = await captureError(store.addBoard({ projectId: 404, title: 'Orphan' }));

    expect(error instanceof ValidationError && error.violations).toEqual([
      {
        field: 'projectId',
        kind: 'ReferentialError',
        message: 'Referenced parent entity does not exist.',
      },
    ]);
  });

  it('blames the list of a task moved to a missing list', async () => {
    const { list } = await seedList();
    const task = await addPlainTask(list.id, 'Original');

    const error = await captureError(store.updateTask(task.taskNo, { listId: 404 }));

    expect(error instanceof ValidationError && error.violations[0]?.field).toBe('listId');
  });
});

describe('task updates', () => {
  it('leaves the task untouched when a label reference fails', async () => {
    const { list, project } = await seedList();
    const label = await store.addLabel({ projectId: project.id, title: 'Bug', color: '#FF0000' });
    const task = await store.addTask({
      listId: list.id,
      title: 'Original',
      description: null,
      priority: 'ME',
      storyPoints: 5,
      labelIds: [label.id],
    });

    const error = await captureError(
      store.updateTask(task.taskNo, { title: 'Changed', labelIds: [999] })
    );

    expect(error instanceof ValidationError && error.violations).toEqual([
      {
        field: 'labelIds',
        kind: 'ReferentialError',
        message: 'Referenced parent entity does not exist.',
      },
    ]);
    expect((await store.getTask(task.taskNo))?.title).toBe('Original');
    expect((await store.getTaskLabels(task.taskNo)).map((l) => l.title)).toEqual(['Bug']);
  });

  it('changes columns and labels together', async () => {
    const { list, project } = await seedList();
    const label = await store.addLabel({ projectId: project.id, title: 'Bug', color: '#FF0000' });
    const task = await addPlainTask(list.id, 'Original');

    const updated = await store.updateTask(task.taskNo, { title: 'Changed', labelIds: [label.id] });

    expect(updated?.title).toBe('Changed');
    expect((await store.getTaskLabels(task.taskNo)).map((l) => l.id)).toEqual([label.id]);
  });
});

describe('cascades', () => {
  it('removes everything below a deleted project', async () => {
    const project = await seedProject();
    const board = await store.addBoard({ projectId: project.id, title: 'Sprint 1' });
    const label = await store.addLabel({ projectId: project.id, title: 'Bug', color: '#FF0000' });
    const list = await store.addList({ boardId: board.id, title: 'Todo', position: 0 });
    const task = await store.addTask({
      listId: list.id,
      title: 'Fix login',
      description: null,
      priority: 'HI',
      storyPoints: 5,
      labelIds: [label.id],
    });

    expect(await store.deleteProject(project.id)).toBe(true);

    expect(await store.getBoard(board.id)).toBeNull();
    expect(await store.getLabel(label.id)).toBeNull();
    expect(await store.getList(list.id)).toBeNull();
    expect(await store.getTask(task.taskNo)).toBeNull();
    expect(await store.deleteProject(project.id)).toBe(false);
  });

  it('drops a task that could not be labelled', async () => {
    const project = await seedProject();
    const board = await store.addBoard({ projectId: project.id, title: 'Sprint 1' });
    const list = await store.addList({ boardId: board.id, title: 'Todo', position: 0 });

    await expect(
      store.addTask({
        listId: list.id,
        title: 'Bad label',
        description: null,
        priority: 'ME',
        storyPoints: 5,
        labelIds: [999],
      })
    ).rejects.toThrow(ValidationError);
    expect(await store.listTasks(list.id)).toEqual([]);
  });
});

describe('constraintViolation', () => {
  it('finds the constraint message anywhere in the cause chain', () => {
    const inner = new Error('SQLITE_CONSTRAINT: UNIQUE constraint failed: lists.board_id, lists.title');
    const outer = new Error('Failed query', { cause: inner });

    expect(constraintViolation(outer, 'boardId')).toEqual({
      field: 'title',
      kind: 'UniquenessError',
      message: 'List with this title already exists on the board.',
    });
  });

  it('blames the given field for a foreign key failure', () => {
    const error = new Error('SQLITE_CONSTRAINT: FOREIGN KEY constraint failed');

    expect(constraintViolation(error, 'labelIds')).toEqual({
      field: 'labelIds',
      kind: 'ReferentialError',
      message: 'Referenced parent entity does not exist.',
    });
  });

  it('ignores unrelated errors', () => {
    expect(constraintViolation(new Error('disk I/O error'), 'listId')).toBeNull();
    expect(constraintViolation('not an error', 'listId')).toBeNull();
  });
});
