import { relations, sql } from 'drizzle-orm';
import { check, integer, primaryKey, sqliteTable, text, unique } from 'drizzle-orm/sqlite-core';

/*
  Drizzle ORM table definitions for Planboard on SQLite.
  migrations/ is generated from this file with `npm run db:generate`
  (drizzle-kit). Field types come from src/schemas/*; this file
  only describes the storage layout, the unique indexes and the cascade rules.
*/

// ---------------------------------------------------------------------------
// projects
// ---------------------------------------------------------------------------
export const projects = sqliteTable('projects', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull().unique('projects_title_unique'),
  description: text('description').notNull().default(''),
  image: text('image'),
  slug: text('slug').notNull().unique('projects_slug_unique'),
});

// ---------------------------------------------------------------------------
// boards
// ---------------------------------------------------------------------------
export const boards = sqliteTable(
  'boards',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
  },
  (table) => [unique('unique_board_title_per_project').on(table.projectId, table.title)]
);

// ---------------------------------------------------------------------------
// labels
// ---------------------------------------------------------------------------
export const labels = sqliteTable(
  'labels',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    color: text('color').notNull(),
  },
  (table) => [unique('unique_label_title_per_project').on(table.projectId, table.title)]
);

// ---------------------------------------------------------------------------
// lists
// ---------------------------------------------------------------------------
export const lists = sqliteTable(
  'lists',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    boardId: integer('board_id')
      .notNull()
      .references(() => boards.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    position: integer('position').notNull(),
  },
  (table) => [
    unique('unique_list_title_per_board').on(table.boardId, table.title),
    check('position_check', sql`${table.position} >= 0`),
  ]
);

// ---------------------------------------------------------------------------
// tasks
// ---------------------------------------------------------------------------
export const tasks = sqliteTable(
  'tasks',
  {
    taskNo: integer('task_no').primaryKey({ autoIncrement: true }),
    listId: integer('list_id')
      .notNull()
      .references(() => lists.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    description: text('description'),
    priority: text('priority', { enum: ['HI', 'ME', 'LO'] })
      .notNull()
      .default('ME'),
    storyPoints: integer('story_points').notNull(),
  },
  (table) => [check('priority_check', sql`${table.priority} IN ('HI', 'ME', 'LO')`)]
);

// ---------------------------------------------------------------------------
// task_labels (many-to-many; deleting either side only drops the link)
// ---------------------------------------------------------------------------
export const taskLabels = sqliteTable(
  'task_labels',
  {
    taskNo: integer('task_no')
      .notNull()
      .references(() => tasks.taskNo, { onDelete: 'cascade' }),
    labelId: integer('label_id')
      .notNull()
      .references(() => labels.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.taskNo, table.labelId] })]
);

// ---------------------------------------------------------------------------
// Relationships (Drizzle helpers)
// ---------------------------------------------------------------------------

export const projectRelations = relations(projects, ({ many }) => ({
  boards: many(boards),
  labels: many(labels),
}));

export const boardRelations = relations(boards, ({ one, many }) => ({
  project: one(projects, { fields: [boards.projectId], references: [projects.id] }),
  lists: many(lists),
}));

export const labelRelations = relations(labels, ({ one, many }) => ({
  project: one(projects, { fields: [labels.projectId], references: [projects.id] }),
  taskLabels: many(taskLabels),
}));

export const listRelations = relations(lists, ({ one, many }) => ({
  board: one(boards, { fields: [lists.boardId], references: [boards.id] }),
  tasks: many(tasks),
}));

export const taskRelations = relations(tasks, ({ one, many }) => ({
  list: one(lists, { fields: [tasks.listId], references: [lists.id] }),
  taskLabels: many(taskLabels),
}));

export const taskLabelRelations = relations(taskLabels, ({ one }) => ({
  task: one(tasks, { fields: [taskLabels.taskNo], references: [tasks.taskNo] }),
  label: one(labels, { fields: [taskLabels.labelId], references: [labels.id] }),
}));

// ---------------------------------------------------------------------------
// Export grouped schema to allow `drizzle(client, { schema })`
// ---------------------------------------------------------------------------
export const schema = {
  projects,
  boards,
  labels,
  lists,
  tasks,
  taskLabels,
  projectRelations,
  boardRelations,
  labelRelations,
  listRelations,
  taskRelations,
  taskLabelRelations,
};

export type PlanboardSchema = typeof schema;
