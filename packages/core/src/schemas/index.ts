/**
 * Schema exports - Single source of truth for all Zod schemas and types
 */

export {
  entityId,
  requiredText,
  optionalText,
  slugPattern,
  slugFormat,
  slugField,
} from './base.js';

export {
  projectSchema,
  createProjectSchema,
  updateProjectSchema,
  describeProject,
  type Project,
  type CreateProject,
  type UpdateProject,
} from './project.js';

export {
  boardSchema,
  createBoardSchema,
  updateBoardSchema,
  describeBoard,
  type Board,
  type CreateBoard,
  type UpdateBoard,
} from './board.js';

export {
  labelSchema,
  createLabelSchema,
  updateLabelSchema,
  describeLabel,
  type Label,
  type CreateLabel,
  type UpdateLabel,
} from './label.js';

export {
  listSchema,
  createListSchema,
  updateListSchema,
  describeList,
  type List,
  type CreateList,
  type UpdateList,
} from './list.js';

export {
  taskSchema,
  createTaskSchema,
  updateTaskSchema,
  taskPriority,
  storyPoints,
  PRIORITY_LABELS,
  DEFAULT_PRIORITY,
  describeTask,
  priorityLabel,
  type Task,
  type CreateTask,
  type UpdateTask,
  type TaskPriority,
} from './task.js';

export { CONSTRAINTS } from './types.js';
