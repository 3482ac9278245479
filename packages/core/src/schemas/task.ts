import { z } from 'zod';
import { divisibleBy, inRange } from '../validation/field-validators.js';
import { refineWith } from '../validation/schema-validation.js';
import { entityId, optionalText, requiredText } from './base.js';
import { CONSTRAINTS } from './types.js';

const { TASK } = CONSTRAINTS;

// Stored as two-letter codes; PRIORITY_LABELS holds the display names
export const taskPriority = z.enum(['HI', 'ME', 'LO']);

export const PRIORITY_LABELS: Record<TaskPriority, string> = {
  HI: 'High',
  ME: 'Medium',
  LO: 'Low',
};

export const DEFAULT_PRIORITY: TaskPriority = 'ME';

export const taskTitle = requiredText(TASK.TITLE_MAX_LENGTH);
export const taskDescription = optionalText(TASK.DESCRIPTION_MAX_LENGTH);

// Range and divisibility are both checked, so 103 reports two violations
export const storyPoints = z
  .number()
  .int()
  .superRefine(
    refineWith(
      inRange(TASK.STORY_POINTS_MIN, TASK.STORY_POINTS_MAX),
      divisibleBy(TASK.STORY_POINTS_STEP)
    )
  );

// Database Task schema - matches what Drizzle returns (nullable description)
export const taskSchema = z.object({
  taskNo: entityId,
  listId: entityId,
  title: taskTitle,
  description: taskDescription.nullable(),
  priority: taskPriority,
  storyPoints: storyPoints,
});

export const createTaskSchema = taskSchema.omit({ taskNo: true }).extend({
  description: taskDescription.nullish(),
  priority: taskPriority.default(DEFAULT_PRIORITY),
  labelIds: z.array(entityId).default([]),
});

// labelIds replaces the whole label set when present
export const updateTaskSchema = taskSchema
  .omit({ taskNo: true })
  .partial()
  .extend({
    labelIds: z.array(entityId).optional(),
  });

export function describeTask(task: Pick<Task, 'taskNo' | 'title'>): string {
  return `#${task.taskNo}: ${task.title}`;
}

export function priorityLabel(priority: TaskPriority): string {
  return PRIORITY_LABELS[priority];
}

export type Task = z.infer<typeof taskSchema>;
export type CreateTask = z.input<typeof createTaskSchema>;
export type UpdateTask = z.input<typeof updateTaskSchema>;
export type TaskPriority = z.infer<typeof taskPriority>;
