import { z } from 'zod';
import { entityId, requiredText } from './base.js';
import { CONSTRAINTS } from './types.js';

export const listTitle = requiredText(CONSTRAINTS.LIST.TITLE_MAX_LENGTH);

// Column order within a board, 0 first
export const listPosition = z
  .number()
  .int()
  .min(0, 'Ensure this value is greater than or equal to 0.');

export const listSchema = z.object({
  id: entityId,
  boardId: entityId,
  title: listTitle,
  position: listPosition,
});

// Position defaults to the end of the board when omitted
export const createListSchema = listSchema.omit({ id: true }).extend({
  position: listPosition.optional(),
});

export const updateListSchema = listSchema.omit({ id: true }).partial();

export function describeList(list: Pick<List, 'title'>): string {
  return list.title;
}

export type List = z.infer<typeof listSchema>;
export type CreateList = z.input<typeof createListSchema>;
export type UpdateList = z.input<typeof updateListSchema>;
