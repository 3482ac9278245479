import { z } from 'zod';
import { entityId, requiredText } from './base.js';
import type { Project } from './project.js';
import { CONSTRAINTS } from './types.js';

export const boardTitle = requiredText(CONSTRAINTS.BOARD.TITLE_MAX_LENGTH);

export const boardSchema = z.object({
  id: entityId,
  projectId: entityId,
  title: boardTitle,
});

export const createBoardSchema = boardSchema.omit({ id: true });

export const updateBoardSchema = createBoardSchema.partial();

/**
 * Boards read as "<project> - <board>" since titles only repeat across projects
 */
export function describeBoard(board: Pick<Board, 'title'>, project: Pick<Project, 'title'>): string {
  return `${project.title} - ${board.title}`;
}

export type Board = z.infer<typeof boardSchema>;
export type CreateBoard = z.input<typeof createBoardSchema>;
export type UpdateBoard = z.input<typeof updateBoardSchema>;
