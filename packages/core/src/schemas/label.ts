import { z } from 'zod';
import { hexColor } from '../validation/field-validators.js';
import { refineWith } from '../validation/schema-validation.js';
import { entityId, requiredText } from './base.js';
import { CONSTRAINTS } from './types.js';

export const labelTitle = requiredText(CONSTRAINTS.LABEL.TITLE_MAX_LENGTH);

export const labelColor = z.string().superRefine(refineWith(hexColor()));

export const labelSchema = z.object({
  id: entityId,
  projectId: entityId,
  title: labelTitle,
  color: labelColor,
});

export const createLabelSchema = labelSchema.omit({ id: true });

export const updateLabelSchema = createLabelSchema.partial();

export function describeLabel(label: Pick<Label, 'title'>): string {
  return label.title;
}

export type Label = z.infer<typeof labelSchema>;
export type CreateLabel = z.input<typeof createLabelSchema>;
export type UpdateLabel = z.input<typeof updateLabelSchema>;
