import { z } from 'zod';
import { entityId, optionalText, requiredText, slugField } from './base.js';
import { CONSTRAINTS } from './types.js';

const { PROJECT, SLUG } = CONSTRAINTS;

export const projectTitle = requiredText(PROJECT.TITLE_MAX_LENGTH);
export const projectDescription = optionalText(PROJECT.DESCRIPTION_MAX_LENGTH);

// Stored image reference, e.g. a path below the media root
export const imageReference = z.string().max(255, 'Ensure this value has at most 255 characters.');

// Database Project schema - matches what Drizzle returns
export const projectSchema = z.object({
  id: entityId,
  title: projectTitle,
  description: projectDescription,
  image: imageReference.nullable(),
  slug: slugField(SLUG.MAX_LENGTH),
});

// A blank or missing slug is derived from the title at creation
export const createProjectSchema = z.object({
  title: projectTitle,
  description: projectDescription.default(''),
  image: imageReference.nullish(),
  slug: slugField(SLUG.MAX_LENGTH).optional(),
});

// Once set, the slug may be replaced but never blanked
export const updateProjectSchema = z.object({
  title: projectTitle.optional(),
  description: projectDescription.optional(),
  image: imageReference.nullable().optional(),
  slug: slugField(SLUG.MAX_LENGTH)
    .refine((value) => value !== '', {
      message: 'Slug cannot be blank once the project exists.',
      params: { kind: 'RequiredError' },
    })
    .optional(),
});

export function describeProject(project: Pick<Project, 'title'>): string {
  return project.title;
}

export type Project = z.infer<typeof projectSchema>;
export type CreateProject = z.input<typeof createProjectSchema>;
export type UpdateProject = z.input<typeof updateProjectSchema>;
