import type { Store } from '../database/store.js';
import { EntityNotFoundError } from '../errors/service.js';
import {
  type CreateProject,
  type Project,
  type UpdateProject,
  createProjectSchema,
  updateProjectSchema,
} from '../schemas/project.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { deriveSlug } from '../utils/slug.js';
import { checkSchema } from '../validation/schema-validation.js';
import { FileSystemImageStorage, type ImageStorage } from './ImageStorage.js';
import {
  ViolationCollector,
  duplicate,
  hasChanges,
  readString,
  requireEntity,
} from './service-utils.js';

const logger = createModuleLogger('ProjectService');

/**
 * ProjectService - creation, update and deletion contract for projects
 *
 * Projects are the root of the model. Deleting one removes its boards and
 * labels, and through the boards every list and task below them.
 */
export class ProjectService {
  constructor(
    private readonly store: Store,
    private readonly images: ImageStorage = new FileSystemImageStorage(cfg.MEDIA_ROOT)
  ) {}

  async list(): Promise<Project[]> {
    return this.store.listProjects();
  }

  async get(id: number): Promise<Project> {
    return requireEntity('project', id, await this.store.getProject(id), 'get');
  }

  async getBySlug(slug: string): Promise<Project> {
    return requireEntity('project', slug, await this.store.getProjectBySlug(slug), 'getBySlug');
  }

  /**
   * Create a project. A blank or missing slug is derived from the title once,
   * here; later title changes leave it alone.
   */
  async create(input: CreateProject): Promise<Project> {
    return this.createFrom(input);
  }

  async createFrom(input: unknown): Promise<Project> {
    const violations = new ViolationCollector();
    const parsed = checkSchema(createProjectSchema, input);
    violations.add(...parsed.violations);

    const title = readString(input, 'title');
    if (title && (await this.store.findProjectByTitle(title))) {
      violations.add(duplicate('title', 'Project with this title already exists.', title));
    }

    const slug = readString(input, 'slug') || (title !== undefined ? deriveSlug(title) : '');
    if (title && !slug) {
      violations.add({
        field: 'slug',
        kind: 'FormatError',
        message: 'Could not derive a slug from the title; supply one explicitly.',
        value: title,
      });
    }
    if (slug && (await this.store.getProjectBySlug(slug))) {
      violations.add(duplicate('slug', 'Project with this slug already exists.', slug));
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('project', 'create');
    }

    const project = await this.store.addProject({
      title: parsed.data.title,
      description: parsed.data.description,
      image: parsed.data.image ?? null,
      slug,
    });

    logger.info({ projectId: project.id, slug: project.slug }, 'Project created');
    return project;
  }

  async update(id: number, patch: UpdateProject): Promise<Project> {
    const existing = await this.get(id);
    const violations = new ViolationCollector();
    const parsed = checkSchema(updateProjectSchema, patch);
    violations.add(...parsed.violations);

    const title = readString(patch, 'title');
    if (title && title !== existing.title) {
      const clash = await this.store.findProjectByTitle(title);
      if (clash && clash.id !== id) {
        violations.add(duplicate('title', 'Project with this title already exists.', title));
      }
    }

    const slug = readString(patch, 'slug');
    if (slug && slug !== existing.slug) {
      const clash = await this.store.getProjectBySlug(slug);
      if (clash && clash.id !== id) {
        violations.add(duplicate('slug', 'Project with this slug already exists.', slug));
      }
    }

    if (!parsed.success || !violations.isEmpty) {
      throw violations.toError('project', 'update');
    }
    if (!hasChanges(parsed.data)) {
      return existing;
    }

    const updated = await this.store.updateProject(id, parsed.data);
    logger.info({ projectId: id }, 'Project updated');
    return requireEntity('project', id, updated, 'update');
  }

  /**
   * Store image bytes and point the project at them
   */
  async attachImage(id: number, fileName: string, data: Uint8Array): Promise<Project> {
    await this.get(id);
    const image = await this.images.save(fileName, data);
    return this.update(id, { image });
  }

  async delete(id: number): Promise<void> {
    if (!(await this.store.deleteProject(id))) {
      throw new EntityNotFoundError('project', id, 'delete');
    }
    logger.info({ projectId: id }, 'Project deleted with its boards and labels');
  }
}
