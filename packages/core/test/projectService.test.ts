import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EntityNotFoundError, ValidationError } from '../src/errors/service.js';
import type { ServiceContainer } from '../src/services/ServiceFactory.js';
import { type TestContext, captureError, setupServices, violationsOf } from './helpers.js';

let ctx: TestContext;
let services: ServiceContainer;

beforeEach(async () => {
  ctx = await setupServices();
  services = ctx.services;
});

afterEach(async () => {
  await ctx.cleanup();
});

describe('ProjectService.create', () => {
  it('derives the slug from the title', async () => {
    const project = await services.projectService.create({ title: 'Hello, Wörld!' });

    expect(project).toMatchObject({
      title: 'Hello, Wörld!',
      description: '',
      image: null,
      slug: 'hello-world',
    });
    expect(project.id).toBeGreaterThan(0);
  });

  it('keeps an explicit slug and derives a blank one', async () => {
    const custom = await services.projectService.create({ title: 'Alpha', slug: 'custom_slug' });
    const blank = await services.projectService.create({ title: 'Beta Release', slug: '' });

    expect(custom.slug).toBe('custom_slug');
    expect(blank.slug).toBe('beta-release');
  });

  it('rejects a duplicate title and the slug derived from it', async () => {
    await services.projectService.create({ title: 'Alpha' });

    expect(await violationsOf(services.projectService.create({ title: 'Alpha' }))).toEqual([
      ['title', 'UniquenessError'],
      ['slug', 'UniquenessError'],
    ]);
  });

  it('rejects a slug taken by another project', async () => {
    await services.projectService.create({ title: 'Alpha', slug: 'shared' });

    expect(
      await violationsOf(services.projectService.create({ title: 'Beta', slug: 'shared' }))
    ).toEqual([['slug', 'UniquenessError']]);
  });

  it('reports a title that yields no slug', async () => {
    const error = await captureError(services.projectService.create({ title: '!!!' }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.violations).toEqual([
        {
          field: 'slug',
          kind: 'FormatError',
          message: 'Could not derive a slug from the title; supply one explicitly.',
          value: '!!!',
        },
      ]);
    }
  });

  it('reports a missing title once', async () => {
    expect(await violationsOf(services.projectService.createFrom({}))).toEqual([
      ['title', 'RequiredError'],
    ]);
  });

  it('lists every violation in the error message', async () => {
    const error = await captureError(
      services.projectService.create({ title: 'x'.repeat(65), slug: 'no spaces' })
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.message).toBe(
      'Invalid project: title: Ensure this value has at most 64 characters.; ' +
        'slug: Enter a valid “slug” consisting of letters, numbers, underscores or hyphens.'
    );
  });
});

describe('ProjectService.create concurrency', () => {
  it('lets only one of two simultaneous creates with the same title through', async () => {
    const results = await Promise.allSettled([
      services.projectService.create({ title: 'Same' }),
      services.projectService.create({ title: 'Same' }),
    ]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter((result) => result.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    const [failure] = rejected;
    const reason: unknown = failure?.status === 'rejected' ? failure.reason : undefined;
    expect(reason).toBeInstanceOf(ValidationError);
    expect(reason instanceof ValidationError && reason.hasKind('UniquenessError')).toBe(true);
    expect(await services.projectService.list()).toHaveLength(1);
  });
});

describe('ProjectService.update', () => {
  it('does not refresh the slug when the title changes', async () => {
    const project = await services.projectService.create({ title: 'Alpha' });

    const updated = await services.projectService.update(project.id, { title: 'Omega' });

    expect(updated.title).toBe('Omega');
    expect(updated.slug).toBe('alpha');
  });

  it('allows keeping its own title and slug', async () => {
    const project = await services.projectService.create({ title: 'Alpha' });

    const updated = await services.projectService.update(project.id, {
      title: 'Alpha',
      slug: 'alpha',
      description: 'Same names',
    });

    expect(updated.description).toBe('Same names');
  });

  it('rejects a title held by another project', async () => {
    await services.projectService.create({ title: 'Alpha' });
    const beta = await services.projectService.create({ title: 'Beta' });

    expect(await violationsOf(services.projectService.update(beta.id, { title: 'Alpha' }))).toEqual(
      [['title', 'UniquenessError']]
    );
  });

  it('refuses to blank the slug', async () => {
    const project = await services.projectService.create({ title: 'Alpha' });

    expect(await violationsOf(services.projectService.update(project.id, { slug: '' }))).toEqual([
      ['slug', 'RequiredError'],
    ]);
  });

  it('fails for a missing project', async () => {
    await expect(services.projectService.update(404, { title: 'Nope' })).rejects.toThrow(
      EntityNotFoundError
    );
  });
});

describe('ProjectService queries', () => {
  it('lists projects by title and finds one by slug', async () => {
    await services.projectService.create({ title: 'Zeta' });
    await services.projectService.create({ title: 'Alpha' });

    const titles = (await services.projectService.list()).map((project) => project.title);
    const bySlug = await services.projectService.getBySlug('zeta');

    expect(titles).toEqual(['Alpha', 'Zeta']);
    expect(bySlug.title).toBe('Zeta');
    await expect(services.projectService.getBySlug('missing')).rejects.toThrow(
      'Project missing not found'
    );
  });
});

describe('ProjectService.attachImage', () => {
  it('stores the bytes under the media directory', async () => {
    const project = await services.projectService.create({ title: 'Alpha' });

    const updated = await services.projectService.attachImage(
      project.id,
      'Team Photo.PNG',
      new Uint8Array([1, 2, 3])
    );

    expect(updated.image).toMatch(/^media\/team-photo-[0-9a-f]{8}\.png$/);
    const path = join(ctx.mediaRoot, updated.image ?? '');
    expect(existsSync(path)).toBe(true);
    expect([...readFileSync(path)]).toEqual([1, 2, 3]);
  });
});

describe('ProjectService.delete', () => {
  it('removes boards, labels, lists and tasks below the project', async () => {
    const project = await services.projectService.create({ title: 'Alpha' });
    const board = await services.boardService.create({ projectId: project.id, title: 'Sprint' });
    const label = await services.labelService.create({
      projectId: project.id,
      title: 'Bug',
      color: '#FF0000',
    });
    const list = await services.listService.create({ boardId: board.id, title: 'Todo' });
    const task = await services.taskService.create({
      listId: list.id,
      title: 'Fix login',
      storyPoints: 5,
      labelIds: [label.id],
    });

    await services.projectService.delete(project.id);

    await expect(services.boardService.get(board.id)).rejects.toThrow(EntityNotFoundError);
    await expect(services.labelService.get(label.id)).rejects.toThrow(EntityNotFoundError);
    await expect(services.listService.get(list.id)).rejects.toThrow(EntityNotFoundError);
    await expect(services.taskService.get(task.taskNo)).rejects.toThrow(EntityNotFoundError);
  });

  it('fails for a missing project', async () => {
    await expect(services.projectService.delete(999)).rejects.toThrow('Project 999 not found');
  });
});
