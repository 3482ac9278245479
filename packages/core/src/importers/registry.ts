import { RegistryError, ValidationError } from '../errors/service.js';
import type { Board } from '../schemas/board.js';
import type { Label } from '../schemas/label.js';
import type { List } from '../schemas/list.js';
import type { Project } from '../schemas/project.js';
import type { Task } from '../schemas/task.js';
import type { ServiceContainer } from '../services/ServiceFactory.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Violation } from '../validation/field-validators.js';

const logger = createModuleLogger('ImportRegistry');

export type ColumnType = 'string' | 'integer' | 'integer[]';

export interface ImportField {
  name: string;
  type: ColumnType;
  required: boolean;
}

export type ImportedEntity = Project | Board | Label | List | Task;

/**
 * An entity that rows can be imported into
 */
export interface EntityDescriptor {
  name: string;
  label: string;
  fields: readonly ImportField[];
  create(services: ServiceContainer, record: Record<string, unknown>): Promise<ImportedEntity>;
}

export type ImportRowResult =
  | { row: number; ok: true; entity: ImportedEntity }
  | { row: number; ok: false; violations: Violation[] };

export interface ImportSummary {
  entity: string;
  created: number;
  failed: number;
  results: ImportRowResult[];
}

/** Maps a source column name to the entity field it fills */
export type ColumnMapping = Record<string, string>;

export type ImportRow = Record<string, unknown>;

const text = (name: string, required = true): ImportField => ({ name, type: 'string', required });
const integer = (name: string, required = true): ImportField => ({ name, type: 'integer', required });

export const IMPORTABLE_ENTITIES: readonly EntityDescriptor[] = [
  {
    name: 'project',
    label: 'Project',
    fields: [text('title'), text('description', false), text('image', false), text('slug', false)],
    create: (services, record) => services.projectService.createFrom(record),
  },
  {
    name: 'board',
    label: 'Board',
    fields: [integer('projectId'), text('title')],
    create: (services, record) => services.boardService.createFrom(record),
  },
  {
    name: 'list',
    label: 'List',
    fields: [integer('boardId'), text('title'), integer('position', false)],
    create: (services, record) => services.listService.createFrom(record),
  },
  {
    name: 'task',
    label: 'Task',
    fields: [
      integer('listId'),
      text('title'),
      text('description', false),
      text('priority', false),
      integer('storyPoints'),
      { name: 'labelIds', type: 'integer[]', required: false },
    ],
    create: (services, record) => services.taskService.createFrom(record),
  },
  {
    name: 'label',
    label: 'Label',
    fields: [integer('projectId'), text('title'), text('color')],
    create: (services, record) => services.labelService.createFrom(record),
  },
];

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Convert a raw cell to the field's type. Cells that do not look like the
 * type are passed through so validation reports them.
 */
export function coerceCell(value: unknown, type: ColumnType): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  switch (type) {
    case 'string':
      return value;
    case 'integer':
      if (trimmed === '') return undefined;
      return INTEGER_TEXT.test(trimmed) ? Number(trimmed) : value;
    case 'integer[]':
      if (trimmed === '') return [];
      return trimmed
        .split(/[\s,;]+/)
        .map((item) => (INTEGER_TEXT.test(item) ? Number(item) : item));
  }
}

/**
 * Registry of importable entities, built from an explicit descriptor list
 */
export class ImportRegistry {
  private readonly descriptors = new Map<string, EntityDescriptor>();

  constructor(
    private readonly services: ServiceContainer,
    descriptors: readonly EntityDescriptor[] = IMPORTABLE_ENTITIES
  ) {
    for (const descriptor of descriptors) {
      if (this.descriptors.has(descriptor.name)) {
        throw new RegistryError(`Entity ${descriptor.name} is registered twice`, 'register', {
          entity: descriptor.name,
        });
      }
      this.descriptors.set(descriptor.name, descriptor);
    }
  }

  names(): string[] {
    return [...this.descriptors.keys()];
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  get(name: string): EntityDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new RegistryError(`No importable entity named ${name}`, 'get', { entity: name });
    }
    return descriptor;
  }

  /**
   * Create one entity per row. Rows are independent: a row that fails
   * validation is reported and the next row is still attempted.
   */
  async importRows(
    name: string,
    rows: readonly ImportRow[],
    mapping: ColumnMapping
  ): Promise<ImportSummary> {
    const descriptor = this.get(name);
    const fields = new Map(descriptor.fields.map((field) => [field.name, field]));

    for (const [column, fieldName] of Object.entries(mapping)) {
      if (!fields.has(fieldName)) {
        throw new RegistryError(
          `Column ${column} maps to unknown ${descriptor.label} field ${fieldName}`,
          'importRows',
          { entity: name, column, field: fieldName }
        );
      }
    }

    const results: ImportRowResult[] = [];
    for (const [index, row] of rows.entries()) {
      const record: Record<string, unknown> = {};
      for (const [column, fieldName] of Object.entries(mapping)) {
        const field = fields.get(fieldName);
        if (!field || !(column in row)) continue;
        const value = coerceCell(row[column], field.type);
        if (value !== undefined) {
          record[fieldName] = value;
        }
      }

      try {
        const entity = await descriptor.create(this.services, record);
        results.push({ row: index, ok: true, entity });
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        results.push({ row: index, ok: false, violations: [...error.violations] });
      }
    }

    const created = results.filter((result) => result.ok).length;
    logger.info(
      { entity: name, rows: rows.length, created, failed: rows.length - created },
      'Import finished'
    );
    return { entity: name, created, failed: rows.length - created, results };
  }
}
