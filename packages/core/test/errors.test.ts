import { describe, expect, it } from 'vitest';
import { DatabaseQueryError, wrapDatabaseError } from '../src/database/errors.js';
import { PlanboardError, extractErrorDetails, isPlanboardError, wrapError } from '../src/errors/base.js';
import { EntityNotFoundError, ValidationError } from '../src/errors/service.js';

describe('ValidationError', () => {
  const error = new ValidationError('task', 'create', [
    { field: 'storyPoints', kind: 'RangeError', message: 'Out of range.', value: 103 },
    { field: 'storyPoints', kind: 'DivisibilityError', message: 'Not a multiple.', value: 103 },
    { field: 'listId', kind: 'ReferentialError', message: 'List 9 does not exist.', value: 9 },
  ]);

  it('lists every violation in its message', () => {
    expect(error.message).toBe(
      'Invalid task: storyPoints: Out of range.; storyPoints: Not a multiple.; listId: List 9 does not exist.'
    );
    expect(error.module).toBe('service.task');
    expect(error.operation).toBe('create');
  });

  it('groups and queries violations', () => {
    expect(Object.keys(error.byField())).toEqual(['storyPoints', 'listId']);
    expect(error.byField().storyPoints).toHaveLength(2);
    expect(error.hasKind('ReferentialError')).toBe(true);
    expect(error.hasKind('ReferentialError', 'storyPoints')).toBe(false);
    expect(error.hasKind('UniquenessError')).toBe(false);
  });
});

describe('EntityNotFoundError', () => {
  it('names the entity and id', () => {
    const error = new EntityNotFoundError('board', 7, 'get');

    expect(error.message).toBe('Board 7 not found');
    expect(error.name).toBe('EntityNotFoundError');
    expect(error.toJSON()).toMatchObject({
      name: 'EntityNotFoundError',
      module: 'service.board',
      operation: 'get',
      context: { entityId: 7 },
    });
  });
});

describe('wrapError', () => {
  it('keeps planboard errors as they are', () => {
    const original = new EntityNotFoundError('task', 1);

    expect(wrapError(original, 'server', 'handle')).toBe(original);
  });

  it('wraps anything else with its origin', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause, 'server', 'handle', { path: '/hello' });

    expect(wrapped).toBeInstanceOf(PlanboardError);
    expect(isPlanboardError(wrapped)).toBe(true);
    expect(wrapped.cause).toBe(cause);
    expect(extractErrorDetails(wrapped)).toMatchObject({
      message: 'boom',
      module: 'server',
      operation: 'handle',
      context: { path: '/hello' },
    });
    expect(extractErrorDetails('plain')).toEqual({ message: 'plain' });
  });

  it('wraps driver failures as query errors', () => {
    const wrapped = wrapDatabaseError(new Error('disk I/O error'), 'sqlite', 'insert');

    expect(wrapped).toBeInstanceOf(DatabaseQueryError);
  });
});
