/**
 * Shared setup for service tests: a fresh in-memory database per test and
 * image uploads under a temporary directory
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createInMemoryDatabase } from '../src/database/index.js';
import { ValidationError } from '../src/errors/service.js';
import { FileSystemImageStorage } from '../src/services/ImageStorage.js';
import { type ServiceContainer, createServices } from '../src/services/ServiceFactory.js';
import type { Violation } from '../src/validation/field-validators.js';

export interface TestContext {
  services: ServiceContainer;
  mediaRoot: string;
  cleanup(): Promise<void>;
}

export async function setupServices(): Promise<TestContext> {
  const store = await createInMemoryDatabase('test');
  const mediaRoot = mkdtempSync(join(tmpdir(), 'planboard-media-'));
  const services = createServices({ store, images: new FileSystemImageStorage(mediaRoot) });

  return {
    services,
    mediaRoot,
    async cleanup() {
      await store.close();
      rmSync(mediaRoot, { recursive: true, force: true });
    },
  };
}

/**
 * Await an operation expected to fail validation and return its violations
 * as [field, kind] pairs
 */
export async function violationsOf(operation: Promise<unknown>): Promise<[string, string][]> {
  const error = await captureError(operation);
  if (!(error instanceof ValidationError)) {
    throw new Error(`Expected a ValidationError, got ${String(error)}`);
  }
  return error.violations.map((violation: Violation) => [violation.field, violation.kind]);
}

export async function captureError(operation: Promise<unknown>): Promise<unknown> {
  try {
    await operation;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the operation to fail');
}
