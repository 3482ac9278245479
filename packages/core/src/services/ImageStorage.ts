import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createModuleLogger } from '../utils/logger.js';
import { deriveSlug } from '../utils/slug.js';

const logger = createModuleLogger('ImageStorage');

// Sub-directory of the media root that project images go to
export const IMAGE_UPLOAD_DIR = 'media';

/**
 * Stores image bytes and returns an opaque reference to them
 */
export interface ImageStorage {
  save(fileName: string, data: Uint8Array): Promise<string>;
}

/**
 * Writes images below `<root>/media/`. The returned reference is the path
 * relative to the root, with a random suffix so uploads never overwrite
 * each other.
 */
export class FileSystemImageStorage implements ImageStorage {
  constructor(private readonly root: string) {}

  async save(fileName: string, data: Uint8Array): Promise<string> {
    const extension = extname(fileName).toLowerCase().replace(/[^.a-z0-9]/g, '');
    const stem = deriveSlug(basename(fileName, extname(fileName))) || 'image';
    const reference = `${IMAGE_UPLOAD_DIR}/${stem}-${randomUUID().slice(0, 8)}${extension}`;

    await mkdir(join(this.root, IMAGE_UPLOAD_DIR), { recursive: true });
    await writeFile(join(this.root, reference), data);

    logger.debug({ reference, bytes: data.byteLength }, 'Stored image');
    return reference;
  }
}
