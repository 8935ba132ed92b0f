import crypto from 'node:crypto';
import { mkdir, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { errorMessage } from '../fax/errors';

export const ALLOWED_EXTENSIONS = new Set(['pdf', 'ps', 'txt', 'tiff', 'tif']);

export interface UploadedDocument {
  name: string;
  data: Buffer;
}

export function isAllowedDocument(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0 || dot === filename.length - 1) return false;
  return ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
}

/** Reduces an uploaded name to a safe basename of letters, digits, dots, dashes and underscores. */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const cleaned = base
    .normalize('NFKD')
    .replace(/[^\w.-]+/g, '_')
    .replace(/^[._]+/, '')
    .replace(/_+/g, '_');
  return cleaned || 'document';
}

/**
 * Staging area for uploaded documents. Files only live here between the
 * request that uploads them and the end of that request's submission.
 */
export class UploadStore {
  private ready: Promise<void> | null = null;

  constructor(readonly directory: string) {}

  async stage(upload: UploadedDocument): Promise<string> {
    await this.ensureDirectory();
    const target = path.join(this.directory, `${crypto.randomUUID()}_${sanitizeFilename(upload.name)}`);
    await writeFile(target, upload.data);
    return target;
  }

  /** Deletes a staged file. A file that is already gone counts as released. */
  async release(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      console.warn(`[Uploads] Failed to remove ${filePath}: ${errorMessage(error)}`);
    }
  }

  async releaseAll(filePaths: readonly string[]): Promise<void> {
    await Promise.all(filePaths.map((filePath) => this.release(filePath)));
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(() => undefined);
      this.ready.catch(() => {
        this.ready = null;
      });
    }
    return this.ready;
  }
}
