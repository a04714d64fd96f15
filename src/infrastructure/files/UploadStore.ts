import fs from 'fs/promises';
import path from 'path';
import type { IArtifactStore, UploadedDocument } from '../../core/interfaces/ICollaborators.js';

/**
 * Keeps each job's uploaded document under `<rootDir>/<jobId>/` until the sweeper reclaims it
 */
export class UploadStore implements IArtifactStore {
  readonly name = 'uploads';

  constructor(private rootDir: string) {}

  async save(jobId: string, document: UploadedDocument): Promise<string> {
    const dir = this.jobDir(jobId);
    await fs.mkdir(dir, { recursive: true });
    const target = path.join(dir, safeFilename(document.filename));
    await fs.writeFile(target, document.content);
    return target;
  }

  async cleanup(jobId: string): Promise<void> {
    await fs.rm(this.jobDir(jobId), { recursive: true, force: true });
  }

  jobDir(jobId: string): string {
    return path.join(this.rootDir, path.basename(jobId));
  }
}

/**
 * Strips directory parts and anything outside a conservative character set
 */
export function safeFilename(filename: string): string {
  const base = path.basename(filename).replace(/[^A-Za-z0-9._-]/g, '_');
  return base === '' || base === '.' || base === '..' ? 'document' : base;
}
