/**
 * Artifact store on the local filesystem
 * @module @loadramp/core/stores/fs-artifact-store
 */

import fs from 'fs-extra';
import path from 'node:path';
import type { ArtifactStore } from './artifact-store';
import { normalizeArtifactPath } from './artifact-store';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FsArtifactStore implements ArtifactStore {
  constructor(readonly root: string) {}

  resolve(artifact: string): string {
    return path.join(this.root, ...normalizeArtifactPath(artifact).split('/'));
  }

  async read(artifact: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(artifact), 'utf8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async write(artifact: string, content: string): Promise<void> {
    await fs.outputFile(this.resolve(artifact), content, 'utf8');
  }

  async append(artifact: string, content: string): Promise<void> {
    const file = this.resolve(artifact);
    await fs.ensureDir(path.dirname(file));
    await fs.appendFile(file, content, 'utf8');
  }

  async remove(artifact: string): Promise<void> {
    await fs.remove(this.resolve(artifact));
  }

  async exists(artifact: string): Promise<boolean> {
    return fs.pathExists(this.resolve(artifact));
  }

  async listDirectories(dir = ''): Promise<string[]> {
    const target = this.resolve(dir);
    if (!(await fs.pathExists(target))) return [];
    const entries = await fs.readdir(target, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }
}
