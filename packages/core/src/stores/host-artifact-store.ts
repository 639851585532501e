/**
 * Artifact store backed by an execution host
 * @module @loadramp/core/stores/host-artifact-store
 */

import type { IExecutionHost } from '@loadramp/shared';
import type { ArtifactStore } from './artifact-store';
import { normalizeArtifactPath } from './artifact-store';

/**
 * Reads and writes artifacts under the host's results root. Appends are
 * read-modify-write and only suit small marker files.
 */
export class HostArtifactStore implements ArtifactStore {
  constructor(private readonly host: IExecutionHost) {}

  read(path: string): Promise<string | null> {
    return this.host.readFile(normalizeArtifactPath(path));
  }

  write(path: string, content: string): Promise<void> {
    return this.host.writeFile(normalizeArtifactPath(path), content);
  }

  async append(path: string, content: string): Promise<void> {
    const existing = (await this.read(path)) ?? '';
    await this.write(path, existing + content);
  }

  remove(path: string): Promise<void> {
    return this.host.removeFile(normalizeArtifactPath(path));
  }

  async exists(path: string): Promise<boolean> {
    return (await this.read(path)) !== null;
  }

  listDirectories(dir = ''): Promise<string[]> {
    return this.host.listDirectories(normalizeArtifactPath(dir));
  }
}
