/**
 * Artifact stores
 * @module @loadramp/core/stores/artifact-store
 *
 * Every durable artifact of a run (tables, logs, summaries, markers) is a
 * text file addressed by a slash-separated path relative to the results
 * root. Stores decide where those files live.
 */

import { reactive, computed, type ComputedRef } from '@vue/reactivity';

export interface ArtifactStore {
  /** Resolves null when the artifact does not exist */
  read(path: string): Promise<string | null>;
  write(path: string, content: string): Promise<void>;
  append(path: string, content: string): Promise<void>;
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Names of the immediate sub-directories of `dir` ('' for the root) */
  listDirectories(dir?: string): Promise<string[]>;
}

/**
 * Normalize an artifact path: forward slashes, no leading "./" or "/",
 * no empty segments.
 */
export function normalizeArtifactPath(path: string): string {
  return path
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.')
    .join('/');
}

export function joinArtifactPath(...segments: string[]): string {
  return normalizeArtifactPath(segments.join('/'));
}

/**
 * Sub-directory names implied by a set of file paths
 */
export function directoriesUnder(paths: Iterable<string>, dir = ''): string[] {
  const prefix = normalizeArtifactPath(dir);
  const names = new Set<string>();
  for (const path of paths) {
    if (prefix !== '' && !path.startsWith(`${prefix}/`)) continue;
    const rest = prefix === '' ? path : path.slice(prefix.length + 1);
    const slash = rest.indexOf('/');
    if (slash > 0) {
      names.add(rest.slice(0, slash));
    }
  }
  return [...names].sort();
}

// ============================================================================
// In-memory store
// ============================================================================

/**
 * Artifact store held in a reactive map, for tests and in-process fakes.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly files = reactive(new Map<string, string>());

  /** Sorted artifact paths */
  readonly paths: ComputedRef<string[]> = computed(() => [...this.files.keys()].sort());

  async read(path: string): Promise<string | null> {
    return this.files.get(normalizeArtifactPath(path)) ?? null;
  }

  async write(path: string, content: string): Promise<void> {
    this.files.set(normalizeArtifactPath(path), content);
  }

  async append(path: string, content: string): Promise<void> {
    const key = normalizeArtifactPath(path);
    this.files.set(key, (this.files.get(key) ?? '') + content);
  }

  async remove(path: string): Promise<void> {
    this.files.delete(normalizeArtifactPath(path));
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalizeArtifactPath(path));
  }

  async listDirectories(dir = ''): Promise<string[]> {
    return directoriesUnder(this.files.keys(), dir);
  }

  /**
   * Synchronous read for assertions
   */
  peek(path: string): string | undefined {
    return this.files.get(normalizeArtifactPath(path));
  }
}
