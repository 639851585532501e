/**
 * Payload source reading exposition files from a directory
 * @module @loadramp/runtime/adapters/payload-source
 */

import fs from 'fs-extra';
import path from 'path';
import type { IPayloadSource } from '@loadramp/shared';

export class FilePayloadSource implements IPayloadSource {
  private readonly cache = new Map<string, string>();

  constructor(private readonly directory: string) {}

  async load(file: string): Promise<string> {
    const cached = this.cache.get(file);
    if (cached !== undefined) return cached;
    const content = await fs.readFile(path.join(this.directory, file), 'utf8');
    this.cache.set(file, content);
    return content;
  }
}
