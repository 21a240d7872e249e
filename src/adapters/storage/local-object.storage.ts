import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { Result } from '../../types/result.types';
import { IObjectStorage } from './object-storage.interface';

// fs errors may come from another realm, so match on shape
function messageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem-backed object store: `{root}/{container}/{key}`.
 */
@injectable()
export class LocalObjectStorage implements IObjectStorage {
  constructor(@inject('LocalStorageRoot') private readonly rootDir: string) {}

  async upload(container: string, key: string, body: string | Buffer): Promise<Result<void>> {
    try {
      const target = this.resolvePath(container, key);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, body);
      console.log(`[Local Storage] Wrote ${container}/${key}`);
      return { success: true, message: `Uploaded ${container}/${key}` };
    } catch (error) {
      return { success: false, message: `Failed to upload ${container}/${key}: ${messageOf(error)}` };
    }
  }

  async download(container: string, key: string): Promise<Result<Buffer>> {
    try {
      const data = await readFile(this.resolvePath(container, key));
      return { success: true, data, message: `Downloaded ${container}/${key}` };
    } catch (error) {
      if (isMissingFile(error)) {
        return { success: true, message: `Object ${container}/${key} not found` };
      }
      return { success: false, message: `Failed to download ${container}/${key}: ${messageOf(error)}` };
    }
  }

  async list(container: string, prefix = ''): Promise<Result<string[]>> {
    try {
      const containerDir = this.resolvePath(container);
      const keys = (await this.walk(containerDir))
        .map(file => path.relative(containerDir, file).split(path.sep).join('/'))
        .filter(key => key.startsWith(prefix))
        .sort();
      return { success: true, data: keys, message: `Listed ${keys.length} objects in ${container}` };
    } catch (error) {
      if (isMissingFile(error)) {
        return { success: true, data: [], message: `Container ${container} is empty` };
      }
      return { success: false, message: `Failed to list ${container}/${prefix}: ${messageOf(error)}` };
    }
  }

  async createContainer(container: string): Promise<Result<void>> {
    try {
      await mkdir(this.resolvePath(container), { recursive: true });
      return { success: true, message: `Container ${container} ready` };
    } catch (error) {
      return { success: false, message: `Failed to create container ${container}: ${messageOf(error)}` };
    }
  }

  private resolvePath(container: string, key = ''): string {
    const root = path.resolve(this.rootDir);
    const target = path.resolve(root, container, key);
    if (target !== root && !target.startsWith(root + path.sep)) {
      throw new Error(`Path escapes storage root: ${container}/${key}`);
    }
    return target;
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else {
        files.push(fullPath);
      }
    }
    return files;
  }
}
