import path from 'path';
import { promises as fs } from 'fs';

export const BLOB_STORE = Symbol('BLOB_STORE');

export interface BlobStore {
  /** Reference of a stored blob, or null when nothing is stored under `name`. */
  locate(name: string): Promise<string | null>;
  put(name: string, bytes: Buffer): Promise<string>;
  read(ref: string): Promise<Buffer>;
}

/** Rendered artifacts on local disk; the reference is the absolute file path. */
export class LocalBlobStore implements BlobStore {
  constructor(private readonly baseDir: string) {}

  async locate(name: string): Promise<string | null> {
    const target = this.pathFor(name);
    try {
      await fs.access(target);
      return target;
    } catch {
      return null;
    }
  }

  async put(name: string, bytes: Buffer): Promise<string> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const target = this.pathFor(name);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, bytes);
    await fs.rename(tmp, target);
    return target;
  }

  async read(ref: string): Promise<Buffer> {
    return fs.readFile(ref);
  }

  private pathFor(name: string): string {
    const safeName = name.replace(/[^a-zA-Z0-9._-]/g, '_');
    return path.resolve(this.baseDir, safeName);
  }
}
