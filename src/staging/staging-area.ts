import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { sanitizeFileName } from './file-name.utils';

/**
 * Private scratch directory of a single request.
 * Every path it hands out is new, so no stage overwrites another stage's
 * files; the whole tree goes away with dispose().
 */
export class StagingArea {
  private disposed = false;

  constructor(public readonly root: string) {}

  /**
   * Unique file path inside the area, e.g. generatePath('.pdf')
   */
  generatePath(extension: string): string {
    return join(this.root, `${uuidv4()}${extension}`);
  }

  /**
   * Create a fresh, empty directory inside the area
   */
  async createDirectory(): Promise<string> {
    const dir = join(this.root, uuidv4());
    await mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * Write an uploaded document under its own directory, keeping its
   * (sanitized) original name
   */
  async stageUpload(originalName: string, content: Buffer): Promise<string> {
    const dir = await this.createDirectory();
    const path = join(dir, sanitizeFileName(originalName));
    await writeFile(path, content);
    return path;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await rm(this.root, { recursive: true, force: true });
  }
}
