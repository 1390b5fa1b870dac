import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

/**
 * FileManager - Scoped temporary storage for providers that stage files locally
 * Every directory handed out is removed when the scope exits, success or failure
 */
export class FileManager {
  private readonly tempDir: string;

  constructor(tempDirectory: string) {
    this.tempDir = tempDirectory;
  }

  get root(): string {
    return this.tempDir;
  }

  /**
   * Run an operation inside a fresh temp directory and remove it afterwards
   */
  async withTempDir<T>(
    prefix: string,
    operation: (dir: string) => Promise<T>,
  ): Promise<T> {
    await fs.mkdir(this.tempDir, { recursive: true });
    const dir = await fs.mkdtemp(path.join(this.tempDir, `${prefix}-`));

    try {
      return await operation(dir);
    } finally {
      await this.removeDir(dir);
    }
  }

  /**
   * List regular files in a directory
   */
  async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && !entry.name.endsWith('.part'))
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Get file size in bytes
   */
  async getFileSize(filePath: string): Promise<number> {
    const stats = await fs.stat(filePath);
    return stats.size;
  }

  async readFile(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      logger.debug('Temp directory removed', { path: dir });
    } catch (error: unknown) {
      logger.error('Failed to remove temp directory', {
        path: dir,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
