/**
 * File operations the credential vault needs, and nothing else.
 * Production uses NodeSecretFileProvider; tests substitute an in-memory map.
 */

import fs from 'fs/promises';

export interface SecretFileProvider {
  /** Create a directory (and parents) with the given mode. */
  ensureDir(dirPath: string, mode: number): Promise<void>;
  /** Write a file, replacing any previous content, with the given mode. */
  writeFile(filePath: string, content: string, mode: number): Promise<void>;
  readFile(filePath: string): Promise<string>;
  exists(filePath: string): Promise<boolean>;
  /** Remove a file or directory tree. Missing paths are not an error. */
  remove(targetPath: string): Promise<void>;
  list(dirPath: string): Promise<string[]>;
}

export class NodeSecretFileProvider implements SecretFileProvider {
  async ensureDir(dirPath: string, mode: number): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true, mode });
    // mkdir's mode is masked by umask
    await fs.chmod(dirPath, mode);
  }

  async writeFile(filePath: string, content: string, mode: number): Promise<void> {
    await fs.writeFile(filePath, content, { mode });
    await fs.chmod(filePath, mode);
  }

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true, force: true });
  }

  async list(dirPath: string): Promise<string[]> {
    try {
      return await fs.readdir(dirPath);
    } catch {
      return [];
    }
  }
}
