import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * File access needed by ingestion.
 */
export interface InputReader {
  readText(filePath: string): Promise<string>;
  /** Regular files directly inside `dir`, sorted by name. */
  listFiles(dir: string): Promise<string[]>;
  writeText(filePath: string, text: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
}

export class FileSystemInputReader implements InputReader {
  async readText(filePath: string): Promise<string> {
    const text = await fs.readFile(filePath, 'utf8');
    return text.startsWith('\uFEFF') ? text.slice(1) : text;
  }

  async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(dir, name));
  }

  async writeText(filePath: string, text: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
