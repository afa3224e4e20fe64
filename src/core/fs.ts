import { appendFile, mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  readBytes(path: string): Promise<Uint8Array>;
  writeText(path: string, content: string): Promise<void>;
  writeJSON(path: string, data: unknown): Promise<void>;
  writeBytes(path: string, data: Uint8Array): Promise<void>;
  appendText(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Recursively lists files under `dir` whose name ends with `extension`. */
  listFiles(dir: string, extension: string): Promise<string[]>;
  mtime(path: string): Promise<number>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf8');
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    return readFile(filePath);
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'utf8');
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
  }

  async writeBytes(filePath: string, data: Uint8Array): Promise<void> {
    await writeFile(filePath, data);
  }

  async appendText(filePath: string, content: string): Promise<void> {
    await appendFile(filePath, content, 'utf8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await stat(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listFiles(dir: string, extension: string): Promise<string[]> {
    if (!(await this.exists(dir))) return [];
    const entries = await readdir(dir, { recursive: true, withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(extension))
      .map((e) => path.join(e.parentPath ?? e.path, e.name))
      .sort();
  }

  async mtime(filePath: string): Promise<number> {
    return (await stat(filePath)).mtimeMs;
  }

  async mkdir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async remove(filePath: string): Promise<void> {
    await rm(filePath, { recursive: true, force: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, Uint8Array>();
  private mtimes = new Map<string, number>();
  private clock = 0;

  async readText(filePath: string): Promise<string> {
    return Buffer.from(await this.readBytes(filePath)).toString('utf8');
  }

  async readJSON<T>(filePath: string): Promise<T> {
    return JSON.parse(await this.readText(filePath)) as T;
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    const content = this.files.get(filePath);
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return Uint8Array.from(content);
  }

  async writeText(filePath: string, content: string): Promise<void> {
    this.store(filePath, Buffer.from(content, 'utf8'));
  }

  async writeJSON(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, JSON.stringify(data, null, 2));
  }

  async writeBytes(filePath: string, data: Uint8Array): Promise<void> {
    this.store(filePath, Uint8Array.from(data));
  }

  async appendText(filePath: string, content: string): Promise<void> {
    const existing = this.files.get(filePath) ?? new Uint8Array();
    this.store(filePath, Buffer.concat([existing, Buffer.from(content, 'utf8')]));
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async listFiles(dir: string, extension: string): Promise<string[]> {
    const prefix = dir.endsWith('/') ? dir : `${dir}/`;
    return [...this.files.keys()].filter((k) => k.startsWith(prefix) && k.endsWith(extension)).sort();
  }

  async mtime(filePath: string): Promise<number> {
    const value = this.mtimes.get(filePath);
    if (value === undefined) throw new Error(`ENOENT: ${filePath}`);
    return value;
  }

  async mkdir(_path: string): Promise<void> {}

  async remove(filePath: string): Promise<void> {
    this.files.delete(filePath);
    this.mtimes.delete(filePath);
  }

  setFile(filePath: string, content: string): void {
    this.store(filePath, Buffer.from(content, 'utf8'));
  }

  getText(filePath: string): string | undefined {
    const content = this.files.get(filePath);
    return content === undefined ? undefined : Buffer.from(content).toString('utf8');
  }

  getFiles(): Map<string, string> {
    const out = new Map<string, string>();
    for (const [k, v] of this.files) out.set(k, Buffer.from(v).toString('utf8'));
    return out;
  }

  private store(filePath: string, content: Uint8Array): void {
    this.files.set(filePath, content);
    this.mtimes.set(filePath, ++this.clock);
  }
}
