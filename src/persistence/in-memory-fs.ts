/**
 * In-memory FileSystem for tests.
 * Files live in a Map keyed by path; directories are tracked only so that
 * `mkdir` is observable. Individual operations can be made to fail.
 */

import type { FileSystem } from './filesystem.ts';

type Operation = 'readFile' | 'writeFile' | 'appendFile' | 'rename' | 'mkdir' | 'remove';

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, Uint8Array>();
  private directories = new Set<string>();
  private failures = new Map<Operation, Error>();

  // --- FileSystem interface ---

  exists(path: string): boolean {
    return this.files.has(path) || this.directories.has(path);
  }

  readFile(path: string): Uint8Array {
    this.maybeFail('readFile');
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: file not found: ${path}`);
    }
    return content.slice();
  }

  writeFile(path: string, data: Uint8Array): void {
    this.maybeFail('writeFile');
    this.files.set(path, data.slice());
  }

  appendFile(path: string, data: Uint8Array): void {
    this.maybeFail('appendFile');
    const existing = this.files.get(path) ?? new Uint8Array(0);
    const combined = new Uint8Array(existing.length + data.length);
    combined.set(existing, 0);
    combined.set(data, existing.length);
    this.files.set(path, combined);
  }

  rename(from: string, to: string): void {
    this.maybeFail('rename');
    const content = this.files.get(from);
    if (content === undefined) {
      throw new Error(`ENOENT: file not found: ${from}`);
    }
    this.files.delete(from);
    this.files.set(to, content);
  }

  mkdir(path: string): void {
    this.maybeFail('mkdir');
    this.directories.add(path);
  }

  remove(path: string): void {
    this.maybeFail('remove');
    this.files.delete(path);
  }

  // --- Test helpers ---

  /** Make every later call of `operation` throw until cleared */
  failOn(operation: Operation, message: string = `EIO: ${operation} failed`): void {
    this.failures.set(operation, new Error(message));
  }

  clearFailures(): void {
    this.failures.clear();
  }

  setFile(path: string, content: string | Uint8Array): void {
    this.files.set(path, typeof content === 'string' ? new TextEncoder().encode(content) : content.slice());
  }

  /** File content decoded as UTF-8, or undefined */
  getText(path: string): string | undefined {
    const content = this.files.get(path);
    return content === undefined ? undefined : new TextDecoder().decode(content);
  }

  getBytes(path: string): Uint8Array | undefined {
    return this.files.get(path)?.slice();
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  private maybeFail(operation: Operation): void {
    const failure = this.failures.get(operation);
    if (failure !== undefined) throw failure;
  }
}
