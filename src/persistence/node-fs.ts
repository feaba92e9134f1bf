/**
 * FileSystem adapter backed by node:fs.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import type { FileSystem } from './filesystem.ts';

export class NodeFileSystem implements FileSystem {
  exists(path: string): boolean {
    return existsSync(path);
  }

  readFile(path: string): Uint8Array {
    return new Uint8Array(readFileSync(path));
  }

  writeFile(path: string, data: Uint8Array): void {
    writeFileSync(path, data);
  }

  appendFile(path: string, data: Uint8Array): void {
    appendFileSync(path, data);
  }

  rename(from: string, to: string): void {
    renameSync(from, to);
  }

  mkdir(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  remove(path: string): void {
    rmSync(path, { force: true });
  }
}
