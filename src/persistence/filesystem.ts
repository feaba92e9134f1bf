/**
 * File-system port.
 *
 * Synchronous on purpose: the session runs on a single loop and treats
 * every write as part of the step that triggered it. Implementations throw
 * on failure; callers wrap failures into `io_error` results.
 */

export interface FileSystem {
  exists(path: string): boolean;

  /** Whole file as bytes */
  readFile(path: string): Uint8Array;

  /** Create or overwrite */
  writeFile(path: string, data: Uint8Array): void;

  /** Create if missing, then append */
  appendFile(path: string, data: Uint8Array): void;

  /** Replace `to` with `from` in one step */
  rename(from: string, to: string): void;

  /** Create a directory and any missing parents */
  mkdir(path: string): void;

  remove(path: string): void;
}
