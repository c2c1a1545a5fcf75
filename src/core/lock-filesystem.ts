import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { isDirectory } from '../utils/fs.js';

/** File access used by the lock store. Errors from read/write/mkdir propagate unchanged. */
export interface LockFilesystem {
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  makeDirectories(path: string): Promise<void>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** False only when nothing is at `path`; any other access error is rethrown. */
async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export const nodeFilesystem: LockFilesystem = {
  exists,
  isDirectory,
  readFile: (path) => readFile(path, 'utf-8'),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  makeDirectories: async (path) => {
    await mkdir(path, { recursive: true });
  },
};
