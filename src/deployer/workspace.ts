import { Injectable } from '@nestjs/common';
import { mkdir, stat } from 'node:fs/promises';

export interface Workspace {
  /** true when `path` exists and is a directory */
  exists(path: string): Promise<boolean>;
  /** Creates `path` and any missing parents. */
  ensureDir(path: string): Promise<void>;
}

@Injectable()
export class WorkspaceService implements Workspace {
  async exists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
