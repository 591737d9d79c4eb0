/**
 * Scoped temporary workspace for a single render.
 *
 * The directory exists only for the duration of the callback and is removed
 * recursively on every exit path, including a throw from the callback.
 */

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { errorContext, logger } from '../logger';

const WORKSPACE_PREFIX = 'cert-render-';

export interface TempWorkspaceOptions {
  /** Parent directory. Default: the OS temp dir. */
  root?: string;
}

export async function withTempWorkspace<T>(
  fn: (dir: string) => Promise<T>,
  options: TempWorkspaceOptions = {},
): Promise<T> {
  const root = options.root ?? os.tmpdir();
  const dir = await mkdtemp(path.join(root, WORKSPACE_PREFIX));
  try {
    return await fn(dir);
  } finally {
    await removeWorkspace(dir);
  }
}

async function removeWorkspace(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err) {
    // A leftover directory must not mask the render's own outcome.
    logger.error('Failed to remove render workspace', { dir, ...errorContext(err) });
  }
}
