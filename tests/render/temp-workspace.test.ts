import { existsSync } from 'fs';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { withTempWorkspace } from '../../src/render/temp-workspace';

describe('withTempWorkspace', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'workspace-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('removes the directory and its files after the callback', async () => {
    let seen = '';
    const result = await withTempWorkspace(
      async (dir) => {
        seen = dir;
        await writeFile(path.join(dir, 'page.png'), 'x');
        return 'done';
      },
      { root },
    );

    expect(result).toBe('done');
    expect(path.dirname(seen)).toBe(root);
    expect(path.basename(seen).startsWith('cert-render-')).toBe(true);
    expect(existsSync(seen)).toBe(false);
  });

  it('removes the directory when the callback throws', async () => {
    let seen = '';
    await expect(
      withTempWorkspace(
        async (dir) => {
          seen = dir;
          await writeFile(path.join(dir, 'page.png'), 'x');
          throw new Error('render failed');
        },
        { root },
      ),
    ).rejects.toThrow('render failed');

    expect(existsSync(seen)).toBe(false);
    expect(await readdir(root)).toEqual([]);
  });

  it('gives concurrent renders separate directories', async () => {
    const dirs = await Promise.all([
      withTempWorkspace(async (dir) => dir, { root }),
      withTempWorkspace(async (dir) => dir, { root }),
    ]);
    expect(dirs[0]).not.toBe(dirs[1]);
  });
});
