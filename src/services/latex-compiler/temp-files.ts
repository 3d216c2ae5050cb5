import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Run `work` inside a fresh temporary directory that is removed afterwards,
 * whether `work` resolves or throws.
 */
export async function withTempDir<T>(
  prefix: string,
  work: (directory: string) => Promise<T>,
  root: string = tmpdir()
): Promise<T> {
  const directory = await mkdtemp(join(root, prefix));
  try {
    return await work(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
