/**
 * Write-then-rename helper so an interrupted run never leaves a partial file
 * at the final path.
 */

import { existsSync, mkdirSync, renameSync, rmSync } from 'fs';
import { dirname } from 'path';

export async function writeAtomically(
  path: string,
  write: (tmpPath: string) => Promise<void> | void
): Promise<void> {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = `${path}.tmp`;
  try {
    await write(tmpPath);
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
