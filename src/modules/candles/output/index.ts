/**
 * Artifact sink
 */

import type { Artifact } from '../types';
import { writeLongTable } from './csvWriter';
import { writeWorkbook } from './workbookWriter';

/**
 * Persist a non-empty artifact to path.
 *
 * @throws Error for an empty artifact; callers report "nothing to save" instead
 */
export async function writeArtifact(artifact: Artifact, path: string): Promise<void> {
  switch (artifact.kind) {
    case 'workbook':
      return writeWorkbook(artifact.sheets, path);
    case 'table':
      return writeLongTable(artifact.rows, path);
    case 'empty':
      throw new Error('Refusing to write an empty artifact');
  }
}

export { formatLongTable, writeLongTable, LONG_TABLE_COLUMNS } from './csvWriter';
export { buildWorkbook, writeWorkbook, toCellDate } from './workbookWriter';
