/**
 * Namespace normalization of the (possibly target-augmented) dataset.
 */

import { INPUTS_COLUMN_PREFIX, OUTPUTS_COLUMN_PREFIX } from '../mapping/column-mapping.js';
import type { Table } from '../table.js';

/**
 * Give every dataset column its provenance prefix.
 *
 * - `outputs.<c>` stays as it is when `c` was generated by the target (a target output that
 *   collided with a dataset column).
 * - A generated column `c` becomes `outputs.<c>`, unless `outputs.<c>` already exists: then `c`
 *   is the original input and becomes `inputs.<c>`.
 * - Everything else becomes `inputs.<c>`.
 */
export function renameColumnsConditionally(table: Table, generatedColumns: ReadonlySet<string>): Table {
  return table.renameWith((column) => {
    if (
      column.startsWith(OUTPUTS_COLUMN_PREFIX) &&
      generatedColumns.has(column.slice(OUTPUTS_COLUMN_PREFIX.length))
    ) {
      return column;
    }
    const outputsColumn = `${OUTPUTS_COLUMN_PREFIX}${column}`;
    if (generatedColumns.has(column) && !table.hasColumn(outputsColumn)) {
      return outputsColumn;
    }
    return `${INPUTS_COLUMN_PREFIX}${column}`;
  });
}
