import type { CrossTab, CrossTabCell, CrossTabDimension, FailureEvent } from '@flakelens/shared';

import { CROSS_TAB_ACCESSORS } from './dimensions.js';

/**
 * Dense contingency matrix over the values that actually occur in `events`.
 * Rates are row-normalized, absent pairs are explicit zeros.
 */
export function buildCrossTab(
  events: readonly FailureEvent[],
  rowDimension: CrossTabDimension,
  columnDimension: CrossTabDimension
): CrossTab {
  const rowOf = CROSS_TAB_ACCESSORS[rowDimension];
  const columnOf = CROSS_TAB_ACCESSORS[columnDimension];

  const rows = [...new Set(events.map(rowOf))].sort();
  const columns = [...new Set(events.map(columnOf))].sort();
  const rowIndex = new Map(rows.map((value, i) => [value, i]));
  const columnIndex = new Map(columns.map((value, i) => [value, i]));

  const counts = rows.map(() => new Array<number>(columns.length).fill(0));
  for (const event of events) {
    const r = rowIndex.get(rowOf(event));
    const c = columnIndex.get(columnOf(event));
    const row = r === undefined ? undefined : counts[r];
    if (row && c !== undefined) {
      row[c] = (row[c] ?? 0) + 1;
    }
  }

  const rowTotals = counts.map((row) => row.reduce((sum, count) => sum + count, 0));
  const cells = counts.map((row, r) => {
    const total = rowTotals[r] ?? 0;
    return Object.freeze(
      row.map((count): CrossTabCell => ({ count, rate: total === 0 ? 0 : count / total }))
    );
  });

  return Object.freeze({
    rowDimension,
    columnDimension,
    rows: Object.freeze(rows),
    columns: Object.freeze(columns),
    cells: Object.freeze(cells),
    rowTotals: Object.freeze(rowTotals),
  });
}

/** Count and rate for one pair, zero when either value does not occur */
export function crossTabCell(crossTab: CrossTab, row: string, column: string): CrossTabCell {
  const r = crossTab.rows.indexOf(row);
  const c = crossTab.columns.indexOf(column);
  return crossTab.cells[r]?.[c] ?? { count: 0, rate: 0 };
}
