/**
 * Board sizes offered on the new-game panel.
 */

import type { GridSize } from './MemoryBoard';

export interface BoardSizeOption {
  readonly size: GridSize;
  /** Button label, e.g. `"4 x 3"`. */
  readonly label: string;
}

export const MIN_COLUMNS = 2;
export const MAX_COLUMNS = 5;
export const MIN_ROWS = 2;
export const MAX_ROWS = 6;

/**
 * Every board of 2-5 columns by 2-6 rows whose cell count is even,
 * ordered by columns then rows.
 */
export function boardSizeOptions(): BoardSizeOption[] {
  const options: BoardSizeOption[] = [];
  for (let cols = MIN_COLUMNS; cols <= MAX_COLUMNS; cols++) {
    for (let rows = MIN_ROWS; rows <= MAX_ROWS; rows++) {
      if ((cols * rows) % 2 !== 0) continue;
      options.push({ size: { cols, rows }, label: `${cols} x ${rows}` });
    }
  }
  return options;
}
