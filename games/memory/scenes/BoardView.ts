/**
 * Text rendering of the memory board and HUD.
 *
 * Each cell is three characters wide: `[ ]` face-down, `[X]` face-up,
 * `(X)` matched, blank for the empty cell of an odd grid. Rows and
 * columns are numbered from 1, matching the `flip <row> <col>` command.
 */

import type { MemoryCard } from '../../../src/card-system/Card';
import { faceFor } from '../CardFaces';
import type { MemoryBoard } from '../MemoryBoard';

export function cellText(card: MemoryCard | undefined): string {
  if (!card) return '   ';
  if (card.isMatched) return `(${faceFor(card.typeId)})`;
  if (card.faceUp) return `[${faceFor(card.typeId)}]`;
  return '[ ]';
}

export function renderBoard(board: MemoryBoard): string[] {
  const { cols, rows } = board.gridSize;
  const lines: string[] = [];

  const header: string[] = [];
  for (let col = 0; col < cols; col++) header.push(` ${col + 1} `);
  lines.push(`   ${header.join(' ')}`.trimEnd());

  for (let row = 0; row < rows; row++) {
    const cells: string[] = [];
    for (let col = 0; col < cols; col++) {
      cells.push(cellText(board.cardAt(board.indexOf(row, col))));
    }
    lines.push(`${String(row + 1).padStart(2)} ${cells.join(' ')}`.trimEnd());
  }
  return lines;
}

export interface HudValues {
  readonly matchesFound: number;
  readonly turnsTaken: number;
}

export function renderHud(values: HudValues): string[] {
  return [`Matches: ${values.matchesFound}`, `Turns: ${values.turnsTaken}`];
}
