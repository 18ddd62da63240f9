import type { Cell, GameConfig, Pos } from "./types";
import { createRng, shuffle } from "./rng";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

// Row-major order
export function comparePos(a: Pos, b: Pos): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

export function sortPositions(positions: Iterable<Pos>): Pos[] {
  return Array.from(positions, (p) => ({ row: p.row, col: p.col })).sort(comparePos);
}

export function inBounds(row: number, col: number, rows: number, cols: number): boolean {
  return row >= 0 && row < rows && col >= 0 && col < cols;
}

/** Cells within Chebyshev distance 1, clipped to the board, in row-major order. */
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (inBounds(r, c, rows, cols)) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function allPositions(rows: number, cols: number): Pos[] {
  const out: Pos[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      out.push({ row: r, col: c });
    }
  }
  return out;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, opened: false, flagged: false, hint: 0 });
    }
    grid.push(row);
  }
  return grid;
}

// Mines land on a seeded shuffle of every cell not in `excludePositions`.
// Returns the number actually placed.
export function placeMines(
  grid: Cell[][],
  config: GameConfig,
  excludePositions: Pos[] = [],
): number {
  const { rows, cols, minesTotal, seed } = config;
  const excludeSet = new Set(excludePositions.map((p) => posKey(p)));
  const eligible = allPositions(rows, cols).filter((p) => !excludeSet.has(posKey(p)));

  if (eligible.length < minesTotal) {
    console.warn(
      `Only ${eligible.length} cells are free for ${minesTotal} mines; placing ${eligible.length}.`,
    );
  }

  const chosen = shuffle(eligible, createRng(seed)).slice(0, minesTotal);
  for (const p of chosen) {
    grid[p.row][p.col].mine = true;
  }
  return chosen.length;
}

export function countNearbyMines(grid: Cell[][], row: number, col: number): number {
  const rows = grid.length;
  const cols = rows > 0 ? grid[0].length : 0;
  let count = 0;
  for (const n of neighbours(row, col, rows, cols)) {
    if (grid[n.row][n.col].mine) count++;
  }
  return count;
}

// hint = mines among the neighbours
export function computeHints(grid: Cell[][]): void {
  for (let r = 0; r < grid.length; r++) {
    for (let c = 0; c < grid[r].length; c++) {
      grid[r][c].hint = countNearbyMines(grid, r, c);
    }
  }
}
