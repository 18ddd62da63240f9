export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
  // keep the first opened cell and its neighbours clear of mines
  safeFirstClick: boolean;
}

export interface Cell {
  mine: boolean;
  opened: boolean;
  flagged: boolean;
  hint: number; // mines among the neighbours
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface Pos {
  row: number;
  col: number;
}

/** Read-only view of a constraint: exactly `count` of `cells` are mines. */
export interface ConstraintView {
  cells: Pos[];
  count: number;
}

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
  safeFirstClick: true,
};
