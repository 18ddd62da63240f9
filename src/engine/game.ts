import type { Cell, GameConfig, Pos } from "./types";
import { GameStatus, DEFAULT_CONFIG } from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  countNearbyMines,
  inBounds,
  neighbours,
  posKey,
} from "./board";
import { InvalidInputError } from "./errors";
import { gameConfigSchema, parseInput } from "./schema";

export class Game {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private firstClick = true;
  private minesPlaced = 0;
  private safeCellCount = 0;
  private openedCount = 0;

  constructor(config: Partial<GameConfig> = {}) {
    this.config = parseInput(gameConfigSchema, { ...DEFAULT_CONFIG, ...config }, "game config");
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.safeCellCount = this.rows * this.cols;

    if (!this.config.safeFirstClick) {
      this.initBoard([]);
    }
  }

  /** A game on a fixed layout, with no first-click relocation. */
  static withMines(rows: number, cols: number, mines: Pos[]): Game {
    const unique = new Map<string, Pos>();
    for (const m of mines) {
      if (!inBounds(m.row, m.col, rows, cols)) {
        throw new InvalidInputError(`Invalid mine: (${m.row},${m.col}) is outside the ${rows}x${cols} board.`);
      }
      unique.set(posKey(m), m);
    }
    const game = new Game({ rows, cols, minesTotal: unique.size, seed: 0, safeFirstClick: true });
    for (const m of unique.values()) {
      game.grid[m.row][m.col].mine = true;
    }
    game.finishLayout(unique.size);
    game.firstClick = false;
    return game;
  }

  // Lazily called on first click when safeFirstClick is on
  private initBoard(excludePositions: Pos[]): void {
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.finishLayout(placeMines(this.grid, this.config, excludePositions));
  }

  private finishLayout(placed: number): void {
    computeHints(this.grid);
    this.minesPlaced = placed;
    this.safeCellCount = this.rows * this.cols - placed;
  }

  cell(row: number, col: number): Cell {
    return this.grid[row][col];
  }

  get mineCount(): number {
    return this.minesPlaced;
  }

  isMine(row: number, col: number): boolean {
    return this.grid[row][col].mine;
  }

  nearbyMines(row: number, col: number): number {
    return countNearbyMines(this.grid, row, col);
  }

  /** Opens a cell; returns every cell the reveal opened (flood fill included). */
  open(row: number, col: number): Pos[] {
    if (this.status !== GameStatus.Playing) return [];
    if (!inBounds(row, col, this.rows, this.cols)) return [];

    if (this.firstClick && this.config.safeFirstClick) {
      const exclude = [
        { row, col },
        ...neighbours(row, col, this.rows, this.cols),
      ];
      this.initBoard(exclude);
    }
    this.firstClick = false;

    const cell = this.grid[row][col];
    if (cell.opened || cell.flagged) return [];

    cell.opened = true;
    const opened: Pos[] = [{ row, col }];

    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row, col };
      return opened;
    }
    this.openedCount++;

    if (cell.hint === 0) {
      const queue: Pos[] = neighbours(row, col, this.rows, this.cols);
      while (queue.length > 0) {
        const p = queue.pop();
        if (!p) break;
        const nc = this.grid[p.row][p.col];
        if (nc.opened || nc.flagged || nc.mine) continue;
        nc.opened = true;
        this.openedCount++;
        opened.push(p);
        if (nc.hint === 0) {
          queue.push(...neighbours(p.row, p.col, this.rows, this.cols));
        }
      }
    }

    this.checkWin();
    return opened;
  }

  /** Toggle a flag on a closed cell. */
  flag(row: number, col: number): void {
    if (this.status !== GameStatus.Playing) return;
    if (!inBounds(row, col, this.rows, this.cols)) return;
    const cell = this.grid[row][col];
    if (cell.opened) return;
    cell.flagged = !cell.flagged;
  }

  /** True when the flags sit exactly on the mines. */
  allMinesFlagged(): boolean {
    if (this.firstClick && this.config.safeFirstClick) return false;
    for (const row of this.grid) {
      for (const c of row) {
        if (c.mine !== c.flagged) return false;
      }
    }
    return true;
  }

  private checkWin(): void {
    if (this.openedCount === this.safeCellCount) {
      this.status = GameStatus.Won;
    }
  }

  // Where the mines are, one |X| or | | per cell
  render(): string {
    const rule = "--".repeat(this.cols) + "-";
    const lines: string[] = [];
    for (const row of this.grid) {
      lines.push(rule);
      lines.push(row.map((c) => (c.mine ? "|X" : "| ")).join("") + "|");
    }
    lines.push(rule);
    return lines.join("\n");
  }
}
