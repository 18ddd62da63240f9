import type { ConstraintView, Pos } from "./types";
import { allPositions, neighbours, posKey, sortPositions } from "./board";
import { Constraint } from "./constraint";
import { ContradictionError, InvalidInputError } from "./errors";
import {
  boardSizeSchema,
  constraintCountSchema,
  mineCountSchema,
  parseInput,
  posSchema,
  rngValueSchema,
} from "./schema";

/**
 * Everything the player has learned about one board: the cells it has
 * played, the cells proven to be mines or safe, and the constraints that
 * are not fully resolved yet.
 *
 * `observe` runs inference to a fixed point before returning, so the
 * selectors below only ever see saturated knowledge.
 */
export class KnowledgeBase {
  readonly rows: number;
  readonly cols: number;
  private readonly moves = new Map<string, Pos>();
  private readonly mines = new Map<string, Pos>();
  private readonly safes = new Map<string, Pos>();
  // count reported for each observed cell
  private readonly observed = new Map<string, number>();
  private knowledge: Constraint[] = [];

  constructor(rows: number, cols: number) {
    const size = parseInput(boardSizeSchema, { rows, cols }, "board size");
    this.rows = size.rows;
    this.cols = size.cols;
  }

  // ─── Facts ─────────────────────────────────────────────────────────────

  /** Record `cell` as a mine and propagate. */
  markMine(cell: Pos): void {
    const pos = this.checkPos(cell);
    this.atomically(() => {
      this.recordMine(pos);
      this.saturate();
    });
  }

  /** Record `cell` as safe and propagate. */
  markSafe(cell: Pos): void {
    const pos = this.checkPos(cell);
    this.atomically(() => {
      this.recordSafe(pos);
      this.saturate();
    });
  }

  private recordMine(cell: Pos): void {
    const key = posKey(cell);
    if (this.safes.has(key)) {
      throw new ContradictionError(`(${cell.row},${cell.col}) is already known to be safe.`);
    }
    this.mines.set(key, { row: cell.row, col: cell.col });
    for (const constraint of this.knowledge) {
      constraint.markMine(cell);
    }
  }

  private recordSafe(cell: Pos): void {
    const key = posKey(cell);
    if (this.mines.has(key)) {
      throw new ContradictionError(`(${cell.row},${cell.col}) is already known to be a mine.`);
    }
    this.safes.set(key, { row: cell.row, col: cell.col });
    for (const constraint of this.knowledge) {
      constraint.markSafe(cell);
    }
  }

  // ─── Inference ─────────────────────────────────────────────────────────

  /**
   * The board revealed `cell` as safe with `count` mines around it.
   * Repeating an observation is a no-op; contradicting one throws.
   */
  observe(cell: Pos, count: number): void {
    const pos = this.checkPos(cell);
    const mineCount = parseInput(mineCountSchema, count, "mine count");
    const key = posKey(pos);

    const previous = this.observed.get(key);
    if (previous !== undefined) {
      if (previous === mineCount) return;
      throw new ContradictionError(
        `(${pos.row},${pos.col}) was observed with ${previous} mine(s), now ${mineCount}.`,
      );
    }

    const around = neighbours(pos.row, pos.col, this.rows, this.cols);
    if (mineCount > around.length) {
      throw new ContradictionError(
        `(${pos.row},${pos.col}) has ${around.length} neighbour(s) but reports ${mineCount} mine(s).`,
      );
    }
    const unknown: Pos[] = [];
    let remaining = mineCount;
    for (const n of around) {
      const nk = posKey(n);
      if (this.mines.has(nk)) remaining--;
      else if (!this.safes.has(nk)) unknown.push(n);
    }
    const constraint = new Constraint(unknown, remaining);

    this.atomically(() => {
      this.recordSafe(pos);
      this.moves.set(key, pos);
      this.observed.set(key, mineCount);
      this.add(constraint);
      this.saturate();
    });
  }

  /**
   * Add "exactly `count` of `cells` are mines" from outside an observation.
   * Cells already resolved are taken out first.
   */
  addConstraint(cells: Iterable<Pos>, count: number): void {
    const positions = new Map<string, Pos>();
    for (const c of cells) {
      const pos = this.checkPos(c);
      positions.set(posKey(pos), pos);
    }
    let remaining = parseInput(constraintCountSchema, count, "mine count");
    const unknown: Pos[] = [];
    for (const [key, p] of positions) {
      if (this.mines.has(key)) remaining--;
      else if (!this.safes.has(key)) unknown.push(p);
    }
    const constraint = new Constraint(unknown, remaining);
    this.atomically(() => {
      this.add(constraint);
      this.saturate();
    });
  }

  // A contradiction found part-way through leaves the store as it was.
  private atomically(update: () => void): void {
    const before = this.clone();
    try {
      update();
    } catch (err) {
      this.restore(before);
      throw err;
    }
  }

  private restore(from: KnowledgeBase): void {
    this.moves.clear();
    this.mines.clear();
    this.safes.clear();
    this.observed.clear();
    for (const [key, p] of from.moves) this.moves.set(key, p);
    for (const [key, p] of from.mines) this.mines.set(key, p);
    for (const [key, p] of from.safes) this.safes.set(key, p);
    for (const [key, n] of from.observed) this.observed.set(key, n);
    this.knowledge = from.knowledge;
  }

  private add(constraint: Constraint): void {
    if (constraint.isEmpty) return;
    const key = constraint.key;
    if (this.knowledge.some((c) => c.key === key)) return;
    this.knowledge.push(constraint);
  }

  // Repeat until a full pass neither resolves a cell nor adds a constraint.
  private saturate(): void {
    let changed = true;
    while (changed) {
      changed = false;

      const newMines = new Map<string, Pos>();
      const newSafes = new Map<string, Pos>();
      for (const constraint of this.knowledge) {
        for (const p of constraint.knownMines()) newMines.set(posKey(p), p);
        for (const p of constraint.knownSafes()) newSafes.set(posKey(p), p);
      }

      for (const [key, p] of newMines) {
        if (this.mines.has(key)) continue;
        this.recordMine(p);
        changed = true;
      }
      for (const [key, p] of newSafes) {
        if (this.safes.has(key)) continue;
        this.recordSafe(p);
        changed = true;
      }

      this.compact();

      if (this.deriveBySubsumption()) changed = true;
    }
  }

  // Drop constraints that say nothing and collapse the ones resolution made equal.
  private compact(): void {
    const seen = new Set<string>();
    this.knowledge = this.knowledge.filter((c) => {
      if (c.isEmpty) return false;
      const key = c.key;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  // If A ⊆ B then B − A holds B.count − A.count mines.
  private deriveBySubsumption(): boolean {
    const keys = new Set(this.knowledge.map((c) => c.key));
    const derived: Constraint[] = [];

    for (const a of this.knowledge) {
      if (a.isEmpty) continue;
      for (const b of this.knowledge) {
        if (a === b || !a.isSubsetOf(b)) continue;
        const inferred = a.subtractFrom(b);
        const key = inferred.key;
        if (inferred.isEmpty || keys.has(key)) continue;
        keys.add(key);
        derived.push(inferred);
      }
    }

    for (const constraint of derived) {
      this.knowledge.push(constraint);
    }
    return derived.length > 0;
  }

  // ─── Move selection ────────────────────────────────────────────────────

  /** A known-safe cell not yet played, committed as played. Row-major first. */
  safeMove(): Pos | null {
    return this.commitFirst(this.safes);
  }

  /** A known mine not yet flagged, committed as played. Row-major first. */
  flagMove(): Pos | null {
    return this.commitFirst(this.mines);
  }

  /**
   * A cell chosen uniformly among those neither played nor known to be
   * mines. Not committed: the reveal that follows is observed instead.
   */
  randomMove(rng: () => number = Math.random): Pos | null {
    const candidates = allPositions(this.rows, this.cols).filter((p) => {
      const key = posKey(p);
      return !this.moves.has(key) && !this.mines.has(key);
    });
    if (candidates.length === 0) return null;
    const roll = parseInput(rngValueSchema, rng(), "rng value");
    return candidates[Math.floor(roll * candidates.length)];
  }

  /** Record a move made without going through a selector. */
  addMove(cell: Pos): void {
    const pos = this.checkPos(cell);
    this.moves.set(posKey(pos), pos);
  }

  private commitFirst(pool: Map<string, Pos>): Pos | null {
    const choice = sortPositions(pool.values()).find((p) => !this.moves.has(posKey(p)));
    if (!choice) return null;
    this.moves.set(posKey(choice), choice);
    return { row: choice.row, col: choice.col };
  }

  // ─── Views ─────────────────────────────────────────────────────────────

  knownMines(): Pos[] {
    return sortPositions(this.mines.values());
  }

  knownSafes(): Pos[] {
    return sortPositions(this.safes.values());
  }

  movesMade(): Pos[] {
    return sortPositions(this.moves.values());
  }

  constraints(): ConstraintView[] {
    return this.knowledge.map((c) => c.toJSON());
  }

  isMine(cell: Pos): boolean {
    return this.mines.has(posKey(cell));
  }

  isSafe(cell: Pos): boolean {
    return this.safes.has(posKey(cell));
  }

  hasMoved(cell: Pos): boolean {
    return this.moves.has(posKey(cell));
  }

  /** Independent deep copy, for exploring hypothetical futures. */
  clone(): KnowledgeBase {
    const copy = new KnowledgeBase(this.rows, this.cols);
    for (const [key, p] of this.moves) copy.moves.set(key, { ...p });
    for (const [key, p] of this.mines) copy.mines.set(key, { ...p });
    for (const [key, p] of this.safes) copy.safes.set(key, { ...p });
    for (const [key, n] of this.observed) copy.observed.set(key, n);
    copy.knowledge = this.knowledge.map((c) => c.clone());
    return copy;
  }

  toString(): string {
    return this.knowledge.map((c) => c.toString()).join("\n");
  }

  private checkPos(cell: Pos): Pos {
    const pos = parseInput(posSchema, cell, "position");
    if (pos.row < 0 || pos.row >= this.rows || pos.col < 0 || pos.col >= this.cols) {
      throw new InvalidInputError(
        `Invalid position: (${pos.row},${pos.col}) is outside the ${this.rows}x${this.cols} board.`,
      );
    }
    return { row: pos.row, col: pos.col };
  }
}
