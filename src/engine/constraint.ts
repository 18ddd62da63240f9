import type { ConstraintView, Pos } from "./types";
import { comparePos, posKey } from "./board";
import { ContradictionError } from "./errors";

/**
 * "Exactly `count` of `cells` are mines."
 *
 * Cells are removed as they become known elsewhere, so a constraint only ever
 * talks about unresolved cells. Once `cells` is empty it says nothing.
 */
export class Constraint {
  private readonly members = new Map<string, Pos>();
  private _count: number;

  constructor(cells: Iterable<Pos>, count: number) {
    for (const p of cells) {
      this.members.set(posKey(p), { row: p.row, col: p.col });
    }
    this._count = count;
    if (count < 0 || count > this.members.size) {
      throw new ContradictionError(
        `Cannot place ${count} mine(s) among ${this.members.size} cell(s).`,
      );
    }
  }

  get count(): number {
    return this._count;
  }

  get size(): number {
    return this.members.size;
  }

  get isEmpty(): boolean {
    return this.members.size === 0;
  }

  /** Cells in row-major order. */
  get cells(): Pos[] {
    return Array.from(this.members.values(), (p) => ({ row: p.row, col: p.col })).sort(comparePos);
  }

  /** Canonical identity: two constraints are equal iff their keys are. */
  get key(): string {
    const cells = this.cells.map((p) => posKey(p)).join(";");
    return `${cells}=${this._count}`;
  }

  has(cell: Pos): boolean {
    return this.members.has(posKey(cell));
  }

  knownMines(): Pos[] {
    return this.members.size === this._count ? this.cells : [];
  }

  knownSafes(): Pos[] {
    return this._count === 0 ? this.cells : [];
  }

  markMine(cell: Pos): void {
    const key = posKey(cell);
    if (!this.members.has(key)) return;
    if (this._count === 0) {
      throw new ContradictionError(
        `(${cell.row},${cell.col}) is a mine but ${this.toString()} allows none.`,
      );
    }
    this.members.delete(key);
    this._count--;
  }

  markSafe(cell: Pos): void {
    const key = posKey(cell);
    if (!this.members.has(key)) return;
    if (this._count === this.members.size) {
      throw new ContradictionError(
        `(${cell.row},${cell.col}) is safe but ${this.toString()} needs every cell to be a mine.`,
      );
    }
    this.members.delete(key);
  }

  isSubsetOf(other: Constraint): boolean {
    if (this.members.size > other.members.size) return false;
    for (const key of this.members.keys()) {
      if (!other.members.has(key)) return false;
    }
    return true;
  }

  /**
   * The constraint left on `superset` once this one is taken out of it.
   * Only meaningful when this is a subset of `superset`.
   */
  subtractFrom(superset: Constraint): Constraint {
    const rest: Pos[] = [];
    for (const [key, p] of superset.members) {
      if (!this.members.has(key)) rest.push(p);
    }
    return new Constraint(rest, superset._count - this._count);
  }

  equals(other: Constraint): boolean {
    return this._count === other._count && this.members.size === other.members.size && this.isSubsetOf(other);
  }

  clone(): Constraint {
    return new Constraint(this.members.values(), this._count);
  }

  toJSON(): ConstraintView {
    return { cells: this.cells, count: this._count };
  }

  toString(): string {
    const cells = this.cells.map((p) => `(${p.row},${p.col})`).join(", ");
    return `{${cells}} = ${this._count}`;
  }
}
