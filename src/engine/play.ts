import type { Pos } from "./types";
import { GameStatus } from "./types";
import type { Game } from "./game";
import type { KnowledgeBase } from "./knowledge";
import { createRng } from "./rng";

export interface PlayOptions {
  rng?: () => number;
  maxMoves?: number;
  log?: (line: string) => void;
}

export interface PlayResult {
  status: GameStatus;
  moves: number;
  safeMoves: number;
  flagMoves: number;
  randomMoves: number;
}

function fmt(p: Pos): string {
  return `(${p.row},${p.col})`;
}

// Reveal and feed everything the reveal opened back into the knowledge base.
function reveal(game: Game, kb: KnowledgeBase, move: Pos): void {
  const opened = game.open(move.row, move.col);
  if (game.status === GameStatus.Lost) return;
  for (const p of opened) {
    kb.observe(p, game.cell(p.row, p.col).hint);
  }
}

/**
 * Plays `game` with `kb` until it is won, lost, or no move is left:
 * known-safe cells first, then flags on known mines, then a random guess.
 */
export function autoplay(game: Game, kb: KnowledgeBase, options: PlayOptions = {}): PlayResult {
  const rng = options.rng ?? createRng(game.config.seed);
  const maxMoves = options.maxMoves ?? game.rows * game.cols * 2;
  const log = options.log ?? (() => {});
  const result: PlayResult = {
    status: game.status,
    moves: 0,
    safeMoves: 0,
    flagMoves: 0,
    randomMoves: 0,
  };

  while (game.status === GameStatus.Playing && result.moves < maxMoves) {
    const safe = kb.safeMove();
    if (safe) {
      log(`safe move ${fmt(safe)}`);
      result.safeMoves++;
      result.moves++;
      reveal(game, kb, safe);
      continue;
    }

    const flag = kb.flagMove();
    if (flag) {
      log(`flag ${fmt(flag)}`);
      game.flag(flag.row, flag.col);
      result.flagMoves++;
      result.moves++;
      continue;
    }

    const guess = kb.randomMove(rng);
    if (!guess) {
      log("no moves left");
      break;
    }
    log(`random move ${fmt(guess)}`);
    kb.addMove(guess);
    result.randomMoves++;
    result.moves++;
    reveal(game, kb, guess);
  }

  if (game.status === GameStatus.Lost && game.explodedPos) {
    log(`hit a mine at ${fmt(game.explodedPos)}`);
  } else if (game.status === GameStatus.Won) {
    log("all safe cells opened");
  }
  result.status = game.status;
  return result;
}
