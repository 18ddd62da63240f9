export { KnowledgeBase } from "./knowledge";
export { Constraint } from "./constraint";
export { Game } from "./game";
export { autoplay } from "./play";
export type { PlayOptions, PlayResult } from "./play";
export {
  allPositions,
  comparePos,
  computeHints,
  countNearbyMines,
  createEmptyGrid,
  inBounds,
  neighbours,
  placeMines,
  posKey,
  sortPositions,
} from "./board";
export { createRng, shuffle } from "./rng";
export { KnowledgeError, ContradictionError, InvalidInputError } from "./errors";
export {
  boardSizeSchema,
  constraintCountSchema,
  gameConfigSchema,
  mineCountSchema,
  posSchema,
  rngValueSchema,
  MAX_NEIGHBOUR_MINES,
} from "./schema";
export type {
  Cell,
  ConstraintView,
  GameConfig,
  Pos,
} from "./types";
export { GameStatus, DEFAULT_CONFIG } from "./types";
