/**
 * Board and transition engine
 */

export {
  Board,
  MAX_EXPONENT,
  SPAWN_FOUR_PROBABILITY,
  type BoardInit,
  type SpawnedTile,
} from './board.js';

export {
  MOVES,
  MOVE_LABELS,
  type Move,
  parseMove,
  randomMove,
  slidesTowardStart,
  isVertical,
} from './moves.js';

export {
  BOARD_SIZE,
  CELL_COUNT,
  ROW_LINES,
  COLUMN_LINES,
  type MergedLine,
  condenseLine,
  mergeLine,
  padLine,
  hasAdjacentPair,
} from './lines.js';
