export * from './types.js';
export * from './errors.js';
export {
  LINES,
  applyMove,
  legalMoves,
  detectOutcome,
  createBoard,
  cloneBoard,
  emptyCells,
  countMarks,
  nextPlayer,
  inBounds,
} from './board.js';
export { newGame, resetGame, move, aiMove, playTurn, describeState } from './game.js';
export type { AiMoveResult, TurnResult } from './game.js';
export { encode, decode, WireState, WireDifficulty } from './codec.js';
export { chooseMove, STRATEGIES } from './ai/strategy.js';
export type { ChooseMoveOptions, Strategy, StrategyContext } from './ai/strategy.js';
export { minimax, alphaBeta, bestMove } from './ai/minimax.js';
export type { SearchResult } from './ai/minimax.js';
export { easyMove, mediumMove, findWinningMove, findBlockingMove } from './ai/heuristics.js';
export { createRng, defaultRng, randomChoice } from './ai/random.js';
export type { Rng } from './ai/random.js';
