import type { Coord, Difficulty, GameState } from '../types.js';
import { legalMoves } from '../board.js';
import { InvalidMoveError } from '../errors.js';
import { easyMove, mediumMove } from './heuristics.js';
import { bestMove } from './minimax.js';
import { defaultRng, type Rng } from './random.js';

export interface StrategyContext {
  rng: Rng;
}

export type Strategy = (state: GameState, context: StrategyContext) => Coord;

function hardMove(state: GameState): Coord {
  const move = bestMove(state, state.turn);
  if (!move) {
    throw new InvalidMoveError('No legal moves available');
  }
  return move;
}

export const STRATEGIES: Record<Difficulty, Strategy> = {
  easy: (state, { rng }) => easyMove(state, rng),
  medium: (state) => mediumMove(state),
  hard: (state) => hardMove(state),
};

export interface ChooseMoveOptions {
  rng?: Rng;
}

/** Picks a move for `state.turn` according to `state.difficulty`. */
export function chooseMove(state: GameState, options: ChooseMoveOptions = {}): Coord {
  if (legalMoves(state).length === 0) {
    throw new InvalidMoveError('No legal moves available');
  }
  const strategy = STRATEGIES[state.difficulty];
  return strategy(state, { rng: options.rng ?? defaultRng });
}
