import type { Coord, GameState, Player } from '../types.js';
import { detectOutcome, emptyCells, legalMoves, nextPlayer, place } from '../board.js';
import { randomChoice, type Rng } from './random.js';

const BLOCK_CHANCE = 0.2;
const CENTER: Coord = { r: 1, c: 1 };
const CORNERS: readonly Coord[] = [
  { r: 0, c: 0 },
  { r: 0, c: 2 },
  { r: 2, c: 0 },
  { r: 2, c: 2 },
];

/** First empty cell (row-major) that completes a line for `player`. */
export function findWinningMove(state: GameState, player: Player): Coord | null {
  for (const cell of emptyCells(state.board)) {
    const outcome = detectOutcome(place(state.board, cell.r, cell.c, player));
    if (outcome.status === 'won' && outcome.winner === player) {
      return cell;
    }
  }
  return null;
}

export function findBlockingMove(state: GameState, player: Player): Coord | null {
  return findWinningMove(state, nextPlayer(player));
}

function isEmpty(state: GameState, cell: Coord): boolean {
  return state.board[cell.r][cell.c] === null;
}

// Mostly random; one time in five it stops an immediate threat if there is one.
export function easyMove(state: GameState, rng: Rng): Coord {
  const moves = legalMoves(state);
  if (rng() < BLOCK_CHANCE) {
    const block = findBlockingMove(state, state.turn);
    if (block) {
      return block;
    }
  }
  return randomChoice(moves, rng);
}

export function mediumMove(state: GameState): Coord {
  const player = state.turn;

  const win = findWinningMove(state, player);
  if (win) return win;

  const block = findBlockingMove(state, player);
  if (block) return block;

  if (isEmpty(state, CENTER)) return { ...CENTER };

  const corner = CORNERS.find((cell) => isEmpty(state, cell));
  if (corner) return { ...corner };

  const [first] = legalMoves(state);
  return first;
}
