import type { Board, Difficulty, GameState } from '../types.js';
import { countMarks, detectOutcome, legalMoves, applyMove } from '../board.js';

/** Builds a consistent state from rows such as `'X O'`; spaces are empty cells. */
export function stateFrom(rows: string[], difficulty: Difficulty = 'medium'): GameState {
  const board: Board = rows.map((row) =>
    row.split('').map((ch) => (ch === 'X' ? 'X' : ch === 'O' ? 'O' : null))
  );
  const counts = countMarks(board);
  const outcome = detectOutcome(board);
  return {
    board,
    turn: counts.X === counts.O ? 'X' : 'O',
    status: outcome.status,
    winner: outcome.winner,
    winningLine: outcome.winningLine,
    difficulty,
  };
}

function keyOf(state: GameState): string {
  return state.board.map((row) => row.map((cell) => cell ?? '.').join('')).join('/');
}

/** Every distinct position reachable from `root` by legal play, root included. */
export function reachableStates(root: GameState): GameState[] {
  const seen = new Map<string, GameState>();
  const stack: GameState[] = [root];
  while (stack.length > 0) {
    const state = stack.pop();
    if (!state) break;
    const key = keyOf(state);
    if (seen.has(key)) continue;
    seen.set(key, state);
    for (const move of legalMoves(state)) {
      stack.push(applyMove(state, move.r, move.c, state.turn));
    }
  }
  return [...seen.values()];
}
