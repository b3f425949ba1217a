import type { Board, Cell, Coord, GameState, Line, Outcome, Player } from './types.js';
import { BOARD_SIZE } from './types.js';
import { InvalidMoveError } from './errors.js';

// Scan order decides which line is reported; keep rows, columns, then diagonals.
export const LINES: readonly Line[] = [
  [{ r: 0, c: 0 }, { r: 0, c: 1 }, { r: 0, c: 2 }],
  [{ r: 1, c: 0 }, { r: 1, c: 1 }, { r: 1, c: 2 }],
  [{ r: 2, c: 0 }, { r: 2, c: 1 }, { r: 2, c: 2 }],
  [{ r: 0, c: 0 }, { r: 1, c: 0 }, { r: 2, c: 0 }],
  [{ r: 0, c: 1 }, { r: 1, c: 1 }, { r: 2, c: 1 }],
  [{ r: 0, c: 2 }, { r: 1, c: 2 }, { r: 2, c: 2 }],
  [{ r: 0, c: 0 }, { r: 1, c: 1 }, { r: 2, c: 2 }],
  [{ r: 0, c: 2 }, { r: 1, c: 1 }, { r: 2, c: 0 }],
];

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

export function cloneBoard(b: Board): Board {
  return b.map((row) => row.slice());
}

export function place(b: Board, r: number, c: number, p: Player): Board {
  const nb = cloneBoard(b);
  nb[r][c] = p;
  return nb;
}

export function inBounds(r: number, c: number): boolean {
  return (
    Number.isInteger(r) &&
    Number.isInteger(c) &&
    r >= 0 &&
    c >= 0 &&
    r < BOARD_SIZE &&
    c < BOARD_SIZE
  );
}

export function emptyCells(board: Board): Coord[] {
  const out: Coord[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (board[r][c] === null) out.push({ r, c });
    }
  }
  return out;
}

export function countMarks(board: Board): Record<Player, number> {
  const counts: Record<Player, number> = { X: 0, O: 0 };
  for (const row of board) {
    for (const cell of row) {
      if (cell !== null) counts[cell]++;
    }
  }
  return counts;
}

export function nextPlayer(p: Player): Player {
  return p === 'X' ? 'O' : 'X';
}

function copyLine(line: Line): Line {
  const [a, b, c] = line;
  return [{ ...a }, { ...b }, { ...c }];
}

export function detectOutcome(board: Board): Outcome {
  for (const line of LINES) {
    const [a, b, c] = line;
    const mark = board[a.r][a.c];
    if (mark !== null && board[b.r][b.c] === mark && board[c.r][c.c] === mark) {
      return { status: 'won', winner: mark, winningLine: copyLine(line) };
    }
  }
  if (emptyCells(board).length === 0) {
    return { status: 'draw', winner: null, winningLine: null };
  }
  return { status: 'in_progress', winner: null, winningLine: null };
}

export function legalMoves(state: GameState): Coord[] {
  if (state.status !== 'in_progress') return [];
  return emptyCells(state.board);
}

export function applyMove(state: GameState, r: number, c: number, mark: Player): GameState {
  if (state.status !== 'in_progress') {
    throw new InvalidMoveError(`Game is ${state.status === 'won' ? 'already won' : 'a draw'}`);
  }
  if (!inBounds(r, c)) {
    throw new InvalidMoveError(`Cell (${r}, ${c}) is outside the board`);
  }
  if (state.board[r][c] !== null) {
    throw new InvalidMoveError(`Cell (${r}, ${c}) is already taken`);
  }
  if (mark !== state.turn) {
    throw new InvalidMoveError(`It is ${state.turn}'s turn, not ${mark}'s`);
  }

  const board = place(state.board, r, c, mark);
  const outcome = detectOutcome(board);
  return {
    ...state,
    board,
    turn: nextPlayer(mark),
    status: outcome.status,
    winner: outcome.winner,
    winningLine: outcome.winningLine,
  };
}
