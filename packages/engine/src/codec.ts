import { z } from 'zod';
import { DIFFICULTIES, type Board, type Cell, type Coord, type GameState, type GameStatus, type Line } from './types.js';
import { LINES, countMarks, detectOutcome, nextPlayer } from './board.js';
import { MalformedStateError } from './errors.js';

const WireCell = z.enum(['X', 'O', '']);
const WireRow = z.tuple([WireCell, WireCell, WireCell]);
const WireCoord = z.tuple([z.number().int().min(0).max(2), z.number().int().min(0).max(2)]);

export const WireDifficulty = z.enum(DIFFICULTIES);

export const WireState = z.object({
  board: z.tuple([WireRow, WireRow, WireRow]),
  currentPlayer: z.enum(['X', 'O']),
  gameStatus: z.enum(['playing', 'won', 'draw']),
  winner: z.enum(['X', 'O']).nullish(),
  winningLine: z.tuple([WireCoord, WireCoord, WireCoord]).nullish(),
  difficulty: WireDifficulty,
});

export type WireState = z.infer<typeof WireState>;
type WireStatus = WireState['gameStatus'];

const STATUS_TO_WIRE: Record<GameStatus, WireStatus> = {
  in_progress: 'playing',
  won: 'won',
  draw: 'draw',
};

const STATUS_FROM_WIRE: Record<WireStatus, GameStatus> = {
  playing: 'in_progress',
  won: 'won',
  draw: 'draw',
};

function toWireRow(row: Cell[]): WireState['board'][number] {
  const [a, b, c] = row.map((cell) => cell ?? '');
  return [a, b, c];
}

function toWireCoord(coord: Coord): [number, number] {
  return [coord.r, coord.c];
}

export function encode(state: GameState): WireState {
  const [r0, r1, r2] = state.board;
  const line = state.winningLine;
  return {
    board: [toWireRow(r0), toWireRow(r1), toWireRow(r2)],
    currentPlayer: state.turn,
    gameStatus: STATUS_TO_WIRE[state.status],
    winner: state.winner,
    winningLine: line ? [toWireCoord(line[0]), toWireCoord(line[1]), toWireCoord(line[2])] : null,
    difficulty: state.difficulty,
  };
}

function sameLine(a: Line | null, b: Line | null): boolean {
  if (a === null || b === null) return a === b;
  return a.every((coord, i) => coord.r === b[i].r && coord.c === b[i].c);
}

function formatPath(path: (string | number)[]): string {
  return path.length ? path.join('.') : '(root)';
}

export function decode(input: unknown): GameState {
  const parsed = WireState.safeParse(input);
  if (!parsed.success) {
    throw new MalformedStateError(
      parsed.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`)
    );
  }
  const wire = parsed.data;

  const board: Board = wire.board.map((row) => row.map((cell) => (cell === '' ? null : cell)));
  const winningLine: Line | null = wire.winningLine
    ? [
        { r: wire.winningLine[0][0], c: wire.winningLine[0][1] },
        { r: wire.winningLine[1][0], c: wire.winningLine[1][1] },
        { r: wire.winningLine[2][0], c: wire.winningLine[2][1] },
      ]
    : null;
  const state: GameState = {
    board,
    turn: wire.currentPlayer,
    status: STATUS_FROM_WIRE[wire.gameStatus],
    winner: wire.winner ?? null,
    winningLine,
    difficulty: wire.difficulty,
  };

  const issues = checkInvariants(state);
  if (issues.length > 0) {
    throw new MalformedStateError(issues);
  }
  return state;
}

function checkInvariants(state: GameState): string[] {
  const issues: string[] = [];
  const counts = countMarks(state.board);
  const diff = counts.X - counts.O;

  if (diff !== 0 && diff !== 1) {
    issues.push(`mark counts X=${counts.X} O=${counts.O} are unbalanced`);
    return issues;
  }

  const expectedTurn = diff === 0 ? 'X' : 'O';
  if (state.turn !== expectedTurn) {
    issues.push(`currentPlayer should be ${expectedTurn}`);
  }

  const outcome = detectOutcome(state.board);
  if (outcome.status !== state.status) {
    issues.push(`gameStatus does not match the board`);
  } else if (outcome.winner !== state.winner) {
    issues.push(`winner does not match the board`);
  } else if (!sameLine(outcome.winningLine, state.winningLine)) {
    issues.push(`winningLine does not match the board`);
  }

  // The winner moved last, so their mark count is fixed by who won.
  if (outcome.status === 'won') {
    const expectedDiff = outcome.winner === 'X' ? 1 : 0;
    if (diff !== expectedDiff) {
      issues.push(`${outcome.winner} cannot have won with X=${counts.X} O=${counts.O}`);
    }
    // Play stops at the first win, so the loser never completes a line.
    const loser = nextPlayer(outcome.winner);
    if (LINES.some((line) => line.every(({ r, c }) => state.board[r][c] === loser))) {
      issues.push(`${loser} also has a complete line`);
    }
  }

  return issues;
}
