export type Player = 'X' | 'O';
export type Cell = Player | null;
export type Board = Cell[][];

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];
export type GameStatus = 'in_progress' | 'won' | 'draw';

export interface Coord {
  r: number;
  c: number;
}

export type Line = [Coord, Coord, Coord];

export interface GameState {
  board: Board;
  turn: Player;
  status: GameStatus;
  winner: Player | null;
  winningLine: Line | null;
  difficulty: Difficulty;
}

export type Outcome =
  | { status: 'in_progress'; winner: null; winningLine: null }
  | { status: 'won'; winner: Player; winningLine: Line }
  | { status: 'draw'; winner: null; winningLine: null };

export const HUMAN: Player = 'X';
export const COMPUTER: Player = 'O';
export const BOARD_SIZE = 3;
