import type { Coord, Difficulty, GameState } from './types.js';
import { COMPUTER, HUMAN } from './types.js';
import { applyMove, createBoard } from './board.js';
import { NotAITurnError } from './errors.js';
import { chooseMove, type ChooseMoveOptions } from './ai/strategy.js';

export interface AiMoveResult {
  state: GameState;
  move: Coord;
}

export interface TurnResult {
  state: GameState;
  /** The computer's reply, or null when the human move ended the game. */
  aiMove: Coord | null;
}

export function newGame(difficulty: Difficulty = 'medium'): GameState {
  return {
    board: createBoard(),
    turn: HUMAN,
    status: 'in_progress',
    winner: null,
    winningLine: null,
    difficulty,
  };
}

export function resetGame(state: GameState, difficulty?: Difficulty): GameState {
  return newGame(difficulty ?? state.difficulty);
}

export function move(state: GameState, r: number, c: number): GameState {
  return applyMove(state, r, c, HUMAN);
}

export function aiMove(state: GameState, options: ChooseMoveOptions = {}): AiMoveResult {
  if (state.status !== 'in_progress') {
    throw new NotAITurnError('The game is over');
  }
  if (state.turn !== COMPUTER) {
    throw new NotAITurnError();
  }
  const choice = chooseMove(state, options);
  return { state: applyMove(state, choice.r, choice.c, COMPUTER), move: choice };
}

/** Human move followed by the computer's reply while the game is still open. */
export function playTurn(
  state: GameState,
  r: number,
  c: number,
  options: ChooseMoveOptions = {}
): TurnResult {
  const afterHuman = move(state, r, c);
  if (afterHuman.status !== 'in_progress') {
    return { state: afterHuman, aiMove: null };
  }
  const reply = aiMove(afterHuman, options);
  return { state: reply.state, aiMove: reply.move };
}

export function describeState(state: GameState): string {
  switch (state.status) {
    case 'won':
      return state.winner === HUMAN ? 'You won! Congratulations!' : 'Computer won! Try again!';
    case 'draw':
      return "It's a draw! Good game!";
    case 'in_progress':
    default:
      return state.turn === HUMAN ? 'Your turn - click a square to play' : "Computer's turn...";
  }
}
