import { describe, expect, it } from 'vitest';
import { aiMove, describeState, move, newGame, playTurn, resetGame } from './game.js';
import { InvalidMoveError, NotAITurnError } from './errors.js';
import { countMarks } from './board.js';
import { createRng } from './ai/random.js';
import { stateFrom } from './test/fixtures.js';

describe('newGame', () => {
  it('starts empty with X to move', () => {
    expect(newGame('hard')).toEqual({
      board: [
        [null, null, null],
        [null, null, null],
        [null, null, null],
      ],
      turn: 'X',
      status: 'in_progress',
      winner: null,
      winningLine: null,
      difficulty: 'hard',
    });
  });

  it('defaults to medium', () => {
    expect(newGame().difficulty).toBe('medium');
  });
});

describe('move', () => {
  it('plays X', () => {
    expect(move(newGame(), 2, 1).board[2][1]).toBe('X');
  });

  it('rejects row 3 and leaves the state alone', () => {
    const state = newGame();
    const before = JSON.parse(JSON.stringify(state));
    expect(() => move(state, 3, 0)).toThrow(InvalidMoveError);
    expect(state).toEqual(before);
  });

  it('rejects a move on a won game', () => {
    expect(() => move(stateFrom(['XXX', 'OO ', '   ']), 2, 2)).toThrow(InvalidMoveError);
  });

  it('rejects a move while the computer is to play', () => {
    expect(() => move(stateFrom(['X  ', '   ', '   ']), 1, 1)).toThrow(InvalidMoveError);
  });
});

describe('aiMove', () => {
  it('answers a corner with the center on hard', () => {
    const afterHuman = move(newGame('hard'), 0, 0);
    const result = aiMove(afterHuman);
    expect(result.move).toEqual({ r: 1, c: 1 });
    expect(result.state.board[1][1]).toBe('O');
    expect(result.state.turn).toBe('X');
  });

  it('fails when it is the human turn', () => {
    expect(() => aiMove(newGame())).toThrow(NotAITurnError);
  });

  it('fails on a finished game', () => {
    expect(() => aiMove(stateFrom(['XXX', 'OO ', '   ']))).toThrow('The game is over');
  });
});

describe('playTurn', () => {
  it('returns the reply alongside the new state', () => {
    const result = playTurn(newGame('medium'), 0, 0);
    expect(result.aiMove).toEqual({ r: 1, c: 1 });
    expect(countMarks(result.state.board)).toEqual({ X: 1, O: 1 });
  });

  it('skips the reply when the human move ends the game', () => {
    const state = stateFrom(['XX ', 'OO ', '   '], 'hard');
    const result = playTurn(state, 0, 2);
    expect(result.aiMove).toBeNull();
    expect(result.state.status).toBe('won');
    expect(describeState(result.state)).toBe('You won! Congratulations!');
  });

  it('keeps the mark balance through a whole easy game', () => {
    const rng = createRng(2024);
    let state = newGame('easy');
    while (state.status === 'in_progress') {
      const open = state.board.flatMap((row, r) =>
        row.flatMap((cell, c) => (cell === null ? [{ r, c }] : []))
      );
      const [first] = open;
      state = playTurn(state, first.r, first.c, { rng }).state;
      const counts = countMarks(state.board);
      expect([0, 1]).toContain(counts.X - counts.O);
    }
    expect(['won', 'draw']).toContain(state.status);
  });
});

describe('resetGame', () => {
  it('keeps the difficulty unless given a new one', () => {
    const played = move(newGame('hard'), 1, 1);
    expect(resetGame(played)).toEqual(newGame('hard'));
    expect(resetGame(played, 'easy').difficulty).toBe('easy');
  });
});

describe('describeState', () => {
  it.each<[string[], string]>([
    [['XXX', 'OO ', '   '], 'You won! Congratulations!'],
    [['OOO', 'XX ', 'X X'], 'Computer won! Try again!'],
    [['XOX', 'XOO', 'OXX'], "It's a draw! Good game!"],
    [['   ', '   ', '   '], 'Your turn - click a square to play'],
    [['X  ', '   ', '   '], "Computer's turn..."],
  ])('describes %j', (rows, message) => {
    expect(describeState(stateFrom(rows))).toBe(message);
  });
});
