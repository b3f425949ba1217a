import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  COMPUTER,
  WireDifficulty,
  aiMove,
  decode,
  describeState,
  encode,
  isGameError,
  newGame,
  playTurn,
  resetGame,
  type GameState,
  type Rng,
} from '@noughts/engine';
import { HttpError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SessionStore } from '../session/store.js';
import { sessionIdOf } from '../session/middleware.js';

const DifficultyInput = z.string().trim().toLowerCase().pipe(WireDifficulty);

const NewGameBody = z.object({
  difficulty: DifficultyInput.optional(),
});

const MoveBody = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export interface GameRouterDeps {
  store: SessionStore;
  logger: Logger;
  rng?: Rng;
}

export function createGameRouter({ store, logger, rng }: GameRouterDeps): Router {
  const router = Router();

  function save(res: Response, state: GameState): void {
    store.set(sessionIdOf(res), encode(state));
  }

  // Returns null when the session has no game; drops and rethrows corrupted entries.
  function load(res: Response): GameState | null {
    const sessionId = sessionIdOf(res);
    const stored = store.get(sessionId);
    if (stored === undefined) {
      return null;
    }
    try {
      return decode(stored);
    } catch (err) {
      store.delete(sessionId);
      logger.warn('Dropped corrupted session game', { sessionId });
      throw err;
    }
  }

  function requireGame(res: Response): GameState {
    const state = load(res);
    if (!state) {
      throw new HttpError(404, 'No active game', 'Please start a new game first');
    }
    return state;
  }

  function body(req: Request): unknown {
    return req.body ?? {};
  }

  router.post('/new', (req, res) => {
    const { difficulty = 'medium' } = NewGameBody.parse(body(req));
    const state = newGame(difficulty);
    save(res, state);
    logger.info('New game started', { difficulty });
    res.json({ success: true, game: encode(state), message: describeState(state) });
  });

  router.get('/state', (_req, res) => {
    const state = requireGame(res);
    res.json({ success: true, game: encode(state), message: describeState(state) });
  });

  router.post('/move', (req, res) => {
    const { row, col } = MoveBody.parse(body(req));
    let state = requireGame(res);
    // A stored game can be waiting on the computer; play its move before the human's.
    if (state.status === 'in_progress' && state.turn === COMPUTER) {
      const pending = aiMove(state, { rng });
      state = pending.state;
      save(res, state);
      logger.info('Pending computer move played', { aiMove: pending.move });
    }
    const result = playTurn(state, row, col, { rng });
    save(res, result.state);
    logger.info('Human move', { row, col, aiMove: result.aiMove });

    const gameOver = result.state.status !== 'in_progress';
    res.json({
      success: true,
      game: encode(result.state),
      message: describeState(result.state),
      gameOver,
      aiMove: result.aiMove ? [result.aiMove.r, result.aiMove.c] : null,
    });
  });

  router.post('/reset', (req, res) => {
    const { difficulty } = NewGameBody.parse(body(req));
    let current: GameState | null = null;
    try {
      current = load(res);
    } catch (err) {
      if (!isGameError(err)) throw err;
    }
    const state = current ? resetGame(current, difficulty) : newGame(difficulty ?? 'medium');
    save(res, state);
    logger.info('Game reset', { difficulty: state.difficulty });
    res.json({ success: true, game: encode(state), message: describeState(state) });
  });

  router.post('/quit', (_req, res) => {
    if (store.delete(sessionIdOf(res))) {
      logger.info('Game ended and session cleared');
    }
    res.json({ success: true, message: 'Game ended successfully' });
  });

  return router;
}
