import type { Coord, GameState, Player } from '../types.js';
import { applyMove, legalMoves } from '../board.js';

const WIN_SCORE = 10;

export interface SearchResult {
  score: number;
  move: Coord | null;
  /** Positions visited, root included. */
  nodes: number;
}

interface NodeResult {
  score: number;
  move: Coord | null;
}

interface SearchStats {
  nodes: number;
}

function terminalScore(state: GameState, forPlayer: Player, depth: number): number | null {
  if (state.status === 'won') {
    return state.winner === forPlayer ? WIN_SCORE - depth : -WIN_SCORE + depth;
  }
  if (state.status === 'draw') {
    return 0;
  }
  return null;
}

/** Exhaustive minimax without pruning. Kept as the reference for `alphaBeta`. */
export function minimax(state: GameState, forPlayer: Player = state.turn): SearchResult {
  const stats: SearchStats = { nodes: 0 };
  const result = search(state, forPlayer, 0, stats);
  return { ...result, nodes: stats.nodes };
}

function search(state: GameState, forPlayer: Player, depth: number, stats: SearchStats): NodeResult {
  stats.nodes++;
  const terminal = terminalScore(state, forPlayer, depth);
  if (terminal !== null) {
    return { score: terminal, move: null };
  }

  const maximizing = state.turn === forPlayer;
  let bestScore = maximizing ? -Infinity : Infinity;
  let bestMove: Coord | null = null;

  for (const move of legalMoves(state)) {
    const next = applyMove(state, move.r, move.c, state.turn);
    const { score } = search(next, forPlayer, depth + 1, stats);
    if (maximizing ? score > bestScore : score < bestScore) {
      bestScore = score;
      bestMove = move;
    }
  }

  return { score: bestScore, move: bestMove };
}

export function alphaBeta(state: GameState, forPlayer: Player = state.turn): SearchResult {
  const stats: SearchStats = { nodes: 0 };
  const result = prune(state, forPlayer, 0, -Infinity, Infinity, stats);
  return { ...result, nodes: stats.nodes };
}

function prune(
  state: GameState,
  forPlayer: Player,
  depth: number,
  alpha: number,
  beta: number,
  stats: SearchStats
): NodeResult {
  stats.nodes++;
  const terminal = terminalScore(state, forPlayer, depth);
  if (terminal !== null) {
    return { score: terminal, move: null };
  }

  const maximizing = state.turn === forPlayer;
  let bestScore = maximizing ? -Infinity : Infinity;
  let bestMove: Coord | null = null;

  for (const move of legalMoves(state)) {
    const next = applyMove(state, move.r, move.c, state.turn);
    const { score } = prune(next, forPlayer, depth + 1, alpha, beta, stats);
    // Strict comparison: on equal scores the earlier move stays.
    if (maximizing) {
      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      alpha = Math.max(alpha, score);
    } else {
      if (score < bestScore) {
        bestScore = score;
        bestMove = move;
      }
      beta = Math.min(beta, score);
    }
    if (alpha >= beta) {
      break;
    }
  }

  return { score: bestScore, move: bestMove };
}

export function bestMove(state: GameState, forPlayer: Player = state.turn): Coord | null {
  return alphaBeta(state, forPlayer).move;
}
