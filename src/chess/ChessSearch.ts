/**
 * ChessSearch - Minimax search with alpha-beta pruning
 *
 * - Negamax formulation (the side to move always maximizes)
 * - Alpha-beta pruning, switchable off for plain minimax
 * - Iterative deepening under a wall-clock budget
 * - Optional MVV-LVA capture ordering
 *
 * The search walks the tree on the caller's board with makeMove/unmakeMove
 * and leaves it exactly as it found it.
 */

import type { ChessBoard } from './ChessBoard.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { hasLegalMove, isInCheck, legalMovesFor } from './ChessRules.js';
import {
  DEFAULT_SEARCH_CONFIG,
  Move,
  PieceType,
  SearchConfig,
  SearchResult,
  SearchStats,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

const INFINITY = Number.POSITIVE_INFINITY;
export const MATE_SCORE = 100_000;
const MATE_THRESHOLD = MATE_SCORE - 1000;

/** Largest magnitude a static evaluation may take inside the search */
export const MAX_STATIC_SCORE = MATE_THRESHOLD - 1;

/** MVV-LVA values for capture ordering */
const MVV_VALUES: Record<PieceType, number> = {
  p: 1, n: 3, b: 3, r: 5, q: 9, k: 100,
};

const LVA_VALUES: Record<PieceType, number> = {
  p: 6, n: 5, b: 5, r: 4, q: 3, k: 2,
};

export function isMateScore(score: number): boolean {
  return Math.abs(score) >= MATE_THRESHOLD;
}

/** Keeps static scores out of the mate band */
export function clampStaticScore(score: number): number {
  return Math.max(-MAX_STATIC_SCORE, Math.min(MAX_STATIC_SCORE, score));
}

// =============================================================================
// ChessSearch Class
// =============================================================================

export class ChessSearch {
  private config: SearchConfig;
  private evaluator: ChessEvaluator;
  private board: ChessBoard | null = null;

  // Search stats
  private stats: SearchStats = this.initStats();

  // Time management
  private searchStartTime = 0;
  private timeLimit = 0;

  constructor(evaluator?: ChessEvaluator, config?: Partial<SearchConfig>) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.evaluator = evaluator ?? new ChessEvaluator();
  }

  /**
   * Search for the best move for the side to move.
   * @param maxDepth - Optional depth override
   * @param maxTime - Optional time limit override (ms)
   */
  search(board: ChessBoard, maxDepth?: number, maxTime?: number): SearchResult {
    this.board = board;
    this.stats = this.initStats();
    this.searchStartTime = Date.now();
    this.timeLimit = maxTime ?? this.config.maxTime;

    const depth = Math.max(1, maxDepth ?? this.config.maxDepth);
    const rootMoves = this.orderMoves(legalMovesFor(board));

    try {
      if (rootMoves.length === 0) {
        return this.finish(null, isInCheck(board, board.turn) ? -MATE_SCORE : 0, 0, [], false);
      }

      let bestMove: Move | null = null;
      let bestScore = -INFINITY;
      let completedDepth = 0;
      let pv: Move[] = [];
      let aborted = false;

      // Iterative deepening
      for (let d = 1; d <= depth && !aborted; d++) {
        let alpha = -INFINITY;
        const beta = INFINITY;
        let iterationBest: Move = rootMoves[0];
        let iterationScore = -INFINITY;
        let iterationPv: Move[] = [];

        for (const move of rootMoves) {
          // The clock is only read between root moves; depth 1 always completes
          if (d > 1 && this.timeUp()) {
            aborted = true;
            break;
          }

          const childPv: Move[] = [];
          board.makeMove(move);
          let score: number;
          try {
            score = -this.negamax(d - 1, -beta, -alpha, 1, childPv);
          } finally {
            board.unmakeMove();
          }

          if (score > iterationScore) {
            iterationScore = score;
            iterationBest = move;
            iterationPv = [move, ...childPv];
          }
          if (this.config.useAlphaBeta && score > alpha) {
            alpha = score;
          }
        }

        if (aborted) break;

        bestMove = iterationBest;
        bestScore = iterationScore;
        completedDepth = d;
        pv = iterationPv;

        // A forced mate will not change with more depth
        if (isMateScore(bestScore)) break;
      }

      return this.finish(bestMove, bestScore, completedDepth, pv, aborted);
    } finally {
      this.board = null;
    }
  }

  /**
   * Negamax with optional alpha-beta pruning. Returns the score from the
   * side to move; fills `pv` with the best line below this node.
   */
  private negamax(depth: number, alpha: number, beta: number, ply: number, pv: Move[]): number {
    const board = this.requireBoard();
    this.stats.nodes++;

    if (depth <= 0) {
      if (!hasLegalMove(board)) return this.terminalScore(board, ply);
      this.stats.evaluations++;
      return clampStaticScore(this.evaluator.score(board, board.turn));
    }

    const moves = this.orderMoves(legalMovesFor(board));
    if (moves.length === 0) return this.terminalScore(board, ply);

    let best = -INFINITY;
    for (const move of moves) {
      const childPv: Move[] = [];
      board.makeMove(move);
      let score: number;
      try {
        score = -this.negamax(depth - 1, -beta, -alpha, ply + 1, childPv);
      } finally {
        board.unmakeMove();
      }

      if (score > best) {
        best = score;
        pv.length = 0;
        pv.push(move, ...childPv);
      }

      if (this.config.useAlphaBeta) {
        if (score > alpha) alpha = score;
        if (alpha >= beta) {
          this.stats.betaCutoffs++;
          break;
        }
      }
    }
    return best;
  }

  /** Mated sides score worse the sooner it happens; stalemate is level */
  private terminalScore(board: ChessBoard, ply: number): number {
    return isInCheck(board, board.turn) ? -MATE_SCORE + ply : 0;
  }

  /**
   * Captures first by MVV-LVA when enabled. The sort is stable, so equal
   * moves keep generation order.
   */
  private orderMoves(moves: Move[]): Move[] {
    if (!this.config.useMoveOrdering) return moves;
    return [...moves].sort((a, b) => this.mvvLva(b) - this.mvvLva(a));
  }

  private mvvLva(move: Move): number {
    if (!move.captured) return 0;
    return MVV_VALUES[move.captured] * 10 + LVA_VALUES[move.piece];
  }

  private timeUp(): boolean {
    return Date.now() - this.searchStartTime >= this.timeLimit;
  }

  private requireBoard(): ChessBoard {
    if (!this.board) {
      throw new Error('ChessSearch: no board bound to the current search');
    }
    return this.board;
  }

  private finish(bestMove: Move | null, score: number, depth: number, pv: Move[], aborted: boolean): SearchResult {
    const elapsed = Date.now() - this.searchStartTime;
    this.stats.depth = depth;
    this.stats.time = elapsed;
    return {
      bestMove,
      score,
      depth,
      nodes: this.stats.nodes,
      time: elapsed,
      pv,
      aborted,
      nps: elapsed > 0 ? Math.round((this.stats.nodes / elapsed) * 1000) : 0,
    };
  }

  /**
   * Initialize search statistics
   */
  private initStats(): SearchStats {
    return {
      nodes: 0,
      evaluations: 0,
      betaCutoffs: 0,
      depth: 0,
      time: 0,
    };
  }

  /**
   * Get search statistics
   */
  getStats(): SearchStats {
    return { ...this.stats };
  }

  getConfig(): SearchConfig {
    return { ...this.config };
  }

  /**
   * Update configuration
   */
  setConfig(config: Partial<SearchConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
