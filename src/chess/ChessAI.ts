/**
 * ChessAI - AI Player
 *
 * Wraps the search and evaluator behind difficulty presets:
 * - beginner plays a random legal move
 * - easy / medium / hard / expert search 2 / 3 / 4 / 5 plies
 *
 * The 'mcts' strategy replaces the minimax search with Monte Carlo tree
 * search that runs for the preset's time budget.
 */

import { logGameEvent } from '../core/GameStateLogger.js';
import type { ChessBoard } from './ChessBoard.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { ChessMCTS } from './ChessMCTS.js';
import { moveToString } from './ChessNotation.js';
import { isInCheck, legalMovesFor } from './ChessRules.js';
import { ChessSearch, MATE_SCORE } from './ChessSearch.js';
import {
  AIConfig,
  AIDifficulty,
  AIMove,
  DEFAULT_AI_CONFIG,
  EvaluationBreakdown,
  Move,
  RandomSource,
} from './types.js';

// =============================================================================
// Difficulty Presets
// =============================================================================

export const DIFFICULTY_CONFIGS: Record<AIDifficulty, Partial<AIConfig>> = {
  beginner: {
    maxDepth: 0,
    maxTime: 0,
  },
  easy: {
    maxDepth: 2,
    maxTime: 1000,
  },
  medium: {
    maxDepth: 3,
    maxTime: 2000,
  },
  hard: {
    maxDepth: 4,
    maxTime: 4000,
  },
  expert: {
    maxDepth: 5,
    maxTime: 8000,
  },
};

export const AI_DIFFICULTIES: readonly AIDifficulty[] = ['beginner', 'easy', 'medium', 'hard', 'expert'];

export interface AIStats {
  movesAnalyzed: number;
  totalNodes: number;
  totalTime: number;
  averageTime: number;
}

export interface PositionAnalysis {
  score: number;
  breakdown: EvaluationBreakdown;
  bestMove: Move | null;
  pv: string[];
  depth: number;
  nodes: number;
}

// =============================================================================
// ChessAI Class
// =============================================================================

export class ChessAI {
  private config: AIConfig;
  private evaluator: ChessEvaluator;
  private search: ChessSearch;
  private readonly mcts: ChessMCTS;
  private readonly random: RandomSource;

  private movesAnalyzed = 0;
  private totalNodes = 0;
  private totalTime = 0;

  constructor(config?: Partial<AIConfig>, random: RandomSource = Math.random) {
    this.config = { ...DEFAULT_AI_CONFIG, ...config };
    this.evaluator = new ChessEvaluator(this.config.weights);
    this.search = new ChessSearch(this.evaluator, {
      maxDepth: Math.max(1, this.config.maxDepth),
      maxTime: this.config.maxTime,
    });
    this.mcts = new ChessMCTS({ maxTime: this.config.maxTime }, random);
    this.random = random;
  }

  /**
   * Create AI from difficulty preset
   */
  static fromDifficulty(difficulty: AIDifficulty, overrides?: Partial<AIConfig>, random?: RandomSource): ChessAI {
    const preset = DIFFICULTY_CONFIGS[difficulty];
    return new ChessAI({ ...preset, difficulty, ...overrides }, random);
  }

  /**
   * Pick a move for the side to move. The board is left unchanged.
   * @param timeBudget - Overrides the configured time limit (ms)
   */
  getBestMove(board: ChessBoard, timeBudget?: number): AIMove {
    const startTime = Date.now();
    const legalMoves = legalMovesFor(board);

    if (legalMoves.length === 0) {
      return {
        move: null,
        evaluation: isInCheck(board, board.turn) ? -MATE_SCORE : 0,
        depth: 0,
        nodes: 0,
        time: Date.now() - startTime,
        reasoning: 'No legal moves',
      };
    }

    // Single move - return immediately
    if (legalMoves.length === 1) {
      return this.record({
        move: legalMoves[0],
        evaluation: this.evaluator.score(board, board.turn),
        depth: 0,
        nodes: 0,
        time: Date.now() - startTime,
        reasoning: 'Only legal move',
      });
    }

    if (this.config.maxDepth <= 0) {
      const index = Math.min(legalMoves.length - 1, Math.floor(this.random() * legalMoves.length));
      return this.record({
        move: legalMoves[index],
        evaluation: this.evaluator.score(board, board.turn),
        depth: 0,
        nodes: 0,
        time: Date.now() - startTime,
        reasoning: 'Random move',
      });
    }

    if (this.config.strategy === 'mcts') {
      const result = this.mcts.search(board, timeBudget ?? this.config.maxTime);
      return this.record({
        move: result.bestMove,
        evaluation: this.evaluator.score(board, board.turn),
        depth: 0,
        nodes: result.iterations,
        time: Date.now() - startTime,
        reasoning: `MCTS: ${result.iterations} ${result.iterations === 1 ? 'playout' : 'playouts'}, ${result.visits} on the chosen move`,
      });
    }

    const result = this.search.search(board, this.config.maxDepth, timeBudget ?? this.config.maxTime);
    const reasoning =
      `Searched ${result.depth} ${result.depth === 1 ? 'ply' : 'plies'}, ${result.nodes} nodes` +
      (result.aborted ? ' (stopped by time budget)' : '');

    return this.record({
      move: result.bestMove,
      evaluation: result.score,
      depth: result.depth,
      nodes: result.nodes,
      time: Date.now() - startTime,
      reasoning,
    });
  }

  /**
   * Static evaluation plus a search of the position
   */
  analyzePosition(board: ChessBoard, depth?: number, timeBudget?: number): PositionAnalysis {
    const result = this.search.search(board, depth ?? Math.max(1, this.config.maxDepth), timeBudget ?? this.config.maxTime);
    return {
      score: result.score,
      breakdown: this.evaluator.breakdown(board),
      bestMove: result.bestMove,
      pv: result.pv.map(moveToString),
      depth: result.depth,
      nodes: result.nodes,
    };
  }

  private record(aiMove: AIMove): AIMove {
    this.movesAnalyzed++;
    this.totalNodes += aiMove.nodes;
    this.totalTime += aiMove.time;
    if (aiMove.move) {
      logGameEvent(
        'AI',
        `${this.config.name} (${this.config.difficulty}) chose ${moveToString(aiMove.move)}: ${aiMove.reasoning}`
      );
    }
    return aiMove;
  }

  setDifficulty(difficulty: AIDifficulty): void {
    this.setConfig({ ...DIFFICULTY_CONFIGS[difficulty], difficulty });
  }

  /**
   * Update AI configuration
   */
  setConfig(config: Partial<AIConfig>): void {
    if (config.weights) {
      this.evaluator = new ChessEvaluator(config.weights);
      this.search = new ChessSearch(this.evaluator);
    }
    this.config = { ...this.config, ...config };
    this.search.setConfig({
      maxDepth: Math.max(1, this.config.maxDepth),
      maxTime: this.config.maxTime,
    });
    this.mcts.setConfig({ maxTime: this.config.maxTime });
  }

  /**
   * Get current configuration
   */
  getConfig(): AIConfig {
    return { ...this.config };
  }

  getStats(): AIStats {
    return {
      movesAnalyzed: this.movesAnalyzed,
      totalNodes: this.totalNodes,
      totalTime: this.totalTime,
      averageTime: this.movesAnalyzed > 0 ? this.totalTime / this.movesAnalyzed : 0,
    };
  }
}
