/**
 * ChessEvaluator - Position evaluation function
 *
 * Weighted sum of:
 * - Material balance
 * - Piece-square tables (positional bonuses)
 * - Pawn structure (isolated and doubled pawns)
 * - Center occupation
 * - King safety (friendly pieces next to the king)
 * - Mobility (pseudo-legal move count)
 *
 * Every term is computed White-minus-Black in centipawns; score() flips
 * the sign for Black. Evaluation never mutates the board.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ChessBoard } from './ChessBoard.js';
import { ChessError } from './ChessErrors.js';
import { pseudoLegalMovesFor } from './ChessPieces.js';
import {
  Color,
  DEFAULT_EVALUATION_WEIGHTS,
  EvaluationBreakdown,
  EvaluationWeights,
  PIECE_VALUES,
} from './types.js';

// =============================================================================
// Piece-Square Tables
// =============================================================================

const pstRowSchema = z.array(z.number()).length(8);
const pstSchema = z.array(pstRowSchema).length(8);

const pieceSquareTablesSchema = z.object({
  p: pstSchema,
  n: pstSchema,
  b: pstSchema,
  r: pstSchema,
  q: pstSchema,
  k: pstSchema,
});

export type PieceSquareTables = z.infer<typeof pieceSquareTablesSchema>;

/**
 * Tables are written from White's side, index 0 = rank 8.
 * Black reads them mirrored vertically.
 */
export function loadPieceSquareTables(
  url: URL = new URL('../../data/piece-square-tables.json', import.meta.url)
): PieceSquareTables {
  const raw: unknown = JSON.parse(readFileSync(url, 'utf8'));
  const parsed = pieceSquareTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChessError('INVALID_CONFIG', `Invalid piece-square tables: ${parsed.error.message}`);
  }
  return parsed.data;
}

const PIECE_SQUARE_TABLES = loadPieceSquareTables();

// =============================================================================
// Evaluation Constants
// =============================================================================

const DOUBLED_PAWN_PENALTY = -10;
const ISOLATED_PAWN_PENALTY = -20;

const CENTER_SQUARES: ReadonlyArray<readonly [number, number]> = [
  [3, 3], [3, 4], [4, 3], [4, 4],
];
const CENTER_BONUS = 10;

const KING_NEIGHBOR_BONUS = 10;

/** Upper bound per weight; keeps weighted scores well clear of mate scores */
export const MAX_WEIGHT = 5;

const weightSchema = z.number().nonnegative().max(MAX_WEIGHT);

export const evaluationWeightsSchema = z.object({
  material: weightSchema,
  pieceSquare: weightSchema,
  pawnStructure: weightSchema,
  centerControl: weightSchema,
  kingSafety: weightSchema,
  mobility: weightSchema,
});

type Term = Exclude<keyof EvaluationBreakdown, 'total'>;

const TERMS: readonly Term[] = [
  'material',
  'pieceSquare',
  'pawnStructure',
  'centerControl',
  'kingSafety',
  'mobility',
];

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export class ChessEvaluator {
  private readonly weights: EvaluationWeights;

  constructor(weights: Partial<EvaluationWeights> = {}) {
    const parsed = evaluationWeightsSchema.safeParse({ ...DEFAULT_EVALUATION_WEIGHTS, ...weights });
    if (!parsed.success) {
      throw new ChessError('INVALID_CONFIG', `Invalid evaluation weights: ${parsed.error.message}`, {
        weights: { ...weights },
      });
    }
    this.weights = parsed.data;
  }

  getWeights(): EvaluationWeights {
    return { ...this.weights };
  }

  /**
   * Score from `perspective`'s side: positive means `perspective` is better.
   * Terms with zero weight are skipped.
   */
  score(board: ChessBoard, perspective: Color): number {
    let total = 0;
    for (const term of TERMS) {
      const weight = this.weights[term];
      if (weight !== 0) total += weight * this.evaluateTerm(board, term);
    }
    const rounded = Math.round(total);
    return perspective === 'w' ? rounded : 0 - rounded;
  }

  /**
   * Raw value of every term plus the weighted total, White's perspective
   */
  breakdown(board: ChessBoard): EvaluationBreakdown {
    const result: EvaluationBreakdown = {
      material: 0,
      pieceSquare: 0,
      pawnStructure: 0,
      centerControl: 0,
      kingSafety: 0,
      mobility: 0,
      total: 0,
    };
    let total = 0;
    for (const term of TERMS) {
      result[term] = this.evaluateTerm(board, term);
      total += this.weights[term] * result[term];
    }
    result.total = Math.round(total);
    return result;
  }

  private evaluateTerm(board: ChessBoard, term: Term): number {
    switch (term) {
      case 'material':
        return this.evaluateMaterial(board);
      case 'pieceSquare':
        return this.evaluatePieceSquares(board);
      case 'pawnStructure':
        return this.evaluatePawnStructure(board);
      case 'centerControl':
        return this.evaluateCenterControl(board);
      case 'kingSafety':
        return this.evaluateKingSafety(board);
      case 'mobility':
        return this.evaluateMobility(board);
    }
  }

  private evaluateMaterial(board: ChessBoard): number {
    let score = 0;
    for (const piece of board.pieces()) {
      const value = PIECE_VALUES[piece.kind];
      score += piece.color === 'w' ? value : -value;
    }
    return score;
  }

  private evaluatePieceSquares(board: ChessBoard): number {
    let score = 0;
    for (const piece of board.pieces()) {
      const row = piece.color === 'w' ? piece.square.row : 7 - piece.square.row;
      const value = PIECE_SQUARE_TABLES[piece.kind][row][piece.square.col];
      score += piece.color === 'w' ? value : -value;
    }
    return score;
  }

  /**
   * Isolated: no friendly pawn on an adjacent file.
   * Doubled: penalised once per extra pawn on a file.
   */
  private evaluatePawnStructure(board: ChessBoard): number {
    return this.pawnStructureFor(board, 'w') - this.pawnStructureFor(board, 'b');
  }

  private pawnStructureFor(board: ChessBoard, color: Color): number {
    const perFile = new Array<number>(8).fill(0);
    for (const piece of board.pieces(color)) {
      if (piece.kind === 'p') perFile[piece.square.col]++;
    }

    let score = 0;
    for (let file = 0; file < 8; file++) {
      const count = perFile[file];
      if (count === 0) continue;
      if (count > 1) score += DOUBLED_PAWN_PENALTY * (count - 1);
      const hasNeighbor = (file > 0 && perFile[file - 1] > 0) || (file < 7 && perFile[file + 1] > 0);
      if (!hasNeighbor) score += ISOLATED_PAWN_PENALTY * count;
    }
    return score;
  }

  private evaluateCenterControl(board: ChessBoard): number {
    let score = 0;
    for (const [row, col] of CENTER_SQUARES) {
      const piece = board.pieceAt(row, col);
      if (piece) score += piece.color === 'w' ? CENTER_BONUS : -CENTER_BONUS;
    }
    return score;
  }

  private evaluateKingSafety(board: ChessBoard): number {
    return this.kingNeighbors(board, 'w') - this.kingNeighbors(board, 'b');
  }

  private kingNeighbors(board: ChessBoard, color: Color): number {
    const king = board.findKing(color);
    if (!king) return 0;
    let score = 0;
    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        if (dr === 0 && dc === 0) continue;
        const piece = board.pieceAt(king.row + dr, king.col + dc);
        if (piece && piece.color === color) score += KING_NEIGHBOR_BONUS;
      }
    }
    return score;
  }

  private evaluateMobility(board: ChessBoard): number {
    return (
      pseudoLegalMovesFor(board, 'w', { includeCastling: false }).length -
      pseudoLegalMovesFor(board, 'b', { includeCastling: false }).length
    );
  }
}
