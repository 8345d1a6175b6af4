/**
 * Chess Module
 *
 * - Position model with in-place make/unmake
 * - Pseudo-legal move rules per piece kind
 * - Legality filter, game status and draw rules
 * - Position evaluation (material, positional, structural)
 * - Minimax search with alpha-beta pruning
 * - AI player with difficulty presets
 *
 * @module chess
 */

// Position model
export { ChessBoard } from './ChessBoard.js';

// Errors
export { ChessError, isChessError } from './ChessErrors.js';
export type { ChessErrorCode } from './ChessErrors.js';

// Notation
export {
  makeSquare,
  isWithinBounds,
  squaresEqual,
  toAlgebraic,
  parseSquare,
  moveToString,
  moveToLan,
} from './ChessNotation.js';

// Move rules and legality
export { pseudoLegalMoves, pseudoLegalMovesFor } from './ChessPieces.js';
export {
  isSquareAttacked,
  isInCheck,
  legalMovesFor,
  legalMovesFrom,
  hasLegalMove,
  findLegalMove,
  isInsufficientMaterial,
  getGameStatus,
  isTerminal,
  perft,
  divide,
} from './ChessRules.js';

// Cross-check against chess.js
export { verifyPerft, referenceDivide } from './ChessVerify.js';
export type { PerftMismatch, VerifyResult } from './ChessVerify.js';

// Evaluation
export { ChessEvaluator, MAX_WEIGHT, loadPieceSquareTables } from './ChessEvaluator.js';

// Search
export { ChessSearch, MATE_SCORE, MAX_STATIC_SCORE, clampStaticScore, isMateScore } from './ChessSearch.js';

// AI Player
export { ChessAI, DIFFICULTY_CONFIGS, AI_DIFFICULTIES } from './ChessAI.js';
export type { AIStats, PositionAnalysis } from './ChessAI.js';
export { ChessMCTS } from './ChessMCTS.js';
export { ChessMatch } from './ChessMatch.js';
export type { MatchMove, MatchResult } from './ChessMatch.js';

// Game session
export { ChessEngine } from './ChessEngine.js';
export type { ChessEngineConfig } from './ChessEngine.js';

// Types
export type {
  Color,
  PieceType,
  PromotionType,
  PieceSymbol,
  Square,
  Piece,
  MoveKind,
  Move,
  MoveInput,
  CastlingRights,
  CapturedPieces,
  GameStatusKind,
  DrawReason,
  GameStatus,
  ApplyResult,
  SelectResult,
  GameSnapshot,
  EvaluationWeights,
  EvaluationBreakdown,
  SearchStats,
  SearchResult,
  SearchConfig,
  MCTSConfig,
  MCTSResult,
  AIDifficulty,
  AIStrategy,
  AIConfig,
  AIMove,
  RandomSource,
} from './types.js';

// Constants
export {
  STARTING_FEN,
  PIECE_VALUES,
  PIECE_UNICODE,
  FILES,
  RANKS,
  DEFAULT_EVALUATION_WEIGHTS,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_MCTS_CONFIG,
  DEFAULT_AI_CONFIG,
} from './types.js';
