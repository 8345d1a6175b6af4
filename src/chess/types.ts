/**
 * Chess Module Type Definitions
 *
 * Shared types and constants for the rules engine, evaluator and search.
 * Coordinates are (row, col) pairs with row 0 = rank 8 and col 0 = file a,
 * matching the top-down order a board is printed in.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Piece types a pawn may promote to, in generation order */
export type PromotionType = Exclude<PieceType, 'p' | 'k'>;

/** Piece symbol (uppercase = white, lowercase = black) */
export type PieceSymbol = 'P' | 'N' | 'B' | 'R' | 'Q' | 'K' | 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** A board coordinate. Rows run from rank 8 (0) down to rank 1 (7). */
export interface Square {
  readonly row: number;
  readonly col: number;
}

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board. Owned by the board slot it occupies. */
export interface Piece {
  kind: PieceType;
  color: Color;
  /** Always equal to the slot the piece sits in */
  square: Square;
  /** Set once the piece has moved; gates castling */
  hasMoved: boolean;
}

// =============================================================================
// Move Representation
// =============================================================================

export type MoveKind = 'normal' | 'capture' | 'castle' | 'promotion' | 'enPassant';

/**
 * A fully described state transition. Promotions that capture keep
 * kind 'promotion' and carry the captured piece type.
 */
export interface Move {
  readonly from: Square;
  readonly to: Square;
  /** Piece type that moved */
  readonly piece: PieceType;
  /** Color of the player who made the move */
  readonly color: Color;
  readonly kind: MoveKind;
  /** Piece type captured (if any) */
  readonly captured?: PieceType;
  /** Piece type promoted to (if pawn promotion) */
  readonly promotion?: PromotionType;
}

/** Input format for making moves by coordinates */
export interface MoveInput {
  from: string;
  to: string;
  promotion?: PromotionType;
}

// =============================================================================
// Game State
// =============================================================================

/** Castling rights */
export interface CastlingRights {
  /** White can castle kingside */
  whiteKingside: boolean;
  /** White can castle queenside */
  whiteQueenside: boolean;
  /** Black can castle kingside */
  blackKingside: boolean;
  /** Black can castle queenside */
  blackQueenside: boolean;
}

/** Captured pieces tracking */
export interface CapturedPieces {
  white: PieceType[];  // Pieces captured BY white (black's pieces)
  black: PieceType[];  // Pieces captured BY black (white's pieces)
}

export type GameStatusKind = 'active' | 'check' | 'checkmate' | 'stalemate' | 'draw';

export type DrawReason = 'insufficient_material' | 'fifty_move_rule' | 'threefold_repetition';

/** Status from the side-to-move's perspective */
export interface GameStatus {
  kind: GameStatusKind;
  /** Side to move when the status was derived */
  turn: Color;
  /** Set for checkmate */
  winner?: Color;
  /** Set for draws other than stalemate */
  drawReason?: DrawReason;
}

/** Result of applying a move through the game session */
export interface ApplyResult {
  move: Move;
  captured: PieceType | null;
  isCheck: boolean;
  isCheckmate: boolean;
  isStalemate: boolean;
  isDraw: boolean;
  status: GameStatus;
}

/** Result of a square selection */
export interface SelectResult {
  selected: boolean;
  /** Legal moves of the selected piece (empty when nothing is selected) */
  legalMoves: Move[];
  /** Present when the click completed a move */
  applied?: ApplyResult;
}

/** Read-only view of a game for rendering */
export interface GameSnapshot {
  /** 8x8 grid of piece symbols, rank 8 first; null for empty squares */
  board: (PieceSymbol | null)[][];
  turn: Color;
  isCheck: boolean;
  status: GameStatus;
  castling: CastlingRights;
  capturedPieces: CapturedPieces;
  /** Coordinate notation, e.g. "e2e4", "O-O" */
  history: string[];
  moveNumber: number;
  fen: string;
  ascii: string;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Weights applied to each evaluation term */
export interface EvaluationWeights {
  material: number;
  pieceSquare: number;
  pawnStructure: number;
  centerControl: number;
  kingSafety: number;
  mobility: number;
}

/** Position evaluation breakdown, White's perspective */
export interface EvaluationBreakdown {
  /** Material balance */
  material: number;
  /** Piece-square table scores */
  pieceSquare: number;
  /** Pawn structure score */
  pawnStructure: number;
  /** Center control score */
  centerControl: number;
  /** King safety score */
  kingSafety: number;
  /** Mobility score */
  mobility: number;
  /** Weighted total */
  total: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Search statistics */
export interface SearchStats {
  /** Total nodes searched */
  nodes: number;
  /** Leaf evaluations */
  evaluations: number;
  /** Beta cutoffs */
  betaCutoffs: number;
  /** Depth reached */
  depth: number;
  /** Search time in milliseconds */
  time: number;
}

/** Search result */
export interface SearchResult {
  /** Best move, null only when the side to move has no legal moves */
  bestMove: Move | null;
  /** Evaluation score in centipawns from the side to move */
  score: number;
  /** Search depth completed */
  depth: number;
  /** Nodes searched */
  nodes: number;
  /** Search time in ms */
  time: number;
  /** Principal variation (best line) */
  pv: Move[];
  /** Whether the time budget cut the search short */
  aborted: boolean;
  /** Nodes per second */
  nps: number;
}

/** Chess search configuration */
export interface SearchConfig {
  /** Maximum search depth in plies */
  maxDepth: number;
  /** Maximum search time in ms */
  maxTime: number;
  /** Prune with alpha-beta; false runs plain minimax */
  useAlphaBeta: boolean;
  /** Try captures first (MVV-LVA); changes which of equal moves wins */
  useMoveOrdering: boolean;
}

// =============================================================================
// Monte Carlo Types
// =============================================================================

export interface MCTSConfig {
  /** UCB1 exploration constant */
  exploration: number;
  /** Plies a random playout may run before it is scored as a draw */
  maxPlayoutMoves: number;
  /** Time budget in ms */
  maxTime: number;
  /** Upper bound on iterations; at least one always runs */
  maxIterations: number;
}

export interface MCTSResult {
  /** Most visited root move, null only when there are no legal moves */
  bestMove: Move | null;
  /** Visits of the chosen move */
  visits: number;
  /** Playout score of the chosen move from the mover's side, 0..1 */
  winRate: number;
  iterations: number;
  /** Search time in ms */
  time: number;
}

// =============================================================================
// AI Types
// =============================================================================

/** AI difficulty levels */
export type AIDifficulty = 'beginner' | 'easy' | 'medium' | 'hard' | 'expert';

/** Move choice: depth-limited minimax, or Monte Carlo tree search under the time budget */
export type AIStrategy = 'minimax' | 'mcts';

/** Source of uniform numbers in [0, 1) */
export type RandomSource = () => number;

/** AI configuration */
export interface AIConfig {
  /** AI name/identifier */
  name: string;
  difficulty: AIDifficulty;
  /** Search depth limit; 0 picks a random legal move */
  maxDepth: number;
  /** Time limit per move in ms */
  maxTime: number;
  strategy: AIStrategy;
  weights: EvaluationWeights;
}

/** AI move result */
export interface AIMove {
  /** Selected move, null when there is none */
  move: Move | null;
  /** Position evaluation from the mover's side */
  evaluation: number;
  depth: number;
  nodes: number;
  time: number;
  reasoning: string;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 20000,
};

export const PROMOTION_TYPES: readonly PromotionType[] = ['q', 'r', 'b', 'n'];

/** Unicode chess piece symbols */
export const PIECE_UNICODE: Record<PieceSymbol, string> = {
  K: '♔', Q: '♕', R: '♖', B: '♗', N: '♘', P: '♙',
  k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟',
};

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** Default evaluation weights */
export const DEFAULT_EVALUATION_WEIGHTS: EvaluationWeights = {
  material: 1.0,
  pieceSquare: 0.3,
  pawnStructure: 0.2,
  centerControl: 0.1,
  kingSafety: 0,
  mobility: 0,
};

/** Default search configuration */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxDepth: 3,
  maxTime: 5000,
  useAlphaBeta: true,
  useMoveOrdering: false,
};

export const DEFAULT_MCTS_CONFIG: MCTSConfig = {
  exploration: Math.SQRT2,
  maxPlayoutMoves: 100,
  maxTime: 2000,
  maxIterations: Number.POSITIVE_INFINITY,
};

/** Default AI configuration */
export const DEFAULT_AI_CONFIG: AIConfig = {
  name: 'Minimax',
  difficulty: 'medium',
  maxDepth: 3,
  maxTime: 2000,
  strategy: 'minimax',
  weights: DEFAULT_EVALUATION_WEIGHTS,
};

export function oppositeColor(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
