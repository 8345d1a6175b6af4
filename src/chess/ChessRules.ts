/**
 * Legality & game status
 *
 * Filters pseudo-legal moves by playing each one on the board and checking
 * whether the mover's king is left attacked, then undoing it. Status is
 * always derived for the side to move.
 */

import { isSquareAttacked } from './ChessAttacks.js';
import type { ChessBoard } from './ChessBoard.js';
import { moveToLan, squaresEqual } from './ChessNotation.js';
import { pseudoLegalMoves, pseudoLegalMovesFor } from './ChessPieces.js';
import { Color, GameStatus, Move, Square, oppositeColor } from './types.js';

export { isSquareAttacked };

export interface StatusOptions {
  /** How many times the current position has occurred in the game */
  repetitions?: number;
}

export function isInCheck(board: ChessBoard, color: Color): boolean {
  const king = board.findKing(color);
  return king !== null && isSquareAttacked(board, king, oppositeColor(color));
}

/** Play the move, test the mover's king, take the move back */
function leavesKingSafe(board: ChessBoard, move: Move): boolean {
  board.makeMove(move);
  try {
    return !isInCheck(board, move.color);
  } finally {
    board.unmakeMove();
  }
}

/**
 * Legal moves for a side, in generation order. Defaults to the side to move.
 */
export function legalMovesFor(board: ChessBoard, color: Color = board.turn): Move[] {
  return pseudoLegalMovesFor(board, color).filter(move => leavesKingSafe(board, move));
}

/** Legal moves of the piece on `square`; [] for an empty square */
export function legalMovesFrom(board: ChessBoard, square: Square): Move[] {
  const piece = board.get(square);
  if (!piece) return [];
  return pseudoLegalMoves(board, piece).filter(move => leavesKingSafe(board, move));
}

export function hasLegalMove(board: ChessBoard, color: Color = board.turn): boolean {
  for (const piece of board.pieces(color)) {
    for (const move of pseudoLegalMoves(board, piece)) {
      if (leavesKingSafe(board, move)) return true;
    }
  }
  return false;
}

/** Find the legal move matching origin and destination; promotion defaults to queen */
export function findLegalMove(board: ChessBoard, from: Square, to: Square, promotion?: Move['promotion']): Move | null {
  const candidates = legalMovesFrom(board, from).filter(m => squaresEqual(m.to, to));
  if (candidates.length === 0) return null;
  const wanted = promotion ?? (candidates[0].kind === 'promotion' ? 'q' : undefined);
  return candidates.find(m => m.promotion === wanted) ?? null;
}

// ===========================================================================
// Draw rules
// ===========================================================================

/**
 * K v K, K+minor v K, and any number of bishops (either side) that all
 * stand on one square color.
 */
export function isInsufficientMaterial(board: ChessBoard): boolean {
  const others = board.pieces().filter(p => p.kind !== 'k');
  if (others.length === 0) return true;
  if (others.some(p => p.kind === 'p' || p.kind === 'r' || p.kind === 'q')) return false;
  if (others.length === 1) return true;
  if (!others.every(p => p.kind === 'b')) return false;
  const shade = (others[0].square.row + others[0].square.col) % 2;
  return others.every(p => (p.square.row + p.square.col) % 2 === shade);
}

export function isFiftyMoveDraw(board: ChessBoard): boolean {
  return board.halfMoveClock >= 100;
}

// ===========================================================================
// Status
// ===========================================================================

/**
 * Status for the side to move. Checkmate and stalemate take precedence over
 * the draw rules.
 */
export function getGameStatus(board: ChessBoard, options: StatusOptions = {}): GameStatus {
  const turn = board.turn;
  const inCheck = isInCheck(board, turn);

  if (!hasLegalMove(board, turn)) {
    return inCheck ? { kind: 'checkmate', turn, winner: oppositeColor(turn) } : { kind: 'stalemate', turn };
  }
  if (isInsufficientMaterial(board)) {
    return { kind: 'draw', turn, drawReason: 'insufficient_material' };
  }
  if (isFiftyMoveDraw(board)) {
    return { kind: 'draw', turn, drawReason: 'fifty_move_rule' };
  }
  if ((options.repetitions ?? 1) >= 3) {
    return { kind: 'draw', turn, drawReason: 'threefold_repetition' };
  }
  return { kind: inCheck ? 'check' : 'active', turn };
}

export function isTerminal(status: GameStatus): boolean {
  return status.kind === 'checkmate' || status.kind === 'stalemate' || status.kind === 'draw';
}

// ===========================================================================
// Perft
// ===========================================================================

/** Count leaf nodes of the legal move tree to `depth` plies */
export function perft(board: ChessBoard, depth: number): number {
  if (depth <= 0) return 1;
  const moves = legalMovesFor(board);
  if (depth === 1) return moves.length;
  let nodes = 0;
  for (const move of moves) {
    board.makeMove(move);
    try {
      nodes += perft(board, depth - 1);
    } finally {
      board.unmakeMove();
    }
  }
  return nodes;
}

/** Perft split by root move, keyed by long algebraic notation */
export function divide(board: ChessBoard, depth: number): Map<string, number> {
  const result = new Map<string, number>();
  for (const move of legalMovesFor(board)) {
    board.makeMove(move);
    try {
      result.set(moveToLan(move), perft(board, depth - 1));
    } finally {
      board.unmakeMove();
    }
  }
  return result;
}
