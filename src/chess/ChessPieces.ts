/**
 * Piece move rules.
 *
 * Pseudo-legal generation: movement geometry and blocking are respected,
 * king safety is not (the rules module filters that). Output order is fixed
 * per piece kind so that search results are reproducible.
 */

import { DIAGONAL, KING_OFFSETS, KNIGHT_OFFSETS, ORTHOGONAL, isSquareAttacked, pawnDirection } from './ChessAttacks.js';
import { homeRow, type ChessBoard } from './ChessBoard.js';
import { makeSquare } from './ChessNotation.js';
import {
  Move,
  MoveKind,
  Piece,
  PROMOTION_TYPES,
  Color,
  oppositeColor,
} from './types.js';

export interface GenerationOptions {
  /** Include castling candidates (default true) */
  includeCastling?: boolean;
}

type Direction = readonly [number, number];

const QUEEN_DIRECTIONS: readonly Direction[] = [...ORTHOGONAL, ...DIAGONAL];

// ===========================================================================
// Helpers
// ===========================================================================

function push(moves: Move[], piece: Piece, row: number, col: number, kind: MoveKind, extra: Partial<Move> = {}): void {
  moves.push({
    from: piece.square,
    to: makeSquare(row, col),
    piece: piece.kind,
    color: piece.color,
    kind,
    ...extra,
  });
}

/** Quiet move or capture onto (row, col); true only when the square was empty */
function pushTarget(board: ChessBoard, moves: Move[], piece: Piece, row: number, col: number): boolean {
  const target = board.pieceAt(row, col);
  if (!target) {
    push(moves, piece, row, col, 'normal');
    return true;
  }
  if (target.color !== piece.color) {
    push(moves, piece, row, col, 'capture', { captured: target.kind });
  }
  return false;
}

function onBoard(row: number, col: number): boolean {
  return row >= 0 && row < 8 && col >= 0 && col < 8;
}

// ===========================================================================
// Generators per kind
// ===========================================================================

function slidingMoves(board: ChessBoard, piece: Piece, directions: readonly Direction[]): Move[] {
  const moves: Move[] = [];
  for (const [dr, dc] of directions) {
    let row = piece.square.row + dr;
    let col = piece.square.col + dc;
    while (onBoard(row, col)) {
      if (!pushTarget(board, moves, piece, row, col)) break;
      row += dr;
      col += dc;
    }
  }
  return moves;
}

function offsetMoves(board: ChessBoard, piece: Piece, offsets: readonly Direction[]): Move[] {
  const moves: Move[] = [];
  for (const [dr, dc] of offsets) {
    const row = piece.square.row + dr;
    const col = piece.square.col + dc;
    if (onBoard(row, col)) pushTarget(board, moves, piece, row, col);
  }
  return moves;
}

function pawnMoves(board: ChessBoard, piece: Piece): Move[] {
  const moves: Move[] = [];
  const dir = pawnDirection(piece.color);
  const { row, col } = piece.square;
  const startRow = piece.color === 'w' ? 6 : 1;
  const lastRow = piece.color === 'w' ? 0 : 7;
  const ahead = row + dir;
  if (!onBoard(ahead, col)) return moves;

  // Pushes
  if (!board.pieceAt(ahead, col)) {
    if (ahead === lastRow) {
      for (const promotion of PROMOTION_TYPES) {
        push(moves, piece, ahead, col, 'promotion', { promotion });
      }
    } else {
      push(moves, piece, ahead, col, 'normal');
      if (row === startRow && !board.pieceAt(row + 2 * dir, col)) {
        push(moves, piece, row + 2 * dir, col, 'normal');
      }
    }
  }

  // Captures, including en passant
  for (const dc of [-1, 1]) {
    const c = col + dc;
    if (c < 0 || c > 7) continue;
    const target = board.pieceAt(ahead, c);
    if (target && target.color !== piece.color) {
      if (ahead === lastRow) {
        for (const promotion of PROMOTION_TYPES) {
          push(moves, piece, ahead, c, 'promotion', { promotion, captured: target.kind });
        }
      } else {
        push(moves, piece, ahead, c, 'capture', { captured: target.kind });
      }
    } else if (!target && board.enPassant && board.enPassant.row === ahead && board.enPassant.col === c) {
      const passed = board.pieceAt(row, c);
      if (passed && passed.kind === 'p' && passed.color !== piece.color) {
        push(moves, piece, ahead, c, 'enPassant', { captured: 'p' });
      }
    }
  }
  return moves;
}

function castlingMoves(board: ChessBoard, king: Piece): Move[] {
  const moves: Move[] = [];
  const row = homeRow(king.color);
  if (king.hasMoved || king.square.row !== row || king.square.col !== 4) return moves;

  const enemy: Color = oppositeColor(king.color);
  const sides: ReadonlyArray<{ rookCol: number; empty: number[]; path: number[]; toCol: number }> = [
    { rookCol: 7, empty: [5, 6], path: [4, 5, 6], toCol: 6 },
    { rookCol: 0, empty: [1, 2, 3], path: [4, 3, 2], toCol: 2 },
  ];

  for (const side of sides) {
    const rook = board.pieceAt(row, side.rookCol);
    if (!rook || rook.kind !== 'r' || rook.color !== king.color || rook.hasMoved) continue;
    if (side.empty.some(col => board.pieceAt(row, col) !== null)) continue;
    if (side.path.some(col => isSquareAttacked(board, makeSquare(row, col), enemy))) continue;
    push(moves, king, row, side.toCol, 'castle');
  }
  return moves;
}

// ===========================================================================
// Public API
// ===========================================================================

/**
 * Pseudo-legal moves for one piece. A piece with nowhere to go yields [].
 */
export function pseudoLegalMoves(board: ChessBoard, piece: Piece, options: GenerationOptions = {}): Move[] {
  switch (piece.kind) {
    case 'p':
      return pawnMoves(board, piece);
    case 'n':
      return offsetMoves(board, piece, KNIGHT_OFFSETS);
    case 'b':
      return slidingMoves(board, piece, DIAGONAL);
    case 'r':
      return slidingMoves(board, piece, ORTHOGONAL);
    case 'q':
      return slidingMoves(board, piece, QUEEN_DIRECTIONS);
    case 'k': {
      const moves = offsetMoves(board, piece, KING_OFFSETS);
      if (options.includeCastling ?? true) moves.push(...castlingMoves(board, piece));
      return moves;
    }
  }
}

/** Pseudo-legal moves for every piece of a color, in board slot order */
export function pseudoLegalMovesFor(board: ChessBoard, color: Color, options: GenerationOptions = {}): Move[] {
  const moves: Move[] = [];
  for (const piece of board.pieces(color)) {
    moves.push(...pseudoLegalMoves(board, piece, options));
  }
  return moves;
}
