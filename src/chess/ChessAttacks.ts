/**
 * Attack detection.
 *
 * Works backwards from the target square: looks for a pawn, knight or king
 * on the squares that could reach it, then walks each ray outwards until
 * the first piece. Never generates moves, so castling generation can call
 * it without recursing into itself.
 */

import type { ChessBoard } from './ChessBoard.js';
import type { Color, PieceType, Square } from './types.js';

export const KNIGHT_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-2, -1], [-2, 1], [-1, -2], [-1, 2],
  [1, -2], [1, 2], [2, -1], [2, 1],
];

export const KING_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
];

export const ORTHOGONAL: ReadonlyArray<readonly [number, number]> = [
  [-1, 0], [1, 0], [0, -1], [0, 1],
];

export const DIAGONAL: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 1], [1, -1], [1, 1],
];

/** Row step a pawn of this color moves along */
export function pawnDirection(color: Color): number {
  return color === 'w' ? -1 : 1;
}

function hasPieceAt(board: ChessBoard, row: number, col: number, color: Color, kind: PieceType): boolean {
  const piece = board.pieceAt(row, col);
  return piece !== null && piece.color === color && piece.kind === kind;
}

function rayHits(
  board: ChessBoard,
  square: Square,
  directions: ReadonlyArray<readonly [number, number]>,
  byColor: Color,
  sliders: readonly PieceType[]
): boolean {
  for (const [dr, dc] of directions) {
    let row = square.row + dr;
    let col = square.col + dc;
    while (row >= 0 && row < 8 && col >= 0 && col < 8) {
      const piece = board.pieceAt(row, col);
      if (piece) {
        if (piece.color === byColor && sliders.includes(piece.kind)) return true;
        break;
      }
      row += dr;
      col += dc;
    }
  }
  return false;
}

/**
 * Whether any piece of `byColor` attacks `square`. Purely geometric:
 * pins and the attacker's own king safety are ignored.
 */
export function isSquareAttacked(board: ChessBoard, square: Square, byColor: Color): boolean {
  // A pawn attacks from one row behind its direction of travel
  const pawnRow = square.row - pawnDirection(byColor);
  if (
    hasPieceAt(board, pawnRow, square.col - 1, byColor, 'p') ||
    hasPieceAt(board, pawnRow, square.col + 1, byColor, 'p')
  ) {
    return true;
  }

  for (const [dr, dc] of KNIGHT_OFFSETS) {
    if (hasPieceAt(board, square.row + dr, square.col + dc, byColor, 'n')) return true;
  }

  for (const [dr, dc] of KING_OFFSETS) {
    if (hasPieceAt(board, square.row + dr, square.col + dc, byColor, 'k')) return true;
  }

  return (
    rayHits(board, square, ORTHOGONAL, byColor, ['r', 'q']) ||
    rayHits(board, square, DIAGONAL, byColor, ['b', 'q'])
  );
}
