/**
 * Square and move notation helpers.
 */

import { ChessError } from './ChessErrors.js';
import { Color, FILES, Move, PieceSymbol, PieceType, Square } from './types.js';

export function makeSquare(row: number, col: number): Square {
  return { row, col };
}

export function isWithinBounds(square: Square): boolean {
  return (
    Number.isInteger(square.row) &&
    Number.isInteger(square.col) &&
    square.row >= 0 && square.row < 8 &&
    square.col >= 0 && square.col < 8
  );
}

/** Throws INVALID_SQUARE unless the square is on the board */
export function assertSquare(square: Square): void {
  if (!isWithinBounds(square)) {
    throw new ChessError('INVALID_SQUARE', `Square out of bounds: (${square.row}, ${square.col})`, {
      row: square.row,
      col: square.col,
    });
  }
}

export function squaresEqual(a: Square, b: Square): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Slot index, 0 = a8 .. 63 = h1 */
export function squareIndex(square: Square): number {
  return square.row * 8 + square.col;
}

export function squareFromIndex(index: number): Square {
  return { row: Math.floor(index / 8), col: index % 8 };
}

/**
 * Convert a square to algebraic notation
 */
export function toAlgebraic(square: Square): string {
  assertSquare(square);
  return `${FILES[square.col]}${8 - square.row}`;
}

/**
 * Parse algebraic notation ("e4"), throws INVALID_SQUARE for anything else
 */
export function parseSquare(text: string): Square {
  const t = text.trim().toLowerCase();
  const match = /^([a-h])([1-8])$/.exec(t);
  if (!match) {
    throw new ChessError('INVALID_SQUARE', `Not a square: "${text}"`, { text });
  }
  const col = match[1].charCodeAt(0) - 97;
  const row = 8 - Number(match[2]);
  return { row, col };
}

export function pieceSymbol(kind: PieceType, color: Color): PieceSymbol {
  const upper: Record<PieceType, PieceSymbol> = { p: 'P', n: 'N', b: 'B', r: 'R', q: 'Q', k: 'K' };
  return color === 'w' ? upper[kind] : kind;
}

/**
 * Coordinate notation: "e2e4", "e7e8q", and "O-O" / "O-O-O" for castles
 */
export function moveToString(move: Move): string {
  if (move.kind === 'castle') {
    return move.to.col > move.from.col ? 'O-O' : 'O-O-O';
  }
  return `${toAlgebraic(move.from)}${toAlgebraic(move.to)}${move.promotion ?? ''}`;
}

/** Long algebraic form used by UCI and chess.js ("e1g1" for castles) */
export function moveToLan(move: Move): string {
  return `${toAlgebraic(move.from)}${toAlgebraic(move.to)}${move.promotion ?? ''}`;
}
