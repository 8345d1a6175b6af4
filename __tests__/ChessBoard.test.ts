/**
 * Position model tests
 *
 * - Square notation
 * - FEN parsing and output
 * - makeMove / unmakeMove for every special move
 */

import { describe, it, expect } from 'vitest';
import { ChessBoard } from '../src/chess/ChessBoard.js';
import { ChessError, isChessError } from '../src/chess/ChessErrors.js';
import { moveToLan, moveToString, parseSquare, toAlgebraic } from '../src/chess/ChessNotation.js';
import { legalMovesFor } from '../src/chess/ChessRules.js';
import { STARTING_FEN } from '../src/chess/types.js';
import type { Move } from '../src/chess/types.js';

function findMove(board: ChessBoard, lan: string): Move {
  const move = legalMovesFor(board).find(m => moveToLan(m) === lan);
  if (!move) throw new Error(`${lan} is not legal in ${board.toFen()}`);
  return move;
}

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isChessError(error) ? error.code : 'not a ChessError';
  }
  return null;
}

// =============================================================================
// Notation
// =============================================================================

describe('Square notation', () => {
  it('maps algebraic names to rows and columns', () => {
    expect(parseSquare('e4')).toEqual({ row: 4, col: 4 });
    expect(parseSquare('a8')).toEqual({ row: 0, col: 0 });
    expect(parseSquare('h1')).toEqual({ row: 7, col: 7 });
  });

  it('formats squares back to algebraic', () => {
    expect(toAlgebraic({ row: 7, col: 4 })).toBe('e1');
    expect(toAlgebraic({ row: 0, col: 7 })).toBe('h8');
  });

  it('rejects text that is not a square', () => {
    expect(errorCode(() => parseSquare('i9'))).toBe('INVALID_SQUARE');
    expect(errorCode(() => parseSquare('e'))).toBe('INVALID_SQUARE');
  });

  it('writes castles as O-O and O-O-O', () => {
    const board = ChessBoard.fromFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');
    expect(moveToString(findMove(board, 'e1g1'))).toBe('O-O');
    expect(moveToString(findMove(board, 'e1c1'))).toBe('O-O-O');
    expect(moveToLan(findMove(board, 'e1g1'))).toBe('e1g1');
  });
});

// =============================================================================
// FEN
// =============================================================================

describe('FEN', () => {
  it('round-trips the starting position', () => {
    const board = ChessBoard.startingPosition();
    expect(board.toFen()).toBe(STARTING_FEN);
    expect(board.turn).toBe('w');
    expect(board.castlingRights()).toEqual({
      whiteKingside: true,
      whiteQueenside: true,
      blackKingside: true,
      blackQueenside: true,
    });
  });

  it('derives castling rights from the castling field', () => {
    const board = ChessBoard.fromFen('r3k2r/8/8/8/8/8/8/R3K2R w Kq - 0 1');
    expect(board.castlingRights()).toEqual({
      whiteKingside: true,
      whiteQueenside: false,
      blackKingside: false,
      blackQueenside: true,
    });
    expect(board.toFen()).toBe('r3k2r/8/8/8/8/8/8/R3K2R w Kq - 0 1');
  });

  it('accepts four-field FEN with default counters', () => {
    const board = ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K3 b - -');
    expect(board.toFen()).toBe('4k3/8/8/8/8/8/8/4K3 b - - 0 1');
  });

  it('rejects malformed FEN', () => {
    expect(errorCode(() => ChessBoard.fromFen('bad'))).toBe('INVALID_FEN');
    expect(errorCode(() => ChessBoard.fromFen('8/8/8/8/8/8/8/K7 w - - 0 1'))).toBe('INVALID_FEN');
    expect(errorCode(() => ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K3 x - - 0 1'))).toBe('INVALID_FEN');
    expect(errorCode(() => ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K3 w - - -1 1'))).toBe('INVALID_FEN');
    expect(errorCode(() => ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K4 w - - 0 1'))).toBe('INVALID_FEN');
  });

  it('keeps the first four fields as the position key', () => {
    const board = ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 12 40');
    expect(board.positionKey()).toBe('4k3/8/8/8/8/8/8/4K3 w - -');
  });

  it('keeps the en passant square in the key only when it can be taken', () => {
    const board = ChessBoard.startingPosition();
    board.makeMove(findMove(board, 'e2e4'));
    expect(board.toFen()).toContain(' b KQkq e3 ');
    expect(board.positionKey()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq -');

    const capturable = ChessBoard.fromFen('4k3/8/8/8/3p4/8/4P3/4K3 w - - 0 1');
    capturable.makeMove(findMove(capturable, 'e2e4'));
    expect(capturable.positionKey()).toBe('4k3/8/8/8/3pP3/8/8/4K3 b - e3');
  });
});

// =============================================================================
// Slot access
// =============================================================================

describe('Slot access', () => {
  it('reads pieces by square', () => {
    const board = ChessBoard.startingPosition();
    expect(board.get(parseSquare('e1'))).toMatchObject({ kind: 'k', color: 'w' });
    expect(board.get(parseSquare('d8'))).toMatchObject({ kind: 'q', color: 'b' });
    expect(board.get(parseSquare('e4'))).toBeNull();
  });

  it('raises INVALID_SQUARE off the board', () => {
    const board = ChessBoard.startingPosition();
    expect(() => board.get({ row: 8, col: 0 })).toThrow(ChessError);
    expect(errorCode(() => board.get({ row: 0, col: -1 }))).toBe('INVALID_SQUARE');
    expect(board.pieceAt(8, 0)).toBeNull();
    expect(board.isWithinBounds({ row: 7, col: 7 })).toBe(true);
    expect(board.isWithinBounds({ row: 7, col: 8 })).toBe(false);
  });

  it('moves a placed piece to its new square', () => {
    const board = ChessBoard.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 0 1');
    const piece = { kind: 'n' as const, color: 'w' as const, square: parseSquare('a1'), hasMoved: true };
    board.place(parseSquare('d4'), piece);
    expect(piece.square).toEqual({ row: 4, col: 3 });
    expect(board.remove(parseSquare('d4'))).toBe(piece);
    expect(board.get(parseSquare('d4'))).toBeNull();
  });

  it('lists pieces in a8..h1 order', () => {
    const board = ChessBoard.fromFen('4k3/8/8/8/8/8/8/N3K3 w - - 0 1');
    expect(board.pieces().map(p => toAlgebraic(p.square))).toEqual(['e8', 'a1', 'e1']);
    expect(board.pieces('w').map(p => p.kind)).toEqual(['n', 'k']);
    expect(board.findKing('b')).toEqual({ row: 0, col: 4 });
  });

  it('draws an ASCII diagram', () => {
    const lines = ChessBoard.startingPosition().ascii().split('\n');
    expect(lines[0]).toBe('   +------------------------+');
    expect(lines[1]).toBe(' 8 | r  n  b  q  k  b  n  r |');
    expect(lines[5]).toBe(' 4 | .  .  .  .  .  .  .  . |');
    expect(lines[8]).toBe(' 1 | R  N  B  Q  K  B  N  R |');
    expect(lines[10]).toBe('     a  b  c  d  e  f  g  h');
  });
});

// =============================================================================
// Make / Unmake
// =============================================================================

describe('makeMove / unmakeMove', () => {
  it('sets the en passant target after a double push', () => {
    const board = ChessBoard.startingPosition();
    board.makeMove(findMove(board, 'e2e4'));
    expect(board.toFen()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
    expect(board.depth).toBe(1);
    expect(board.lastMove()).toMatchObject({ kind: 'normal', piece: 'p' });

    board.unmakeMove();
    expect(board.toFen()).toBe(STARTING_FEN);
    expect(board.depth).toBe(0);
  });

  it('counts half and full moves', () => {
    const board = ChessBoard.startingPosition();
    board.makeMove(findMove(board, 'g1f3'));
    board.makeMove(findMove(board, 'g8f6'));
    expect(board.halfMoveClock).toBe(2);
    expect(board.fullMoveNumber).toBe(2);
    expect(board.turn).toBe('w');
  });

  it('castles kingside and restores the rights on unmake', () => {
    const fen = 'r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1';
    const board = ChessBoard.fromFen(fen);
    board.makeMove(findMove(board, 'e1g1'));

    expect(board.get(parseSquare('g1'))).toMatchObject({ kind: 'k', color: 'w' });
    expect(board.get(parseSquare('f1'))).toMatchObject({ kind: 'r', color: 'w' });
    expect(board.get(parseSquare('h1'))).toBeNull();
    expect(board.toFen()).toBe('r3k2r/8/8/8/8/8/8/R4RK1 b kq - 1 1');

    board.unmakeMove();
    expect(board.toFen()).toBe(fen);
    expect(board.castlingRights().whiteKingside).toBe(true);
  });

  it('castles queenside', () => {
    const board = ChessBoard.fromFen('r3k2r/8/8/8/8/8/8/R3K2R b KQkq - 0 1');
    board.makeMove(findMove(board, 'e8c8'));
    expect(board.toFen()).toBe('2kr3r/8/8/8/8/8/8/R3K2R w KQ - 1 2');
  });

  it('promotes and demotes a pawn', () => {
    const fen = '4k3/P7/8/8/8/8/8/4K3 w - - 0 1';
    const board = ChessBoard.fromFen(fen);
    board.makeMove(findMove(board, 'a7a8q'));
    expect(board.toFen()).toBe('Q3k3/8/8/8/8/8/8/4K3 b - - 0 1');

    board.unmakeMove();
    expect(board.toFen()).toBe(fen);
    expect(board.get(parseSquare('a7'))).toMatchObject({ kind: 'p', color: 'w' });
  });

  it('captures en passant and puts the pawn back on unmake', () => {
    const fen = '4k3/8/8/3pP3/8/8/8/4K3 w - d6 0 1';
    const board = ChessBoard.fromFen(fen);
    const move = findMove(board, 'e5d6');
    expect(move.kind).toBe('enPassant');
    expect(move.captured).toBe('p');

    board.makeMove(move);
    expect(board.toFen()).toBe('4k3/8/3P4/8/8/8/8/4K3 b - - 0 1');

    board.unmakeMove();
    expect(board.toFen()).toBe(fen);
  });

  it('rejects a move whose piece is not on the board', () => {
    const board = ChessBoard.startingPosition();
    const move = findMove(board, 'e2e4');
    board.makeMove(move);
    expect(errorCode(() => board.makeMove(move))).toBe('ILLEGAL_MOVE');
  });

  it('returns null when there is nothing to unmake', () => {
    expect(ChessBoard.startingPosition().unmakeMove()).toBeNull();
  });

  it('keeps a clone independent of its source', () => {
    const board = ChessBoard.startingPosition();
    const copy = board.clone();
    copy.makeMove(findMove(copy, 'd2d4'));
    expect(board.toFen()).toBe(STARTING_FEN);
    expect(copy.toFen()).not.toBe(STARTING_FEN);
    expect(copy.depth).toBe(1);
  });
});
