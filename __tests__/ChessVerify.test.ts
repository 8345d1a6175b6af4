/**
 * Move generator cross-check against chess.js
 */

import { describe, it, expect } from 'vitest';
import { ChessBoard } from '../src/chess/ChessBoard.js';
import { perft } from '../src/chess/ChessRules.js';
import { referenceDivide, verifyPerft } from '../src/chess/ChessVerify.js';
import { STARTING_FEN } from '../src/chess/types.js';

const POSITIONS: Array<[string, string]> = [
  ['castling on both wings', 'r3k2r/pppq1ppp/2n1bn2/3pp3/3PP3/2N1BN2/PPPQ1PPP/R3K2R w KQkq - 0 1'],
  ['en passant and promotions', '4k3/1P6/8/2pP4/8/8/6p1/4K2R w K c6 0 1'],
  ['pinned pawn, Black to move', '4k2r/8/8/8/1b6/8/3P4/R3K2R b KQk - 0 1'],
];

describe('verifyPerft', () => {
  it('agrees with chess.js from the starting position', () => {
    const result = verifyPerft(STARTING_FEN, 3);
    expect(result.mismatches).toEqual([]);
    expect(result.actual).toBe(result.expected);
    expect(result.actual).toBe(perft(ChessBoard.startingPosition(), 3));
  });

  it.each(POSITIONS)('agrees with chess.js: %s', (_name, fen) => {
    const result = verifyPerft(fen, 3);
    expect(result.mismatches).toEqual([]);
    expect(result.actual).toBe(result.expected);
  });

  it('keys root moves by long algebraic notation', () => {
    const counts = referenceDivide('4k3/P7/8/8/8/8/8/4K3 w - - 0 1', 1);
    expect([...counts.keys()].filter(move => move.startsWith('a7')).sort()).toEqual([
      'a7a8b',
      'a7a8n',
      'a7a8q',
      'a7a8r',
    ]);
  });

  it('counts castling the same way', () => {
    const result = verifyPerft('4k3/8/8/8/8/8/8/4K2R w K - 0 1', 1);
    expect(result.mismatches).toEqual([]);
    expect(result.expected).toBe(15);
  });
});
