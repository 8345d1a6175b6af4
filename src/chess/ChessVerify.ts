/**
 * Move generator cross-check against chess.js
 *
 * Runs perft on both generators and reports every root move whose subtree
 * count differs, or that only one side generates.
 */

import { Chess } from 'chess.js';
import { ChessBoard } from './ChessBoard.js';
import { divide } from './ChessRules.js';

export interface PerftMismatch {
  /** Root move in long algebraic notation */
  move: string;
  /** chess.js count; null when chess.js does not generate the move */
  expected: number | null;
  /** Our count; null when we do not generate the move */
  actual: number | null;
}

export interface VerifyResult {
  fen: string;
  depth: number;
  expected: number;
  actual: number;
  mismatches: PerftMismatch[];
}

function referencePerft(chess: Chess, depth: number): number {
  if (depth <= 0) return 1;
  const moves = chess.moves({ verbose: true });
  if (depth === 1) return moves.length;
  let nodes = 0;
  for (const move of moves) {
    chess.move(move);
    nodes += referencePerft(chess, depth - 1);
    chess.undo();
  }
  return nodes;
}

/** chess.js perft split by root move */
export function referenceDivide(fen: string, depth: number): Map<string, number> {
  const chess = new Chess(fen);
  const result = new Map<string, number>();
  for (const move of chess.moves({ verbose: true })) {
    chess.move(move);
    result.set(`${move.from}${move.to}${move.promotion ?? ''}`, referencePerft(chess, depth - 1));
    chess.undo();
  }
  return result;
}

export function verifyPerft(fen: string, depth: number): VerifyResult {
  const expected = referenceDivide(fen, depth);
  const actual = divide(ChessBoard.fromFen(fen), depth);

  const mismatches: PerftMismatch[] = [];
  for (const [move, count] of expected) {
    const ours = actual.get(move);
    if (ours !== count) {
      mismatches.push({ move, expected: count, actual: ours ?? null });
    }
  }
  for (const [move, count] of actual) {
    if (!expected.has(move)) {
      mismatches.push({ move, expected: null, actual: count });
    }
  }

  const sum = (counts: Map<string, number>): number => [...counts.values()].reduce((a, b) => a + b, 0);
  return {
    fen,
    depth,
    expected: sum(expected),
    actual: sum(actual),
    mismatches,
  };
}
