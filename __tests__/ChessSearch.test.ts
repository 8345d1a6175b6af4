/**
 * Search Tests
 *
 * - Tactics at shallow depth
 * - Alpha-beta agrees with plain minimax
 * - Time budget and terminal positions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChessBoard } from '../src/chess/ChessBoard.js';
import { ChessEvaluator } from '../src/chess/ChessEvaluator.js';
import { moveToLan } from '../src/chess/ChessNotation.js';
import { ChessSearch, MATE_SCORE, MAX_STATIC_SCORE, isMateScore } from '../src/chess/ChessSearch.js';
import type { Color } from '../src/chess/types.js';

const QUEEN_HANGS = '4k3/8/8/4q3/3P4/8/8/K7 w - - 0 1';
const MATE_IN_ONE = '6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1';
const MATED = '6rk/6p1/8/8/8/8/8/K6Q b - - 0 1';
const STALEMATE = 'k7/8/1Q6/8/8/8/8/7K b - - 0 1';
const MIDDLEGAME = 'r3k2r/pppq1ppp/2n1bn2/3pp3/3PP3/2N1BN2/PPPQ1PPP/R3K2R w KQkq - 0 1';

const materialOnly = (): ChessEvaluator =>
  new ChessEvaluator({ material: 1, pieceSquare: 0, pawnStructure: 0, centerControl: 0 });

/** Scores every position the same for the side asked about */
class FixedEvaluator extends ChessEvaluator {
  constructor(private readonly value: number) {
    super();
  }

  score(_board: ChessBoard, _perspective: Color): number {
    return this.value;
  }
}

// =============================================================================
// Tactics
// =============================================================================

describe('ChessSearch tactics', () => {
  let search: ChessSearch;

  beforeEach(() => {
    search = new ChessSearch(materialOnly());
  });

  it('takes a hanging queen at depth 1', () => {
    const result = search.search(ChessBoard.fromFen(QUEEN_HANGS), 1, 10000);
    expect(result.bestMove && moveToLan(result.bestMove)).toBe('d4e5');
    expect(result.bestMove?.captured).toBe('q');
    expect(result.score).toBe(100);
    expect(result.depth).toBe(1);
  });

  it('keeps the queen capture at depth 2', () => {
    const result = search.search(ChessBoard.fromFen(QUEEN_HANGS), 2, 10000);
    expect(result.bestMove && moveToLan(result.bestMove)).toBe('d4e5');
    expect(result.score).toBe(100);
  });

  it('finds a back-rank mate and stops deepening', () => {
    const result = search.search(ChessBoard.fromFen(MATE_IN_ONE), 3, 10000);
    expect(result.bestMove && moveToLan(result.bestMove)).toBe('a1a8');
    expect(result.score).toBe(MATE_SCORE - 1);
    expect(isMateScore(result.score)).toBe(true);
    expect(result.depth).toBe(1);
    expect(result.pv.map(moveToLan)).toEqual(['a1a8']);
  });
});

// =============================================================================
// Alpha-Beta vs Minimax
// =============================================================================

describe('Alpha-beta pruning', () => {
  it.each([
    [QUEEN_HANGS, 3],
    [MATE_IN_ONE.replace('R5K1', 'R4K2'), 2],
    [MIDDLEGAME, 2],
  ])('matches minimax on %s at depth %i', (fen, depth) => {
    const evaluator = new ChessEvaluator();
    const pruned = new ChessSearch(evaluator, { useAlphaBeta: true }).search(ChessBoard.fromFen(fen), depth, 60000);
    const full = new ChessSearch(evaluator, { useAlphaBeta: false }).search(ChessBoard.fromFen(fen), depth, 60000);

    expect(pruned.score).toBe(full.score);
    expect(pruned.bestMove && moveToLan(pruned.bestMove)).toBe(full.bestMove && moveToLan(full.bestMove));
    expect(pruned.nodes).toBeLessThanOrEqual(full.nodes);
  });

  it('gives the same answer with capture ordering', () => {
    const evaluator = new ChessEvaluator();
    const plain = new ChessSearch(evaluator).search(ChessBoard.fromFen(MIDDLEGAME), 2, 60000);
    const ordered = new ChessSearch(evaluator, { useMoveOrdering: true }).search(ChessBoard.fromFen(MIDDLEGAME), 2, 60000);
    expect(ordered.score).toBe(plain.score);
  });
});

// =============================================================================
// Budget & Board State
// =============================================================================

describe('Search bookkeeping', () => {
  it('leaves the board as it found it', () => {
    const board = ChessBoard.fromFen(MIDDLEGAME);
    new ChessSearch().search(board, 2, 60000);
    expect(board.toFen()).toBe(MIDDLEGAME);
    expect(board.depth).toBe(0);
  });

  it('always completes depth 1 under a zero budget', () => {
    const result = new ChessSearch().search(ChessBoard.startingPosition(), 4, 0);
    expect(result.depth).toBe(1);
    expect(result.aborted).toBe(true);
    expect(result.bestMove).not.toBeNull();
  });

  it('reports no move when the side to move is mated', () => {
    const result = new ChessSearch().search(ChessBoard.fromFen(MATED), 3, 1000);
    expect(result.bestMove).toBeNull();
    expect(result.score).toBe(-MATE_SCORE);
    expect(result.depth).toBe(0);
  });

  it('scores stalemate as level', () => {
    const result = new ChessSearch().search(ChessBoard.fromFen(STALEMATE), 3, 1000);
    expect(result.bestMove).toBeNull();
    expect(result.score).toBe(0);
  });

  it('counts nodes and evaluations', () => {
    const search = new ChessSearch();
    const result = search.search(ChessBoard.startingPosition(), 2, 60000);
    const stats = search.getStats();
    expect(stats.nodes).toBe(result.nodes);
    expect(stats.nodes).toBeGreaterThan(20);
    expect(stats.evaluations).toBeGreaterThan(0);
    expect(stats.depth).toBe(2);
  });

  it('merges configuration updates', () => {
    const search = new ChessSearch(undefined, { maxDepth: 2 });
    search.setConfig({ useMoveOrdering: true });
    expect(search.getConfig()).toEqual({
      maxDepth: 2,
      maxTime: 5000,
      useAlphaBeta: true,
      useMoveOrdering: true,
    });
  });
});

// =============================================================================
// Score Bounds
// =============================================================================

describe('Score bounds', () => {
  it('still returns a move when every line scores far below zero', () => {
    const board = ChessBoard.fromFen('3qk3/8/8/8/8/8/4P3/4K3 w - - 0 1');
    const result = new ChessSearch(new FixedEvaluator(-5_000_000)).search(board, 2, 10000);

    expect(result.bestMove && moveToLan(result.bestMove)).toBe('e2e3');
    expect(result.score).toBe(-MAX_STATIC_SCORE);
    expect(isMateScore(result.score)).toBe(false);
    expect(result.depth).toBe(2);
  });

  it('keeps deepening with a heavy material weight', () => {
    const evaluator = new ChessEvaluator({ material: 5, pieceSquare: 0, pawnStructure: 0, centerControl: 0 });
    const result = new ChessSearch(evaluator).search(ChessBoard.fromFen('4k3/8/8/8/8/8/8/Q3K3 w - - 0 1'), 3, 60000);

    expect(result.score).toBe(4500);
    expect(isMateScore(result.score)).toBe(false);
    expect(result.depth).toBe(3);
  });
});
