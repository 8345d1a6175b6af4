/**
 * ChessMCTS - Monte Carlo tree search
 *
 * - UCB1 selection, one expansion per iteration
 * - Random playouts, scored as a draw after maxPlayoutMoves plies
 * - The most visited root move is played
 *
 * The tree is walked on the caller's board with makeMove/unmakeMove and the
 * board is restored before search returns.
 */

import type { ChessBoard } from './ChessBoard.js';
import {
  getGameStatus,
  hasLegalMove,
  isFiftyMoveDraw,
  isInCheck,
  isInsufficientMaterial,
  isTerminal,
  legalMovesFor,
} from './ChessRules.js';
import {
  Color,
  DEFAULT_MCTS_CONFIG,
  MCTSConfig,
  MCTSResult,
  Move,
  RandomSource,
  oppositeColor,
} from './types.js';

interface TreeNode {
  parent: TreeNode | null;
  children: ChildNode[];
  /** Moves not yet expanded; empty at game-over nodes */
  untried: Move[];
  /** Side that played into this node */
  mover: Color;
  /** Playout results from the mover's side: 1 win, 0.5 draw */
  wins: number;
  visits: number;
}

type ChildNode = TreeNode & { move: Move };

// =============================================================================
// ChessMCTS Class
// =============================================================================

export class ChessMCTS {
  private config: MCTSConfig;
  private readonly random: RandomSource;

  constructor(config?: Partial<MCTSConfig>, random: RandomSource = Math.random) {
    this.config = { ...DEFAULT_MCTS_CONFIG, ...config };
    this.random = random;
  }

  /**
   * Pick a move for the side to move.
   * @param maxTime - Overrides the configured time budget (ms)
   */
  search(board: ChessBoard, maxTime?: number): MCTSResult {
    const startTime = Date.now();
    const timeLimit = maxTime ?? this.config.maxTime;

    // The root always expands, even in a position the draw rules end
    const root: TreeNode = {
      parent: null,
      children: [],
      untried: legalMovesFor(board),
      mover: oppositeColor(board.turn),
      wins: 0,
      visits: 0,
    };

    let iterations = 0;
    if (root.untried.length > 0) {
      while (
        iterations === 0 ||
        (iterations < this.config.maxIterations && Date.now() - startTime < timeLimit)
      ) {
        this.iterate(board, root);
        iterations++;
      }
    }

    let best: ChildNode | null = null;
    for (const child of root.children) {
      if (!best || child.visits > best.visits) best = child;
    }

    return {
      bestMove: best ? best.move : null,
      visits: best ? best.visits : 0,
      winRate: best && best.visits > 0 ? best.wins / best.visits : 0,
      iterations,
      time: Date.now() - startTime,
    };
  }

  getConfig(): MCTSConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<MCTSConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /** Selection, expansion, playout and backpropagation */
  private iterate(board: ChessBoard, root: TreeNode): void {
    let node = root;
    let made = 0;
    try {
      while (node.untried.length === 0 && node.children.length > 0) {
        const child = this.selectChild(node);
        board.makeMove(child.move);
        made++;
        node = child;
      }

      if (node.untried.length > 0) {
        const [move] = node.untried.splice(this.pick(node.untried.length), 1);
        board.makeMove(move);
        made++;
        const child = this.createChild(board, node, move);
        node.children.push(child);
        node = child;
      }

      const winner = this.playout(board);
      for (let current: TreeNode | null = node; current; current = current.parent) {
        current.visits++;
        current.wins += winner === null ? 0.5 : winner === current.mover ? 1 : 0;
      }
    } finally {
      for (; made > 0; made--) board.unmakeMove();
    }
  }

  private createChild(board: ChessBoard, parent: TreeNode, move: Move): ChildNode {
    const over = isTerminal(getGameStatus(board));
    return {
      parent,
      move,
      children: [],
      untried: over ? [] : legalMovesFor(board),
      mover: move.color,
      wins: 0,
      visits: 0,
    };
  }

  /** UCB1; unvisited children first, ties keep the earlier child */
  private selectChild(node: TreeNode): ChildNode {
    const logVisits = Math.log(node.visits);
    let best = node.children[0];
    let bestScore = Number.NEGATIVE_INFINITY;
    for (const child of node.children) {
      const score =
        child.visits === 0
          ? Number.POSITIVE_INFINITY
          : child.wins / child.visits + this.config.exploration * Math.sqrt(logVisits / child.visits);
      if (score > bestScore) {
        bestScore = score;
        best = child;
      }
    }
    return best;
  }

  /**
   * Play random legal moves from the current position and undo them.
   * Returns the winner, or null for a draw or an unfinished playout.
   */
  private playout(board: ChessBoard): Color | null {
    let played = 0;
    try {
      while (played < this.config.maxPlayoutMoves) {
        if (isInsufficientMaterial(board) || isFiftyMoveDraw(board)) return null;
        const moves = legalMovesFor(board);
        if (moves.length === 0) break;
        board.makeMove(moves[this.pick(moves.length)]);
        played++;
      }
      if (hasLegalMove(board)) return null;
      return isInCheck(board, board.turn) ? oppositeColor(board.turn) : null;
    } finally {
      for (; played > 0; played--) board.unmakeMove();
    }
  }

  private pick(count: number): number {
    return Math.min(count - 1, Math.floor(this.random() * count));
  }
}
