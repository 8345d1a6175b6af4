/**
 * ChessMatch - AI vs AI match controller
 */

import { ChessAI } from './ChessAI.js';
import { ChessEngine } from './ChessEngine.js';
import { moveToString } from './ChessNotation.js';
import type { AIConfig, AIMove, GameSnapshot, GameStatus } from './types.js';

export interface MatchMove {
  move: string;
  evaluation: number;
  time: number;
}

export interface MatchResult {
  /** "1-0", "0-1" or "1/2-1/2"; "*" when the move limit ended the match */
  result: string;
  reason: GameStatus['kind'] | GameStatus['drawReason'] | 'max_moves';
  moves: MatchMove[];
  finalFen: string;
}

export class ChessMatch {
  private engine: ChessEngine;
  private whiteAI: ChessAI;
  private blackAI: ChessAI;
  private moveHistory: MatchMove[] = [];
  private onMove?: (snapshot: GameSnapshot, aiMove: AIMove) => void;

  constructor(whiteConfig: Partial<AIConfig>, blackConfig: Partial<AIConfig>, startingFen?: string) {
    this.engine = new ChessEngine({ initialFen: startingFen });
    this.whiteAI = new ChessAI({ ...whiteConfig, name: whiteConfig.name ?? 'White AI' });
    this.blackAI = new ChessAI({ ...blackConfig, name: blackConfig.name ?? 'Black AI' });
  }

  /**
   * Set move callback
   */
  onMoveCallback(callback: (snapshot: GameSnapshot, aiMove: AIMove) => void): void {
    this.onMove = callback;
  }

  /**
   * Play a single move; null once the game is over
   */
  playMove(): AIMove | null {
    if (this.engine.isGameOver()) {
      return null;
    }

    const ai = this.engine.turn() === 'w' ? this.whiteAI : this.blackAI;
    const aiMove = ai.getBestMove(this.engine.getBoard());
    if (!aiMove.move) return null;

    this.engine.apply(aiMove.move);
    this.moveHistory.push({
      move: moveToString(aiMove.move),
      evaluation: aiMove.evaluation,
      time: aiMove.time,
    });

    this.onMove?.(this.engine.snapshot(), aiMove);
    return aiMove;
  }

  /**
   * Play until the game ends or `maxMoves` plies have been made
   */
  playGame(maxMoves = 200): MatchResult {
    let moves = 0;
    while (!this.engine.isGameOver() && moves < maxMoves) {
      if (!this.playMove()) break;
      moves++;
    }

    const status = this.engine.status();
    return {
      result: resultString(status),
      reason: this.engine.isGameOver() ? status.drawReason ?? status.kind : 'max_moves',
      moves: [...this.moveHistory],
      finalFen: this.engine.fen(),
    };
  }

  getSnapshot(): GameSnapshot {
    return this.engine.snapshot();
  }

  getMoveHistory(): MatchMove[] {
    return [...this.moveHistory];
  }

  /**
   * Reset match
   */
  reset(startingFen?: string): void {
    this.engine.reset(startingFen);
    this.moveHistory = [];
  }
}

function resultString(status: GameStatus): string {
  switch (status.kind) {
    case 'checkmate':
      return status.winner === 'w' ? '1-0' : '0-1';
    case 'stalemate':
    case 'draw':
      return '1/2-1/2';
    default:
      return '*';
  }
}
