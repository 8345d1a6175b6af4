/**
 * ChessEngine - Game session
 *
 * Owns one board for the length of a game and exposes the operations a
 * turn orchestrator needs: square selection, move application, undo,
 * AI moves and a read-only snapshot for rendering.
 */

import { logGameEvent, logGameState } from '../core/GameStateLogger.js';
import { ChessAI } from './ChessAI.js';
import { ChessBoard } from './ChessBoard.js';
import { ChessError } from './ChessErrors.js';
import {
  assertSquare,
  moveToLan,
  moveToString,
  parseSquare,
  pieceSymbol,
  squaresEqual,
  toAlgebraic,
} from './ChessNotation.js';
import { findLegalMove, getGameStatus, isTerminal, legalMovesFor, legalMovesFrom } from './ChessRules.js';
import {
  ApplyResult,
  CapturedPieces,
  Color,
  GameSnapshot,
  GameStatus,
  Move,
  MoveInput,
  PieceSymbol,
  PieceType,
  SelectResult,
  Square,
} from './types.js';

export interface ChessEngineConfig {
  /** Starting position (default: standard) */
  initialFen?: string;
  /** Computer player; a medium-strength AI is created when omitted */
  ai?: ChessAI;
  /** Side the computer plays; when unset the AI answers for whichever side is to move */
  aiColor?: Color;
}

const STATUS_TEXT: Record<GameStatus['kind'], string> = {
  active: 'to move',
  check: 'to move, in check',
  checkmate: 'checkmated',
  stalemate: 'stalemated',
  draw: 'draw',
};

/**
 * A single game. Every change goes through apply/undo so the move list,
 * board mementos, captured tallies and repetition counts stay in step.
 */
export class ChessEngine {
  private board: ChessBoard;
  private readonly ai: ChessAI;
  private readonly aiColor?: Color;
  private moveHistory: Move[] = [];
  private capturedPieces: CapturedPieces = { white: [], black: [] };
  private positionCounts: Map<string, number> = new Map();
  private currentStatus: GameStatus;

  // Selection state for click-driven play
  private selection: Square | null = null;
  private selectionMoves: Move[] = [];

  constructor(config: ChessEngineConfig = {}) {
    this.board = config.initialFen ? ChessBoard.fromFen(config.initialFen) : ChessBoard.startingPosition();
    this.ai = config.ai ?? new ChessAI();
    this.aiColor = config.aiColor;
    this.recordPosition();
    this.currentStatus = this.computeStatus();
    this.publish('New game');
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Click handling. A click on an own piece selects it; a click on one of
   * the selected piece's destinations plays the move (queen for promotions);
   * any other click clears the selection, including a second click on the
   * selected piece.
   */
  select(square: Square): SelectResult {
    assertSquare(square);

    if (this.selection && !isTerminal(this.currentStatus)) {
      const move = this.selectionMoves.find(m => squaresEqual(m.to, square) && (!m.promotion || m.promotion === 'q'));
      if (move) {
        const applied = this.apply(move);
        return { selected: false, legalMoves: [], applied };
      }
    }

    const piece = this.board.get(square);
    const reselect = this.selection !== null && squaresEqual(this.selection, square);
    if (piece && piece.color === this.board.turn && !reselect && !isTerminal(this.currentStatus)) {
      this.selection = square;
      this.selectionMoves = legalMovesFrom(this.board, square);
      return { selected: true, legalMoves: [...this.selectionMoves] };
    }

    this.clearSelection();
    return { selected: false, legalMoves: [] };
  }

  /**
   * Strict destination click: raises NO_ACTIVE_SELECTION with nothing
   * selected and ILLEGAL_MOVE when the square is not a destination of the
   * selected piece. The selection survives a rejected click.
   */
  commitSelection(square: Square, promotion: Move['promotion'] = 'q'): ApplyResult {
    assertSquare(square);
    if (!this.selection) {
      throw new ChessError('NO_ACTIVE_SELECTION', `No piece selected for ${toAlgebraic(square)}`);
    }
    const move = this.selectionMoves.find(
      m => squaresEqual(m.to, square) && (m.promotion === undefined || m.promotion === promotion)
    );
    if (!move) {
      throw new ChessError(
        'ILLEGAL_MOVE',
        `${toAlgebraic(this.selection)} cannot move to ${toAlgebraic(square)}`,
        { from: toAlgebraic(this.selection), to: toAlgebraic(square) }
      );
    }
    return this.apply(move);
  }

  getSelection(): Square | null {
    return this.selection;
  }

  clearSelection(): void {
    this.selection = null;
    this.selectionMoves = [];
  }

  // ===========================================================================
  // Core Game Methods
  // ===========================================================================

  /**
   * Apply a move from the current legal set and advance the turn.
   * Anything else raises ILLEGAL_MOVE and changes nothing.
   */
  apply(move: Move): ApplyResult {
    const legal = isTerminal(this.currentStatus)
      ? undefined
      : legalMovesFor(this.board).find(
          m =>
            squaresEqual(m.from, move.from) &&
            squaresEqual(m.to, move.to) &&
            m.kind === move.kind &&
            m.promotion === move.promotion
        );
    if (!legal) {
      throw new ChessError('ILLEGAL_MOVE', `Illegal move ${moveToLan(move)}`, {
        move: moveToLan(move),
        fen: this.board.toFen(),
      });
    }

    this.board.makeMove(legal);
    this.moveHistory.push(legal);
    if (legal.captured) {
      this.tallyFor(legal.color).push(legal.captured);
    }
    this.recordPosition();
    this.clearSelection();
    this.currentStatus = this.computeStatus();

    logGameEvent('Chess', `${legal.color === 'w' ? 'White' : 'Black'} played ${moveToString(legal)}`);
    this.publish(`Played ${moveToString(legal)}`);

    const status = this.currentStatus;
    return {
      move: legal,
      captured: legal.captured ?? null,
      isCheck: status.kind === 'check' || status.kind === 'checkmate',
      isCheckmate: status.kind === 'checkmate',
      isStalemate: status.kind === 'stalemate',
      isDraw: status.kind === 'draw',
      status,
    };
  }

  /**
   * Make a move by algebraic squares, e.g. { from: 'e2', to: 'e4' }
   */
  move(input: MoveInput): ApplyResult {
    const from = parseSquare(input.from);
    const to = parseSquare(input.to);
    const legal = isTerminal(this.currentStatus) ? null : findLegalMove(this.board, from, to, input.promotion);
    if (!legal) {
      throw new ChessError('ILLEGAL_MOVE', `Illegal move ${input.from}${input.to}${input.promotion ?? ''}`, {
        from: input.from,
        to: input.to,
      });
    }
    return this.apply(legal);
  }

  /**
   * Undo the last move
   * @returns false when there is no history
   */
  undo(): boolean {
    const last = this.moveHistory.pop();
    if (!last) return false;

    this.forgetPosition();
    this.board.unmakeMove();
    if (last.captured) {
      const tally = this.tallyFor(last.color);
      const idx = tally.lastIndexOf(last.captured);
      if (idx !== -1) tally.splice(idx, 1);
    }
    this.clearSelection();
    this.currentStatus = this.computeStatus();

    logGameEvent('Chess', `Undid ${moveToString(last)}`);
    this.publish(`Undid ${moveToString(last)}`);
    return true;
  }

  /** undo() that raises EMPTY_HISTORY instead of returning false */
  undoOrThrow(): void {
    if (!this.undo()) {
      throw new ChessError('EMPTY_HISTORY', 'No moves to undo');
    }
  }

  /**
   * Reset to a new game
   */
  reset(fen?: string): void {
    const board = fen ? ChessBoard.fromFen(fen) : ChessBoard.startingPosition();
    this.board = board;
    this.moveHistory = [];
    this.capturedPieces = { white: [], black: [] };
    this.positionCounts.clear();
    this.clearSelection();
    this.recordPosition();
    this.currentStatus = this.computeStatus();
    this.publish('New game');
  }

  // ===========================================================================
  // AI
  // ===========================================================================

  isAiTurn(): boolean {
    return this.aiColor === undefined || this.aiColor === this.board.turn;
  }

  /**
   * The computer's choice for the side to move, without playing it.
   * Null when the game is over or the side to move is not the computer's.
   */
  requestAiMove(timeBudget?: number): Move | null {
    if (isTerminal(this.currentStatus) || !this.isAiTurn()) return null;
    return this.ai.getBestMove(this.board, timeBudget).move;
  }

  /** requestAiMove() followed by apply() */
  playAiMove(timeBudget?: number): ApplyResult | null {
    const move = this.requestAiMove(timeBudget);
    return move ? this.apply(move) : null;
  }

  getAI(): ChessAI {
    return this.ai;
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  legalMoves(): Move[] {
    return isTerminal(this.currentStatus) ? [] : legalMovesFor(this.board);
  }

  status(): GameStatus {
    return { ...this.currentStatus };
  }

  isGameOver(): boolean {
    return isTerminal(this.currentStatus);
  }

  turn(): Color {
    return this.board.turn;
  }

  fen(): string {
    return this.board.toFen();
  }

  ascii(): string {
    return this.board.ascii();
  }

  /** Moves in coordinate notation */
  history(): string[] {
    return this.moveHistory.map(moveToString);
  }

  historyVerbose(): Move[] {
    return [...this.moveHistory];
  }

  getCapturedPieces(): CapturedPieces {
    return {
      white: [...this.capturedPieces.white],
      black: [...this.capturedPieces.black],
    };
  }

  /** Times the current position has occurred */
  getRepetitionCount(): number {
    return this.positionCounts.get(this.board.positionKey()) ?? 0;
  }

  /**
   * Private copy of the board, safe to hand to analysis code
   */
  getBoard(): ChessBoard {
    return this.board.clone();
  }

  /**
   * Read-only view for rendering
   */
  snapshot(): GameSnapshot {
    const grid: (PieceSymbol | null)[][] = [];
    for (let row = 0; row < 8; row++) {
      const line: (PieceSymbol | null)[] = [];
      for (let col = 0; col < 8; col++) {
        const piece = this.board.pieceAt(row, col);
        line.push(piece ? pieceSymbol(piece.kind, piece.color) : null);
      }
      grid.push(line);
    }

    const status = this.status();
    return {
      board: grid,
      turn: this.board.turn,
      isCheck: status.kind === 'check' || status.kind === 'checkmate',
      status,
      castling: this.board.castlingRights(),
      capturedPieces: this.getCapturedPieces(),
      history: this.history(),
      moveNumber: this.board.fullMoveNumber,
      fen: this.board.toFen(),
      ascii: this.board.ascii(),
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private tallyFor(color: Color): PieceType[] {
    return color === 'w' ? this.capturedPieces.white : this.capturedPieces.black;
  }

  private recordPosition(): void {
    const key = this.board.positionKey();
    this.positionCounts.set(key, (this.positionCounts.get(key) ?? 0) + 1);
  }

  private forgetPosition(): void {
    const key = this.board.positionKey();
    const count = this.positionCounts.get(key) ?? 0;
    if (count <= 1) {
      this.positionCounts.delete(key);
    } else {
      this.positionCounts.set(key, count - 1);
    }
  }

  private computeStatus(): GameStatus {
    return getGameStatus(this.board, { repetitions: this.getRepetitionCount() });
  }

  private publish(event: string): void {
    const side = this.currentStatus.turn === 'w' ? 'White' : 'Black';
    const text =
      this.currentStatus.kind === 'draw' && this.currentStatus.drawReason
        ? `Draw by ${this.currentStatus.drawReason.replace(/_/g, ' ')}`
        : `${side} ${STATUS_TEXT[this.currentStatus.kind]}`;
    logGameState('Chess', `${event}. ${text}`, this.board.ascii(), this.snapshot());
  }
}
