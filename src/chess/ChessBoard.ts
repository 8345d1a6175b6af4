/**
 * ChessBoard - Position model
 *
 * A fixed 64-slot board that owns its pieces, plus side to move,
 * en passant target and move counters. Moves are applied in place and
 * reverted from a memento stack, so search can walk a tree on one
 * instance without copying it per node.
 */

import { ChessError } from './ChessErrors.js';
import {
  assertSquare,
  isWithinBounds,
  makeSquare,
  pieceSymbol,
  squareIndex,
  toAlgebraic,
  parseSquare,
} from './ChessNotation.js';
import {
  CastlingRights,
  Color,
  FILES,
  Move,
  Piece,
  PieceType,
  Square,
  STARTING_FEN,
  oppositeColor,
} from './types.js';

/** Everything makeMove changes that the move itself does not describe */
interface BoardMemento {
  move: Move;
  moved: Piece;
  movedHadMoved: boolean;
  captured: Piece | null;
  rook: Piece | null;
  rookHadMoved: boolean;
  enPassant: Square | null;
  halfMoveClock: number;
  fullMoveNumber: number;
}

const FEN_PIECES: Record<string, PieceType> = {
  p: 'p', n: 'n', b: 'b', r: 'r', q: 'q', k: 'k',
};

/** Home row of each side's back rank */
export function homeRow(color: Color): number {
  return color === 'w' ? 7 : 0;
}

export class ChessBoard {
  private slots: (Piece | null)[] = new Array<Piece | null>(64).fill(null);
  private mementos: BoardMemento[] = [];

  turn: Color = 'w';
  enPassant: Square | null = null;
  halfMoveClock = 0;
  fullMoveNumber = 1;

  static startingPosition(): ChessBoard {
    return ChessBoard.fromFen(STARTING_FEN);
  }

  /**
   * Build a board from a FEN string. Four-field FEN (no counters) is accepted.
   */
  static fromFen(fen: string): ChessBoard {
    const parts = fen.trim().split(/\s+/);
    if (parts.length !== 4 && parts.length !== 6) {
      throw new ChessError('INVALID_FEN', `Expected 4 or 6 FEN fields, got ${parts.length}`, { fen });
    }
    const [placement, turn, castling, enPassant] = parts;
    const board = new ChessBoard();

    const ranks = placement.split('/');
    if (ranks.length !== 8) {
      throw new ChessError('INVALID_FEN', 'Placement must have 8 ranks', { fen });
    }
    ranks.forEach((rank, row) => {
      let col = 0;
      for (const ch of rank) {
        if (/[1-8]/.test(ch)) {
          col += Number(ch);
          continue;
        }
        const kind = FEN_PIECES[ch.toLowerCase()];
        if (!kind || col > 7) {
          throw new ChessError('INVALID_FEN', `Bad placement in rank ${8 - row}: "${rank}"`, { fen });
        }
        const color: Color = ch === ch.toUpperCase() ? 'w' : 'b';
        board.place(makeSquare(row, col), { kind, color, square: makeSquare(row, col), hasMoved: false });
        col++;
      }
      if (col !== 8) {
        throw new ChessError('INVALID_FEN', `Rank ${8 - row} does not cover 8 files`, { fen });
      }
    });

    for (const color of ['w', 'b'] as const) {
      const kings = board.pieces(color).filter(p => p.kind === 'k').length;
      if (kings !== 1) {
        throw new ChessError('INVALID_FEN', `Expected one ${color === 'w' ? 'white' : 'black'} king, found ${kings}`, { fen });
      }
    }

    if (turn !== 'w' && turn !== 'b') {
      throw new ChessError('INVALID_FEN', `Bad side to move "${turn}"`, { fen });
    }
    board.turn = turn;

    if (!/^(-|K?Q?k?q?)$/.test(castling)) {
      throw new ChessError('INVALID_FEN', `Bad castling field "${castling}"`, { fen });
    }
    board.applyCastlingField(castling);

    if (enPassant !== '-') {
      try {
        board.enPassant = parseSquare(enPassant);
      } catch {
        throw new ChessError('INVALID_FEN', `Bad en passant field "${enPassant}"`, { fen });
      }
    }

    if (parts.length === 6) {
      const half = Number(parts[4]);
      const full = Number(parts[5]);
      if (!Number.isInteger(half) || half < 0 || !Number.isInteger(full) || full < 1) {
        throw new ChessError('INVALID_FEN', 'Bad move counters', { fen });
      }
      board.halfMoveClock = half;
      board.fullMoveNumber = full;
    }

    return board;
  }

  // ===========================================================================
  // Slot access
  // ===========================================================================

  isWithinBounds(square: Square): boolean {
    return isWithinBounds(square);
  }

  get(square: Square): Piece | null {
    assertSquare(square);
    return this.slots[squareIndex(square)];
  }

  /** Unchecked lookup for generators; off-board coordinates read as empty */
  pieceAt(row: number, col: number): Piece | null {
    if (row < 0 || row > 7 || col < 0 || col > 7) return null;
    return this.slots[row * 8 + col];
  }

  /** Put a piece on a square, replacing whatever was there */
  place(square: Square, piece: Piece): void {
    assertSquare(square);
    piece.square = square;
    this.slots[squareIndex(square)] = piece;
  }

  remove(square: Square): Piece | null {
    assertSquare(square);
    const idx = squareIndex(square);
    const piece = this.slots[idx];
    this.slots[idx] = null;
    return piece;
  }

  /** Pieces in slot order (a8 .. h1), optionally for one color */
  pieces(color?: Color): Piece[] {
    const result: Piece[] = [];
    for (const piece of this.slots) {
      if (piece && (color === undefined || piece.color === color)) {
        result.push(piece);
      }
    }
    return result;
  }

  findKing(color: Color): Square | null {
    for (const piece of this.slots) {
      if (piece && piece.kind === 'k' && piece.color === color) return piece.square;
    }
    return null;
  }

  // ===========================================================================
  // Move application
  // ===========================================================================

  /**
   * Apply a move generated for this position. Pushes a memento first;
   * unmakeMove() restores the exact prior state.
   */
  makeMove(move: Move): void {
    const moved = this.get(move.from);
    if (!moved || moved.color !== move.color || moved.kind !== move.piece) {
      throw new ChessError('ILLEGAL_MOVE', `No ${move.piece} of that color on ${toAlgebraic(move.from)}`, {
        from: toAlgebraic(move.from),
        to: toAlgebraic(move.to),
      });
    }

    let rook: Piece | null = null;
    if (move.kind === 'castle') {
      rook = this.get(makeSquare(move.from.row, move.to.col > move.from.col ? 7 : 0));
      if (!rook || rook.kind !== 'r' || rook.color !== move.color) {
        throw new ChessError('ILLEGAL_MOVE', 'Castling rook is missing', { from: toAlgebraic(move.from) });
      }
    }

    const memento: BoardMemento = {
      move,
      moved,
      movedHadMoved: moved.hasMoved,
      captured: null,
      rook,
      rookHadMoved: rook?.hasMoved ?? false,
      enPassant: this.enPassant,
      halfMoveClock: this.halfMoveClock,
      fullMoveNumber: this.fullMoveNumber,
    };

    if (move.kind === 'enPassant') {
      memento.captured = this.remove(makeSquare(move.from.row, move.to.col));
    } else {
      memento.captured = this.remove(move.to);
    }

    this.remove(move.from);
    moved.hasMoved = true;
    if (move.promotion) {
      this.place(move.to, { kind: move.promotion, color: moved.color, square: move.to, hasMoved: true });
    } else {
      this.place(move.to, moved);
    }

    if (rook) {
      this.remove(rook.square);
      rook.hasMoved = true;
      this.place(makeSquare(move.from.row, move.to.col > move.from.col ? 5 : 3), rook);
    }

    this.enPassant =
      moved.kind === 'p' && Math.abs(move.to.row - move.from.row) === 2
        ? makeSquare((move.from.row + move.to.row) / 2, move.from.col)
        : null;
    this.halfMoveClock = moved.kind === 'p' || memento.captured ? 0 : this.halfMoveClock + 1;
    if (moved.color === 'b') this.fullMoveNumber++;
    this.turn = oppositeColor(this.turn);

    this.mementos.push(memento);
  }

  /**
   * Revert the most recent makeMove. Returns null when there is nothing to undo.
   */
  unmakeMove(): Move | null {
    const memento = this.mementos.pop();
    if (!memento) return null;
    const { move, moved } = memento;

    if (memento.rook) {
      this.remove(memento.rook.square);
      memento.rook.hasMoved = memento.rookHadMoved;
      this.place(makeSquare(move.from.row, move.to.col > move.from.col ? 7 : 0), memento.rook);
    }

    this.remove(move.to);
    moved.hasMoved = memento.movedHadMoved;
    this.place(move.from, moved);

    if (memento.captured) {
      this.place(memento.captured.square, memento.captured);
    }

    this.enPassant = memento.enPassant;
    this.halfMoveClock = memento.halfMoveClock;
    this.fullMoveNumber = memento.fullMoveNumber;
    this.turn = oppositeColor(this.turn);
    return move;
  }

  /** Number of moves that can be unmade */
  get depth(): number {
    return this.mementos.length;
  }

  lastMove(): Move | null {
    return this.mementos.length > 0 ? this.mementos[this.mementos.length - 1].move : null;
  }

  // ===========================================================================
  // Derived state
  // ===========================================================================

  castlingRights(): CastlingRights {
    return {
      whiteKingside: this.canStillCastle('w', 7),
      whiteQueenside: this.canStillCastle('w', 0),
      blackKingside: this.canStillCastle('b', 7),
      blackQueenside: this.canStillCastle('b', 0),
    };
  }

  private canStillCastle(color: Color, rookCol: number): boolean {
    const row = homeRow(color);
    const king = this.slots[row * 8 + 4];
    const rook = this.slots[row * 8 + rookCol];
    return (
      !!king && king.kind === 'k' && king.color === color && !king.hasMoved &&
      !!rook && rook.kind === 'r' && rook.color === color && !rook.hasMoved
    );
  }

  private applyCastlingField(castling: string): void {
    const rights: Record<string, [Color, number]> = { K: ['w', 7], Q: ['w', 0], k: ['b', 7], q: ['b', 0] };

    // Everything off its home square or without a matching right counts as moved
    for (const piece of this.slots) {
      if (!piece) continue;
      if (piece.kind === 'p') {
        piece.hasMoved = piece.square.row !== (piece.color === 'w' ? 6 : 1);
      } else if (piece.kind === 'k' || piece.kind === 'r') {
        piece.hasMoved = true;
      }
    }

    for (const [flag, [color, rookCol]] of Object.entries(rights)) {
      if (!castling.includes(flag)) continue;
      const row = homeRow(color);
      const king = this.slots[row * 8 + 4];
      const rook = this.slots[row * 8 + rookCol];
      if (king?.kind === 'k' && king.color === color && rook?.kind === 'r' && rook.color === color) {
        king.hasMoved = false;
        rook.hasMoved = false;
      }
    }
  }

  /**
   * Placement, side to move, castling and en passant; counters excluded.
   * The en passant square only counts when a pawn can capture onto it.
   */
  positionKey(): string {
    const [placement, turn, castling, enPassant] = this.toFen().split(' ');
    return [placement, turn, castling, this.canCaptureEnPassant() ? enPassant : '-'].join(' ');
  }

  private canCaptureEnPassant(): boolean {
    const target = this.enPassant;
    if (!target) return false;
    const row = target.row + (this.turn === 'w' ? 1 : -1);
    return [-1, 1].some(dc => {
      const piece = this.pieceAt(row, target.col + dc);
      return piece?.kind === 'p' && piece.color === this.turn;
    });
  }

  toFen(): string {
    const rows: string[] = [];
    for (let row = 0; row < 8; row++) {
      let line = '';
      let empty = 0;
      for (let col = 0; col < 8; col++) {
        const piece = this.slots[row * 8 + col];
        if (!piece) {
          empty++;
          continue;
        }
        if (empty > 0) {
          line += String(empty);
          empty = 0;
        }
        line += pieceSymbol(piece.kind, piece.color);
      }
      if (empty > 0) line += String(empty);
      rows.push(line);
    }

    const rights = this.castlingRights();
    const castling =
      (rights.whiteKingside ? 'K' : '') +
      (rights.whiteQueenside ? 'Q' : '') +
      (rights.blackKingside ? 'k' : '') +
      (rights.blackQueenside ? 'q' : '');

    return [
      rows.join('/'),
      this.turn,
      castling || '-',
      this.enPassant ? toAlgebraic(this.enPassant) : '-',
      String(this.halfMoveClock),
      String(this.fullMoveNumber),
    ].join(' ');
  }

  ascii(): string {
    let out = '   +------------------------+\n';
    for (let row = 0; row < 8; row++) {
      out += ` ${8 - row} |`;
      for (let col = 0; col < 8; col++) {
        const piece = this.slots[row * 8 + col];
        out += ` ${piece ? pieceSymbol(piece.kind, piece.color) : '.'} `;
      }
      out += '|\n';
    }
    out += '   +------------------------+\n';
    out += `     ${FILES.join('  ')}`;
    return out;
  }

  /**
   * Deep copy of the position. The copy starts with an empty undo history.
   */
  clone(): ChessBoard {
    const copy = new ChessBoard();
    for (const piece of this.slots) {
      if (piece) copy.place(piece.square, { ...piece });
    }
    copy.turn = this.turn;
    copy.enPassant = this.enPassant;
    copy.halfMoveClock = this.halfMoveClock;
    copy.fullMoveNumber = this.fullMoveNumber;
    return copy;
  }
}
