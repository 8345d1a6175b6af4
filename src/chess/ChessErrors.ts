/**
 * ChessError - recoverable errors raised by the rules engine and game session.
 *
 * Every operation that raises leaves board and game state as they were.
 */

export type ChessErrorCode =
  | 'INVALID_SQUARE'
  | 'ILLEGAL_MOVE'
  | 'NO_ACTIVE_SELECTION'
  | 'EMPTY_HISTORY'
  | 'INVALID_FEN'
  | 'INVALID_CONFIG';

export class ChessError extends Error {
  readonly code: ChessErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ChessErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ChessError';
    this.code = code;
    this.details = details;
  }
}

export function isChessError(err: unknown, code?: ChessErrorCode): err is ChessError {
  return err instanceof ChessError && (code === undefined || err.code === code);
}
