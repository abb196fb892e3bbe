import type { PieceKind, Player, Square } from "../types.ts";

export type MoveErrorKind =
  | "InvalidSquare"
  | "InvalidNotation"
  | "EmptySource"
  | "WrongTurnOwner"
  | "BlockedPath"
  | "IllegalGeometry"
  | "IllegalCapture"
  | "SelfCheck"
  | "AmbiguousMove"
  | "NoLegalCandidate"
  | "IllegalCastle"
  | "PromotionError";

export interface MoveError {
  kind: MoveErrorKind;
  message: string;
  from?: Square;
  to?: Square;
  piece?: { kind: PieceKind; color: Player };
}

export type Result<T, E = MoveError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err(error: MoveError): { ok: false; error: MoveError } {
  return { ok: false, error };
}

/**
 * Thrown by the throwing entry points (`Game.move`, `Game.play`, `parseSquare`).
 * `fen` is the position the move was attempted in, when a game was involved.
 */
export class ChessRuleError extends Error {
  readonly kind: MoveErrorKind;
  readonly detail: MoveError;
  readonly fen: string | null;

  constructor(detail: MoveError, fen: string | null = null) {
    super(detail.message);
    this.name = "ChessRuleError";
    this.kind = detail.kind;
    this.detail = detail;
    this.fen = fen;
  }
}

export function isChessRuleError(e: unknown): e is ChessRuleError {
  return e instanceof ChessRuleError;
}
