import type { CastleSide, PieceKind, Player, Square } from "../types.ts";
import type { Result } from "./errors.ts";

export interface MoveRecord {
  ply: number;
  turn: number;
  color: Player;
  piece: PieceKind;
  from: Square;
  to: Square;
  captured: PieceKind | null;
  enPassant: boolean;
  castle: CastleSide | null;
  promotion: PieceKind | null;
  /** The text the move was played from, when it came through notation. */
  notation: string | null;
}

export interface MoveOutcome {
  record: MoveRecord;
  /** The side now to move is in check. */
  check: boolean;
  checkmate: boolean;
}

export type MoveResult = Result<MoveOutcome>;

export interface StandardMove {
  kind: "standard";
  from: Square;
  to: Square;
  promotion: PieceKind | null;
}

export interface CastleMove {
  kind: "castle";
  side: CastleSide;
}

export type ResolvedMove = StandardMove | CastleMove;
