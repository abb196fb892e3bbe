import type { Piece, PieceKind, Player, Square } from "../types.ts";

export const PIECE_VALUES: Record<PieceKind, number> = {
  P: 1,
  N: 3,
  B: 3,
  R: 5,
  Q: 9,
  K: 100,
};

export const PROMOTION_KINDS: readonly PieceKind[] = ["Q", "R", "B", "N"];

const PIECE_KIND_RE = /^[PNBRQK]$/;

export function isPieceKind(raw: string): raw is PieceKind {
  return PIECE_KIND_RE.test(raw);
}

export function isPromotionKind(kind: PieceKind): boolean {
  return PROMOTION_KINDS.includes(kind);
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function createPiece(id: number, kind: PieceKind, color: Player, square: Square): Piece {
  return { id, kind, color, square, hasMoved: false };
}

/** Back-rank layout, file a to h. */
export const BACK_RANK: readonly PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

export function homeRankIndex(color: Player): number {
  return color === "W" ? 0 : 7;
}

export function pawnStartRankIndex(color: Player): number {
  return color === "W" ? 1 : 6;
}

export function pawnDirection(color: Player): number {
  return color === "W" ? 1 : -1;
}

export function promotionRankIndex(color: Player): number {
  return color === "W" ? 7 : 0;
}
