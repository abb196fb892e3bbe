import type { PieceKind, Player } from "../types.ts";

export function playerLabel(color: Player): string {
  return color === "W" ? "White" : "Black";
}

export function kindLabel(kind: PieceKind): string {
  switch (kind) {
    case "P": return "Pawn";
    case "N": return "Knight";
    case "B": return "Bishop";
    case "R": return "Rook";
    case "Q": return "Queen";
    case "K": return "King";
  }
}

export function pieceLabel(p: { kind: PieceKind; color: Player }): string {
  return `${playerLabel(p.color)} ${kindLabel(p.kind)}`;
}
