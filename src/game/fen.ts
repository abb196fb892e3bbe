import type { Piece } from "../types.ts";
import type { Board } from "./board.ts";
import type { Game } from "./game.ts";

function pieceToFenChar(piece: Pick<Piece, "kind" | "color">): string {
  return piece.color === "W" ? piece.kind : piece.kind.toLowerCase();
}

/** Piece-placement field: rank 8 first, digits for runs of empty squares. */
export function fenPlacement(board: Board): string {
  const rows: string[] = [];
  for (const cells of board.snapshot()) {
    let empties = 0;
    let row = "";
    for (const cell of cells) {
      if (!cell) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += pieceToFenChar(cell);
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }
  return rows.join("/");
}

/** `KQkq` letters for every castle the position currently allows, or `-`. */
export function fenCastling(game: Game): string {
  const rights = game.castlingAvailability();
  let s = "";
  if (rights.W.kingSide) s += "K";
  if (rights.W.queenSide) s += "Q";
  if (rights.B.kingSide) s += "k";
  if (rights.B.queenSide) s += "q";
  return s.length > 0 ? s : "-";
}

/**
 * FEN-like export. The en passant field is always `-`.
 */
export function exportFen(game: Game): string {
  const side = game.activePlayer === "W" ? "w" : "b";
  return `${fenPlacement(game.board)} ${side} ${fenCastling(game)} - ${game.halfmoveClock} ${game.turnNumber}`;
}
