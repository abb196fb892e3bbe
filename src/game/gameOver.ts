import type { Player, Square } from "../types.ts";
import type { Game } from "./game.ts";
import { playerLabel } from "../pieces/pieceLabel.ts";
import { tryOffsetSquare } from "./coords.ts";
import { PIECE_RULES } from "./pieceRules.ts";
import { opponentOf } from "./pieces.ts";

/**
 * Adjacent squares the King of `color` could step to. Off-board and
 * own-occupied squares are skipped; the rest go through the King's own
 * `canMoveTo`, which refuses attacked squares.
 */
export function kingEscapeSquares(game: Game, color: Player): Square[] {
  const king = game.findKing(color);
  if (!king || !king.square) return [];

  const out: Square[] = [];
  for (let df = -1; df <= 1; df++) {
    for (let dr = -1; dr <= 1; dr++) {
      if (df === 0 && dr === 0) continue;
      const sq = tryOffsetSquare(king.square, { df, dr });
      if (!sq) continue;
      const occupant = game.pieceAt(sq);
      if (occupant && occupant.color === color) continue;
      if (PIECE_RULES.K.canMoveTo(king, sq, game)) out.push(sq);
    }
  }
  return out;
}

/**
 * True when the King of `color` has no escape square.
 *
 * Only the King's own moves are considered: blocking or capturing the
 * checking piece with another defender is not looked at, and being in
 * check is not required. Move outcomes combine this with `isInCheck`.
 */
export function isCheckmate(game: Game, color: Player): boolean {
  if (!game.findKing(color)) return false;
  return kingEscapeSquares(game, color).length === 0;
}

/**
 * Winner once the side to move is mated, or nulls if the game continues.
 */
export function getWinner(game: Game): { winner: Player | null; reason: string | null } {
  const loser = game.activePlayer;
  if (!game.isInCheck(loser) || !isCheckmate(game, loser)) return { winner: null, reason: null };

  const winner = opponentOf(loser);
  return {
    winner,
    reason: `${playerLabel(winner)} wins — ${playerLabel(loser)} is checkmated`,
  };
}
