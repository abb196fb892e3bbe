import type { Piece } from "../types.ts";
import type { MoveError, Result } from "./errors.ts";
import type { Game } from "./game.ts";
import type { ResolvedMove } from "./moveTypes.ts";
import type { ParsedStandard } from "./notation.ts";
import { kindLabel, playerLabel } from "../pieces/pieceLabel.ts";
import { fileIndex, rankIndex } from "./coords.ts";
import { err, ok } from "./errors.ts";
import { parseMoveText } from "./notation.ts";
import { rulesFor } from "./pieceRules.ts";
import { isPieceKind, isPromotionKind, promotionRankIndex } from "./pieces.ts";
import { withTempMove } from "./tempMove.ts";

function checkPromotion(game: Game, parsed: ParsedStandard): Result<null> {
  if (parsed.promotion === null) return ok(null);
  const letter = parsed.promotion;
  if (!isPieceKind(letter) || !isPromotionKind(letter)) {
    return err({ kind: "PromotionError", message: `Cannot promote to '${letter}' in '${parsed.text}'`, to: parsed.to });
  }
  if (parsed.piece !== "P") {
    return err({ kind: "PromotionError", message: `Only pawns promote ('${parsed.text}')`, to: parsed.to });
  }
  if (rankIndex(parsed.to) !== promotionRankIndex(game.activePlayer)) {
    return err({ kind: "PromotionError", message: `Pawns promote only on the last rank, not ${parsed.to}`, to: parsed.to });
  }
  return ok(null);
}

/** Whether `piece` reaches the destination under the move's capture flag. */
function reaches(game: Game, piece: Piece, parsed: ParsedStandard): boolean {
  const rules = rulesFor(piece);
  if (!parsed.capture) return rules.canMoveTo(piece, parsed.to, game);

  if (game.pieceAt(parsed.to) === null) {
    // An empty capture square is only valid for en passant.
    return piece.kind === "P" && parsed.to === game.enPassantTarget && rules.canTake(piece, parsed.to, game);
  }
  return rules.canTake(piece, parsed.to, game);
}

/**
 * Turns move text into a concrete move for the side to move.
 *
 * Candidates of the named kind (Pawn when none is named) are filtered by
 * the disambiguators, by reach, and then by simulating each one in a
 * rollback scope to drop those that leave their own King in check.
 */
export function resolveMove(game: Game, text: string): Result<ResolvedMove> {
  const parsed = parseMoveText(text);
  if (!parsed.ok) return parsed;
  const move = parsed.value;
  if (move.kind === "castle") return ok({ kind: "castle", side: move.side });

  const promo = checkPromotion(game, move);
  if (!promo.ok) return promo;

  const color = game.activePlayer;
  let fromFile = move.fromFile;
  let fromRank = move.fromRank;
  if (move.piece === "K" && fromFile === null && fromRank === null) {
    const king = game.findKing(color);
    if (king && king.square) {
      fromFile = fileIndex(king.square);
      fromRank = rankIndex(king.square);
    }
  }

  const pool = game.livePieces(color).filter((p) => {
    if (p.kind !== move.piece || !p.square) return false;
    if (fromFile !== null && fileIndex(p.square) !== fromFile) return false;
    if (fromRank !== null && rankIndex(p.square) !== fromRank) return false;
    return true;
  });

  const candidates = pool.filter((p) => reaches(game, p, move));
  if (candidates.length === 0) {
    return err({ kind: "NoLegalCandidate", message: `No ${playerLabel(color)} ${kindLabel(move.piece)} can reach ${move.to} ('${move.text}')`, to: move.to });
  }

  const refusals: MoveError[] = [];
  const survivors = candidates.filter((p) => {
    const from = p.square;
    if (!from) return false;
    const probe = withTempMove(game, () => game.tryMove(from, move.to, move.promotion));
    if (!probe.ok) refusals.push(probe.error);
    return probe.ok;
  });

  if (survivors.length === 0) {
    const other = refusals.find((e) => e.kind !== "SelfCheck");
    if (other) return err(other);
    return err({
      kind: "NoLegalCandidate",
      message: `'${move.text}': every candidate (${candidates.map((p) => p.square).join(", ")}) leaves the ${playerLabel(color)} King in check`,
      to: move.to,
    });
  }
  if (survivors.length > 1) {
    return err({
      kind: "AmbiguousMove",
      message: `Ambiguous move '${move.text}': ${survivors.map((p) => p.square).join(" and ")} can all reach ${move.to}`,
      to: move.to,
    });
  }

  const from = survivors[0].square;
  if (!from) return err({ kind: "NoLegalCandidate", message: `'${move.text}' has no piece left to move`, to: move.to });
  return ok({ kind: "standard", from, to: move.to, promotion: move.promotion !== null && isPieceKind(move.promotion) ? move.promotion : null });
}
