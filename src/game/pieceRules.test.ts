import { describe, it, expect } from "vitest";
import type { Piece, Square } from "../types.ts";
import type { Game } from "./game.ts";
import { positionGame, quietGame } from "../test/positions.ts";
import { PIECE_RULES, rulesFor } from "./pieceRules.ts";

function at(game: Game, square: Square): Piece {
  const piece = game.pieceAt(square);
  if (!piece) throw new Error(`test setup: no piece on ${square}`);
  return piece;
}

describe("pawn rules", () => {
  it("steps one or two squares from the start rank", () => {
    const game = quietGame();
    const pawn = at(game, "e2");
    expect(rulesFor(pawn).canMoveTo(pawn, "e3", game)).toBe(true);
    expect(rulesFor(pawn).canMoveTo(pawn, "e4", game)).toBe(true);
    expect(rulesFor(pawn).canMoveTo(pawn, "e5", game)).toBe(false);
    expect(rulesFor(pawn).canMoveTo(pawn, "d3", game)).toBe(false);
  });

  it("moves toward rank 1 for Black", () => {
    const game = quietGame();
    const pawn = at(game, "d7");
    expect(PIECE_RULES.P.canMoveTo(pawn, "d5", game)).toBe(true);
    expect(PIECE_RULES.P.canMoveTo(pawn, "d8", game)).toBe(false);
  });

  it("is blocked by any piece in front", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["K", "B", "e8"],
      ["P", "W", "c2"],
      ["N", "B", "c3"],
      ["P", "W", "g2"],
      ["N", "B", "g4"],
    ]);
    expect(PIECE_RULES.P.canMoveTo(at(game, "c2"), "c3", game)).toBe(false);
    expect(PIECE_RULES.P.canMoveTo(at(game, "c2"), "c4", game)).toBe(false);
    expect(PIECE_RULES.P.canMoveTo(at(game, "g2"), "g3", game)).toBe(true);
    expect(PIECE_RULES.P.canMoveTo(at(game, "g2"), "g4", game)).toBe(false);
  });

  it("does not double-step away from its start rank", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["K", "B", "e8"],
      ["P", "W", "b3"],
    ]);
    expect(PIECE_RULES.P.canMoveTo(at(game, "b3"), "b5", game)).toBe(false);
  });

  it("captures diagonally forward only", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["K", "B", "e8"],
      ["P", "W", "d4"],
      ["P", "B", "e5"],
      ["P", "B", "c3"],
    ]);
    const pawn = at(game, "d4");
    expect(PIECE_RULES.P.canTake(pawn, "e5", game)).toBe(true);
    expect(PIECE_RULES.P.canTake(pawn, "c3", game)).toBe(false);
    expect(PIECE_RULES.P.canTake(pawn, "c5", game)).toBe(false);
    expect(PIECE_RULES.P.attacks(pawn, "c5", game)).toBe(true);
  });

  it("sets the en passant target only on a double step", () => {
    const game = quietGame();
    const pawn = at(game, "e2");
    game.board.forceMove("e2", "e4");
    PIECE_RULES.P.onMoved(pawn, "e2", "e4", game);
    expect(game.enPassantTarget).toBe("e3");
    expect(pawn.hasMoved).toBe(true);

    game.board.forceMove("e4", "e5");
    PIECE_RULES.P.onMoved(pawn, "e4", "e5", game);
    expect(game.enPassantTarget).toBeNull();
  });
});

describe("piece geometry", () => {
  it("lets knights jump over pieces", () => {
    const game = quietGame();
    const knight = at(game, "g1");
    expect(PIECE_RULES.N.canMoveTo(knight, "f3", game)).toBe(true);
    expect(PIECE_RULES.N.canMoveTo(knight, "h3", game)).toBe(true);
    expect(PIECE_RULES.N.canMoveTo(knight, "g3", game)).toBe(false);
  });

  it("requires a clear path for sliders", () => {
    const game = positionGame([
      ["K", "W", "h1"],
      ["K", "B", "h8"],
      ["B", "W", "c1"],
      ["R", "W", "a1"],
      ["Q", "W", "d4"],
      ["P", "W", "a4"],
    ]);
    const bishop = at(game, "c1");
    const rook = at(game, "a1");
    const queen = at(game, "d4");

    expect(PIECE_RULES.B.canMoveTo(bishop, "h6", game)).toBe(true);
    expect(PIECE_RULES.B.canMoveTo(bishop, "c4", game)).toBe(false);

    expect(PIECE_RULES.R.canMoveTo(rook, "a3", game)).toBe(true);
    expect(PIECE_RULES.R.canMoveTo(rook, "a6", game)).toBe(false);
    expect(PIECE_RULES.R.canMoveTo(rook, "g1", game)).toBe(true);
    expect(PIECE_RULES.R.canMoveTo(rook, "b2", game)).toBe(false);

    expect(PIECE_RULES.Q.canMoveTo(queen, "d8", game)).toBe(true);
    expect(PIECE_RULES.Q.canMoveTo(queen, "a7", game)).toBe(true);
    expect(PIECE_RULES.Q.canMoveTo(queen, "e6", game)).toBe(false);
  });

  it("only takes opposing pieces", () => {
    const game = positionGame([
      ["K", "W", "h1"],
      ["K", "B", "h8"],
      ["R", "W", "a1"],
      ["P", "W", "a2"],
      ["N", "B", "e1"],
    ]);
    const rook = at(game, "a1");
    expect(PIECE_RULES.R.canTake(rook, "e1", game)).toBe(true);
    expect(PIECE_RULES.R.canTake(rook, "a2", game)).toBe(false);
    expect(PIECE_RULES.R.canTake(rook, "c1", game)).toBe(false);
  });
});

describe("king rules", () => {
  it("steps one square but never onto an attacked square", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["R", "B", "d8"],
      ["K", "B", "a8"],
    ]);
    const king = at(game, "e1");
    expect(PIECE_RULES.K.canMoveTo(king, "e2", game)).toBe(true);
    expect(PIECE_RULES.K.canMoveTo(king, "d1", game)).toBe(false);
    expect(PIECE_RULES.K.canMoveTo(king, "d2", game)).toBe(false);
    expect(PIECE_RULES.K.canMoveTo(king, "e3", game)).toBe(false);
  });

  it("cannot retreat along the line it is checked on", () => {
    const game = positionGame([
      ["K", "W", "e4"],
      ["R", "B", "e8"],
      ["K", "B", "a8"],
    ]);
    const king = at(game, "e4");
    expect(PIECE_RULES.K.canMoveTo(king, "e3", game)).toBe(false);
    expect(PIECE_RULES.K.canMoveTo(king, "d3", game)).toBe(true);
  });

  it("cannot take a defended piece", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["P", "B", "e2"],
      ["P", "B", "d2"],
      ["P", "B", "f3"],
      ["K", "B", "a8"],
    ]);
    const king = at(game, "e1");
    // f3 covers e2; nothing covers d2.
    expect(PIECE_RULES.K.canTake(king, "d2", game)).toBe(true);
    expect(PIECE_RULES.K.canTake(king, "e2", game)).toBe(false);
  });
});
