import { describe, it, expect } from "vitest";
import { positionGame, quietGame } from "../test/positions.ts";
import { getWinner, isCheckmate, kingEscapeSquares } from "./gameOver.ts";

const SCHOLARS_MATE = ["e4", "e5", "Bc4", "Nc6", "Qh5", "Nf6", "Qxf7#"];

describe("kingEscapeSquares", () => {
  it("lists the adjacent squares the King may step to", () => {
    const game = positionGame([
      ["K", "W", "a1"],
      ["K", "B", "h8"],
      ["R", "B", "b8"],
    ]);
    expect(kingEscapeSquares(game, "W")).toEqual(["a2"]);
  });

  it("skips squares held by the King's own side", () => {
    const game = quietGame();
    expect(kingEscapeSquares(game, "W")).toEqual([]);
  });
});

describe("isCheckmate", () => {
  it("detects a King with no escape square", () => {
    const game = positionGame([
      ["K", "B", "a8"],
      ["Q", "W", "b6"],
      ["K", "W", "c6"],
    ]);
    expect(game.isInCheck("B")).toBe(false);
    expect(game.checkForCheckmate()).toBe(true);
    expect(isCheckmate(game, "B")).toBe(true);
  });

  it("is false while the King can step away", () => {
    const game = positionGame([
      ["K", "W", "e1"],
      ["R", "W", "a8"],
      ["K", "B", "h8"],
    ]);
    expect(isCheckmate(game, "B")).toBe(false);
  });

  it("is false without a King", () => {
    const game = positionGame([["K", "W", "e1"]]);
    expect(isCheckmate(game, "B")).toBe(false);
  });

  it("ends scholar's mate", () => {
    const game = quietGame();
    const outcomes = SCHOLARS_MATE.map((text) => game.play(text));
    const last = outcomes[outcomes.length - 1];
    expect(last.check).toBe(true);
    expect(last.checkmate).toBe(true);
    expect(last.record).toMatchObject({ piece: "Q", from: "h5", to: "f7", captured: "P", notation: "Qxf7#" });
    expect(outcomes.slice(0, -1).some((o) => o.checkmate)).toBe(false);
  });

  it("only considers King moves", () => {
    // Black can take the checking Rook, yet the King itself has nowhere to go.
    const game = positionGame([
      ["K", "W", "g1"],
      ["R", "W", "e1"],
      ["K", "B", "h8"],
      ["P", "B", "g7"],
      ["P", "B", "h7"],
      ["R", "B", "a8"],
    ]);
    const outcome = game.play("Re8+");
    expect(outcome.check).toBe(true);
    expect(outcome.checkmate).toBe(true);

    const reply = game.tryPlay("Rxe8");
    expect(reply.ok).toBe(true);
    expect(game.pieceAt("e8")).toMatchObject({ kind: "R", color: "B" });
  });
});

describe("getWinner", () => {
  it("returns nulls while the game continues", () => {
    expect(getWinner(quietGame())).toEqual({ winner: null, reason: null });
  });

  it("names the winner once the side to move is mated", () => {
    const game = quietGame();
    for (const text of SCHOLARS_MATE) game.play(text);
    expect(getWinner(game)).toEqual({ winner: "W", reason: "White wins — Black is checkmated" });
  });

  it("needs the mated side to be in check", () => {
    const game = positionGame(
      [
        ["K", "B", "a8"],
        ["Q", "W", "b6"],
        ["K", "W", "c6"],
      ],
      "B"
    );
    expect(getWinner(game)).toEqual({ winner: null, reason: null });
  });
});
