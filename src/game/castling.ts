import type { CastleSide, Player, Square } from "../types.ts";

export interface CastlePath {
  kingFrom: Square;
  kingTo: Square;
  rookFrom: Square;
  rookTo: Square;
  /** Squares strictly between king and rook. */
  mustBeEmpty: Square[];
  /** King start, transit and destination. */
  mustBeSafe: Square[];
}

export const CASTLE_PATHS: Record<Player, Record<CastleSide, CastlePath>> = {
  W: {
    kingSide: {
      kingFrom: "e1", kingTo: "g1", rookFrom: "h1", rookTo: "f1",
      mustBeEmpty: ["f1", "g1"],
      mustBeSafe: ["e1", "f1", "g1"],
    },
    queenSide: {
      kingFrom: "e1", kingTo: "c1", rookFrom: "a1", rookTo: "d1",
      mustBeEmpty: ["b1", "c1", "d1"],
      mustBeSafe: ["e1", "d1", "c1"],
    },
  },
  B: {
    kingSide: {
      kingFrom: "e8", kingTo: "g8", rookFrom: "h8", rookTo: "f8",
      mustBeEmpty: ["f8", "g8"],
      mustBeSafe: ["e8", "f8", "g8"],
    },
    queenSide: {
      kingFrom: "e8", kingTo: "c8", rookFrom: "a8", rookTo: "d8",
      mustBeEmpty: ["b8", "c8", "d8"],
      mustBeSafe: ["e8", "d8", "c8"],
    },
  },
};

export const CASTLE_TOKENS: Record<CastleSide, string> = {
  kingSide: "O-O",
  queenSide: "O-O-O",
};

/** Accepts `O-O` / `O-O-O` and the zero-digit spelling some PGN exports use. */
export function castleSideFromToken(token: string): CastleSide | null {
  const t = token.trim().toUpperCase().replace(/0/g, "O");
  if (t === "O-O") return "kingSide";
  if (t === "O-O-O") return "queenSide";
  return null;
}
