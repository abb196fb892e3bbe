import type { File, Rank, Square } from "../types.ts";
import { ChessRuleError } from "./errors.ts";

export const FILES: readonly File[] = ["a", "b", "c", "d", "e", "f", "g", "h"];
export const RANKS: readonly Rank[] = ["1", "2", "3", "4", "5", "6", "7", "8"];

export interface Vector {
  df: number;
  dr: number;
}

const SQUARE_RE = /^[a-h][1-8]$/;

export function isSquare(raw: string): raw is Square {
  return SQUARE_RE.test(raw);
}

export function inBounds(fileIdx: number, rankIdx: number): boolean {
  return fileIdx >= 0 && fileIdx < 8 && rankIdx >= 0 && rankIdx < 8;
}

/** Builds a square from 0-based file/rank indices, or null when off the board. */
export function makeSquare(fileIdx: number, rankIdx: number): Square | null {
  if (!Number.isInteger(fileIdx) || !Number.isInteger(rankIdx)) return null;
  if (!inBounds(fileIdx, rankIdx)) return null;
  const square: Square = `${FILES[fileIdx]}${RANKS[rankIdx]}`;
  return square;
}

export function parseSquare(raw: string): Square {
  const s = String(raw).trim().toLowerCase();
  if (!isSquare(s)) {
    throw new ChessRuleError({ kind: "InvalidSquare", message: `Invalid square: ${raw}` });
  }
  return s;
}

export function fileIndex(square: Square): number {
  return square.charCodeAt(0) - "a".charCodeAt(0);
}

export function rankIndex(square: Square): number {
  return square.charCodeAt(1) - "1".charCodeAt(0);
}

export function fileOf(square: Square): File {
  return FILES[fileIndex(square)];
}

export function rankOf(square: Square): Rank {
  return RANKS[rankIndex(square)];
}

export function squareDelta(from: Square, to: Square): Vector {
  return {
    df: fileIndex(to) - fileIndex(from),
    dr: rankIndex(to) - rankIndex(from),
  };
}

export function tryOffsetSquare(square: Square, v: Vector): Square | null {
  return makeSquare(fileIndex(square) + v.df, rankIndex(square) + v.dr);
}

export function offsetSquare(square: Square, v: Vector): Square {
  const next = tryOffsetSquare(square, v);
  if (!next) {
    throw new ChessRuleError({
      kind: "InvalidSquare",
      message: `Offset (${v.df}, ${v.dr}) from ${square} leaves the board`,
      from: square,
    });
  }
  return next;
}

export function allSquares(): Square[] {
  const out: Square[] = [];
  for (let f = 0; f < 8; f++) {
    for (let r = 0; r < 8; r++) {
      const sq = makeSquare(f, r);
      if (sq) out.push(sq);
    }
  }
  return out;
}
