import type { Piece, PieceKind, Player, Square } from "../types.ts";
import { makeSquare, squareDelta, tryOffsetSquare } from "./coords.ts";

export interface BoardCell {
  kind: PieceKind;
  color: Player;
}

/**
 * Squares strictly between `start` and `end` along a rank, file or diagonal.
 * Non-collinear pairs (and adjacent squares) have none.
 */
export function squaresBetween(start: Square, end: Square): Square[] {
  const { df, dr } = squareDelta(start, end);
  const collinear = df === 0 || dr === 0 || Math.abs(df) === Math.abs(dr);
  if (!collinear || (df === 0 && dr === 0)) return [];

  const step = { df: Math.sign(df), dr: Math.sign(dr) };
  const out: Square[] = [];
  let cur = tryOffsetSquare(start, step);
  while (cur && cur !== end) {
    out.push(cur);
    cur = tryOffsetSquare(cur, step);
  }
  return out;
}

export class Board {
  private squares = new Map<Square, Piece>();

  get(square: Square): Piece | null {
    return this.squares.get(square) ?? null;
  }

  isEmpty(square: Square): boolean {
    return !this.squares.has(square);
  }

  /**
   * Puts `piece` on an empty square and points its location at it.
   * Setup and restore only; normal play goes through the game's move path.
   */
  place(piece: Piece, square: Square): void {
    const occupant = this.squares.get(square);
    if (occupant && occupant !== piece) {
      throw new Error(`Board.place: ${square} is already occupied`);
    }
    if (piece.square && piece.square !== square && this.squares.get(piece.square) === piece) {
      this.squares.delete(piece.square);
    }
    this.squares.set(square, piece);
    piece.square = square;
  }

  /** Detaches the occupant of `square`, if any, and nulls its location. */
  lift(square: Square): Piece | null {
    const piece = this.squares.get(square);
    if (!piece) return null;
    this.squares.delete(square);
    piece.square = null;
    return piece;
  }

  /**
   * Unconditional relocation. Any occupant of `end` is detached; callers
   * record captures before calling this.
   */
  forceMove(start: Square, end: Square): Piece {
    const piece = this.squares.get(start);
    if (!piece) throw new Error(`Board.forceMove: no piece at ${start}`);
    if (start === end) return piece;

    const displaced = this.squares.get(end);
    if (displaced) displaced.square = null;

    this.squares.delete(start);
    this.squares.set(end, piece);
    piece.square = end;
    return piece;
  }

  /**
   * True when no square strictly between `start` and `end` is occupied.
   * `transparent` is treated as empty (used to look through a king that is about to move).
   */
  isPathClear(start: Square, end: Square, transparent: Square | null = null): boolean {
    for (const sq of squaresBetween(start, end)) {
      if (sq === transparent) continue;
      if (this.squares.has(sq)) return false;
    }
    return true;
  }

  clear(): void {
    this.squares.clear();
  }

  occupied(): Array<[Square, Piece]> {
    return Array.from(this.squares.entries());
  }

  /** Rows from rank 8 down to rank 1, each from file a to h. */
  snapshot(): Array<Array<BoardCell | null>> {
    const rows: Array<Array<BoardCell | null>> = [];
    for (let r = 7; r >= 0; r--) {
      const row: Array<BoardCell | null> = [];
      for (let f = 0; f < 8; f++) {
        const sq = makeSquare(f, r);
        const piece = sq ? this.squares.get(sq) : undefined;
        row.push(piece ? { kind: piece.kind, color: piece.color } : null);
      }
      rows.push(row);
    }
    return rows;
  }
}
