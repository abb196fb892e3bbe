import type { Piece, PieceKind, Player, Square } from "../types.ts";
import type { Board } from "./board.ts";
import { rankIndex, squareDelta } from "./coords.ts";
import { squaresBetween } from "./board.ts";
import { opponentOf, pawnDirection, pawnStartRankIndex } from "./pieces.ts";

/** What the per-kind rules may read from, and write back to, the game. */
export interface RulesContext {
  readonly board: Board;
  readonly enPassantTarget: Square | null;
  isSquareAttacked(square: Square, byColor: Player, transparent?: Square | null): boolean;
  setEnPassantTarget(square: Square | null): void;
}

export interface PieceRules {
  /** Geometric capture reach, whether or not `target` is occupied. */
  attacks(piece: Piece, target: Square, ctx: RulesContext, transparent?: Square | null): boolean;
  canMoveTo(piece: Piece, dest: Square, ctx: RulesContext): boolean;
  canTake(piece: Piece, dest: Square, ctx: RulesContext): boolean;
  onMoved(piece: Piece, start: Square, end: Square, ctx: RulesContext): void;
}

function holdsOpponent(piece: Piece, dest: Square, ctx: RulesContext): boolean {
  const occupant = ctx.board.get(dest);
  return occupant !== null && occupant.color !== piece.color;
}

function baseOnMoved(piece: Piece, _start: Square, _end: Square, ctx: RulesContext): void {
  piece.hasMoved = true;
  ctx.setEnPassantTarget(null);
}

type Shape = (df: number, dr: number) => boolean;

const diagonal: Shape = (df, dr) => df !== 0 && Math.abs(df) === Math.abs(dr);
const straight: Shape = (df, dr) => (df === 0) !== (dr === 0);
const knightJump: Shape = (df, dr) =>
  (Math.abs(df) === 1 && Math.abs(dr) === 2) || (Math.abs(df) === 2 && Math.abs(dr) === 1);
const adjacent: Shape = (df, dr) => Math.max(Math.abs(df), Math.abs(dr)) === 1;

function slider(shape: Shape): PieceRules {
  const reaches = (piece: Piece, target: Square, ctx: RulesContext, transparent: Square | null = null): boolean => {
    if (!piece.square) return false;
    const { df, dr } = squareDelta(piece.square, target);
    return shape(df, dr) && ctx.board.isPathClear(piece.square, target, transparent);
  };
  return {
    attacks: reaches,
    canMoveTo: (piece, dest, ctx) => reaches(piece, dest, ctx),
    canTake: (piece, dest, ctx) => reaches(piece, dest, ctx) && holdsOpponent(piece, dest, ctx),
    onMoved: baseOnMoved,
  };
}

function pawnAttacks(piece: Piece, target: Square): boolean {
  if (!piece.square) return false;
  const { df, dr } = squareDelta(piece.square, target);
  return dr === pawnDirection(piece.color) && Math.abs(df) === 1;
}

const pawnRules: PieceRules = {
  attacks: (piece, target) => pawnAttacks(piece, target),

  canMoveTo(piece, dest, ctx) {
    const from = piece.square;
    if (!from) return false;
    const { df, dr } = squareDelta(from, dest);
    if (df !== 0 || !ctx.board.isEmpty(dest)) return false;

    const dir = pawnDirection(piece.color);
    if (dr === dir) return true;

    const onStartRank = rankIndex(from) === pawnStartRankIndex(piece.color);
    return dr === 2 * dir && onStartRank && !piece.hasMoved && ctx.board.isPathClear(from, dest);
  },

  canTake(piece, dest, ctx) {
    if (!pawnAttacks(piece, dest)) return false;
    return holdsOpponent(piece, dest, ctx) || (ctx.enPassantTarget !== null && dest === ctx.enPassantTarget);
  },

  onMoved(piece, start, end, ctx) {
    piece.hasMoved = true;
    const { dr } = squareDelta(start, end);
    if (Math.abs(dr) === 2) {
      // The square passed over is the only one an opposing pawn may take on next ply.
      ctx.setEnPassantTarget(squaresBetween(start, end)[0] ?? null);
    } else {
      ctx.setEnPassantTarget(null);
    }
  },
};

function knightReaches(piece: Piece, target: Square): boolean {
  if (!piece.square) return false;
  const { df, dr } = squareDelta(piece.square, target);
  return knightJump(df, dr);
}

const knightRules: PieceRules = {
  attacks: (piece, target) => knightReaches(piece, target),
  canMoveTo: (piece, dest) => knightReaches(piece, dest),
  canTake: (piece, dest, ctx) => knightReaches(piece, dest) && holdsOpponent(piece, dest, ctx),
  onMoved: baseOnMoved,
};

function kingReaches(piece: Piece, target: Square): boolean {
  if (!piece.square) return false;
  const { df, dr } = squareDelta(piece.square, target);
  return adjacent(df, dr);
}

/** The king is looked through, so retreating along a checking line is still refused. */
function kingSquareIsSafe(piece: Piece, dest: Square, ctx: RulesContext): boolean {
  return !ctx.isSquareAttacked(dest, opponentOf(piece.color), piece.square);
}

const kingRules: PieceRules = {
  attacks: (piece, target) => kingReaches(piece, target),
  canMoveTo: (piece, dest, ctx) => kingReaches(piece, dest) && kingSquareIsSafe(piece, dest, ctx),
  canTake: (piece, dest, ctx) =>
    kingReaches(piece, dest) && holdsOpponent(piece, dest, ctx) && kingSquareIsSafe(piece, dest, ctx),
  onMoved: baseOnMoved,
};

export const PIECE_RULES: Record<PieceKind, PieceRules> = {
  P: pawnRules,
  N: knightRules,
  B: slider(diagonal),
  R: slider(straight),
  Q: slider((df, dr) => diagonal(df, dr) || straight(df, dr)),
  K: kingRules,
};

export function rulesFor(piece: Piece): PieceRules {
  return PIECE_RULES[piece.kind];
}
