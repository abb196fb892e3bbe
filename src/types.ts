export type Player = "W" | "B";
export type PieceKind = "P" | "N" | "B" | "R" | "Q" | "K";

export type File = "a" | "b" | "c" | "d" | "e" | "f" | "g" | "h";
export type Rank = "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8";
export type Square = `${File}${Rank}`;

export interface Piece {
  readonly id: number;
  readonly kind: PieceKind;
  readonly color: Player;
  /** Null once the piece has been captured. */
  square: Square | null;
  hasMoved: boolean;
}

export type CastleSide = "kingSide" | "queenSide";
