import type { Piece, Player, Square } from "../types.ts";

export interface PieceSnapshot {
  piece: Piece;
  square: Square | null;
  hasMoved: boolean;
}

/** Every mutable field of a game, captured by value. */
export interface GameSnapshot {
  depth: number;
  pieces: PieceSnapshot[];
  live: Record<Player, Piece[]>;
  captured: Record<Player, Piece[]>;
  activePlayer: Player;
  turnNumber: number;
  plyCount: number;
  halfmoveClock: number;
  enPassantTarget: Square | null;
  moveLogLength: number;
  nextPieceId: number;
}

export interface Rollbackable {
  openRollback(): GameSnapshot;
  closeRollback(snapshot: GameSnapshot, restore: boolean): void;
  unwindRollback(snapshot: GameSnapshot): void;
}

/**
 * Snapshot/restore pair. Scopes nest and must close in LIFO order.
 */
export class TempMove {
  private readonly snapshot: GameSnapshot;
  private closed = false;

  constructor(private readonly game: Rollbackable) {
    this.snapshot = game.openRollback();
  }

  /** Puts every snapshotted field back and closes the scope. */
  restore(): void {
    this.close(true);
  }

  /** Closes the scope and keeps whatever happened inside it. */
  commit(): void {
    this.close(false);
  }

  /** Restores this scope even when scopes opened inside it were left open. */
  unwind(): void {
    if (this.closed) throw new Error("TempMove: scope already closed");
    this.game.unwindRollback(this.snapshot);
    this.closed = true;
  }

  private close(restore: boolean): void {
    if (this.closed) throw new Error("TempMove: scope already closed");
    this.game.closeRollback(this.snapshot, restore);
    this.closed = true;
  }
}

export function withTempMove<T>(game: Rollbackable, fn: () => T): T {
  const scope = new TempMove(game);
  try {
    return fn();
  } finally {
    scope.unwind();
  }
}
