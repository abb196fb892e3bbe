import type { CastleSide, Piece, PieceKind, Player, Square } from "../types.ts";
import type { EngineConfig } from "../shared/config.ts";
import type { EngineLogger } from "../shared/logger.ts";
import type { MoveOutcome, MoveRecord, MoveResult } from "./moveTypes.ts";
import type { RulesContext } from "./pieceRules.ts";
import type { GameSnapshot, Rollbackable } from "./tempMove.ts";
import { loadEngineConfig } from "../shared/config.ts";
import { createConsoleLogger } from "../shared/logger.ts";
import { kindLabel, pieceLabel, playerLabel } from "../pieces/pieceLabel.ts";
import { Board, squaresBetween } from "./board.ts";
import { CASTLE_PATHS, CASTLE_TOKENS, castleSideFromToken } from "./castling.ts";
import { allSquares, fileIndex, isSquare, makeSquare, rankIndex } from "./coords.ts";
import { ChessRuleError, err, ok } from "./errors.ts";
import type { MoveError, Result } from "./errors.ts";
import { exportFen } from "./fen.ts";
import { isCheckmate } from "./gameOver.ts";
import { PIECE_RULES, rulesFor } from "./pieceRules.ts";
import {
  BACK_RANK,
  PIECE_VALUES,
  createPiece,
  homeRankIndex,
  isPieceKind,
  isPromotionKind,
  opponentOf,
  pawnStartRankIndex,
  promotionRankIndex,
} from "./pieces.ts";
import { resolveMove } from "./resolveMove.ts";
import { TempMove, withTempMove } from "./tempMove.ts";

export type GameSetup = "standard" | "empty";

export interface GameOptions {
  logger?: EngineLogger;
  config?: EngineConfig;
  setup?: GameSetup;
}

export interface PieceFilter {
  color?: Player;
  kind?: PieceKind;
  file?: number;
  rank?: number;
}

interface MovePlan {
  piece: Piece;
  from: Square;
  to: Square;
  /** Piece removed by the move; for en passant it is not on `to`. */
  target: Piece | null;
  enPassant: boolean;
  promotion: PieceKind | null;
}

function normalizeSquare(raw: string | null | undefined): Square | null {
  if (raw === null || raw === undefined) return null;
  const s = String(raw).trim().toLowerCase();
  return isSquare(s) ? s : null;
}

function matchesFilter(piece: Piece, filter: PieceFilter): boolean {
  if (filter.kind && piece.kind !== filter.kind) return false;
  if (!piece.square) return false;
  if (filter.file !== undefined && fileIndex(piece.square) !== filter.file) return false;
  if (filter.rank !== undefined && rankIndex(piece.square) !== filter.rank) return false;
  return true;
}

export class Game implements RulesContext, Rollbackable {
  readonly board = new Board();
  private live: Record<Player, Piece[]> = { W: [], B: [] };
  private captured: Record<Player, Piece[]> = { W: [], B: [] };
  private log: MoveRecord[] = [];
  private active: Player = "W";
  private turn = 1;
  private plies = 0;
  private halfmoves = 0;
  private epTarget: Square | null = null;
  private nextPieceId = 1;
  private rollbackStack: GameSnapshot[] = [];
  private readonly logger: EngineLogger;
  private readonly config: EngineConfig;

  constructor(opts: GameOptions = {}) {
    this.config = opts.config ?? loadEngineConfig();
    this.logger = opts.logger ?? createConsoleLogger({ level: this.config.logLevel });
    if ((opts.setup ?? "standard") === "standard") this.setupBoard();
  }

  get activePlayer(): Player {
    return this.active;
  }

  get turnNumber(): number {
    return this.turn;
  }

  get plyCount(): number {
    return this.plies;
  }

  get halfmoveClock(): number {
    return this.halfmoves;
  }

  get enPassantTarget(): Square | null {
    return this.epTarget;
  }

  get moveLog(): readonly MoveRecord[] {
    return this.log;
  }

  setEnPassantTarget(square: Square | null): void {
    this.epTarget = square;
  }

  // ---------------------------------------------------------------------------
  // Setup and maintenance
  // ---------------------------------------------------------------------------

  /** Empties the board and puts every counter back to the start of a game. */
  reset(): void {
    if (this.rollbackStack.length > 0) throw new Error("Game.reset: a rollback scope is open");
    this.board.clear();
    this.live = { W: [], B: [] };
    this.captured = { W: [], B: [] };
    this.log = [];
    this.active = "W";
    this.turn = 1;
    this.plies = 0;
    this.halfmoves = 0;
    this.epTarget = null;
    this.logger.debug("Finished resetting game board.");
  }

  setupBoard(): void {
    this.reset();
    for (const color of ["W", "B"] as const) {
      const home = homeRankIndex(color);
      const pawns = pawnStartRankIndex(color);
      BACK_RANK.forEach((kind, f) => {
        const back = makeSquare(f, home);
        const front = makeSquare(f, pawns);
        if (back) this.addPiece(kind, color, back);
        if (front) this.addPiece("P", color, front);
      });
    }
    this.logger.debug("Finished setting up initial piece positions.");
  }

  /** Places a new piece. Setup and tests only; it bypasses move legality. */
  addPiece(kind: PieceKind, color: Player, square: Square): Piece {
    if (!this.board.isEmpty(square)) {
      throw new Error(`Game.addPiece: ${square} is already occupied`);
    }
    if (kind === "K" && this.findKing(color)) {
      throw new Error(`Game.addPiece: ${playerLabel(color)} already has a King`);
    }
    const piece = createPiece(this.nextPieceId++, kind, color, square);
    this.live[color].push(piece);
    this.board.place(piece, square);
    return piece;
  }

  /** Removes a piece outright (not a capture). Tests only. */
  removePieceAt(square: Square): Piece {
    const piece = this.board.lift(square);
    if (!piece) throw new Error(`Game.removePieceAt: no piece at ${square}`);
    this.live[piece.color] = this.live[piece.color].filter((p) => p !== piece);
    return piece;
  }

  setActivePlayer(color: Player): void {
    this.active = color;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  pieceAt(square: Square): Piece | null {
    return this.board.get(square);
  }

  livePieces(color: Player): readonly Piece[] {
    return [...this.live[color]];
  }

  capturedPieces(color: Player): readonly Piece[] {
    return [...this.captured[color]];
  }

  findKing(color: Player): Piece | null {
    return this.live[color].find((p) => p.kind === "K") ?? null;
  }

  isSquareAttacked(square: Square, byColor: Player, transparent: Square | null = null): boolean {
    return this.live[byColor].some((p) => PIECE_RULES[p.kind].attacks(p, square, this, transparent));
  }

  isInCheck(color: Player): boolean {
    const king = this.findKing(color);
    if (!king || !king.square) return false;
    return this.isSquareAttacked(king.square, opponentOf(color));
  }

  isCheckmate(color: Player): boolean {
    return isCheckmate(this, color);
  }

  /** Checkmate test against the opponent of the side to move. */
  checkForCheckmate(): boolean {
    return this.isCheckmate(opponentOf(this.active));
  }

  whoCanMoveTo(square: Square, filter: PieceFilter = {}): Piece[] {
    const color = filter.color ?? this.active;
    return this.live[color].filter((p) => matchesFilter(p, filter) && rulesFor(p).canMoveTo(p, square, this));
  }

  /**
   * Pieces that could capture on `square`. Without a color filter the side
   * opposing the occupant is searched (the opponent of the side to move when empty).
   */
  whoCanCapture(square: Square, filter: PieceFilter = {}): Piece[] {
    const occupant = this.board.get(square);
    const color = filter.color ?? (occupant ? opponentOf(occupant.color) : opponentOf(this.active));
    return this.live[color].filter((p) => matchesFilter(p, filter) && rulesFor(p).canTake(p, square, this));
  }

  /** Every destination a coordinate move from `square` would be accepted for. */
  legalDestinations(square: Square): Square[] {
    const piece = this.board.get(square);
    if (!piece || piece.color !== this.active) return [];
    return allSquares().filter((to) => withTempMove(this, () => this.tryMove(square, to).ok));
  }

  castlingAvailability(): Record<Player, Record<CastleSide, boolean>> {
    return {
      W: { kingSide: !this.castleRefusal("W", "kingSide"), queenSide: !this.castleRefusal("W", "queenSide") },
      B: { kingSide: !this.castleRefusal("B", "kingSide"), queenSide: !this.castleRefusal("B", "queenSide") },
    };
  }

  /** Value of the opposing material `color` has captured. */
  materialBalance(color: Player): number {
    return this.captured[opponentOf(color)].reduce((sum, p) => sum + PIECE_VALUES[p.kind], 0);
  }

  /**
   * Board/registry consistency problems; empty when every invariant holds.
   */
  verifyIntegrity(): string[] {
    const problems: string[] = [];
    for (const [square, piece] of this.board.occupied()) {
      if (piece.square !== square) problems.push(`${pieceLabel(piece)} on ${square} thinks it is on ${piece.square ?? "nowhere"}`);
      if (!this.live[piece.color].includes(piece)) problems.push(`${pieceLabel(piece)} on ${square} is not registered as live`);
    }
    for (const color of ["W", "B"] as const) {
      for (const piece of this.live[color]) {
        if (!piece.square || this.board.get(piece.square) !== piece) {
          problems.push(`live ${pieceLabel(piece)} is not on the board at ${piece.square ?? "nowhere"}`);
        }
      }
      const kings = this.live[color].filter((p) => p.kind === "K").length;
      if (kings !== 1) problems.push(`${playerLabel(color)} has ${kings} Kings`);
    }
    return problems;
  }

  // ---------------------------------------------------------------------------
  // Moves
  // ---------------------------------------------------------------------------

  /** Coordinate move, or a castle token as `start`. */
  tryMove(start: string, end: string | null = null, promotion: string | null = null): MoveResult {
    return this.applyMove(start, end, promotion, null);
  }

  move(start: string, end: string | null = null, promotion: string | null = null): MoveOutcome {
    return this.unwrap(this.tryMove(start, end, promotion));
  }

  castle(side: CastleSide): MoveOutcome {
    return this.move(CASTLE_TOKENS[side]);
  }

  /** Resolves move text such as `Nf3`, `exd5`, `e8=Q+` or `O-O` and applies it. */
  tryPlay(text: string): MoveResult {
    this.logger.debug(`=== Turn ${this.turn}-${playerLabel(this.active)}: expanding '${text}' ===`);
    const resolved = resolveMove(this, text);
    if (!resolved.ok) {
      this.logger.debug(`Could not resolve '${text}': ${resolved.error.message}`);
      return resolved;
    }
    const m = resolved.value;
    if (m.kind === "castle") return this.applyMove(CASTLE_TOKENS[m.side], null, null, text);
    return this.applyMove(m.from, m.to, m.promotion, text);
  }

  play(text: string): MoveOutcome {
    return this.unwrap(this.tryPlay(text));
  }

  private unwrap(result: MoveResult): MoveOutcome {
    if (result.ok) return result.value;
    throw new ChessRuleError(result.error, exportFen(this));
  }

  private applyMove(start: string, end: string | null, promotion: string | null, notation: string | null): MoveResult {
    const side = castleSideFromToken(start);
    if (side) return this.applyCastle(side, notation);

    const planned = this.planMove(start, end, promotion);
    if (!planned.ok) {
      this.logger.debug(`Rejected ${start} ${end ?? ""}: ${planned.error.message}`);
      return planned;
    }
    const plan = planned.value;

    const scope = new TempMove(this);
    let record: MoveRecord;
    try {
      record = this.executePlan(plan, notation);
    } catch (e) {
      scope.unwind();
      throw e;
    }

    if (this.isInCheck(plan.piece.color)) {
      scope.restore();
      return err({
        kind: "SelfCheck",
        message: `${pieceLabel(plan.piece)} ${plan.from}-${plan.to} would leave the ${playerLabel(plan.piece.color)} King in check`,
        from: plan.from,
        to: plan.to,
        piece: { kind: plan.piece.kind, color: plan.piece.color },
      });
    }
    scope.commit();
    return ok(this.finalize(record));
  }

  private planMove(start: string, end: string | null, promotion: string | null): Result<MovePlan> {
    const from = normalizeSquare(start);
    if (!from) return err({ kind: "InvalidSquare", message: `Invalid square: ${start}` });

    const piece = this.board.get(from);
    if (!piece) return err({ kind: "EmptySource", message: `No piece at ${from}`, from });

    const pieceInfo = { kind: piece.kind, color: piece.color };
    if (piece.color !== this.active) {
      return err({
        kind: "WrongTurnOwner",
        message: `It is ${playerLabel(this.active)}'s move; cannot move the ${pieceLabel(piece)} on ${from}`,
        from,
        piece: pieceInfo,
      });
    }

    const to = normalizeSquare(end);
    if (!to) return err({ kind: "InvalidSquare", message: `Invalid destination square: ${end ?? "(none)"}`, from, piece: pieceInfo });
    if (to === from) {
      return err({ kind: "IllegalGeometry", message: `${pieceLabel(piece)} cannot stay on ${from}`, from, to, piece: pieceInfo });
    }

    const rules = rulesFor(piece);
    let target: Piece | null = null;
    let enPassant = false;

    if (piece.kind === "P" && to === this.epTarget && this.board.isEmpty(to)) {
      const passedSquare = makeSquare(fileIndex(to), rankIndex(from));
      const passed = passedSquare ? this.board.get(passedSquare) : null;
      if (!rules.canTake(piece, to, this)) return err(this.refusal(piece, from, to));
      if (!passed || passed.kind !== "P" || passed.color === piece.color) {
        return err({ kind: "IllegalCapture", message: `No pawn to take en passant on ${passedSquare ?? to}`, from, to, piece: pieceInfo });
      }
      target = passed;
      enPassant = true;
    } else {
      const occupant = this.board.get(to);
      if (occupant) {
        if (occupant.color === piece.color) {
          return err({ kind: "IllegalCapture", message: `${pieceLabel(piece)} cannot capture its own ${kindLabel(occupant.kind)} on ${to}`, from, to, piece: pieceInfo });
        }
        if (occupant.kind === "K") {
          return err({ kind: "IllegalCapture", message: `The ${pieceLabel(occupant)} cannot be captured`, from, to, piece: pieceInfo });
        }
        if (!rules.canTake(piece, to, this)) return err(this.refusal(piece, from, to));
        target = occupant;
      } else if (!rules.canMoveTo(piece, to, this)) {
        return err(this.refusal(piece, from, to));
      }
    }

    const promo = this.planPromotion(piece, from, to, promotion);
    if (!promo.ok) return promo;

    return ok({ piece, from, to, target, enPassant, promotion: promo.value });
  }

  private planPromotion(piece: Piece, from: Square, to: Square, promotion: string | null): Result<PieceKind | null> {
    const reachesLastRank = piece.kind === "P" && rankIndex(to) === promotionRankIndex(piece.color);
    const pieceInfo = { kind: piece.kind, color: piece.color };

    if (promotion === null || promotion === "") {
      return ok(reachesLastRank ? this.config.defaultPromotion : null);
    }
    const letter = promotion.trim().toUpperCase();
    if (!isPieceKind(letter) || !isPromotionKind(letter)) {
      return err({ kind: "PromotionError", message: `Cannot promote to '${promotion}'`, from, to, piece: pieceInfo });
    }
    if (piece.kind !== "P") {
      return err({ kind: "PromotionError", message: `Only pawns promote; ${from} holds a ${pieceLabel(piece)}`, from, to, piece: pieceInfo });
    }
    if (!reachesLastRank) {
      return err({ kind: "PromotionError", message: `Pawns promote only on the last rank, not ${to}`, from, to, piece: pieceInfo });
    }
    return ok(letter);
  }

  /** Explains why `piece` cannot reach `to`. */
  private refusal(piece: Piece, from: Square, to: Square): MoveError {
    const pieceInfo = { kind: piece.kind, color: piece.color };
    if (piece.kind === "K" && PIECE_RULES.K.attacks(piece, to, this)) {
      return { kind: "SelfCheck", message: `The ${pieceLabel(piece)} cannot move into check on ${to}`, from, to, piece: pieceInfo };
    }
    const blocked = piece.kind !== "N" && squaresBetween(from, to).some((sq) => !this.board.isEmpty(sq));
    if (blocked) {
      return { kind: "BlockedPath", message: `${pieceLabel(piece)} cannot pass through occupied squares from ${from} to ${to}`, from, to, piece: pieceInfo };
    }
    return { kind: "IllegalGeometry", message: `${pieceLabel(piece)} on ${from} cannot reach ${to}`, from, to, piece: pieceInfo };
  }

  private executePlan(plan: MovePlan, notation: string | null): MoveRecord {
    const { piece, from, to } = plan;
    const record: MoveRecord = {
      ply: this.plies + 1,
      turn: this.turn,
      color: piece.color,
      piece: piece.kind,
      from,
      to,
      captured: plan.target ? plan.target.kind : null,
      enPassant: plan.enPassant,
      castle: null,
      promotion: plan.promotion,
      notation,
    };

    if (plan.target) {
      this.logger.debug(`${pieceLabel(piece)} captures ${pieceLabel(plan.target)}`);
      this.detach(plan.target);
    }
    this.board.forceMove(from, to);
    rulesFor(piece).onMoved(piece, from, to, this);
    if (plan.promotion) this.promote(piece, plan.promotion);
    return record;
  }

  /** Moves a captured piece from the live registry to its color's captured list. */
  private detach(piece: Piece): void {
    if (piece.square) this.board.lift(piece.square);
    this.live[piece.color] = this.live[piece.color].filter((p) => p !== piece);
    this.captured[piece.color].push(piece);
  }

  private promote(pawn: Piece, kind: PieceKind): Piece {
    const square = pawn.square;
    if (!square) throw new Error("Game.promote: pawn is not on the board");
    this.board.lift(square);
    const promoted: Piece = { ...createPiece(this.nextPieceId++, kind, pawn.color, square), hasMoved: true };
    this.live[pawn.color] = this.live[pawn.color].map((p) => (p === pawn ? promoted : p));
    this.board.place(promoted, square);
    this.logger.debug(`${pieceLabel(pawn)} on ${square} promoted to ${kindLabel(kind)}`);
    return promoted;
  }

  private castleRefusal(color: Player, side: CastleSide): MoveError | null {
    const path = CASTLE_PATHS[color][side];
    const token = CASTLE_TOKENS[side];
    const refuse = (reason: string): MoveError => ({
      kind: "IllegalCastle",
      message: `${playerLabel(color)} cannot castle ${token}: ${reason}`,
      from: path.kingFrom,
      to: path.kingTo,
    });

    const king = this.board.get(path.kingFrom);
    if (!king || king.kind !== "K" || king.color !== color || king.hasMoved) return refuse(`the King is not on ${path.kingFrom} or has moved`);
    const rook = this.board.get(path.rookFrom);
    if (!rook || rook.kind !== "R" || rook.color !== color || rook.hasMoved) return refuse(`the Rook is not on ${path.rookFrom} or has moved`);

    const occupied = path.mustBeEmpty.find((sq) => !this.board.isEmpty(sq));
    if (occupied) return refuse(`${occupied} is occupied`);

    const opponent = opponentOf(color);
    const attacked = path.mustBeSafe.find((sq) => this.isSquareAttacked(sq, opponent));
    if (attacked) return refuse(`${attacked} is attacked`);
    return null;
  }

  private applyCastle(side: CastleSide, notation: string | null): MoveResult {
    const color = this.active;
    const refusal = this.castleRefusal(color, side);
    if (refusal) {
      this.logger.debug(refusal.message);
      return err(refusal);
    }

    const path = CASTLE_PATHS[color][side];
    const king = this.board.forceMove(path.kingFrom, path.kingTo);
    const rook = this.board.forceMove(path.rookFrom, path.rookTo);
    king.hasMoved = true;
    rook.hasMoved = true;
    this.epTarget = null;

    return ok(
      this.finalize({
        ply: this.plies + 1,
        turn: this.turn,
        color,
        piece: "K",
        from: path.kingFrom,
        to: path.kingTo,
        captured: null,
        enPassant: false,
        castle: side,
        promotion: null,
        notation,
      })
    );
  }

  private finalize(record: MoveRecord): MoveOutcome {
    this.log.push(record);
    const resetsClock = record.piece === "P" || record.captured !== null;
    this.halfmoves = resetsClock ? 0 : this.halfmoves + 1;
    this.plies += 1;
    if (record.color === "B") this.turn += 1;
    this.active = opponentOf(record.color);

    const check = this.isInCheck(this.active);
    const checkmate = check && this.isCheckmate(this.active);

    // Probes run inside an open rollback scope and are never played.
    if (this.rollbackStack.length > 0) return { record, check, checkmate };

    const what = record.castle ? `castles ${CASTLE_TOKENS[record.castle]}` : `${record.from} to ${record.to}`;
    this.logger.info(`Turn ${record.turn}-${playerLabel(record.color)}: ${what}`);
    if (checkmate) this.logger.info(`${playerLabel(this.active)} is checkmated`);

    return { record, check, checkmate };
  }

  // ---------------------------------------------------------------------------
  // Rollback
  // ---------------------------------------------------------------------------

  openRollback(): GameSnapshot {
    const everyPiece = [...this.live.W, ...this.live.B, ...this.captured.W, ...this.captured.B];
    const snapshot: GameSnapshot = {
      depth: this.rollbackStack.length + 1,
      pieces: everyPiece.map((piece) => ({ piece, square: piece.square, hasMoved: piece.hasMoved })),
      live: { W: [...this.live.W], B: [...this.live.B] },
      captured: { W: [...this.captured.W], B: [...this.captured.B] },
      activePlayer: this.active,
      turnNumber: this.turn,
      plyCount: this.plies,
      halfmoveClock: this.halfmoves,
      enPassantTarget: this.epTarget,
      moveLogLength: this.log.length,
      nextPieceId: this.nextPieceId,
    };
    this.rollbackStack.push(snapshot);
    return snapshot;
  }

  closeRollback(snapshot: GameSnapshot, restore: boolean): void {
    const innermost = this.rollbackStack[this.rollbackStack.length - 1];
    if (innermost !== snapshot) {
      throw new Error(
        `Rollback scopes must close in LIFO order (closing ${snapshot.depth}, innermost is ${innermost?.depth ?? "none"})`
      );
    }
    this.rollbackStack.pop();
    if (restore) this.restoreSnapshot(snapshot);
  }

  /** Restores `snapshot` and discards every scope opened inside it. */
  unwindRollback(snapshot: GameSnapshot): void {
    const index = this.rollbackStack.indexOf(snapshot);
    if (index < 0) throw new Error(`Rollback scope ${snapshot.depth} is not open`);
    const discarded = this.rollbackStack.length - index - 1;
    if (discarded > 0) this.logger.warn(`Discarding ${discarded} rollback scope(s) left open inside scope ${snapshot.depth}`);
    this.rollbackStack.length = index;
    this.restoreSnapshot(snapshot);
  }

  private restoreSnapshot(snapshot: GameSnapshot): void {
    this.board.clear();
    for (const s of snapshot.pieces) {
      s.piece.square = s.square;
      s.piece.hasMoved = s.hasMoved;
    }
    this.live = { W: [...snapshot.live.W], B: [...snapshot.live.B] };
    this.captured = { W: [...snapshot.captured.W], B: [...snapshot.captured.B] };
    for (const piece of [...this.live.W, ...this.live.B]) {
      if (piece.square) this.board.place(piece, piece.square);
    }
    this.active = snapshot.activePlayer;
    this.turn = snapshot.turnNumber;
    this.plies = snapshot.plyCount;
    this.halfmoves = snapshot.halfmoveClock;
    this.epTarget = snapshot.enPassantTarget;
    this.log.length = snapshot.moveLogLength;
    this.nextPieceId = snapshot.nextPieceId;
  }
}
