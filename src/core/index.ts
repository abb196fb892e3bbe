// "Core" is the stable rules surface (no rendering, no I/O).

export type { CastleSide, File, Piece, PieceKind, Player, Rank, Square } from "../types.ts";
export type { BoardCell } from "../game/board.ts";
export type { MoveError, MoveErrorKind, Result } from "../game/errors.ts";
export type { GameOptions, GameSetup, PieceFilter } from "../game/game.ts";
export type { MoveOutcome, MoveRecord, MoveResult, ResolvedMove } from "../game/moveTypes.ts";
export type { ParsedMove } from "../game/notation.ts";
export type { ReplayResult, ReplaySummary } from "../game/replay.ts";
export type { EngineConfig, LogLevel } from "../shared/config.ts";
export type { EngineLogger } from "../shared/logger.ts";

export { Board, squaresBetween } from "../game/board.ts";
export { parseSquare, squareDelta, offsetSquare, tryOffsetSquare } from "../game/coords.ts";
export { ChessRuleError, isChessRuleError } from "../game/errors.ts";
export { Game } from "../game/game.ts";
export { getWinner, isCheckmate, kingEscapeSquares } from "../game/gameOver.ts";
export { exportFen, fenPlacement } from "../game/fen.ts";
export { parseMoveText } from "../game/notation.ts";
export { PIECE_RULES } from "../game/pieceRules.ts";
export { opponentOf, PIECE_VALUES } from "../game/pieces.ts";
export { replayGames, replayMoves } from "../game/replay.ts";
export { resolveMove } from "../game/resolveMove.ts";
export { TempMove, withTempMove } from "../game/tempMove.ts";
export { loadEngineConfig } from "../shared/config.ts";
export { createConsoleLogger, silentLogger } from "../shared/logger.ts";
