import type { PieceKind } from "../types.ts";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface EngineConfig {
  logLevel: LogLevel;
  /** Piece a pawn becomes on its last rank when the move names none. */
  defaultPromotion: PieceKind;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  logLevel: "warn",
  defaultPromotion: "Q",
};

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];
const PROMOTION_LETTERS: readonly PieceKind[] = ["Q", "R", "B", "N"];

function coerceLogLevel(raw: string | undefined): LogLevel {
  const v = String(raw ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? DEFAULT_ENGINE_CONFIG.logLevel;
}

function coercePromotion(raw: string | undefined): PieceKind {
  const v = String(raw ?? "").trim().toUpperCase();
  return PROMOTION_LETTERS.find((k) => k === v) ?? DEFAULT_ENGINE_CONFIG.defaultPromotion;
}

/**
 * Reads CHESS_ENGINE_LOG_LEVEL and CHESS_ENGINE_DEFAULT_PROMOTION.
 * Unknown values fall back to the defaults.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  return {
    logLevel: coerceLogLevel(env.CHESS_ENGINE_LOG_LEVEL),
    defaultPromotion: coercePromotion(env.CHESS_ENGINE_DEFAULT_PROMOTION),
  };
}
