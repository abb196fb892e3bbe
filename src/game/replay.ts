import type { EngineConfig } from "../shared/config.ts";
import type { EngineLogger } from "../shared/logger.ts";
import { loadEngineConfig } from "../shared/config.ts";
import { createConsoleLogger } from "../shared/logger.ts";
import type { MoveError } from "./errors.ts";
import { Game } from "./game.ts";
import { getWinner } from "./gameOver.ts";
import { playerLabel } from "../pieces/pieceLabel.ts";

export type ReplayResult =
  | { ok: true; game: Game }
  | { ok: false; game: Game; ply: number; move: string; error: MoveError };

export interface ReplaySummary {
  index: number;
  ok: boolean;
  plies: number;
  /** Set when the replay stopped on a bad move. */
  failure: { ply: number; move: string; error: MoveError } | null;
  /** Set when the last move mated the side to move. */
  result: string | null;
}

export interface ReplayOptions {
  logger?: EngineLogger;
  config?: EngineConfig;
}

/** Fills in the config and logger once, so every game in a batch shares them. */
function resolveOptions(opts: ReplayOptions): { logger: EngineLogger; config: EngineConfig } {
  const config = opts.config ?? loadEngineConfig();
  return { config, logger: opts.logger ?? createConsoleLogger({ level: config.logLevel }) };
}

/**
 * Plays a pre-tokenized move list on a fresh game, stopping at the first
 * move that does not apply. The game is returned in the state it stopped in.
 */
export function replayMoves(tokens: readonly string[], opts: ReplayOptions = {}): ReplayResult {
  const game = new Game(resolveOptions(opts));
  for (let i = 0; i < tokens.length; i++) {
    const move = tokens[i];
    const result = game.tryPlay(move);
    if (!result.ok) return { ok: false, game, ply: i + 1, move, error: result.error };
  }
  return { ok: true, game };
}

/** Replays each game on its own board; a failure in one does not stop the rest. */
export function replayGames(games: ReadonlyArray<readonly string[]>, opts: ReplayOptions = {}): ReplaySummary[] {
  const shared = resolveOptions(opts);
  return games.map((tokens, index) => {
    const replay = replayMoves(tokens, shared);
    if (!replay.ok) {
      shared.logger.warn(
        `Game ${index + 1}: ${playerLabel(replay.game.activePlayer)}'s move ${replay.ply} '${replay.move}' failed: ${replay.error.message}`
      );
      return {
        index,
        ok: false,
        plies: replay.game.plyCount,
        failure: { ply: replay.ply, move: replay.move, error: replay.error },
        result: null,
      };
    }
    return { index, ok: true, plies: replay.game.plyCount, failure: null, result: getWinner(replay.game).reason };
  });
}
