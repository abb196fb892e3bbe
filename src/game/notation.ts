import type { CastleSide, PieceKind, Square } from "../types.ts";
import type { Result } from "./errors.ts";
import { castleSideFromToken } from "./castling.ts";
import { isSquare } from "./coords.ts";
import { err, ok } from "./errors.ts";
import { isPieceKind } from "./pieces.ts";

export interface ParsedCastle {
  kind: "castle";
  text: string;
  side: CastleSide;
  check: boolean;
  mate: boolean;
}

export interface ParsedStandard {
  kind: "standard";
  text: string;
  piece: PieceKind;
  /** 0-based disambiguating file/rank, when given. */
  fromFile: number | null;
  fromRank: number | null;
  capture: boolean;
  to: Square;
  /** Promotion letter as written (upper-cased); validated by the resolver. */
  promotion: string | null;
  check: boolean;
  mate: boolean;
}

export type ParsedMove = ParsedCastle | ParsedStandard;

const CASTLE_RE = /^((?:O-O(?:-O)?)|(?:0-0(?:-0)?))(\+\+|[+#])?$/;
const MOVE_RE = /^([KQRBN])?([a-h])?([1-8])?([x:])?([a-h][1-8])(?:=?\(?([KQRBNPkqrbnp])\)?)?(?:e\.p\.)?(\+\+|[+#])?$/;

function stripAnnotations(text: string): string {
  return text.trim().replace(/[!?]+$/, "");
}

export function parseMoveText(raw: string): Result<ParsedMove> {
  const text = stripAnnotations(String(raw));

  const castle = CASTLE_RE.exec(text);
  if (castle) {
    const side = castleSideFromToken(castle[1]);
    if (side) {
      const suffix = castle[2] ?? "";
      return ok({ kind: "castle", text, side, check: suffix === "+", mate: suffix === "#" || suffix === "++" });
    }
  }

  const m = MOVE_RE.exec(text);
  if (!m) return err({ kind: "InvalidNotation", message: `Cannot parse move '${raw}'` });

  const [, pieceLetter, fileLetter, rankDigit, captureMark, dest, promo, suffix] = m;
  if (!isSquare(dest)) return err({ kind: "InvalidSquare", message: `Invalid square in '${raw}'` });

  const piece: PieceKind = pieceLetter && isPieceKind(pieceLetter) ? pieceLetter : "P";
  const fromFile = fileLetter ? fileLetter.charCodeAt(0) - "a".charCodeAt(0) : null;
  const fromRank = rankDigit ? Number(rankDigit) - 1 : null;

  return ok({
    kind: "standard",
    text,
    piece,
    fromFile,
    fromRank,
    capture: Boolean(captureMark),
    to: dest,
    promotion: promo ? promo.toUpperCase() : null,
    check: suffix === "+",
    mate: suffix === "#" || suffix === "++",
  });
}
