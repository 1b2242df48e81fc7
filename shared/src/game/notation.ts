import { BOARD_SIZE, FILE_LETTERS } from "./constants";
import { isInsideBoard } from "./board";
import type { Coord } from "./board";

export type NotationErrorKind = "format" | "notation";

export type ParsedMoveText =
  | { ok: true; value: { from: Coord; to: Coord } }
  | { ok: false; error: NotationErrorKind };

const SQUARE_PATTERN = /^([a-h])([1-8])$/;

/** "e2" → { row: 6, col: 4 }. Returns null for anything that is not one of the 64 labels. */
export const parseSquare = (label: string): Coord | null => {
  const match = SQUARE_PATTERN.exec(label.trim().toLowerCase());
  if (!match) return null;
  const [, file, rank] = match;
  return {
    row: BOARD_SIZE - Number(rank),
    col: file.charCodeAt(0) - "a".charCodeAt(0)
  };
};

export const formatSquare = (coord: Coord): string => {
  if (!isInsideBoard(coord)) {
    throw new RangeError(`Square ${coord.row},${coord.col} is not on the board`);
  }
  return `${FILE_LETTERS[coord.col]}${BOARD_SIZE - coord.row}`;
};

/** Reads the first two whitespace-separated tokens of a line such as "e2 e4". */
export const parseMoveText = (line: string): ParsedMoveText => {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 2) {
    return { ok: false, error: "format" };
  }
  const from = parseSquare(tokens[0]);
  const to = parseSquare(tokens[1]);
  if (!from || !to) {
    return { ok: false, error: "notation" };
  }
  return { ok: true, value: { from, to } };
};
