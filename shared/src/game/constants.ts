export const BOARD_SIZE = 8;

export const FILE_LETTERS = ["a", "b", "c", "d", "e", "f", "g", "h"] as const;

// Pawns start here and may advance two squares from it.
export const PAWN_HOME_ROW = { white: 6, black: 1 } as const;

export const PAWN_DIRECTION = { white: -1, black: 1 } as const;

export const BACK_RANK_ORDER = [
  "rook",
  "knight",
  "bishop",
  "queen",
  "king",
  "bishop",
  "knight",
  "rook"
] as const;
