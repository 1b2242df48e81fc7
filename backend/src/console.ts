import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import {
  attemptMove,
  createGame,
  describeRejection,
  INVALID_FORMAT_MESSAGE,
  INVALID_NOTATION_MESSAGE,
  isGameOver,
  parseMoveText,
  renderBoard
} from "@rankfile/shared";
import type { GameState } from "@rankfile/shared";

export const MOVE_FAILED_MESSAGE = "Move failed. Try again.";

const BANNER = [
  "========== Chess ==========",
  "Enter moves in algebraic notation (e.g., e2 e4)",
  "Enter 'quit' to exit"
];

export interface ConsoleStep {
  lines: string[];
  quit: boolean;
}

/** One turn of the console loop: parses a "from to" line and plays it. */
export const handleConsoleLine = (state: GameState, line: string): ConsoleStep => {
  if (line.trim() === "quit") {
    return { lines: [], quit: true };
  }

  const parsed = parseMoveText(line);
  if (!parsed.ok) {
    return parsed.error === "format"
      ? { lines: [INVALID_FORMAT_MESSAGE], quit: false }
      : { lines: [INVALID_NOTATION_MESSAGE, MOVE_FAILED_MESSAGE], quit: false };
  }

  const { from, to } = parsed.value;
  const result = attemptMove(state, from, to);
  if (!result.ok) {
    return { lines: [describeRejection(state, result.error, from), MOVE_FAILED_MESSAGE], quit: false };
  }
  return { lines: [], quit: false };
};

export const runConsole = async (input: Readable, output: Writable): Promise<GameState> => {
  const state = createGame("console");
  const write = (text: string): void => {
    output.write(`${text}\n`);
  };
  const prompt = (): void => {
    write(`\n${renderBoard(state)}`);
    output.write("Enter move: ");
  };

  BANNER.forEach(write);
  prompt();

  const lines = createInterface({ input, terminal: false });
  try {
    for await (const line of lines) {
      const step = handleConsoleLine(state, line);
      if (step.quit) break;
      step.lines.forEach(write);
      if (isGameOver(state.board)) break;
      prompt();
    }
  } finally {
    lines.close();
  }

  if (isGameOver(state.board)) {
    write(`\n${renderBoard(state)}`);
    write("Game over!");
  }
  write("Thanks for playing!");
  return state;
};
