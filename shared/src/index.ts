export * from "./types";
export * from "./game/constants";
export * from "./game/board";
export * from "./game/path";
export * from "./game/pieces";
export * from "./game/setup";
export * from "./game/state";
export * from "./game/notation";
export * from "./game/render";
export * from "./game/messages";
export * from "./game/move";
