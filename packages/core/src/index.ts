export * from "./types/game";
export * from "./types/match";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { TranscriptBuilder, findBrokenLink } from "./libs/TranscriptBuilder";
export { createLogger, resolveLogLevel, isLogLevel } from "./libs/logger";
export type { Logger } from "./libs/logger";
