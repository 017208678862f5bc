export { LocalAgent } from "./LocalAgent";
export { RandomStrategy } from "./strategies/RandomStrategy";
export { KnowledgeStrategy } from "./strategies/KnowledgeStrategy";
export type { KnowledgeStrategyOptions } from "./strategies/KnowledgeStrategy";
export type {
  AgentConfig,
  GameContext,
  GameResult,
  Strategy,
  PlayOptions,
} from "./types";

// Re-export commonly needed types from core
export type { Action, Observation } from "@deduce/core";
