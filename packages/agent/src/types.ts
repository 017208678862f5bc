import { Action, Logger, MatchTranscript, Observation } from "@deduce/core";
import { GameRegistry } from "@deduce/engine";

export interface AgentConfig {
  /** Games the agent can play */
  registry: GameRegistry;
  /** Player identifier recorded in transcripts. Defaults to "agent". */
  playerId?: string;
  /** Logger handed to match orchestrators. */
  logger?: Logger;
}

export interface GameContext {
  matchId: string;
  gameId: string;
  observation: Observation;
  yourTurn: boolean;
  legalActions: Action[];
  turnNumber: number;
}

export interface GameResult {
  matchId: string;
  winner: string | null;
  draw: boolean;
  reason: string;
  you: string;
  didWin: boolean;
  /** Number of actions the agent submitted */
  moves: number;
  /** What the agent could see when the game ended */
  finalObservation: Observation;
  transcript: MatchTranscript;
}

export interface Strategy {
  /** Called each time it's your turn. Return the action to play. */
  chooseAction(ctx: GameContext): Action | Promise<Action>;
  /** Called when the game ends. */
  onGameOver?(result: GameResult): void;
  /** Called on every game state update, including the final one. */
  onStateUpdate?(ctx: GameContext): void;
}

export interface PlayOptions {
  /** Delay in ms before submitting each move. Useful for watching a game unfold. */
  moveDelay?: number;
  /** Called for each lifecycle event. */
  onLog?(tag: string, message: string): void;
  /** Seed for the game's random setup. Defaults to the match id. */
  seed?: string;
  /** Game settings, e.g. { height: 8, width: 8, mines: 10 } */
  settings?: Record<string, unknown>;
  /** Defaults to a random UUID. */
  matchId?: string;
}
