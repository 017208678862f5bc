import { GameConfig, GameState, Action, Outcome, Observation } from "@deduce/core";

// ---------------------------------------------------------------------------
// Game UI Specification: shipped by each game module for rendering
// ---------------------------------------------------------------------------

export interface GlyphDisplay {
  /** Single character drawn on the board (e.g. "F", "*") */
  symbol: string;
  /** Short text label for legends (e.g. "flag") */
  label: string;
}

/**
 * UI specification that each game module can provide so that the CLI can
 * render any game generically without hardcoded per-game logic.
 */
export interface GameUISpec {
  /** Map of cell state identifiers to display info */
  glyphs: Record<string, GlyphDisplay>;

  /** Hint text shown to the player (e.g. "r ROW COL to reveal") */
  inputHint: string;

  /** Render the board as an ASCII string from publicData. */
  renderBoard(publicData: Record<string, unknown>): string;

  /** Render a one-line status string, or null if nothing special. */
  renderStatus(publicData: Record<string, unknown>): string | null;

  /** Parse raw user input into an Action, or return null if invalid. */
  parseInput(raw: string, publicData: Record<string, unknown>): Action | null;

  /** Format an Action as a human-readable string for move history. */
  formatAction(action: Action): string;
}

// ---------------------------------------------------------------------------
// Game module ABI
// ---------------------------------------------------------------------------

/**
 * The 7-function ABI that every game module must implement.
 *
 * Every function must be deterministic given the same inputs, so a match
 * can be replayed from its seed and transcript.
 */
export interface IGameModule {
  /** Unique identifier for this game (e.g., "minesweeper") */
  readonly gameId: string;

  readonly name: string;
  readonly description: string;

  /** Number of players required */
  readonly minPlayers: number;
  readonly maxPlayers: number;

  readonly ui?: GameUISpec;

  /** Initialize a new game state */
  init(config: GameConfig, players: string[], rngSeed: string): GameState;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState, playerId: string, action: Action): boolean;

  /** Apply an action and return the new state (must be deterministic) */
  applyAction(state: GameState, playerId: string, action: Action): GameState;

  isTerminal(state: GameState): boolean;

  /** Get the outcome of a terminal game state */
  getOutcome(state: GameState): Outcome;

  /** Get the observable state for a specific player (hides private info) */
  getObservation(state: GameState, playerId: string): Observation;

  /** Get all legal actions for a player in the current state */
  getLegalActions(state: GameState, playerId: string): Action[];
}
