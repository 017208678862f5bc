/** Settings handed to a game module when a match is created. */
export interface GameConfig {
  gameId: string;
  version: string;
  settings?: Record<string, unknown>;
}

/**
 * Full, authoritative state of a match. `data` is owned by the game module
 * and may contain hidden information (e.g. mine positions).
 */
export interface GameState {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  data: Record<string, unknown>;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

/** What a single player is allowed to see of a GameState. */
export interface Observation {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  publicData: Record<string, unknown>;
  privateData?: Record<string, unknown>;
}
