import {
  GameConfig,
  GameState,
  Action,
  Outcome,
  Observation,
} from "@deduce/core";
import { IGameModule } from "@deduce/engine";
import { MinesweeperUI } from "./ui";
import {
  allMinesFlagged,
  cloneData,
  isInside,
  newBoardData,
  readData,
  statusOf,
} from "./state";
import {
  isRevealAction,
  isFlagAction,
  isUnflagAction,
  isResignAction,
  getLegalActionsForPlayer,
} from "./actions";
import { getObservationForPlayer } from "./observation";
import { nearbyMines, placeMines } from "./board";

export const DEFAULT_HEIGHT = 8;
export const DEFAULT_WIDTH = 8;
export const DEFAULT_MINES = 8;
export const MAX_SIDE = 64;

/** Integer setting, accepting numbers or numeric strings (as config files hold them). */
function readIntSetting(
  settings: Record<string, unknown> | undefined,
  key: string,
  fallback: number
): number {
  const raw = settings?.[key];
  if (raw === undefined || raw === null || raw === "") return fallback;
  const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : NaN;
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${key}: ${String(raw)}. Must be an integer.`);
  }
  return value;
}

export const MinesweeperModule: IGameModule = {
  gameId: "minesweeper",
  name: "Minesweeper",
  description:
    "Reveal every safe cell, or flag every mine, on a grid of hidden mines. Each revealed cell shows how many of its neighbors are mines.",
  minPlayers: 1,
  maxPlayers: 1,
  ui: MinesweeperUI,

  init(config: GameConfig, players: string[], rngSeed: string): GameState {
    if (players.length !== 1) {
      throw new Error("Minesweeper requires exactly 1 player");
    }

    const height = readIntSetting(config.settings, "height", DEFAULT_HEIGHT);
    const width = readIntSetting(config.settings, "width", DEFAULT_WIDTH);
    const mines = readIntSetting(config.settings, "mines", DEFAULT_MINES);

    if (height < 1 || height > MAX_SIDE || width < 1 || width > MAX_SIDE) {
      throw new Error(
        `Invalid board size: ${height}x${width}. Height and width must be 1-${MAX_SIDE}.`
      );
    }
    if (mines < 0 || mines >= height * width) {
      throw new Error(
        `Invalid mine count: ${mines}. Must be 0-${height * width - 1} on a ${height}x${width} board.`
      );
    }

    const data = newBoardData(placeMines(height, width, mines, rngSeed));

    return {
      gameId: config.gameId,
      players,
      currentPlayer: players[0],
      turnNumber: 0,
      data,
    };
  },

  validateAction(
    state: GameState,
    playerId: string,
    action: Action
  ): boolean {
    if (state.currentPlayer !== playerId) return false;

    const data = readData(state.data);
    if (statusOf(data) !== "playing") return false;

    if (isResignAction(action)) return true;

    if (isRevealAction(action) || isFlagAction(action)) {
      const { row, col } = action.data;
      return (
        isInside(data, action.data) &&
        data.revealed[row][col] === null &&
        !data.flagged[row][col]
      );
    }

    if (isUnflagAction(action)) {
      const { row, col } = action.data;
      return isInside(data, action.data) && data.flagged[row][col];
    }

    return false;
  },

  applyAction(
    state: GameState,
    _playerId: string,
    action: Action
  ): GameState {
    const data = cloneData(readData(state.data));

    if (isResignAction(action)) {
      data.resigned = true;
    } else if (isRevealAction(action)) {
      const { row, col } = action.data;
      if (data.mines[row][col]) {
        data.exploded = { row, col };
      } else {
        data.revealed[row][col] = nearbyMines(data.mines, action.data);
      }
    } else if (isFlagAction(action)) {
      data.flagged[action.data.row][action.data.col] = true;
    } else if (isUnflagAction(action)) {
      data.flagged[action.data.row][action.data.col] = false;
    } else {
      throw new Error("Invalid action type");
    }

    return {
      gameId: state.gameId,
      players: state.players,
      currentPlayer: state.currentPlayer,
      turnNumber: state.turnNumber + 1,
      data,
    };
  },

  isTerminal(state: GameState): boolean {
    return statusOf(readData(state.data)) !== "playing";
  },

  getOutcome(state: GameState): Outcome {
    const data = readData(state.data);
    const player = state.players[0];

    switch (statusOf(data)) {
      case "lost":
        return {
          winner: null,
          draw: false,
          scores: { [player]: 0 },
          reason: "mine_revealed",
        };
      case "resigned":
        return {
          winner: null,
          draw: false,
          scores: { [player]: 0 },
          reason: "resigned",
        };
      case "won":
        return {
          winner: player,
          draw: false,
          scores: { [player]: 1 },
          reason: allMinesFlagged(data) ? "all_mines_flagged" : "board_cleared",
        };
      default:
        return {
          winner: null,
          draw: false,
          scores: {},
          reason: "game_in_progress",
        };
    }
  },

  getObservation(state: GameState, playerId: string): Observation {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
