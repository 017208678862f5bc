import { GameState, Observation } from "@deduce/core";
import {
  Coord,
  GameStatus,
  MinesweeperData,
  cloneGrid,
  countFlags,
  isBoolean,
  isCoord,
  isCount,
  isGrid,
  listMines,
  readData,
  statusOf,
} from "./state";

/** What a player sees of the board. */
export interface PublicBoard {
  height: number;
  width: number;
  mineCount: number;
  revealed: (number | null)[][];
  flagged: boolean[][];
  flagsPlaced: number;
  exploded: Coord | null;
  status: GameStatus;
  /** Mine positions, present once the game is over */
  mines: Coord[] | null;
}

const STATUSES: readonly string[] = ["playing", "won", "lost", "resigned"];

function isStatus(value: unknown): value is GameStatus {
  return typeof value === "string" && STATUSES.includes(value);
}

export function toPublicBoard(data: MinesweeperData): PublicBoard {
  const status = statusOf(data);
  return {
    height: data.height,
    width: data.width,
    mineCount: data.mineCount,
    revealed: cloneGrid(data.revealed),
    flagged: cloneGrid(data.flagged),
    flagsPlaced: countFlags(data),
    exploded: data.exploded ? { ...data.exploded } : null,
    status,
    mines: status === "playing" ? null : listMines(data),
  };
}

/**
 * Returns the observation for the player.
 * The mine layout is HIDDEN while the game is in progress; only revealed
 * counts and the player's own flags are shown.
 */
export function getObservationForPlayer(
  state: GameState,
  _playerId: string
): Observation {
  const board = toPublicBoard(readData(state.data));
  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: { ...board },
  };
}

/** Narrow an observation's publicData back to a PublicBoard, or null if it is not one. */
export function readPublicBoard(publicData: Record<string, unknown>): PublicBoard | null {
  const { height, width, mineCount, revealed, flagged, flagsPlaced, exploded, status, mines } =
    publicData;
  if (
    typeof height !== "number" ||
    typeof width !== "number" ||
    typeof mineCount !== "number" ||
    typeof flagsPlaced !== "number" ||
    !isGrid(revealed, height, width, isCount) ||
    !isGrid(flagged, height, width, isBoolean) ||
    !(exploded === null || isCoord(exploded)) ||
    !isStatus(status) ||
    !(mines === null || (Array.isArray(mines) && mines.every(isCoord)))
  ) {
    return null;
  }
  return { height, width, mineCount, revealed, flagged, flagsPlaced, exploded, status, mines };
}
