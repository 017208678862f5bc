export { MinesweeperModule, DEFAULT_HEIGHT, DEFAULT_WIDTH, DEFAULT_MINES, MAX_SIDE } from "./rules";
export { MinesweeperUI } from "./ui";
export { SeededRng } from "./prng";
export { placeMines, nearbyMines, neighborsOf } from "./board";
export { readPublicBoard, toPublicBoard } from "./observation";
export type { PublicBoard } from "./observation";
export {
  reveal,
  flag,
  unflag,
  resign,
  isRevealAction,
  isFlagAction,
  isUnflagAction,
  isResignAction,
} from "./actions";
export type { RevealAction, FlagAction, UnflagAction, ResignAction } from "./actions";
export { newBoardData, readData, statusOf } from "./state";
export type { Coord, GameStatus, MinesweeperData } from "./state";
