import { GameRegistry } from "@deduce/engine";
import { MinesweeperModule } from "@deduce/game-minesweeper";

export function createRegistry(): GameRegistry {
  return new GameRegistry([MinesweeperModule]);
}
