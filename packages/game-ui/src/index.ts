import { GameUISpec } from "@deduce/engine";
import { MinesweeperUI } from "@deduce/game-minesweeper";

const registry = new Map<string, GameUISpec>();
registry.set("minesweeper", MinesweeperUI);

/**
 * Look up the UI specification for a game by its ID.
 * Returns undefined if the game has no registered UI.
 */
export function getGameUI(gameId: string): GameUISpec | undefined {
  return registry.get(gameId);
}

export type { GameUISpec, GlyphDisplay } from "@deduce/engine";
