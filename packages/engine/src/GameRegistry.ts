import { IGameModule } from "./interfaces/IGameModule";

/**
 * In-memory registry of available game modules.
 */
export class GameRegistry {
  private games = new Map<string, IGameModule>();

  constructor(modules: IGameModule[] = []) {
    for (const game of modules) this.register(game);
  }

  register(game: IGameModule): void {
    if (this.games.has(game.gameId)) {
      throw new Error(`Game already registered: ${game.gameId}`);
    }
    this.games.set(game.gameId, game);
  }

  get(gameId: string): IGameModule | undefined {
    return this.games.get(gameId);
  }

  /** Like get, but throws for an unknown id. */
  require(gameId: string): IGameModule {
    const game = this.games.get(gameId);
    if (!game) {
      const known = this.list().map((g) => g.gameId).join(", ") || "none";
      throw new Error(`Unknown game: ${gameId} (registered: ${known})`);
    }
    return game;
  }

  list(): IGameModule[] {
    return Array.from(this.games.values());
  }

  has(gameId: string): boolean {
    return this.games.has(gameId);
  }
}
