import { Action } from "@deduce/core";
import { GameContext, Strategy } from "../types";

/**
 * Picks uniformly among the legal actions, optionally restricted to some
 * action types (e.g. only "reveal").
 */
export class RandomStrategy implements Strategy {
  private readonly types: readonly string[] | null;
  private readonly random: () => number;

  constructor(types?: readonly string[], random: () => number = Math.random) {
    this.types = types && types.length > 0 ? types : null;
    this.random = random;
  }

  chooseAction(ctx: GameContext): Action {
    const types = this.types;
    const pool = types ? ctx.legalActions.filter((a) => types.includes(a.type)) : ctx.legalActions;
    if (pool.length === 0) {
      throw new Error(`No legal action of type ${types ? types.join("/") : "any"}`);
    }
    const idx = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
    return pool[idx];
  }
}
