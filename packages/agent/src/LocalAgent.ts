import { randomUUID } from "crypto";
import { Action, Logger } from "@deduce/core";
import { GameRegistry, IGameModule, MatchOrchestrator } from "@deduce/engine";
import { AgentConfig, GameContext, GameResult, Strategy, PlayOptions } from "./types";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeAction(game: IGameModule, action: Action): string {
  return game.ui ? game.ui.formatAction(action) : JSON.stringify(action);
}

/**
 * Plays complete matches in-process against registered game modules,
 * asking a Strategy for every move.
 */
export class LocalAgent {
  private readonly registry: GameRegistry;
  private readonly playerId: string;
  private readonly logger?: Logger;
  private aborted = false;

  constructor(config: AgentConfig) {
    this.registry = config.registry;
    this.playerId = config.playerId || "agent";
    this.logger = config.logger;
  }

  /**
   * Start a match of `gameId` and play it to the end using the provided
   * strategy. Resolves with the result; rejects if the strategy picks an
   * invalid action or the agent is closed mid-game.
   */
  async play(
    gameId: string,
    strategy: Strategy,
    opts: PlayOptions = {}
  ): Promise<GameResult> {
    const log = opts.onLog || (() => {});
    const game = this.registry.require(gameId);
    const matchId = opts.matchId || randomUUID();

    const orch = new MatchOrchestrator({
      game,
      players: [this.playerId],
      matchId,
      rngSeed: opts.seed || matchId,
      settings: opts.settings,
      logger: this.logger,
    });
    log("match", `Started ${game.name} match ${matchId}`);

    const context = (): GameContext => {
      const observation = orch.getObservation(this.playerId);
      const yourTurn = !orch.isTerminal() && orch.getCurrentPlayer() === this.playerId;
      return {
        matchId,
        gameId,
        observation,
        yourTurn,
        legalActions: yourTurn ? orch.getLegalActions(this.playerId) : [],
        turnNumber: observation.turnNumber,
      };
    };

    let moves = 0;
    while (!orch.isTerminal()) {
      if (this.aborted) {
        throw new Error("Agent was closed before the match ended");
      }

      const ctx = context();
      strategy.onStateUpdate?.(ctx);

      if (opts.moveDelay) {
        await sleep(opts.moveDelay);
      }
      const action = await Promise.resolve(strategy.chooseAction(ctx));
      log("move", describeAction(game, action));
      orch.submitAction(this.playerId, action);
      moves++;
    }

    const final = context();
    strategy.onStateUpdate?.(final);

    const outcome = orch.getOutcome();
    const result: GameResult = {
      matchId,
      winner: outcome.winner,
      draw: outcome.draw,
      reason: outcome.reason,
      you: this.playerId,
      didWin: outcome.winner === this.playerId,
      moves,
      finalObservation: final.observation,
      transcript: orch.getTranscript(),
    };

    log(
      "over",
      result.draw
        ? `Draw: ${result.reason}`
        : result.didWin
          ? `You won! ${result.reason}`
          : `You lost. ${result.reason}`
    );

    strategy.onGameOver?.(result);
    return result;
  }

  /** Abort the match in progress, if any; later calls to play reject. */
  close(): void {
    this.aborted = true;
  }
}
