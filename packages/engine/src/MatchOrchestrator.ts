import {
  GameState,
  Action,
  Outcome,
  Observation,
  MatchStatus,
  MatchTranscript,
  TranscriptBuilder,
  createLogger,
  hashState,
  Logger,
} from "@deduce/core";
import { IGameModule } from "./interfaces/IGameModule";

export interface MatchOrchestratorOptions {
  game: IGameModule;
  players: string[];
  matchId: string;
  rngSeed?: string;
  settings?: Record<string, unknown>;
  logger?: Logger;
  /** Clock for transcript timestamps. */
  now?: () => number;
}

export interface SubmitResult {
  observation: Observation;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Orchestrates a single match: manages turns, validates moves,
 * applies state transitions, and builds the transcript.
 */
export class MatchOrchestrator {
  readonly matchId: string;
  private game: IGameModule;
  private state: GameState;
  private transcript: TranscriptBuilder;
  private initialHash: string;
  private log: Logger;
  private now: () => number;

  constructor(opts: MatchOrchestratorOptions) {
    if (
      opts.players.length < opts.game.minPlayers ||
      opts.players.length > opts.game.maxPlayers
    ) {
      throw new Error(
        `${opts.game.name} needs ${opts.game.minPlayers}-${opts.game.maxPlayers} players, got ${opts.players.length}`
      );
    }

    this.game = opts.game;
    this.matchId = opts.matchId;
    this.log = opts.logger ?? createLogger("engine");
    this.now = opts.now ?? Date.now;

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.state = opts.game.init(config, opts.players, opts.rngSeed || "0");
    this.initialHash = hashState(this.state);
    this.transcript = new TranscriptBuilder(opts.matchId, opts.game.gameId, this.state);

    this.log.debug(
      { matchId: opts.matchId, gameId: opts.game.gameId, players: opts.players },
      "Match created"
    );
  }

  get status(): MatchStatus {
    return this.isTerminal() ? MatchStatus.COMPLETED : MatchStatus.ACTIVE;
  }

  getState(): GameState {
    return this.state;
  }

  getCurrentPlayer(): string {
    return this.state.currentPlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(playerId: string): Observation {
    return this.game.getObservation(this.state, playerId);
  }

  getLegalActions(playerId: string): Action[] {
    return this.game.getLegalActions(this.state, playerId);
  }

  getTranscript(): MatchTranscript {
    return this.transcript.getTranscript();
  }

  /** Hash of the state the match started from; the first link of the chain. */
  getInitialStateHash(): string {
    return this.initialHash;
  }

  /**
   * Submit a move. Returns the new state observation or throws if invalid.
   */
  submitAction(playerId: string, action: Action): SubmitResult {
    if (this.isTerminal()) {
      throw new Error("Game is already over");
    }

    if (this.state.currentPlayer !== playerId) {
      throw new Error(
        `Not your turn. Current player: ${this.state.currentPlayer}`
      );
    }

    if (!this.game.validateAction(this.state, playerId, action)) {
      throw new Error(`Invalid action: ${action.type}`);
    }

    this.state = this.game.applyAction(this.state, playerId, action);
    this.transcript.addEntry(playerId, action, this.state, this.now());

    const terminal = this.game.isTerminal(this.state);
    const observation = this.game.getObservation(this.state, playerId);
    const outcome = terminal ? this.game.getOutcome(this.state) : undefined;

    if (outcome) {
      this.log.debug(
        {
          matchId: this.matchId,
          moves: this.transcript.getEntryCount(),
          winner: outcome.winner,
          reason: outcome.reason,
        },
        "Match completed"
      );
    }

    return { observation, terminal, outcome };
  }
}
