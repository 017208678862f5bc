import { Action, Logger, Observation } from "@deduce/core";
import { PublicBoard, readPublicBoard, flag, reveal, resign } from "@deduce/game-minesweeper";
import { KnowledgeBase } from "@deduce/knowledge";
import { GameContext, Strategy } from "../types";

export interface KnowledgeStrategyOptions {
  /** Uniform source for guesses; defaults to Math.random. */
  random?: () => number;
  logger?: Logger;
}

/**
 * Minesweeper player backed by a KnowledgeBase. Every newly revealed cell
 * becomes an observation; each turn it flags a proven mine, else reveals
 * a proven-safe cell, else guesses, else resigns.
 */
export class KnowledgeStrategy implements Strategy {
  private readonly opts: KnowledgeStrategyOptions;
  private kb: KnowledgeBase | null = null;
  private matchId: string | null = null;

  constructor(opts: KnowledgeStrategyOptions = {}) {
    this.opts = opts;
  }

  /** Knowledge of the current (or last) match. */
  get knowledge(): KnowledgeBase | null {
    return this.kb;
  }

  onStateUpdate(ctx: GameContext): void {
    this.absorb(ctx);
  }

  chooseAction(ctx: GameContext): Action {
    const { kb, board } = this.absorb(ctx);

    for (const mine of kb.mines) {
      if (!board.flagged[mine.row][mine.col]) return flag(mine.row, mine.col);
    }

    const move = kb.makeSafeMove() ?? kb.makeRandomMove();
    return move ? reveal(move.row, move.col) : resign();
  }

  private absorb(ctx: GameContext): { kb: KnowledgeBase; board: PublicBoard } {
    const board = readBoard(ctx.observation);

    let kb = this.kb;
    if (
      !kb ||
      this.matchId !== ctx.matchId ||
      kb.height !== board.height ||
      kb.width !== board.width
    ) {
      kb = new KnowledgeBase({
        height: board.height,
        width: board.width,
        random: this.opts.random,
        logger: this.opts.logger,
      });
      this.kb = kb;
      this.matchId = ctx.matchId;
    }

    for (let row = 0; row < board.height; row++) {
      for (let col = 0; col < board.width; col++) {
        const count = board.revealed[row][col];
        if (count === null || kb.movesMade.has({ row, col })) continue;
        kb.addKnowledge({ row, col }, count);
      }
    }

    return { kb, board };
  }
}

function readBoard(observation: Observation): PublicBoard {
  const board = readPublicBoard(observation.publicData);
  if (!board) {
    throw new Error(`KnowledgeStrategy cannot read a ${observation.gameId} observation`);
  }
  return board;
}
