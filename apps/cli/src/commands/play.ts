import { Command } from "commander";
import { createLogger, resolveLogLevel } from "@deduce/core";
import { KnowledgeStrategy, LocalAgent, RandomStrategy, Strategy } from "@deduce/agent";
import { getGameUI } from "@deduce/game-ui";
import {
  resolveConfig,
  parseRunOptions,
  parseStrategy,
  setCliOverride,
  toBoardSettings,
  BoardSettings,
  StrategyName,
} from "../config";
import { createRegistry } from "../games";
import { log } from "../log";

const GAME_ID = "minesweeper";

interface PlayOpts {
  height?: string;
  width?: string;
  mines?: string;
  seed?: string;
  strategy?: string;
  count: string;
  delay: string;
  board?: boolean;
}

function episodeSeed(seed: string, index: number, count: number): string | undefined {
  if (!seed) return undefined;
  return count > 1 ? `${seed}-${index + 1}` : seed;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play Minesweeper autonomously")
    .option("--height <rows>", "Board height")
    .option("--width <cols>", "Board width")
    .option("-m, --mines <N>", "Number of mines")
    .option("-s, --seed <seed>", "Seed for mine placement")
    .option("--strategy <name>", "knowledge or random")
    .option("-n, --count <N>", "Number of games to play", "1")
    .option("--delay <ms>", "Delay between moves in ms", "0")
    .option("--board", "Print the board after each game")
    .action(async (opts: PlayOpts) => {
      if (opts.height) setCliOverride("height", opts.height);
      if (opts.width) setCliOverride("width", opts.width);
      if (opts.mines) setCliOverride("mines", opts.mines);
      if (opts.seed) setCliOverride("seed", opts.seed);
      if (opts.strategy) setCliOverride("strategy", opts.strategy);

      const config = await resolveConfig();
      const level = resolveLogLevel(config.logLevel);

      let settings: BoardSettings;
      let strategyName: StrategyName;
      let count: number;
      let delay: number;
      try {
        settings = toBoardSettings(config);
        strategyName = parseStrategy(config.strategy);
        ({ count, delay } = parseRunOptions(opts.count, opts.delay));
      } catch (err) {
        log("error", err instanceof Error ? err.message : String(err));
        process.exit(1);
      }

      log(
        "init",
        `Board: ${settings.height}x${settings.width}, ${settings.mines} mines | Strategy: ${strategyName}`,
      );
      log("init", `Count: ${count} | Delay: ${delay}ms${config.seed ? ` | Seed: ${config.seed}` : ""}`);

      const agent = new LocalAgent({
        registry: createRegistry(),
        playerId: "agent",
        logger: createLogger("engine", level),
      });
      const ui = getGameUI(GAME_ID);

      // Clean shutdown on Ctrl+C
      process.on("SIGINT", () => {
        log("exit", "Shutting down...");
        agent.close();
        process.exit(0);
      });

      let wins = 0;
      let losses = 0;

      for (let i = 0; i < count; i++) {
        if (count > 1) {
          log("match", `--- Game ${i + 1} of ${count} ---`);
        }

        const strategy: Strategy =
          strategyName === "knowledge"
            ? new KnowledgeStrategy({ logger: createLogger("knowledge", level) })
            : new RandomStrategy(["reveal"]);

        try {
          const result = await agent.play(GAME_ID, strategy, {
            moveDelay: delay,
            onLog: log,
            seed: episodeSeed(config.seed, i, count),
            settings: { ...settings },
          });

          if (result.didWin) wins++;
          else losses++;

          log("stats", `${result.moves} moves | transcript ${result.transcript.rootHash.slice(0, 18)}`);
          if (opts.board && ui) {
            console.log(ui.renderBoard(result.finalObservation.publicData));
          }
        } catch (err) {
          log("error", err instanceof Error ? err.message : String(err));
          process.exitCode = 1;
          break;
        }
      }

      if (count > 1) {
        log("done", `Results: ${wins}W / ${losses}L (${count} games)`);
      }
    });
}
