import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerPlayCommand } from "./commands/play";
import { createRegistry } from "./games";

program
  .name("deduce")
  .description("deduce - Minesweeper played by propositional inference")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerConfigCommand(program);

program
  .command("games")
  .description("List available games")
  .action(() => {
    console.log("\nAvailable Games:");
    console.log("────────────────");
    for (const game of createRegistry().list()) {
      console.log(`  ${game.name} (${game.gameId})`);
      console.log(`    ${game.description}`);
      console.log(`    Players: ${game.minPlayers}-${game.maxPlayers}`);
      console.log("");
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
