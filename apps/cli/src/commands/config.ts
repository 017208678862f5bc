import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  checkConfigValue,
  isConfigKey,
  CONFIG_KEYS,
} from "../config";

function rejectKey(key: string): never {
  console.error(
    `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
  );
  process.exit(1);
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.deduce/config.json)");

  configCmd.action(async () => {
    await printConfigList();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) rejectKey(key);
      const problem = checkConfigValue(key, value);
      if (problem) {
        console.error(problem);
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) rejectKey(key);
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });

  configCmd
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : resolved[key];
    console.log(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  console.log("");
}
