import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS, ConfigData } from "./defaults";

/** ~/.deduce, or DEDUCE_CONFIG_DIR when set. */
export function getConfigDir(): string {
  return process.env.DEDUCE_CONFIG_DIR || join(homedir(), ".deduce");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    if (isMissingFile(err)) {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "deduce config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }

  const data: Partial<ConfigData> = {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return data;
  }
  const entries = new Map<string, unknown>(Object.entries(parsed));
  for (const key of CONFIG_KEYS) {
    const value = entries.get(key);
    if (typeof value === "string") data[key] = value;
  }
  return data;
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
