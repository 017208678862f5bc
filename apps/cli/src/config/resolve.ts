import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) delete cliOverrides[key];
}

/** Defaults, then the config file, then the environment, then command-line flags. */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      resolved[key] = fileVal;
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const cliVal = cliOverrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      resolved[key] = cliVal;
    }
  }

  return resolved;
}

/** Where a resolved value came from, for `deduce config list`. */
export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}
