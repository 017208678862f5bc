/** Every value is kept as a string, the way it appears in the file or the environment. */
export interface ConfigData {
  height: string;
  width: string;
  mines: string;
  /** Seed for mine placement; empty means a fresh random board per episode */
  seed: string;
  /** "knowledge" or "random" */
  strategy: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "height",
  "width",
  "mines",
  "seed",
  "strategy",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  height: "8",
  width: "8",
  mines: "8",
  seed: "",
  strategy: "knowledge",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  height: "DEDUCE_HEIGHT",
  width: "DEDUCE_WIDTH",
  mines: "DEDUCE_MINES",
  seed: "DEDUCE_SEED",
  strategy: "DEDUCE_STRATEGY",
  logLevel: "LOG_LEVEL",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  const keys: readonly string[] = CONFIG_KEYS;
  return keys.includes(key);
}
