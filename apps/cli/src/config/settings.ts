import { isLogLevel } from "@deduce/core";
import { MAX_SIDE } from "@deduce/game-minesweeper";
import { ConfigData, DEFAULTS } from "./defaults";

export type StrategyName = "knowledge" | "random";

export const STRATEGIES: readonly StrategyName[] = ["knowledge", "random"];

export interface BoardSettings {
  height: number;
  width: number;
  mines: number;
}

function isStrategyName(value: string): value is StrategyName {
  const names: readonly string[] = STRATEGIES;
  return names.includes(value);
}

function parseInteger(key: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new Error(`Invalid ${key}: "${raw}". Must be an integer.`);
  }
  return value;
}

export function parseStrategy(raw: string): StrategyName {
  if (!isStrategyName(raw)) {
    throw new Error(`Unknown strategy: "${raw}". Valid strategies: ${STRATEGIES.join(", ")}`);
  }
  return raw;
}

/** Board settings from resolved config; the game module checks the mine count against the size. */
export function toBoardSettings(config: ConfigData): BoardSettings {
  const height = parseInteger("height", config.height);
  const width = parseInteger("width", config.width);
  const mines = parseInteger("mines", config.mines);
  for (const [key, side] of [["height", height], ["width", width]] as const) {
    if (side < 1 || side > MAX_SIDE) {
      throw new Error(`Invalid ${key}: ${side}. Must be 1-${MAX_SIDE}.`);
    }
  }
  if (mines < 0) {
    throw new Error(`Invalid mines: ${mines}. Must not be negative.`);
  }
  return { height, width, mines };
}

export interface RunOptions {
  count: number;
  delay: number;
}

/** Episode count (at least 1) and move delay in ms (at least 0) from `play` flags. */
export function parseRunOptions(count: string, delay: string): RunOptions {
  const games = parseInteger("count", count);
  if (games < 1) {
    throw new Error(`Invalid count: ${games}. Must be at least 1.`);
  }
  const ms = parseInteger("delay", delay);
  if (ms < 0) {
    throw new Error(`Invalid delay: ${ms}. Must not be negative.`);
  }
  return { count: games, delay: ms };
}

/** Error message for a value `deduce config set` should refuse, or null when it is acceptable. */
export function checkConfigValue(key: keyof ConfigData, value: string): string | null {
  try {
    switch (key) {
      case "height":
      case "width":
      case "mines":
        toBoardSettings({ ...DEFAULTS, [key]: value });
        return null;
      case "strategy":
        parseStrategy(value);
        return null;
      case "logLevel":
        return isLogLevel(value) ? null : `Invalid logLevel: "${value}". Use trace, debug, info, warn, error or fatal.`;
      default:
        return null;
    }
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}
