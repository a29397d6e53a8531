import path from "path";
import type { LogLevel } from "./lib/logger";
import { DEFAULT_CONCURRENCY } from "./pipeline";

export const DEFAULT_RECIPES_PATH = "Recipes";
export const DEFAULT_INDEX_PATH = "search_idx";

export type CatalogConfig = {
  recipesPath: string;
  /** Undefined keeps the search index in memory and skips the fingerprint cache. */
  indexPath?: string;
  concurrency: number;
  logLevel: LogLevel;
};

export type ConfigInput = {
  recipes?: string;
  index?: string;
  memory?: boolean;
  concurrency?: string | number;
  debug?: boolean;
};

function parseConcurrency(value: string | number | undefined): number {
  if (value === undefined || value === "") {
    return DEFAULT_CONCURRENCY;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid concurrency: ${value}. Expected a positive integer`);
  }
  return parsed;
}

export function resolveConfig(input: ConfigInput, cwd: string = process.cwd()): CatalogConfig {
  return {
    recipesPath: path.resolve(cwd, input.recipes || DEFAULT_RECIPES_PATH),
    indexPath: input.memory ? undefined : path.resolve(cwd, input.index || DEFAULT_INDEX_PATH),
    concurrency: parseConcurrency(input.concurrency),
    logLevel: input.debug ? "debug" : "info",
  };
}
