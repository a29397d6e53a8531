import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { isDocumentPath } from "../adapters";
import { RecipeCardError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { extractRecipe } from "./extract";
import { CorpusLoad, DocumentOutcome, Recipe } from "./types";

export type CorpusOptions = {
  logger: Logger;
  concurrency?: number;
  /** Swappable for tests. */
  extract?: (docPath: string) => Promise<Recipe>;
};

export const DEFAULT_CONCURRENCY = Math.max(1, os.availableParallelism());

async function pointsToDirectory(linkPath: string): Promise<boolean> {
  // a dangling link is kept as a file and fails on extraction
  return fs.stat(linkPath).then(
    (stats) => stats.isDirectory(),
    () => false,
  );
}

async function listFiles(dir: string, logger: Logger): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSubdirectory(fullPath, logger)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink() && !(await pointsToDirectory(fullPath))) {
      files.push(fullPath);
    }
  }

  return files;
}

async function listSubdirectory(dir: string, logger: Logger): Promise<string[]> {
  try {
    return await listFiles(dir, logger);
  } catch (error) {
    logger.warn({ dir, err: error }, "Skipping unreadable directory");
    return [];
  }
}

/**
 * Run up to `concurrency` tasks at a time. Each task writes only its own slot,
 * so results come back in input order whatever order they finish in.
 */
async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let index = 0;

  async function worker(): Promise<void> {
    while (index < items.length) {
      const i = index++;
      results[i] = await fn(items[i]);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

async function resolveRoot(root: string): Promise<string> {
  const absoluteRoot = path.resolve(root);
  const stats = await fs.stat(absoluteRoot).catch((error: unknown) => {
    throw new RecipeCardError("CORPUS_UNAVAILABLE", `Unable to read recipe directory ${absoluteRoot}: ${errorMessage(error)}`, {
      cause: error,
    });
  });
  if (!stats.isDirectory()) {
    throw new RecipeCardError("CORPUS_UNAVAILABLE", `Not a directory ${absoluteRoot}`);
  }
  return absoluteRoot;
}

export async function loadCorpus(root: string, options: CorpusOptions): Promise<CorpusLoad> {
  const { logger } = options;
  const extract = options.extract ?? extractRecipe;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  const absoluteRoot = await resolveRoot(root);
  let files: string[];
  try {
    files = await listFiles(absoluteRoot, logger);
  } catch (error) {
    throw new RecipeCardError("CORPUS_UNAVAILABLE", `Unable to walk recipe directory ${absoluteRoot}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const documents = files.filter((file) => isDocumentPath(path.basename(file)));

  logger.debug({ root: absoluteRoot, documents: documents.length, concurrency }, "Loading recipes");

  const outcomes = await runWithConcurrency(documents, concurrency, async (docPath): Promise<DocumentOutcome> => {
    try {
      const recipe = await extract(docPath);
      return { status: "loaded", docPath, recipe };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error({ docPath, err: failure }, "Failed to load recipe document");
      return { status: "failed", docPath, error: failure };
    }
  });

  const recipes: Recipe[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "loaded") {
      recipes.push(outcome.recipe);
    }
  }

  logger.info({ root: absoluteRoot, found: recipes.length, failed: outcomes.length - recipes.length }, "Loaded recipes");

  return { root: absoluteRoot, recipes, outcomes };
}
