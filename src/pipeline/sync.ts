import { RecipeCardError, errorMessage, isRecipeCardError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { SearchIndex } from "../search/types";
import { computeFingerprint, saveFingerprints } from "./fingerprint";
import { FingerprintCache, IndexFailure, Recipe, SyncReport } from "./types";

export type SyncInput = {
  recipes: Recipe[];
  index: SearchIndex;
  fingerprints: FingerprintCache;
  /** Where the updated fingerprints are written. Nothing is written when omitted. */
  cachePath?: string;
  logger: Logger;
};

function toIndexFailure(title: string, operation: IndexFailure["operation"], error: unknown): IndexFailure {
  return {
    title,
    operation,
    error: isRecipeCardError(error, "INDEX_OPERATION_FAILED")
      ? error
      : new RecipeCardError("INDEX_OPERATION_FAILED", `Unable to ${operation} ${title}: ${errorMessage(error)}`, {
          cause: error,
        }),
  };
}

/**
 * Brings the search index and the fingerprint cache in line with `recipes`.
 *
 * A recipe is written to the index only when its title is new to the cache
 * or its fingerprint changed, and cached titles that no longer have a recipe
 * are pruned. `fingerprints` is updated in place. Running it again over the
 * same recipes touches nothing.
 */
export async function synchronize(input: SyncInput): Promise<SyncReport> {
  const { recipes, index, fingerprints, cachePath, logger } = input;
  const report: SyncReport = {
    accepted: new Map(),
    inserted: [],
    reindexed: [],
    removed: [],
    unchanged: 0,
    skipped: [],
    failures: [],
  };

  for (const recipe of recipes) {
    if (!recipe.title) {
      logger.error({ docPath: recipe.docPath }, "Missing title");
      report.skipped.push({ reason: "missing-title", docPath: recipe.docPath });
      continue;
    }

    const existing = report.accepted.get(recipe.title);
    if (existing) {
      logger.error(
        { existingPath: existing.docPath, newPath: recipe.docPath, title: recipe.title },
        "Duplicate recipe title",
      );
      report.skipped.push({
        reason: "duplicate-title",
        docPath: recipe.docPath,
        title: recipe.title,
        existingPath: existing.docPath,
      });
      continue;
    }

    report.accepted.set(recipe.title, recipe);

    const fingerprint = computeFingerprint(recipe);
    logger.debug({ title: recipe.title, sha256: fingerprint.toString("hex") }, "Finished hashing data");

    const previous = fingerprints.get(recipe.title);
    if (previous && previous.equals(fingerprint)) {
      report.unchanged += 1;
      continue;
    }

    logger.info({ title: recipe.title, docPath: recipe.docPath }, "Indexing");
    try {
      await index.delete(recipe.title);
      await index.index(recipe.title, recipe);
    } catch (error) {
      const failure = toIndexFailure(recipe.title, "index", error);
      logger.error({ title: recipe.title, err: failure.error }, "Failed to index recipe");
      report.failures.push(failure);
      // forget the old fingerprint so the next pass retries
      fingerprints.delete(recipe.title);
      continue;
    }

    fingerprints.set(recipe.title, fingerprint);
    (previous ? report.reindexed : report.inserted).push(recipe.title);
    logger.info({ title: recipe.title }, "Indexed");
  }

  for (const title of [...fingerprints.keys()]) {
    if (report.accepted.has(title)) {
      continue;
    }

    logger.info({ title }, "Removing missing recipe");
    try {
      await index.delete(title);
    } catch (error) {
      const failure = toIndexFailure(title, "delete", error);
      logger.error({ title, err: failure.error }, "Failed to remove recipe from index");
      report.failures.push(failure);
      continue;
    }
    fingerprints.delete(title);
    report.removed.push(title);
  }

  if (cachePath) {
    try {
      await saveFingerprints(fingerprints, cachePath);
      logger.info({ cachePath }, "Updated index data");
    } catch (error) {
      report.persistenceError = isRecipeCardError(error)
        ? error
        : new RecipeCardError("PERSISTENCE_FAILED", errorMessage(error), { cause: error });
      logger.warn({ cachePath, err: report.persistenceError }, "Failed to update index data");
    }
  }

  return report;
}
