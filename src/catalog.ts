import { promises as fs } from "fs";
import type { CatalogConfig } from "./config";
import { RecipeCardError, errorMessage, isRecipeCardError } from "./lib/errors";
import type { Logger } from "./lib/logger";
import { loadCorpus, loadFingerprints, saveFingerprints, synchronize } from "./pipeline";
import type { CorpusLoad, FingerprintCache, Recipe, SyncReport } from "./pipeline";
import { openSearchStore } from "./search/store";
import type { SearchStore } from "./search/store";
import type { SearchIndex } from "./search/types";

export type Catalog = {
  /** Accepted recipes in corpus walk order. */
  recipes: Recipe[];
  corpus: CorpusLoad;
  report: SyncReport;
  get(title: string): Recipe | undefined;
  search(query: string): Recipe[];
};

function searchRecipes(index: SearchIndex, accepted: Map<string, Recipe>, query: string): Recipe[] {
  const trimmed = query.trim();
  if (!trimmed) {
    return [];
  }

  let hits = index.search(trimmed);
  if (hits.length === 0) {
    hits = index.search(trimmed, { fuzzy: true });
  }

  const found: Recipe[] = [];
  for (const hit of hits) {
    const recipe = accepted.get(hit.id);
    if (recipe) {
      found.push(recipe);
    }
  }
  return found;
}

function persistenceFailure(error: unknown): RecipeCardError {
  return isRecipeCardError(error) ? error : new RecipeCardError("PERSISTENCE_FAILED", errorMessage(error), { cause: error });
}

/**
 * Writes the index dump, then the fingerprints that describe it. When the dump
 * cannot be written the fingerprint file is removed instead, so the next run
 * re-indexes everything.
 */
async function persist(store: SearchStore, fingerprints: FingerprintCache, report: SyncReport, logger: Logger): Promise<void> {
  const { fingerprintsPath } = store;

  try {
    await store.save();
  } catch (error) {
    const failure = persistenceFailure(error);
    logger.warn({ err: failure }, "Failed to save search index");
    report.persistenceError ??= failure;
    if (fingerprintsPath) {
      await fs.rm(fingerprintsPath, { force: true }).catch((rmError: unknown) => {
        logger.warn({ cachePath: fingerprintsPath, err: rmError }, "Failed to remove fingerprint cache");
      });
    }
    return;
  }

  if (!fingerprintsPath) {
    return;
  }
  try {
    await saveFingerprints(fingerprints, fingerprintsPath);
    logger.info({ cachePath: fingerprintsPath }, "Updated index data");
  } catch (error) {
    const failure = persistenceFailure(error);
    logger.warn({ cachePath: fingerprintsPath, err: failure }, "Failed to save fingerprint cache");
    report.persistenceError ??= failure;
  }
}

/**
 * Loads the corpus and synchronizes the search index with it. The returned
 * catalog answers lookups and searches against the synchronized state.
 */
export async function openCatalog(config: CatalogConfig, logger: Logger): Promise<Catalog> {
  logger.info({ recipesPath: config.recipesPath }, "Getting recipes from path");
  const corpus = await loadCorpus(config.recipesPath, { logger, concurrency: config.concurrency });

  const store = await openSearchStore(config.indexPath, logger);

  let fingerprints: FingerprintCache = new Map();
  if (store.fingerprintsPath && !store.fresh) {
    fingerprints = await loadFingerprints(store.fingerprintsPath, logger);
  }

  const report = await synchronize({
    recipes: corpus.recipes,
    index: store.index,
    fingerprints,
    logger,
  });

  await persist(store, fingerprints, report, logger);

  const accepted = report.accepted;
  return {
    recipes: [...accepted.values()],
    corpus,
    report,
    get: (title) => accepted.get(title),
    search: (query) => searchRecipes(store.index, accepted, query),
  };
}
