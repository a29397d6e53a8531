import { promises as fs } from "fs";
import path from "path";
import { RecipeCardError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { RecipeSearchIndex } from "./recipeIndex";

export const SEARCH_DUMP_FILE = "search.json";
export const FINGERPRINTS_FILE = "item.idx";

export type SearchStore = {
  index: RecipeSearchIndex;
  /** True when no previous index could be restored. */
  fresh: boolean;
  /** Undefined for an in-memory store, which keeps no fingerprints either. */
  fingerprintsPath?: string;
  save(): Promise<void>;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function restoreIndex(dumpPath: string, logger: Logger): Promise<RecipeSearchIndex | undefined> {
  let json: string;
  try {
    json = await fs.readFile(dumpPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info({ dumpPath }, "No previous search index, creating a new one");
    } else {
      logger.warn({ dumpPath, err: error }, "Failed to open search index, recreating it");
    }
    return undefined;
  }

  try {
    return RecipeSearchIndex.fromJSON(json);
  } catch (error) {
    logger.warn({ dumpPath, err: error }, "Failed to restore search index, recreating it");
    return undefined;
  }
}

export async function openSearchStore(indexDir: string | undefined, logger: Logger): Promise<SearchStore> {
  if (!indexDir) {
    logger.info("Creating in-memory search index");
    return {
      index: new RecipeSearchIndex(),
      fresh: true,
      save: async () => {},
    };
  }

  try {
    await fs.mkdir(indexDir, { recursive: true });
  } catch (error) {
    throw new RecipeCardError("PERSISTENCE_FAILED", `Unable to create index directory ${indexDir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const dumpPath = path.join(indexDir, SEARCH_DUMP_FILE);
  const restored = await restoreIndex(dumpPath, logger);
  const index = restored ?? new RecipeSearchIndex();

  logger.debug({ dumpPath, documents: index.size, fresh: !restored }, "Opened search index");

  return {
    index,
    fresh: !restored,
    fingerprintsPath: path.join(indexDir, FINGERPRINTS_FILE),
    save: async () => {
      try {
        await fs.writeFile(dumpPath, index.serialize(), "utf-8");
      } catch (error) {
        throw new RecipeCardError("PERSISTENCE_FAILED", `Unable to save search index: ${errorMessage(error)}`, {
          cause: error,
          details: { dumpPath },
        });
      }
    },
  };
}
