import { createHash } from "crypto";
import { promises as fs } from "fs";
import { RecipeCardError, errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { orderedSections } from "./extract";
import { FingerprintCache, Recipe } from "./types";

export const DIGEST_SIZE = 32;

const RECORD_SEPARATOR = 0x0a;

export function computeFingerprint(recipe: Pick<Recipe, "title" | "sections">): Buffer {
  const hash = createHash("sha256");
  hash.update(recipe.title);
  for (const [, lines] of orderedSections(recipe)) {
    for (const line of lines) {
      hash.update(line);
    }
  }
  return hash.digest();
}

/**
 * Records are `title \n digest`, the digest being exactly {@link DIGEST_SIZE}
 * raw bytes. Titles that contain a newline cannot be framed and are left out.
 */
export function encodeFingerprints(cache: FingerprintCache): Buffer {
  const records: Buffer[] = [];
  for (const [title, digest] of cache) {
    if (title.includes("\n") || digest.length !== DIGEST_SIZE) {
      continue;
    }
    records.push(Buffer.from(`${title}\n`, "utf8"), digest);
  }
  return Buffer.concat(records);
}

export function decodeFingerprints(data: Buffer): FingerprintCache {
  const cache: FingerprintCache = new Map();
  let offset = 0;

  while (offset < data.length) {
    const separator = data.indexOf(RECORD_SEPARATOR, offset);
    if (separator === -1) {
      throw new RecipeCardError("CACHE_UNAVAILABLE", `Fingerprint cache ends inside a title at byte ${offset}`);
    }
    const digestEnd = separator + 1 + DIGEST_SIZE;
    if (digestEnd > data.length) {
      throw new RecipeCardError("CACHE_UNAVAILABLE", `Fingerprint cache has a truncated digest at byte ${separator + 1}`);
    }

    const title = data.toString("utf8", offset, separator);
    cache.set(title, Buffer.from(data.subarray(separator + 1, digestEnd)));
    offset = digestEnd;
  }

  return cache;
}

/** Never throws: an unreadable cache only costs a full re-index. */
export async function loadFingerprints(cachePath: string, logger: Logger): Promise<FingerprintCache> {
  let data: Buffer;
  try {
    data = await fs.readFile(cachePath);
  } catch (error) {
    const warning = new RecipeCardError("CACHE_UNAVAILABLE", `Unable to read fingerprint cache: ${errorMessage(error)}`, {
      cause: error,
    });
    logger.warn({ cachePath, err: warning }, "Failed to open previous fingerprint cache");
    return new Map();
  }

  try {
    const cache = decodeFingerprints(data);
    logger.debug({ cachePath, count: cache.size }, "Got previous fingerprints");
    return cache;
  } catch (error) {
    logger.warn({ cachePath, err: error }, "Ignoring malformed fingerprint cache");
    return new Map();
  }
}

export async function saveFingerprints(cache: FingerprintCache, cachePath: string): Promise<void> {
  try {
    await fs.writeFile(cachePath, encodeFingerprints(cache));
  } catch (error) {
    throw new RecipeCardError("PERSISTENCE_FAILED", `Unable to save fingerprint cache: ${errorMessage(error)}`, {
      cause: error,
      details: { cachePath },
    });
  }
}
