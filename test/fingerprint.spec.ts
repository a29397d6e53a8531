import { createHash } from "crypto";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { isRecipeCardError } from "../src/lib/errors";
import { silentLogger } from "../src/lib/logger";
import {
  DIGEST_SIZE,
  computeFingerprint,
  decodeFingerprints,
  encodeFingerprints,
  loadFingerprints,
  saveFingerprints,
} from "../src/pipeline/fingerprint";
import { makeRecipe } from "./helpers";

const logger = silentLogger();

describe("computeFingerprint", () => {
  it("hashes the title and every line in category order", () => {
    const recipe = makeRecipe("Apple Pie", {});
    recipe.sections.set("ingredients", ["2 cups flour", "6 apples"]);
    recipe.sections.set("serves", ["8"]);

    const expected = createHash("sha256").update("Apple Pie8" + "2 cups flour6 apples").digest();

    assert.deepEqual(computeFingerprint(recipe), expected);
    assert.equal(computeFingerprint(recipe).length, DIGEST_SIZE);
  });

  it("changes when a line changes or lines are reordered", () => {
    const original = computeFingerprint(makeRecipe("Stew", { ingredients: ["beef", "carrots"] }));
    const edited = computeFingerprint(makeRecipe("Stew", { ingredients: ["beef", "parsnips"] }));
    const reordered = computeFingerprint(makeRecipe("Stew", { ingredients: ["carrots", "beef"] }));

    assert.notDeepEqual(edited, original);
    assert.notDeepEqual(reordered, original);
    assert.deepEqual(computeFingerprint(makeRecipe("Stew", { ingredients: ["beef", "carrots"] })), original);
  });
});

describe("fingerprint file format", () => {
  it("writes title, newline and raw digest per record", () => {
    const digest = Buffer.alloc(DIGEST_SIZE, 7);

    const encoded = encodeFingerprints(new Map([["Pie", digest]]));

    assert.deepEqual(encoded, Buffer.concat([Buffer.from("Pie\n", "utf-8"), digest]));
  });

  it("reads digests that contain newline bytes", () => {
    const first = Buffer.alloc(DIGEST_SIZE, 0x0a);
    const second = Buffer.alloc(DIGEST_SIZE, 0xff);
    const data = Buffer.concat([Buffer.from("Crème brûlée\n", "utf-8"), first, Buffer.from("Soup\n", "utf-8"), second]);

    const decoded = decodeFingerprints(data);

    assert.deepEqual([...decoded.keys()], ["Crème brûlée", "Soup"]);
    assert.deepEqual(decoded.get("Crème brûlée"), first);
    assert.deepEqual(decoded.get("Soup"), second);
  });

  it("leaves out titles that cannot be framed", () => {
    const digest = Buffer.alloc(DIGEST_SIZE, 1);

    const encoded = encodeFingerprints(
      new Map([
        ["Two\nLines", digest],
        ["Short digest", Buffer.alloc(4)],
        ["Kept", digest],
      ]),
    );

    assert.deepEqual([...decodeFingerprints(encoded).keys()], ["Kept"]);
  });

  it("rejects a truncated digest", () => {
    const data = Buffer.concat([Buffer.from("Pie\n", "utf-8"), Buffer.alloc(DIGEST_SIZE - 1)]);

    assert.throws(
      () => decodeFingerprints(data),
      (error: unknown) => isRecipeCardError(error, "CACHE_UNAVAILABLE"),
    );
  });

  it("rejects a trailing title without a digest", () => {
    const data = Buffer.concat([Buffer.from("Pie\n", "utf-8"), Buffer.alloc(DIGEST_SIZE), Buffer.from("Cake", "utf-8")]);

    assert.throws(
      () => decodeFingerprints(data),
      (error: unknown) => isRecipeCardError(error, "CACHE_UNAVAILABLE"),
    );
  });
});

describe("fingerprint cache file", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "recipe-card-fingerprint-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("saves and loads the cache", async () => {
    const cachePath = path.join(tempDir, "item.idx");
    const cache = new Map([["Apple Pie", computeFingerprint(makeRecipe("Apple Pie", { serves: ["8"] }))]]);

    await saveFingerprints(cache, cachePath);
    const loaded = await loadFingerprints(cachePath, logger);

    assert.deepEqual(loaded, cache);
  });

  it("loads an empty cache when the file is missing", async () => {
    const loaded = await loadFingerprints(path.join(tempDir, "missing.idx"), logger);

    assert.equal(loaded.size, 0);
  });

  it("loads an empty cache when the file is malformed", async () => {
    const cachePath = path.join(tempDir, "item.idx");
    await fs.writeFile(cachePath, "Apple Pie\nshort");

    const loaded = await loadFingerprints(cachePath, logger);

    assert.equal(loaded.size, 0);
  });

  it("fails with PERSISTENCE_FAILED when the file cannot be written", async () => {
    const cachePath = path.join(tempDir, "missing-dir", "item.idx");

    await assert.rejects(saveFingerprints(new Map(), cachePath), (error: unknown) =>
      isRecipeCardError(error, "PERSISTENCE_FAILED"),
    );
  });
});
