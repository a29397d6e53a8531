import type { RecipeCardError } from "../lib/errors";

/** Section names a document may use, in display order. */
export const CATEGORY_ORDER = ["serves", "oven temperature", "ingredients", "preparation", "tips"] as const;

export type Category = (typeof CATEGORY_ORDER)[number];

export type Sections = Map<Category, string[]>;

export type Recipe = {
  title: string;
  sections: Sections;
  docPath: string;
  scanPaths: string[];
  image?: Buffer;
};

export type ParsedLines = {
  title: string;
  sections: Sections;
};

export type DocxContainer = {
  body: Buffer;
  image?: Buffer;
};

export type DocumentOutcome =
  | { status: "loaded"; docPath: string; recipe: Recipe }
  | { status: "failed"; docPath: string; error: Error };

export type CorpusLoad = {
  root: string;
  recipes: Recipe[];
  outcomes: DocumentOutcome[];
};

/** Title to SHA-256 digest of the content that was last indexed. */
export type FingerprintCache = Map<string, Buffer>;

export type SkippedRecipe =
  | { reason: "missing-title"; docPath: string }
  | { reason: "duplicate-title"; docPath: string; title: string; existingPath: string };

export type IndexFailure = {
  title: string;
  operation: "index" | "delete";
  error: RecipeCardError;
};

export type SyncReport = {
  accepted: Map<string, Recipe>;
  inserted: string[];
  reindexed: string[];
  removed: string[];
  unchanged: number;
  skipped: SkippedRecipe[];
  failures: IndexFailure[];
  persistenceError?: RecipeCardError;
};
