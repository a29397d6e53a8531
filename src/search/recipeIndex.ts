import MiniSearch, { Options } from "minisearch";
import { RecipeCardError, errorMessage } from "../lib/errors";
import { summarize } from "../pipeline/extract";
import type { Recipe } from "../pipeline/types";
import { SearchHit, SearchIndex, SearchOptions } from "./types";

type IndexedRecipe = {
  id: string;
  title: string;
  body: string;
};

const FUZZINESS = 0.2;

const INDEX_OPTIONS: Options<IndexedRecipe> = {
  idField: "id",
  fields: ["title", "body"],
  storeFields: [],
  searchOptions: {
    boost: { title: 2 },
  },
};

function toDocument(id: string, recipe: Recipe): IndexedRecipe {
  return {
    id,
    title: recipe.title,
    body: summarize(recipe),
  };
}

export class RecipeSearchIndex implements SearchIndex {
  private readonly engine: MiniSearch<IndexedRecipe>;

  constructor(engine?: MiniSearch<IndexedRecipe>) {
    this.engine = engine ?? new MiniSearch<IndexedRecipe>(INDEX_OPTIONS);
  }

  static fromJSON(json: string): RecipeSearchIndex {
    return new RecipeSearchIndex(MiniSearch.loadJSON<IndexedRecipe>(json, INDEX_OPTIONS));
  }

  get size(): number {
    return this.engine.documentCount;
  }

  has(id: string): boolean {
    return this.engine.has(id);
  }

  async index(id: string, recipe: Recipe): Promise<void> {
    try {
      if (this.engine.has(id)) {
        this.engine.discard(id);
      }
      this.engine.add(toDocument(id, recipe));
    } catch (error) {
      throw new RecipeCardError("INDEX_OPERATION_FAILED", `Unable to index ${id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async delete(id: string): Promise<void> {
    try {
      if (this.engine.has(id)) {
        this.engine.discard(id);
      }
    } catch (error) {
      throw new RecipeCardError("INDEX_OPERATION_FAILED", `Unable to delete ${id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  search(query: string, options: SearchOptions = {}): SearchHit[] {
    const results = this.engine.search(query, options.fuzzy ? { fuzzy: FUZZINESS } : {});
    return results.map((result) => ({ id: String(result.id), score: result.score }));
  }

  serialize(): string {
    return JSON.stringify(this.engine);
  }
}
