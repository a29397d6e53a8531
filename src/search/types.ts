import type { Recipe } from "../pipeline/types";

export type SearchHit = {
  id: string;
  score: number;
};

export type SearchOptions = {
  /** Tolerate misspellings instead of matching terms exactly. */
  fuzzy?: boolean;
};

/**
 * Full-text search capability the synchronizer writes to. Documents are keyed
 * by recipe title; `delete` of an unknown id is a no-op.
 */
export interface SearchIndex {
  index(id: string, recipe: Recipe): Promise<void>;
  delete(id: string): Promise<void>;
  search(query: string, options?: SearchOptions): SearchHit[];
}
