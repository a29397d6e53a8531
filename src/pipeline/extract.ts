import { readDocx } from "../adapters";
import { linearize } from "./linearize";
import { findScanImages } from "./scans";
import { CATEGORY_ORDER, Category, ParsedLines, Recipe } from "./types";

const TITLE_MARKER = "recipe";

function toCategory(line: string): Category | undefined {
  const candidate = line.replace(/:+$/, "").toLowerCase();
  return CATEGORY_ORDER.find((category) => category === candidate);
}

/**
 * Recovers a title and categorized sections from the document's lines.
 *
 * The title is the line right after the first line mentioning "recipe".
 * After that, a line naming a category (trailing colons ignored) opens that
 * section and every following line belongs to it until the next category
 * line. Lines before the first category are dropped.
 */
export function parseRecipeLines(lines: Iterable<string>): ParsedLines {
  const sections = new Map<Category, string[]>();
  let phase: "title" | "content" = "title";
  let title = "";
  let titleIsNext = false;
  let currentCategory: Category | undefined;

  for (const line of lines) {
    if (phase === "title") {
      if (titleIsNext) {
        title = line;
        phase = "content";
        continue;
      }
      if (line.toLowerCase().includes(TITLE_MARKER)) {
        titleIsNext = true;
      }
      continue;
    }

    const category = toCategory(line);
    if (category) {
      currentCategory = category;
      continue;
    }

    if (!currentCategory) {
      continue;
    }

    const content = sections.get(currentCategory);
    if (content) {
      content.push(line);
    } else {
      sections.set(currentCategory, [line]);
    }
  }

  return { title, sections };
}

export async function extractRecipe(docPath: string): Promise<Recipe> {
  const scanPaths = await findScanImages(docPath);
  const container = await readDocx(docPath);
  const { title, sections } = parseRecipeLines(linearize(container.body));

  return {
    title,
    sections,
    docPath,
    scanPaths,
    ...(container.image ? { image: container.image } : {}),
  };
}

/** Sections that are present, in display order. */
export function orderedSections(recipe: Pick<Recipe, "sections">): Array<[Category, string[]]> {
  const ordered: Array<[Category, string[]]> = [];
  for (const category of CATEGORY_ORDER) {
    const lines = recipe.sections.get(category);
    if (lines) {
      ordered.push([category, lines]);
    }
  }
  return ordered;
}

export function summarize(recipe: Pick<Recipe, "sections">): string {
  return orderedSections(recipe)
    .map(([category, lines]) => [category, ...lines].join("\n"))
    .join("\n\n");
}
