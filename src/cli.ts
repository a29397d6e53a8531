#!/usr/bin/env node
import { Command, Option } from "commander";
import { openCatalog } from "./catalog";
import { CatalogConfig, ConfigInput, DEFAULT_INDEX_PATH, DEFAULT_RECIPES_PATH, resolveConfig } from "./config";
import { createLogger } from "./lib/logger";
import type { Logger } from "./lib/logger";
import { summarize } from "./pipeline";

export async function syncCatalog(config: CatalogConfig, logger: Logger): Promise<number> {
  const catalog = await openCatalog(config, logger);
  const { corpus, report } = catalog;
  const failedDocuments = corpus.outcomes.flatMap((outcome) => (outcome.status === "failed" ? [outcome] : []));

  console.log(
    [
      `Documents found: ${corpus.outcomes.length}`,
      `Failed documents: ${failedDocuments.length}`,
      `Inserted: ${report.inserted.length}`,
      `Re-indexed: ${report.reindexed.length}`,
      `Removed: ${report.removed.length}`,
      `Unchanged: ${report.unchanged}`,
      `Skipped: ${report.skipped.length}`,
    ].join("\n"),
  );

  for (const outcome of failedDocuments) {
    console.log(`- ${outcome.docPath}: ${outcome.error.message}`);
  }
  for (const skipped of report.skipped) {
    if (skipped.reason === "missing-title") {
      console.log(`- ${skipped.docPath}: missing title`);
    } else {
      console.log(`- ${skipped.docPath}: duplicate title "${skipped.title}" (kept ${skipped.existingPath})`);
    }
  }
  for (const failure of report.failures) {
    console.log(`- ${failure.title}: ${failure.error.message}`);
  }
  if (report.persistenceError) {
    console.log(`- ${report.persistenceError.message}`);
  }

  return 0;
}

export async function searchCatalog(query: string, config: CatalogConfig, logger: Logger): Promise<number> {
  const catalog = await openCatalog(config, logger);
  const found = catalog.search(query);
  if (found.length === 0) {
    console.log(`No recipes match "${query}".`);
    return 1;
  }

  for (const recipe of found) {
    console.log(`${recipe.title}\t${recipe.docPath}`);
  }
  return 0;
}

export async function showRecipe(title: string, config: CatalogConfig, logger: Logger): Promise<number> {
  const catalog = await openCatalog(config, logger);
  const recipe = catalog.get(title);
  if (!recipe) {
    console.error(`No recipe titled "${title}".`);
    return 1;
  }

  const lines = [recipe.title, "", summarize(recipe), "", `Document: ${recipe.docPath}`];
  if (recipe.scanPaths.length > 0) {
    lines.push("Scans:", ...recipe.scanPaths.map((scanPath) => `- ${scanPath}`));
  }
  console.log(lines.join("\n"));
  return 0;
}

export async function listRecipes(config: CatalogConfig, logger: Logger): Promise<number> {
  const catalog = await openCatalog(config, logger);
  for (const recipe of catalog.recipes) {
    console.log(recipe.title);
  }
  return 0;
}

type CliOptions = ConfigInput;

function withCatalogOptions(command: Command): Command {
  return command
    .addOption(
      new Option("-r, --recipes <path>", "Path to recipes").env("RECIPE_CARD_RECIPES").default(DEFAULT_RECIPES_PATH),
    )
    .addOption(
      new Option("-i, --index <path>", "Path for search index").env("RECIPE_CARD_INDEX").default(DEFAULT_INDEX_PATH),
    )
    .option("--memory", "Keep the search index in memory only")
    .option("-c, --concurrency <n>", "Documents to read in parallel")
    .option("-d, --debug", "Enable debug logging");
}

function loggerFor(config: CatalogConfig): Logger {
  return createLogger({ level: config.logLevel });
}

export function createProgram(): Command {
  const program = new Command();

  program.name("recipe-card").description("Index .docx recipes for full-text search");

  withCatalogOptions(program.command("sync").description("Synchronize the search index with the recipe directory"))
    .action(async (options: CliOptions) => {
      const config = resolveConfig(options);
      process.exitCode = await syncCatalog(config, loggerFor(config));
    });

  withCatalogOptions(program.command("search").description("Search recipes").argument("<query...>", "Search terms"))
    .action(async (query: string[], options: CliOptions) => {
      const config = resolveConfig(options);
      process.exitCode = await searchCatalog(query.join(" "), config, loggerFor(config));
    });

  withCatalogOptions(program.command("show").description("Print a recipe").argument("<title>", "Recipe title"))
    .action(async (title: string, options: CliOptions) => {
      const config = resolveConfig(options);
      process.exitCode = await showRecipe(title, config, loggerFor(config));
    });

  withCatalogOptions(program.command("list").description("List recipe titles"))
    .action(async (options: CliOptions) => {
      const config = resolveConfig(options);
      process.exitCode = await listRecipes(config, loggerFor(config));
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error) => {
      console.error(error);
      process.exitCode = 1;
    });
}
