import { promises as fs } from "fs";
import path from "path";
import { isImageName } from "../adapters";

/** Scanned pages stored next to a document, sorted by path. */
export async function findScanImages(docPath: string): Promise<string[]> {
  const dir = path.dirname(docPath);
  const entries = await fs.readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => !entry.isDirectory() && isImageName(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}
