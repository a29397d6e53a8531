import { promises as fs } from "fs";
import { RecipeCardError, errorMessage } from "../lib/errors";
import { ZipArchive, ZipEntry } from "../lib/zip";
import { DocxContainer } from "../pipeline/types";

// the one part of a .docx holding the visible text
export const DOCUMENT_BODY_ENTRY = "word/document.xml";

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg"] as const;

export function isImageName(name: string): boolean {
  const lower = name.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function openArchive(data: Buffer): ZipEntry[] {
  try {
    return new ZipArchive(data).getEntries();
  } catch (error) {
    throw new RecipeCardError("MALFORMED_CONTAINER", `Unable to open docx container: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export function readDocxContainer(data: Buffer): DocxContainer {
  let body: Buffer | undefined;
  let image: Buffer | undefined;

  for (const entry of openArchive(data)) {
    if (body && image) {
      break;
    }
    if (entry.isDirectory) {
      continue;
    }

    const lowerName = entry.entryName.toLowerCase();
    if (!image && isImageName(lowerName)) {
      try {
        image = entry.getData();
      } catch {
        // a broken cover image leaves the document usable
        continue;
      }
    } else if (!body && lowerName === DOCUMENT_BODY_ENTRY) {
      try {
        body = entry.getData();
      } catch (error) {
        throw new RecipeCardError(
          "MALFORMED_CONTAINER",
          `Unable to read ${DOCUMENT_BODY_ENTRY} from docx: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }
  }

  if (!body) {
    throw new RecipeCardError("MISSING_DOCUMENT_BODY", `Unable to find ${DOCUMENT_BODY_ENTRY} in docx`);
  }

  return image ? { body, image } : { body };
}

export async function readDocx(inputPath: string): Promise<DocxContainer> {
  const buffer = await fs.readFile(inputPath);
  return readDocxContainer(buffer);
}
