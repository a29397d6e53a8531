import { promises as fs } from "fs";
import { ZipArchive } from "../src/lib/zip";
import { CATEGORY_ORDER, Category, Recipe } from "../src/pipeline/types";

const WORD_NAMESPACE = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

function escapeXml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function documentXml(paragraphs: string[]): string {
  const body = paragraphs.map((text) => `<w:p><w:r><w:t>${escapeXml(text)}</w:t></w:r></w:p>`).join("");
  return `<?xml version="1.0" encoding="UTF-8"?><w:document xmlns:w="${WORD_NAMESPACE}"><w:body>${body}</w:body></w:document>`;
}

export type DocxFixture = {
  paragraphs?: string[];
  bodyEntryName?: string;
  images?: Array<{ name: string; data: Buffer }>;
};

export function buildDocx(fixture: DocxFixture): Buffer {
  const zip = new ZipArchive();
  zip.addFile("[Content_Types].xml", Buffer.from("<Types/>", "utf-8"));
  for (const image of fixture.images ?? []) {
    zip.addFile(image.name, image.data);
  }
  if (fixture.paragraphs) {
    zip.addFile(fixture.bodyEntryName ?? "word/document.xml", Buffer.from(documentXml(fixture.paragraphs), "utf-8"));
  }
  return zip.toBuffer();
}

export async function writeDocx(filePath: string, fixture: DocxFixture): Promise<void> {
  await fs.writeFile(filePath, buildDocx(fixture));
}

export function recipeParagraphs(title: string, sections: Partial<Record<Category, string[]>>): string[] {
  const paragraphs = ["Family Recipe", title];
  for (const category of CATEGORY_ORDER) {
    const lines = sections[category];
    if (lines) {
      paragraphs.push(`${category}:`, ...lines);
    }
  }
  return paragraphs;
}

export function makeRecipe(
  title: string,
  sections: Partial<Record<Category, string[]>>,
  docPath = `/recipes/${title || "untitled"}.docx`,
): Recipe {
  const map = new Map<Category, string[]>();
  for (const category of CATEGORY_ORDER) {
    const lines = sections[category];
    if (lines) {
      map.set(category, lines);
    }
  }
  return { title, sections: map, docPath, scanPaths: [] };
}
