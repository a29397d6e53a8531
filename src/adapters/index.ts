export { readDocx, readDocxContainer, isImageName, DOCUMENT_BODY_ENTRY, IMAGE_EXTENSIONS } from "./docx";

export const SUPPORTED_EXTENSIONS = [".docx"] as const;

export function isDocumentPath(inputPath: string): boolean {
  const normalizedPath = inputPath.toLowerCase();
  return SUPPORTED_EXTENSIONS.some((extension) => normalizedPath.endsWith(extension));
}
