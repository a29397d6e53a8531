export { linearize } from "./linearize";
export { parseRecipeLines, extractRecipe, orderedSections, summarize } from "./extract";
export { findScanImages } from "./scans";
export { loadCorpus, DEFAULT_CONCURRENCY } from "./corpus";
export {
  computeFingerprint,
  encodeFingerprints,
  decodeFingerprints,
  loadFingerprints,
  saveFingerprints,
  DIGEST_SIZE,
} from "./fingerprint";
export { synchronize } from "./sync";
export * from "./types";
