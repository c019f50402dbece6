// ──────────────────────────────────────────────
// Strand - Text Chunking
// ──────────────────────────────────────────────

export interface ChunkingOptions {
  maxChunkChars: number;
  overlapChars: number;
}

export const DEFAULT_MAX_CHUNK_CHARS = 1200;
export const DEFAULT_OVERLAP_CHARS = 200;

/** Fixed-size windows over whitespace-collapsed text; neighbours share `overlapChars`. */
export function windowText(text: string, options: ChunkingOptions): string[] {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= options.maxChunkChars) {
    return flat ? [flat] : [];
  }

  const stride = Math.max(1, options.maxChunkChars - options.overlapChars);
  const windows: string[] = [];
  for (let start = 0; ; start += stride) {
    const piece = flat.slice(start, start + options.maxChunkChars).trim();
    if (piece) windows.push(piece);
    if (start + options.maxChunkChars >= flat.length) break;
  }
  return windows;
}

/** Blank lines separate paragraphs; oversized paragraphs are windowed. */
export function splitParagraphs(text: string, options: ChunkingOptions): string[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .flatMap((paragraph) =>
      paragraph.length <= options.maxChunkChars ? [paragraph] : windowText(paragraph, options)
    );
}
