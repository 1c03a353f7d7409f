// server/src/services/extraction/blockSegmenter.ts

// "\nQ.1)", "\nQ.12.", "\nQ. 3)"
const QUESTION_START = /\nQ\.\s*\d+[).]/;

/**
 * Splits cleaned text into one raw block per question, in document order.
 * Text before the first marker (title page, instructions) is dropped.
 */
export function segmentBlocks(cleanedText: string): string[] {
  const [, ...segments] = cleanedText.split(QUESTION_START);
  return segments.map((s) => s.trim()).filter((s) => s.length > 0);
}
