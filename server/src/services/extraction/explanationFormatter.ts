// server/src/services/extraction/explanationFormatter.ts

export const NO_EXPLANATION = "No explanation provided.";

const NUMBERED_POINT = /\n\s*(\d+\.)\s+/g;
const BREAK_RUN = /(?:<br>){3,}/g;

/**
 * One alternation over all keyword sources, in list order, so a single
 * left-to-right pass wraps each occurrence once and never re-matches the
 * markup it inserted.
 */
export function compileEmphasis(keywords: readonly string[]): RegExp | null {
  if (keywords.length === 0) return null;
  return new RegExp(keywords.map((k) => `(?:${k})`).join("|"), "gi");
}

/**
 * Adds <b>/<br> markup for display. Not safe to apply twice: a second pass
 * wraps the already emphasised keywords again.
 */
export function formatExplanation(text: string, emphasis: RegExp | null): string {
  if (!text.trim()) return NO_EXPLANATION;

  let out = emphasis ? text.replace(emphasis, (m) => `<br><br><b>${m}</b>`) : text;
  out = out.replace(NUMBERED_POINT, "<br><b>$1</b> ");
  out = out.replace(BREAK_RUN, "<br><br>");

  return out.trim();
}
