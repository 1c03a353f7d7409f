// server/src/services/extraction/noiseStripper.ts
import { noiseBlockSource, type NoisePatterns } from "../../config/documentTemplate";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Noise patterns compiled once per pipeline. */
export type CompiledNoise = {
  blocks: readonly RegExp[];
  linePrefixes: readonly RegExp[];
  literals: readonly string[];
};

export function compileNoise(noise: NoisePatterns): CompiledNoise {
  return Object.freeze({
    blocks: noise.blocks.map((b) => new RegExp(noiseBlockSource(b), "gi")),
    linePrefixes: noise.linePrefixes.map((p) => new RegExp(`^${escapeRegExp(p)}.*$`, "gm")),
    literals: [...noise.literals],
  });
}

function stripOnce(text: string, noise: CompiledNoise): string {
  let out = text;

  for (const block of noise.blocks) {
    out = out.replace(block, "");
  }

  // OCR typos can break the block patterns; drop the known fragments anyway.
  // Literals go before line prefixes: removing one can expose a header line.
  for (const junk of noise.literals) {
    out = out.split(junk).join("");
  }

  for (const prefix of noise.linePrefixes) {
    out = out.replace(prefix, "");
  }

  return out.replace(/\n{3,}/g, "\n\n");
}

/**
 * Removes known boilerplate for one document template, then collapses the
 * blank runs left behind so block boundaries stay at "\n\n" at most.
 * Passes repeat until nothing changes, so the result is a fixed point.
 */
export function stripNoise(rawText: string, noise: CompiledNoise): string {
  let text = rawText;
  for (;;) {
    const next = stripOnce(text, noise);
    if (next === text) return text;
    text = next;
  }
}
