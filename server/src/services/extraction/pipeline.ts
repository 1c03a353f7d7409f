// server/src/services/extraction/pipeline.ts
import type { DocumentTemplate } from "../../config/documentTemplate";
import type { QuestionRecord } from "../../schemas/questionRecordSchemas";
import type { Logger } from "../../utils/logger";
import { joinPages } from "../pageText";
import { segmentBlocks } from "./blockSegmenter";
import { compileEmphasis, formatExplanation } from "./explanationFormatter";
import { extractFields, type ExtractedFields } from "./fieldExtractor";
import { compileNoise, stripNoise } from "./noiseStripper";
import { tryAssembleRecord, type AssemblerDeps } from "./recordAssembler";

export type ParseFailure = { position: number; message: string };

export type ParseReport = {
  records: QuestionRecord[];
  blockCount: number;
  failures: ParseFailure[];
};

export type PipelineOptions = {
  template: DocumentTemplate;
  logger?: Logger;
  /** Overrides for the per-block steps; default to the template-driven ones. */
  extract?: (block: string) => ExtractedFields;
  format?: (explanation: string) => string;
};

export type ExtractionPipeline = {
  readonly templateName: string;
  parseDocument(rawText: string, label?: string): ParseReport;
  parseText(rawText: string, label?: string): QuestionRecord[];
  parsePages(pages: readonly string[], label?: string): QuestionRecord[];
};

export function createExtractionPipeline(opts: PipelineOptions): ExtractionPipeline {
  const logger = opts.logger ?? console;
  const { template } = opts;
  const noise = compileNoise(template.noise);
  const emphasis = compileEmphasis(template.emphasis);

  const deps: AssemblerDeps = {
    extract: opts.extract ?? ((block) => extractFields(block, logger)),
    format: opts.format ?? ((text) => formatExplanation(text, emphasis)),
  };

  function parseDocument(rawText: string, label = "document"): ParseReport {
    const blocks = segmentBlocks(stripNoise(rawText, noise));
    if (blocks.length === 0) {
      logger.warn(`⚠️ No question markers found in ${label}`);
    }

    const records: QuestionRecord[] = [];
    const failures: ParseFailure[] = [];

    blocks.forEach((block, position) => {
      const r = tryAssembleRecord(block, position, records.length, deps, logger);
      if (r.ok) records.push(r.record);
      else failures.push({ position: r.position, message: r.message });
    });

    return { records, blockCount: blocks.length, failures };
  }

  return Object.freeze({
    templateName: template.name,
    parseDocument,
    parseText: (rawText: string, label?: string) => parseDocument(rawText, label).records,
    parsePages: (pages: readonly string[], label?: string) =>
      parseDocument(joinPages(pages), label).records,
  });
}
