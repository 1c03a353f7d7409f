// server/src/services/extraction/recordAssembler.ts
import { QuestionRecordSchema, type QuestionRecord } from "../../schemas/questionRecordSchemas";
import { errorMessage, type Logger } from "../../utils/logger";
import type { ExtractedFields } from "./fieldExtractor";

export type AssemblerDeps = {
  extract: (block: string) => ExtractedFields;
  format: (explanation: string) => string;
};

export type AssemblyResult =
  | { ok: true; record: QuestionRecord }
  | { ok: false; position: number; message: string };

/** Builds the record for one block; `id` is `index + 1`. Throws on any fault. */
export function assembleRecord(block: string, index: number, deps: AssemblerDeps): QuestionRecord {
  const f = deps.extract(block);

  const record = QuestionRecordSchema.parse({
    id: index + 1,
    text: f.questionText,
    options: f.options,
    correctAnswer: f.correctAnswerIndex,
    explanation: deps.format(f.rawExplanation),
    subject: f.subject,
    topic: f.topic,
  });

  return Object.freeze(record);
}

/**
 * `position` is the block's place in the document (0-based), used only for
 * diagnostics; `index` is the number of records already emitted.
 */
export function tryAssembleRecord(
  block: string,
  position: number,
  index: number,
  deps: AssemblerDeps,
  logger: Logger
): AssemblyResult {
  try {
    return { ok: true, record: assembleRecord(block, index, deps) };
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`❌ Error parsing Q${position + 1}: ${message}`);
    return { ok: false, position, message };
  }
}
