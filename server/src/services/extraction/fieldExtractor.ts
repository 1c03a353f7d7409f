// server/src/services/extraction/fieldExtractor.ts
import { OPTION_COUNT } from "../../schemas/questionRecordSchemas";
import { errorMessage, type Logger } from "../../utils/logger";

export const QUESTION_PARSE_ERROR = "Error parsing question text.";
export const OPTION_PARSE_ERROR = "Parse Error";
export const OPTION_PLACEHOLDER = "-";
export const DEFAULT_SUBJECT = "General";
export const DEFAULT_TOPIC = "GS";

export type ExtractedFields = {
  questionText: string;
  options: string[];
  correctAnswerIndex: number;
  subject: string;
  topic: string;
  rawExplanation: string;
};

export type AnswerLetter = "a" | "b" | "c" | "d";

/** What an answer strategy gets to look at. */
export type AnswerContext = {
  block: string;
  explanation: string;
};

export type AnswerStrategy = {
  name: string;
  find: (ctx: AnswerContext) => string | null;
};

const EXPLANATION_TAG = /(?:Exp|Explanation)[):]\s*([\s\S]*)/i;
const ANSWER_TAG = /(?:Ans|Answer)[):]\s*([a-d])\b/i;
const CORRECT_ANSWER_SENTENCE = /(?:Option\s*)?\b([a-d])\s+is\s+the\s+correct\s+answer/i;
const CORRECT_ANSWER_SENTENCE_ALL = /(?:Option\s*)?\b[a-d]\s+is\s+the\s+correct\s+answer[.\s]*/gi;
const METADATA_TAIL = /(?:Subject:\)|Topic:\)|Source:\))[\s\S]*/;
const SUBJECT_TAG = /Subject:\)[ \t]*(.*)/;
const TOPIC_TAG = /Topic:\)[ \t]*(.*)/;
const OPTION_START = /\n\s*a[).]/;
// first answer/explanation tag at a line start ends the option region
const OPTION_REGION_END = /\n\s*(?:Ans|Answer|Exp|Explanation)[):]/i;
const OPTION_MARKER = /(?:^|\n)\s*([a-dA-D])[).]/g;

const LETTER_INDEX: Record<AnswerLetter, number> = { a: 0, b: 1, c: 2, d: 3 };

function isAnswerLetter(s: string): s is AnswerLetter {
  return /^[a-d]$/.test(s);
}

/** a→0 … d→3, case-insensitive; anything else → -1. */
export function letterToIndex(letter: string | null | undefined): number {
  const l = String(letter ?? "").trim().toLowerCase();
  return isAnswerLetter(l) ? LETTER_INDEX[l] : -1;
}

/** Tried in order; the first letter found wins. */
export const ANSWER_STRATEGIES: readonly AnswerStrategy[] = [
  {
    name: "explanation-sentence",
    find: ({ explanation }) => explanation.match(CORRECT_ANSWER_SENTENCE)?.[1] ?? null,
  },
  {
    name: "answer-tag",
    find: ({ block }) => block.match(ANSWER_TAG)?.[1] ?? null,
  },
];

export function detectAnswerLetter(
  ctx: AnswerContext,
  strategies: readonly AnswerStrategy[] = ANSWER_STRATEGIES
): string | null {
  for (const s of strategies) {
    const letter = s.find(ctx);
    if (letter) return letter.toLowerCase();
  }
  return null;
}

export function findExplanation(block: string): string {
  return block.match(EXPLANATION_TAG)?.[1]?.trim() ?? "";
}

/** Drops the answer sentence and anything from the first metadata tag on. */
export function cleanExplanation(explanation: string): string {
  return explanation.replace(CORRECT_ANSWER_SENTENCE_ALL, "").replace(METADATA_TAIL, "").trim();
}

function lineAfterTag(block: string, tag: RegExp, fallback: string): string {
  const value = block.match(tag)?.[1]?.trim();
  return value ? value : fallback;
}

export function findSubject(block: string): string {
  return lineAfterTag(block, SUBJECT_TAG, DEFAULT_SUBJECT);
}

export function findTopic(block: string): string {
  return lineAfterTag(block, TOPIC_TAG, DEFAULT_TOPIC);
}

type StemAndOptions = { questionText: string; options: string[] };

function unparsedQuestion(): StemAndOptions {
  return {
    questionText: QUESTION_PARSE_ERROR,
    options: Array.from({ length: OPTION_COUNT }, () => OPTION_PARSE_ERROR),
  };
}

export function splitStemAndOptions(block: string): StemAndOptions {
  const start = OPTION_START.exec(block);
  if (!start) return unparsedQuestion();

  const questionText = block.slice(0, start.index).trim();
  const rest = block.slice(start.index);
  const end = OPTION_REGION_END.exec(rest);
  const region = end ? rest.slice(0, end.index) : rest;

  const markers = Array.from(region.matchAll(OPTION_MARKER));
  const options = markers.map((m, i) => {
    const from = (m.index ?? 0) + m[0].length;
    const next = markers[i + 1];
    const to = next?.index ?? region.length;
    return region.slice(from, to).trim();
  });

  return { questionText, options };
}

/** Exactly OPTION_COUNT entries: extra options are dropped, missing ones padded. */
export function padOptions(options: readonly string[]): string[] {
  const out = options.slice(0, OPTION_COUNT);
  while (out.length < OPTION_COUNT) out.push(OPTION_PLACEHOLDER);
  return out;
}

function field<T>(name: string, fallback: T, compute: () => T, logger: Logger): T {
  try {
    return compute();
  } catch (err) {
    logger.warn(`⚠️ Could not extract ${name}: ${errorMessage(err)}`);
    return fallback;
  }
}

/** Pulls every field out of one question block; each field falls back to its default independently. */
export function extractFields(block: string, logger: Logger = console): ExtractedFields {
  const explanation = field("explanation", "", () => findExplanation(block), logger);

  const correctAnswerIndex = field(
    "answer",
    -1,
    () => letterToIndex(detectAnswerLetter({ block, explanation })),
    logger
  );

  const rawExplanation = field("explanation", "", () => cleanExplanation(explanation), logger);
  const subject = field("subject", DEFAULT_SUBJECT, () => findSubject(block), logger);
  const topic = field("topic", DEFAULT_TOPIC, () => findTopic(block), logger);

  const { questionText, options } = field(
    "question text",
    unparsedQuestion(),
    () => splitStemAndOptions(block),
    logger
  );

  return {
    questionText,
    options: padOptions(options),
    correctAnswerIndex,
    subject,
    topic,
    rawExplanation,
  };
}
