import { describe, expect, it, vi } from "vitest";
import {
  ANSWER_STRATEGIES,
  DEFAULT_SUBJECT,
  DEFAULT_TOPIC,
  OPTION_PARSE_ERROR,
  OPTION_PLACEHOLDER,
  QUESTION_PARSE_ERROR,
  cleanExplanation,
  detectAnswerLetter,
  extractFields,
  findExplanation,
  findSubject,
  findTopic,
  letterToIndex,
  padOptions,
  splitStemAndOptions,
} from "./fieldExtractor";

const quietLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("letterToIndex", () => {
  it("maps a-d in either case", () => {
    expect(["a", "b", "c", "d"].map(letterToIndex)).toEqual([0, 1, 2, 3]);
    expect(["A", "B", "C", "D"].map(letterToIndex)).toEqual([0, 1, 2, 3]);
  });

  it("maps everything else to -1", () => {
    for (const v of ["e", "", "ab", "1", "constructor", null, undefined]) {
      expect(letterToIndex(v)).toBe(-1);
    }
  });
});

describe("answer detection", () => {
  it("prefers the correct-answer sentence in the explanation", () => {
    const ctx = { block: "Stem\nAns) a", explanation: "Option c is the correct answer." };
    expect(detectAnswerLetter(ctx)).toBe("c");
  });

  it("accepts the sentence without the word Option", () => {
    expect(detectAnswerLetter({ block: "", explanation: "Hence, D is the correct answer" })).toBe("d");
  });

  it("falls back to the answer tag", () => {
    expect(detectAnswerLetter({ block: "Stem\nAnswer: B\nExp) none", explanation: "none" })).toBe("b");
  });

  it("returns null when no strategy finds a letter", () => {
    expect(detectAnswerLetter({ block: "Stem only", explanation: "" })).toBeNull();
  });

  it("runs strategies in the given order", () => {
    const ctx = { block: "Ans) a", explanation: "b is the correct answer" };
    expect(detectAnswerLetter(ctx, [...ANSWER_STRATEGIES].reverse())).toBe("a");
  });
});

describe("explanation", () => {
  it("takes everything after the first explanation tag", () => {
    expect(findExplanation("Stem\nExplanation: Because.\nMore")).toBe("Because.\nMore");
    expect(findExplanation("Stem\nEXP) upper")).toBe("upper");
    expect(findExplanation("Stem only")).toBe("");
  });

  it("drops the answer sentence and the metadata tail", () => {
    const text = "Option c is the correct answer. Thus, yes.\nSubject:) Polity\nTopic:) Constitution";
    expect(cleanExplanation(text)).toBe("Thus, yes.");
  });
});

describe("metadata", () => {
  const block = "Stem\nExp) x\nSubject:) Polity\nTopic:) Constitution";

  it("reads subject and topic to the end of the line", () => {
    expect(findSubject(block)).toBe("Polity");
    expect(findTopic(block)).toBe("Constitution");
  });

  it("falls back to the defaults", () => {
    expect(findSubject("Stem")).toBe(DEFAULT_SUBJECT);
    expect(findTopic("Stem\nTopic:)   ")).toBe(DEFAULT_TOPIC);
  });
});

describe("splitStemAndOptions", () => {
  it("splits the stem from the options and stops at the answer tag", () => {
    const block = "Which colour?\na) Red\nb) Blue\nc) Green\nd) Yellow\nAnswer: b\nExplanation: sky";
    expect(splitStemAndOptions(block)).toEqual({
      questionText: "Which colour?",
      options: ["Red", "Blue", "Green", "Yellow"],
    });
  });

  it("accepts dotted markers", () => {
    expect(splitStemAndOptions("Stem\na. One\nb. Two").options).toEqual(["One", "Two"]);
  });

  it("keeps options in order of appearance", () => {
    expect(splitStemAndOptions("Stem\na) x\nc) z\nb) y").options).toEqual(["x", "z", "y"]);
  });

  it("marks the block as unparsed without an a) marker", () => {
    expect(splitStemAndOptions("Stem\n(1) one (2) two")).toEqual({
      questionText: QUESTION_PARSE_ERROR,
      options: [OPTION_PARSE_ERROR, OPTION_PARSE_ERROR, OPTION_PARSE_ERROR, OPTION_PARSE_ERROR],
    });
  });
});

describe("padOptions", () => {
  it("always returns four options", () => {
    expect(padOptions([])).toEqual(["-", "-", "-", "-"]);
    expect(padOptions(["x", "y"])).toEqual(["x", "y", OPTION_PLACEHOLDER, OPTION_PLACEHOLDER]);
    expect(padOptions(["1", "2", "3", "4", "5"])).toEqual(["1", "2", "3", "4"]);
  });
});

describe("extractFields", () => {
  it("extracts a complete block", () => {
    const block =
      "Consider the following:\n1. one\n2. two\na) Only 1\nb) Only 2\nc) Both\nd) Neither\n" +
      "Ans) c\nExp) Both hold.\nSubject:) Economy\nTopic:) Banking";
    expect(extractFields(block, quietLogger())).toEqual({
      questionText: "Consider the following:\n1. one\n2. two",
      options: ["Only 1", "Only 2", "Both", "Neither"],
      correctAnswerIndex: 2,
      subject: "Economy",
      topic: "Banking",
      rawExplanation: "Both hold.",
    });
  });

  it("pads a block with two options and no answer", () => {
    const f = extractFields("Stem\na) x\nb) y", quietLogger());
    expect(f.options).toEqual(["x", "y", "-", "-"]);
    expect(f.correctAnswerIndex).toBe(-1);
    expect(f.rawExplanation).toBe("");
  });

  it("keeps four options when five markers are present", () => {
    const f = extractFields("Stem\na) 1\nb) 2\nc) 3\nd) 4\nd) 5", quietLogger());
    expect(f.options).toEqual(["1", "2", "3", "4"]);
  });
});
