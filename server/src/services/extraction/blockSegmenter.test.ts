import { describe, expect, it } from "vitest";
import { segmentBlocks } from "./blockSegmenter";

describe("segmentBlocks", () => {
  it("returns nothing when there is no question marker", () => {
    expect(segmentBlocks("Instructions only\nno questions here")).toEqual([]);
    expect(segmentBlocks("")).toEqual([]);
  });

  it("splits on every marker form and drops the preamble", () => {
    const text = "Title\nQ.1) First\nQ.2. Second\nQ. 3) Third";
    expect(segmentBlocks(text)).toEqual(["First", "Second", "Third"]);
  });

  it("drops empty segments", () => {
    expect(segmentBlocks("x\nQ.1)\nQ.2) B")).toEqual(["B"]);
  });

  it("does not split on a marker inside a line", () => {
    const text = "Intro\nQ.1) A Exp) compare Q.3) here\nQ.2) B";
    expect(segmentBlocks(text)).toEqual(["A Exp) compare Q.3) here", "B"]);
  });

  it("splits on a marker that starts a line inside an explanation", () => {
    const text = "Intro\nQ.1) First\nExp) see\nQ.3) above\nQ.2) Second";
    expect(segmentBlocks(text)).toEqual(["First\nExp) see", "above", "Second"]);
  });

  it("treats a marker at the very start as preamble", () => {
    expect(segmentBlocks("Q.1) lost\nQ.2) kept")).toEqual(["kept"]);
  });
});
