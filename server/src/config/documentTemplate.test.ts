import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  DocumentTemplateSchema,
  FORUM_IAS_TEMPLATE,
  loadDocumentTemplate,
  resolveDocumentTemplate,
} from "./documentTemplate";

const fixture = (name: string) => path.join(__dirname, "__fixtures__", name);

describe("document templates", () => {
  it("loads a template file and fills in defaults", () => {
    const t = loadDocumentTemplate(fixture("custom-template.json"));
    expect(t.name).toBe("acme-mock");
    expect(t.noise.blocks).toEqual([
      { label: "page header", start: "ACME\\s+MOCK", ends: ["END"], multiline: false },
    ]);
    expect(t.noise.linePrefixes).toEqual([]);
    expect(t.noise.literals).toEqual([]);
    expect(t.emphasis).toEqual(["Key point:"]);
  });

  it("rejects an invalid template file", () => {
    expect(() => loadDocumentTemplate(fixture("invalid-template.json"))).toThrow(/^Invalid document template/);
  });

  it("rejects a template whose patterns do not compile", () => {
    expect(() => loadDocumentTemplate(fixture("bad-regex-template.json"))).toThrow(/not a valid regular expression/);
    expect(
      DocumentTemplateSchema.safeParse({ name: "bad", noise: {}, emphasis: ["Hence ("] }).success
    ).toBe(false);
    expect(
      DocumentTemplateSchema.safeParse({
        name: "bad",
        noise: { blocks: [{ label: "x", start: "(?<n>a)", ends: ["(?<n>b)"] }] },
      }).success
    ).toBe(false);
  });

  it("falls back to the built-in template", () => {
    expect(resolveDocumentTemplate(undefined)).toBe(FORUM_IAS_TEMPLATE);
    expect(resolveDocumentTemplate(fixture("custom-template.json")).name).toBe("acme-mock");
  });

  it("freezes templates all the way down", () => {
    for (const t of [FORUM_IAS_TEMPLATE, loadDocumentTemplate(fixture("custom-template.json"))]) {
      expect(Object.isFrozen(t)).toBe(true);
      expect(Object.isFrozen(t.noise)).toBe(true);
      expect(Object.isFrozen(t.noise.blocks)).toBe(true);
      expect(Object.isFrozen(t.noise.literals)).toBe(true);
      expect(Object.isFrozen(t.emphasis)).toBe(true);
    }
    expect(Object.isFrozen(FORUM_IAS_TEMPLATE.noise.blocks[0].ends)).toBe(true);
    expect(() => FORUM_IAS_TEMPLATE.noise.literals.push("x")).toThrow(TypeError);
  });
});
