// server/src/config/documentTemplate.ts
import fs from "node:fs";
import { z } from "zod";

/**
 * A boilerplate block bounded by a start anchor and the first of its end
 * anchors. All values are regular-expression sources matched case-insensitively.
 * `multiline: false` keeps the match on the anchor's own line.
 */
function compiles(source: string): boolean {
  try {
    new RegExp(source, "gi");
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z.string().min(1).refine(compiles, "not a valid regular expression");

const NoiseBlockSchema = z
  .object({
    label: z.string().min(1),
    start: RegexSourceSchema,
    ends: z.array(RegexSourceSchema).min(1),
    multiline: z.boolean().default(true),
  })
  .refine((b) => compiles(noiseBlockSource(b)), {
    path: ["start"],
    message: "start and ends do not combine into a valid regular expression",
  });

export const DocumentTemplateSchema = z.object({
  name: z.string().min(1),
  noise: z.object({
    blocks: z.array(NoiseBlockSchema).default([]),
    linePrefixes: z.array(z.string().min(1)).default([]),
    literals: z.array(z.string().min(1)).default([]),
  }),
  emphasis: z.array(RegexSourceSchema).default([]),
});

export type NoiseBlock = z.infer<typeof NoiseBlockSchema>;
export type DocumentTemplate = z.infer<typeof DocumentTemplateSchema>;
export type NoisePatterns = DocumentTemplate["noise"];

/**
 * Non-greedy start→first-end source. A multiline block may cross line
 * breaks; a single-line block stops at the end of the anchor's line.
 */
export function noiseBlockSource(block: { start: string; ends: string[]; multiline: boolean }): string {
  const gap = block.multiline ? "[\\s\\S]*?" : "[^\\n]*?";
  return `${block.start}${gap}(?:${block.ends.join("|")})`;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/** Forum IAS SFG test papers */
export const FORUM_IAS_TEMPLATE: DocumentTemplate = deepFreeze({
  name: "forum-ias",
  noise: {
    blocks: [
      {
        label: "address footer",
        start: String.raw`Forum\s+Learning\s+Centre\s*:`,
        ends: [String.raw`helpdesk@forumias\.academy`, String.raw`admissions@forumias\.academy`],
        multiline: true,
      },
      {
        label: "test header",
        start: String.raw`SFG\s*2026`,
        ends: [String.raw`Forum\s*IAS`],
        multiline: false,
      },
    ],
    linePrefixes: ["SFG 2026"],
    literals: [
      "9311740400, 9311740900",
      "https://academy.forumias.com",
      "admissions@forumias.academy",
      "helpdesk@forumias.academy",
      "Plot No. 36, 4th Floor",
      "Hyderabad - 1st & 2nd Floor, SM Plaza",
    ],
  },
  emphasis: [
    "Statement I is correct",
    "Statement II is correct",
    "Statement 1 is correct",
    "Statement 2 is correct",
    "Statement I is incorrect",
    "Statement II is incorrect",
    "Statement 1 is incorrect",
    "Statement 2 is incorrect",
    "Hence option .*? is correct",
    "Thus,",
    "Therefore,",
  ],
});

/** Reads and validates a template JSON file; throws with the zod message when invalid. */
export function loadDocumentTemplate(file: string): DocumentTemplate {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  const parsed = DocumentTemplateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid document template ${file}: ${parsed.error.message}`);
  }
  return deepFreeze(parsed.data);
}

export function resolveDocumentTemplate(file?: string): DocumentTemplate {
  return file ? loadDocumentTemplate(file) : FORUM_IAS_TEMPLATE;
}
