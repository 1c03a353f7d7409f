import { z } from "zod";

export const OPTION_COUNT = 4;

export const QuestionRecordSchema = z.object({
  id: z.number().int().positive(),
  text: z.string(),
  options: z.array(z.string()).length(OPTION_COUNT),
  correctAnswer: z.number().int().min(-1).max(OPTION_COUNT - 1),
  explanation: z.string(),
  subject: z.string(),
  topic: z.string(),
});

export const QuestionRecordListSchema = z.array(QuestionRecordSchema);

export const ManifestEntrySchema = z.object({
  name: z.string(),
  filename: z.string().min(1),
});

export const ManifestSchema = z.array(ManifestEntrySchema);

// POST /imports/parse accepts either the joined text or the page strings
export const ParseRequestSchema = z
  .object({
    text: z.string().optional(),
    pages: z.array(z.string()).optional(),
    label: z.string().min(1).max(200).optional(),
  })
  .refine((d) => d.text !== undefined || d.pages !== undefined, {
    path: ["text"],
    message: "either text or pages is required",
  });

// Filenames served from the tests folder: "<name>.json", no path segments
export const TestFilenameSchema = z
  .string()
  .regex(/^[\w\- .]+\.json$/, "expected a .json file name")
  .refine((s) => !s.includes(".."), "expected a .json file name");

// ---- Export types
export type QuestionRecord = Readonly<z.infer<typeof QuestionRecordSchema>>;
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type ParseRequestDTO = z.infer<typeof ParseRequestSchema>;
