// server/src/controllers/importController.ts
import type { RequestHandler } from "express";
import { ParseRequestSchema, type ParseRequestDTO } from "../schemas/questionRecordSchemas";
import type { ExtractionPipeline } from "../services/extraction";
import { joinPages } from "../services/pageText";

/** POST /imports/parse  { text } | { pages, label? } -> ParseReport */
export function parseDocumentHandler(pipeline: ExtractionPipeline): RequestHandler {
  return (req, res, next) => {
    const parsed = ParseRequestSchema.safeParse(req.body);
    if (!parsed.success) return next(parsed.error);

    const { text, pages, label }: ParseRequestDTO = parsed.data;
    const raw = text ?? joinPages(pages ?? []);
    const report = pipeline.parseDocument(raw, label ?? "request body");

    res.json({ template: pipeline.templateName, ...report });
  };
}
