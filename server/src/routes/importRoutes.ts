// server/src/routes/importRoutes.ts
import { Router } from "express";
import { parseDocumentHandler } from "../controllers/importController";
import type { ExtractionPipeline } from "../services/extraction";

export default function importRoutes(pipeline: ExtractionPipeline) {
  const router = Router();

  // raw text (or page strings) in, question records out; nothing is written
  router.post("/parse", parseDocumentHandler(pipeline));

  return router;
}
