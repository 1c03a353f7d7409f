// server/src/controllers/testsController.ts
import fs from "node:fs/promises";
import path from "node:path";
import type { RequestHandler } from "express";
import { QuestionRecordListSchema, TestFilenameSchema } from "../schemas/questionRecordSchemas";
import { readManifest } from "../services/manifest";

export type TestsLocation = { testsDir: string; manifestFile: string };

/** GET /tests -> [{ name, filename }] */
export function listTests(loc: TestsLocation): RequestHandler {
  return async (_req, res, next) => {
    try {
      res.json(await readManifest(loc.manifestFile));
    } catch (err) {
      next(err);
    }
  };
}

/** GET /tests/:filename -> QuestionRecord[] */
export function getTest(loc: TestsLocation): RequestHandler {
  return async (req, res, next) => {
    const name = TestFilenameSchema.safeParse(req.params.filename);
    if (!name.success) return next(name.error);
    // the manifest shares the folder but is not a test
    if (name.data === path.basename(loc.manifestFile)) {
      return res.status(404).json({ error: "Test not found" });
    }

    let raw: string;
    try {
      raw = await fs.readFile(path.join(loc.testsDir, name.data), "utf8");
    } catch {
      return res.status(404).json({ error: "Test not found" });
    }

    try {
      const records = QuestionRecordListSchema.safeParse(JSON.parse(raw));
      if (!records.success) return next(new Error(`Malformed test file ${name.data}`));
      res.json(records.data);
    } catch (err) {
      next(err);
    }
  };
}
