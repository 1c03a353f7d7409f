// server/src/services/importer.ts
import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, type Logger } from "../utils/logger";
import type { ExtractionPipeline } from "./extraction";
import { updateManifest } from "./manifest";
import type { PageReader } from "./pdfReader";
import type { QuestionStore } from "./questionStore";

export type ImportOptions = {
  uploadDir: string;
  testsDir: string;
  manifestFile: string;
  pipeline: ExtractionPipeline;
  readPages: PageReader;
  store?: QuestionStore | null;
  logger?: Logger;
};

export type ImportSummary = {
  generated: { pdf: string; output: string; questions: number }[];
  empty: string[];
};

/** "Prelims_Test-05.pdf" -> "Prelims Test 05" */
export function testTitle(pdfName: string): string {
  return pdfName.replace(/\.pdf$/i, "").replace(/[-_]/g, " ");
}

export function outputName(pdfName: string): string {
  return pdfName.replace(/\.pdf$/i, "") + ".json";
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Converts every PDF in the upload folder into a JSON test, records it in the
 * manifest and removes the PDF. PDFs that yield no questions stay where they are.
 */
export async function runImport(opts: ImportOptions): Promise<ImportSummary> {
  const logger = opts.logger ?? console;
  const summary: ImportSummary = { generated: [], empty: [] };

  if (!(await exists(opts.uploadDir))) {
    logger.log(`Directory ${opts.uploadDir} missing. Creating...`);
    await fs.mkdir(opts.uploadDir, { recursive: true });
    return summary;
  }
  await fs.mkdir(opts.testsDir, { recursive: true });

  const pdfs = (await fs.readdir(opts.uploadDir)).filter((f) => /\.pdf$/i.test(f)).sort();

  for (const pdf of pdfs) {
    logger.log(`Processing ${pdf}...`);
    const source = path.join(opts.uploadDir, pdf);

    let pages: string[] = [];
    try {
      pages = await opts.readPages(source);
    } catch (err) {
      logger.error(`❌ Error reading ${source}: ${errorMessage(err)}`);
    }

    const records = opts.pipeline.parsePages(pages, pdf);
    if (records.length === 0) {
      logger.warn(`⚠️ No questions parsed from ${pdf}`);
      summary.empty.push(pdf);
      continue;
    }

    const output = outputName(pdf);
    const title = testTitle(pdf);
    await fs.writeFile(path.join(opts.testsDir, output), JSON.stringify(records, null, 2), "utf8");
    await updateManifest(opts.manifestFile, { name: title, filename: output }, logger);
    logger.log(`✅ Generated ${output} (${records.length} Qs)`);

    if (opts.store) {
      try {
        const s = await opts.store.saveImported(records, title);
        logger.log(`✅ Stored ${s.inserted} questions from ${pdf} (${s.duplicates} duplicates, ${s.skipped} without answer)`);
      } catch (err) {
        // the JSON test is already written; the PDF is still consumed
        logger.error(`❌ Could not store questions from ${pdf}: ${errorMessage(err)}`);
      }
    }

    await fs.rm(source);
    summary.generated.push({ pdf, output, questions: records.length });
  }

  if (summary.generated.length === 0) {
    logger.log(`No PDF files processed from ${opts.uploadDir}/ folder.`);
  }
  return summary;
}
