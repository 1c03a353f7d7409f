// server/src/scripts/importPdfs.ts
import { resolveDocumentTemplate } from "../config/documentTemplate";
import { closePool, getPool, pingDb } from "../config/db";
import { loadConfig } from "../config/env";
import { createExtractionPipeline } from "../services/extraction";
import { runImport } from "../services/importer";
import { readPdfPages } from "../services/pdfReader";
import { PgQuestionStore } from "../services/questionStore";

async function main() {
  const config = loadConfig();
  const template = resolveDocumentTemplate(config.templateFile);
  const pool = getPool(config);

  try {
    if (pool) {
      const info = await pingDb(pool);
      console.log(`✅ Connected to DB ${info.db} as ${info.db_user}`);
    }

    const summary = await runImport({
      uploadDir: config.uploadDir,
      testsDir: config.testsDir,
      manifestFile: config.manifestFile,
      pipeline: createExtractionPipeline({ template }),
      readPages: readPdfPages,
      store: pool ? new PgQuestionStore(pool) : null,
    });
    console.log(`Done: ${summary.generated.length} generated, ${summary.empty.length} without questions`);
  } finally {
    await closePool();
  }
}

main().catch((err) => {
  console.error("❌ Import failed:", err);
  process.exitCode = 1;
});
