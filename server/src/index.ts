// server/src/index.ts
import { createApp } from "./app";
import { resolveDocumentTemplate } from "./config/documentTemplate";
import { loadConfig } from "./config/env";
import { createExtractionPipeline } from "./services/extraction";

const config = loadConfig();
const template = resolveDocumentTemplate(config.templateFile);

const app = createApp({
  pipeline: createExtractionPipeline({ template }),
  testsDir: config.testsDir,
  manifestFile: config.manifestFile,
  corsOrigins: config.corsOrigins,
});

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port} (template: ${template.name})`);
});
