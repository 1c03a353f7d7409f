export { createExtractionPipeline } from "./pipeline";
export type { ExtractionPipeline, ParseReport, ParseFailure } from "./pipeline";
