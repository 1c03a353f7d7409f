// server/src/services/pdfReader.ts
import fs from "node:fs/promises";
import { PDFParse } from "pdf-parse";

/** Reads one PDF file and returns the text layer of each page, in order. */
export type PageReader = (file: string) => Promise<string[]>;

export const readPdfPages: PageReader = async (file) => {
  const data = await fs.readFile(file);
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.pages.map((p) => p.text);
  } finally {
    await parser.destroy();
  }
};
