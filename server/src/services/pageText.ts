// server/src/services/pageText.ts

// "[24]" and "--- PAGE 2 ---" left behind by the PDF text layer
const BRACKET_PAGE_NUMBER = /\[\d+\]/g;
const PAGE_BANNER = /---\s*PAGE\s*\d+\s*---/g;

export function cleanPageText(page: string): string {
  return page.replace(BRACKET_PAGE_NUMBER, "").replace(PAGE_BANNER, "");
}

/** Concatenates cleaned pages, each followed by a newline. */
export function joinPages(pages: readonly string[]): string {
  return pages.map((p) => cleanPageText(p) + "\n").join("");
}
