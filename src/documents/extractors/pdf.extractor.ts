import pdfParse from "pdf-parse";

export interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfTextContent {
  items: PdfTextItem[];
}

const TEXT_CONTENT_OPTIONS = {
  normalizeWhitespace: false,
  disableCombineTextItems: false,
};

/** Text of every page in order, each page followed by a newline. */
export async function extractPdfText(buffer: Buffer): Promise<string> {
  const pages: string[] = [];
  const result = await pdfParse(buffer, {
    // pdf-parse awaits the value returned for each page before moving to the next one.
    pagerender: (pageData) =>
      pageData.getTextContent(TEXT_CONTENT_OPTIONS).then((content: PdfTextContent) => {
        const text = renderPageText(content.items);
        pages.push(text);
        return text;
      }),
  });
  return joinPages(pages, result.numpages);
}

/** Fails unless every page was rendered. */
export function joinPages(pages: readonly string[], pageCount: number): string {
  if (pages.length !== pageCount) {
    throw new Error(`Rendered ${pages.length} of ${pageCount} PDF pages`);
  }
  return pages.map((page) => `${page}\n`).join("");
}

/** Joins text items, starting a new line whenever the baseline moves. */
export function renderPageText(items: readonly PdfTextItem[]): string {
  let lastY: number | undefined;
  let text = "";
  for (const item of items) {
    const y = item.transform[5];
    if (lastY === undefined || y === lastY) {
      text += item.str;
    } else {
      text += `\n${item.str}`;
    }
    lastY = y;
  }
  return text;
}
