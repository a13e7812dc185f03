import mammoth from "mammoth";

interface DocxElement {
  type: string;
  children?: unknown;
  value?: unknown;
  breakType?: unknown;
}

export interface DocxContent {
  paragraphs: string[];
  tableCells: string[];
}

/**
 * Body paragraphs in document order, then every table cell (tables in order,
 * row-major), each followed by a newline.
 */
export async function extractDocxText(buffer: Buffer): Promise<string> {
  const content = await readDocxContent(buffer);
  return [...content.paragraphs, ...content.tableCells].map((text) => `${text}\n`).join("");
}

export async function readDocxContent(buffer: Buffer): Promise<DocxContent> {
  let content: DocxContent = { paragraphs: [], tableCells: [] };
  // The HTML output is discarded; only the parsed document tree is read.
  await mammoth.convertToHtml(
    { buffer },
    {
      transformDocument: (document: unknown) => {
        content = collectDocxContent(document);
        return document;
      },
    },
  );
  return content;
}

export function collectDocxContent(document: unknown): DocxContent {
  const content: DocxContent = { paragraphs: [], tableCells: [] };
  if (!isDocxElement(document)) {
    return content;
  }
  for (const block of childrenOf(document)) {
    if (block.type === "paragraph") {
      content.paragraphs.push(paragraphText(block));
      continue;
    }
    if (block.type !== "table") {
      continue;
    }
    for (const row of childrenOf(block)) {
      if (row.type !== "tableRow") {
        continue;
      }
      for (const cell of childrenOf(row)) {
        if (cell.type === "tableCell") {
          content.tableCells.push(cellText(cell));
        }
      }
    }
  }
  return content;
}

function cellText(cell: DocxElement): string {
  return childrenOf(cell)
    .filter((child) => child.type === "paragraph")
    .map(paragraphText)
    .join("\n");
}

function paragraphText(element: DocxElement): string {
  let text = "";
  for (const child of childrenOf(element)) {
    if (child.type === "text") {
      text += typeof child.value === "string" ? child.value : "";
    } else if (child.type === "tab") {
      text += "\t";
    } else if (child.type === "break") {
      text += child.breakType === "line" ? "\n" : "";
    } else if (child.type !== "table") {
      text += paragraphText(child);
    }
  }
  return text;
}

function childrenOf(element: DocxElement): DocxElement[] {
  return Array.isArray(element.children) ? element.children.filter(isDocxElement) : [];
}

function isDocxElement(value: unknown): value is DocxElement {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}
