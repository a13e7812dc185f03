import path from "node:path";
import type { Logger } from "../config/logger";
import { CorruptDocumentError, UnsupportedFormatError } from "../shared/errors";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";

export type DocumentType = "pdf" | "docx";

export type DocumentDecoders = Record<DocumentType, (buffer: Buffer) => Promise<string>>;

const DEFAULT_DECODERS: DocumentDecoders = {
  pdf: extractPdfText,
  docx: extractDocxText,
};

export class DocumentService {
  constructor(
    private readonly logger: Logger,
    private readonly decoders: DocumentDecoders = DEFAULT_DECODERS,
  ) {}

  detectDocumentType(fileName: string): DocumentType | "unknown" {
    const extension = path.extname(fileName).toLowerCase();
    if (extension === ".pdf") {
      return "pdf";
    }
    if (extension === ".docx") {
      return "docx";
    }
    return "unknown";
  }

  assertSupportedDocument(fileName: string): DocumentType {
    const type = this.detectDocumentType(fileName);
    if (type === "unknown") {
      throw new UnsupportedFormatError(fileName);
    }
    return type;
  }

  /**
   * Decodes the in-memory buffer without touching the file system. Empty text is a
   * valid result; only a decoder failure is an error.
   */
  async extractText(buffer: Buffer, fileName: string): Promise<string> {
    const type = this.assertSupportedDocument(fileName);

    let text: string;
    try {
      text = await this.decoders[type](buffer);
    } catch (error) {
      this.logger.warn("document.extract.failed", {
        fileName,
        type,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw new CorruptDocumentError(fileName, error);
    }

    this.logger.info("document.extracted", {
      fileName,
      type,
      chars: text.length,
    });
    return text;
  }
}
