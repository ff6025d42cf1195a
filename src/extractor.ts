/**
 * Text extraction for uploaded files.
 *
 * Plain-text formats (.txt, .md) are decoded as UTF-8 (a leading BOM is
 * dropped). PDFs go through `pdf-parse`; the page count it reports is kept on
 * the document record. Word documents (.docx) go through `mammoth`.
 */
import path from "node:path";
import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { ExtractionError, InvalidUploadError } from "./errors";

export interface ExtractedText {
  text: string;
  pageCount: number;
}

const TEXT_EXTENSIONS = new Set(["txt", "md", "markdown"]);

/** Lower-case extension without the leading dot ("" when there is none). */
export function fileTypeOf(filename: string): string {
  return path.extname(filename).toLowerCase().replace(/^\./, "");
}

export class TextExtractor {
  private readonly verbose: boolean;

  public constructor(verbose = false) {
    this.verbose = verbose;
  }

  /** Whether this extractor can read files with the given extension. */
  public static supports(fileType: string): boolean {
    return fileType === "pdf" || fileType === "docx" || TEXT_EXTENSIONS.has(fileType);
  }

  /**
   * @throws {InvalidUploadError} For an extension no extractor handles.
   * @throws {ExtractionError} When the file cannot be decoded.
   */
  public async extract(bytes: Uint8Array, filename: string): Promise<ExtractedText> {
    const fileType = fileTypeOf(filename);
    if (TEXT_EXTENSIONS.has(fileType)) {
      try {
        const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes).replace(/^\uFEFF/, "");
        return { text, pageCount: 1 };
      } catch (e) {
        throw new ExtractionError(`${filename} is not valid UTF-8 text`, { cause: e });
      }
    }
    if (fileType === "pdf") return this.extractPdf(bytes, filename);
    if (fileType === "docx") return this.extractDocx(bytes, filename);
    throw new InvalidUploadError(`Unsupported file type: ${fileType || "(none)"}`);
  }

  /** Paragraph text only; pageCount is always 1. */
  private async extractDocx(bytes: Uint8Array, filename: string): Promise<ExtractedText> {
    try {
      const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
      if (this.verbose) {
        for (const m of result.messages) console.error(`[DOCX] ${filename}: ${m.message}`);
      }
      return { text: result.value.trim(), pageCount: 1 };
    } catch (e) {
      console.error(`[DOCX] Failed to extract text from ${filename}:`, e);
      throw new ExtractionError(`Could not read Word document ${filename}`, { cause: e });
    }
  }

  private async extractPdf(bytes: Uint8Array, filename: string): Promise<ExtractedText> {
    if (this.verbose) console.error(`[PDF] Extracting text from ${filename}...`);
    const parser = new PDFParse({ data: new Uint8Array(bytes) });
    try {
      const result = await parser.getText();
      const pageCount = result.pages.length;
      if (this.verbose) console.error(`[PDF] ${filename}: ${pageCount} pages`);
      return { text: result.text || "", pageCount };
    } catch (e) {
      console.error(`[PDF] Failed to extract text from ${filename}:`, e);
      throw new ExtractionError(`Could not read PDF ${filename}`, { cause: e });
    } finally {
      await parser.destroy();
    }
  }
}
