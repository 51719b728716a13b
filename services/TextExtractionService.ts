import mammoth from 'mammoth';
import { ExtractionError, UnsupportedFormatError, errorMessage } from '../utils/errors';
import { withTimeout } from '../utils/retry';

export interface ExtractionResult {
  text: string;
  pages: number;
}

export class TextExtractionService {
  private timeoutMs: number;

  constructor(timeoutMs: number = 30000) {
    this.timeoutMs = timeoutMs;
  }

  async extractText(buffer: Buffer, format: string, filename: string): Promise<ExtractionResult> {
    if (buffer.length === 0) {
      throw new ExtractionError(`No content in ${filename}`);
    }

    const result = await withTimeout(() => this.extractByFormat(buffer, format.toLowerCase()), this.timeoutMs, `Text extraction for ${filename}`);

    if (!result.text.trim()) {
      throw new ExtractionError(`No text content extracted from ${filename}`);
    }
    return result;
  }

  private async extractByFormat(buffer: Buffer, format: string): Promise<ExtractionResult> {
    switch (format) {
      case 'pdf':
        return this.extractFromPDF(buffer);
      case 'docx':
        return this.extractFromDOCX(buffer);
      case 'txt':
      case 'md':
        return this.extractFromText(buffer);
      default:
        throw new UnsupportedFormatError(format);
    }
  }

  private async extractFromPDF(buffer: Buffer): Promise<ExtractionResult> {
    try {
      // loaded on demand: the package entry point runs a debug self-test when it has no parent module
      const { default: pdfParse } = await import('pdf-parse');
      const data = await pdfParse(buffer);
      return {
        text: data.text,
        pages: data.numpages
      };
    } catch (error) {
      throw new ExtractionError(`Failed to extract text from PDF: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async extractFromDOCX(buffer: Buffer): Promise<ExtractionResult> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return {
        text: result.value,
        pages: this.estimatePages(result.value)
      };
    } catch (error) {
      throw new ExtractionError(`Failed to extract text from DOCX: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async extractFromText(buffer: Buffer): Promise<ExtractionResult> {
    const text = buffer.toString('utf-8');
    // U+FFFD everywhere means the bytes were not text at all
    const replacements = (text.match(/\uFFFD/g) || []).length;
    if (replacements > 0 && replacements / text.length > 0.1) {
      throw new ExtractionError('File is not valid UTF-8 text');
    }

    return {
      text: text.replace(/^\uFEFF/, ''),
      pages: this.estimatePages(text)
    };
  }

  private estimatePages(text: string): number {
    const wordCount = text.split(/\s+/).length;
    return Math.max(1, Math.ceil(wordCount / 500));
  }
}
