import { SectionDetectionService } from './SectionDetectionService';

export interface Chunk {
  index: number;
  text: string;
  /** Offsets into the source text; `text === source.slice(start, end)`. */
  start: number;
  end: number;
  section?: string;
}

export class ChunkingService {
  private sectionDetector: SectionDetectionService;

  constructor() {
    this.sectionDetector = new SectionDetectionService();
  }

  /**
   * Splits `text` into overlapping chunks of at most `maxChars`. A chunk prefers to end on a
   * paragraph, sentence or line break in the second half of its window. Output depends only
   * on the input text and parameters.
   */
  chunkText(text: string, maxChars: number = 1000, overlapChars: number = 200): Chunk[] {
    if (maxChars < 1 || overlapChars < 0 || overlapChars * 2 >= maxChars) {
      throw new Error(`Invalid chunking parameters: maxChars=${maxChars}, overlapChars=${overlapChars}`);
    }

    const sections = this.sectionDetector.detectSections(text);
    const chunks: Chunk[] = [];
    let startIndex = 0;

    while (startIndex < text.length) {
      let endIndex = Math.min(startIndex + maxChars, text.length);

      if (endIndex < text.length) {
        endIndex = this.findBreak(text, startIndex, endIndex, maxChars);
      }

      const raw = text.substring(startIndex, endIndex);
      const trimmed = raw.trim();
      if (trimmed.length > 0) {
        const start = startIndex + (raw.length - raw.trimStart().length);
        chunks.push({
          index: chunks.length,
          text: trimmed,
          start,
          end: start + trimmed.length,
          section: this.sectionDetector.sectionAt(sections, start)
        });
      }

      if (endIndex >= text.length) {
        break;
      }
      startIndex = Math.max(startIndex + 1, this.wordStart(text, endIndex - overlapChars, endIndex));
    }

    return chunks;
  }

  private findBreak(text: string, startIndex: number, endIndex: number, maxChars: number): number {
    const minBreak = startIndex + maxChars * 0.5;

    const paragraphBreak = text.lastIndexOf('\n\n', endIndex - 2);
    if (paragraphBreak > minBreak) {
      return paragraphBreak + 2;
    }

    const sentenceBreak = text.lastIndexOf('. ', endIndex - 2);
    if (sentenceBreak > minBreak) {
      return sentenceBreak + 2;
    }

    const lineBreak = text.lastIndexOf('\n', endIndex - 1);
    if (lineBreak > minBreak) {
      return lineBreak + 1;
    }

    return endIndex;
  }

  // first word start at or after `from`, so an overlap never begins mid-word
  private wordStart(text: string, from: number, limit: number): number {
    if (from <= 0 || /\s/.test(text[from - 1])) {
      return Math.max(from, 0);
    }
    for (let i = from; i < limit; i++) {
      if (/\s/.test(text[i])) {
        return i + 1;
      }
    }
    return from;
  }
}
