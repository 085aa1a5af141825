import { extname } from 'node:path';
import { UnsupportedFileTypeError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { TextExtractor } from './base.js';
import { DocxExtractor } from './docx.js';
import { PdfExtractor } from './pdf.js';

/** Picks the extractor registered for a file's (lowercased) extension. */
export class DocumentExtractor implements TextExtractor {
  name = 'document';
  private readonly byExtension = new Map<string, TextExtractor>();

  constructor(extractors: TextExtractor[]) {
    for (const extractor of extractors) {
      for (const ext of extractor.supportedExtensions) {
        this.byExtension.set(ext.toLowerCase(), extractor);
      }
    }
  }

  get supportedExtensions(): string[] {
    return [...this.byExtension.keys()];
  }

  supports(filePath: string): boolean {
    return this.byExtension.has(extname(filePath).toLowerCase());
  }

  async extract(filePath: string): Promise<string> {
    const ext = extname(filePath).toLowerCase();
    const extractor = this.byExtension.get(ext);
    if (!extractor) {
      throw new UnsupportedFileTypeError(ext);
    }
    return extractor.extract(filePath);
  }
}

export function createDocumentExtractor(logger?: Logger): DocumentExtractor {
  return new DocumentExtractor([new PdfExtractor(logger?.child('pdf')), new DocxExtractor()]);
}

export type { TextExtractor } from './base.js';
export { PdfExtractor } from './pdf.js';
export { DocxExtractor, joinParagraphs } from './docx.js';
