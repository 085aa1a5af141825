import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { TextExtractor } from './base.js';

/**
 * PDF text via Mozilla's pdfjs-dist (legacy build, the one that runs on Node).
 * A page that fails to render its text layer is logged and left out.
 */
export class PdfExtractor implements TextExtractor {
  name = 'pdf';
  supportedExtensions = ['.pdf'];

  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? rootLogger.child('pdf');
  }

  async extract(filePath: string): Promise<string> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(filePath));
    } catch (err) {
      throw new ExtractionError(filePath, { cause: err });
    }

    const pdf = await getDocument({ data, isEvalSupported: false, useSystemFonts: true, verbosity: 0 })
      .promise.catch((err: unknown) => {
        throw new ExtractionError(filePath, { cause: err });
      });

    const pages: string[] = [];
    try {
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        try {
          const page = await pdf.getPage(pageNum);
          const content = await page.getTextContent();
          const pageText = content.items
            .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
            .join('');
          if (pageText) {
            pages.push(pageText);
          }
        } catch (err) {
          this.log.warn(`Error extracting text from page ${pageNum} in ${filePath}: ${errorMessage(err)}`);
        }
      }
    } finally {
      await pdf.destroy();
    }

    return pages.join('\n');
  }
}
