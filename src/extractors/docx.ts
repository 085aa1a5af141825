import mammoth from 'mammoth';
import { ExtractionError } from '../errors.js';
import type { TextExtractor } from './base.js';

/** DOCX text via mammoth: one line per non-blank paragraph. */
export class DocxExtractor implements TextExtractor {
  name = 'docx';
  supportedExtensions = ['.docx'];

  async extract(filePath: string): Promise<string> {
    let raw: string;
    try {
      const result = await mammoth.extractRawText({ path: filePath });
      raw = result.value;
    } catch (err) {
      throw new ExtractionError(filePath, { cause: err });
    }
    return joinParagraphs(raw);
  }
}

/** mammoth separates paragraphs with blank lines; collapse them and drop empty ones. */
export function joinParagraphs(raw: string): string {
  return raw
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .join('\n');
}
