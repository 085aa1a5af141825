export interface TextExtractor {
  name: string;
  supportedExtensions: string[];
  /**
   * Resolves to the plain text of the document, or an empty string when the
   * document holds no text. Rejects with ExtractionError when it cannot be parsed.
   */
  extract(filePath: string): Promise<string>;
}
