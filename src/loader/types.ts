export type ExtractedPdf = {
  pageCount: number;
  /** Text of each page, first page first. */
  pages: string[];
};

export interface PdfTextExtractor {
  extract(data: Uint8Array): Promise<ExtractedPdf>;
}
