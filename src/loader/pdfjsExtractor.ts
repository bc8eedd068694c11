import * as pdfjsLib from 'pdfjs-dist';

import type { ExtractedPdf, PdfTextExtractor } from './types';

/**
 * Text extraction through Mozilla's pdf.js. Items on a page are joined with a
 * space, and with a newline where pdf.js reports an end of line.
 */
export class PdfjsTextExtractor implements PdfTextExtractor {
  async extract(data: Uint8Array): Promise<ExtractedPdf> {
    const loadingTask = pdfjsLib.getDocument({
      data,
      isEvalSupported: false,
      verbosity: 0,
    });
    const pdfDocument = await loadingTask.promise;

    try {
      const pages: string[] = [];

      for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber += 1) {
        const page = await pdfDocument.getPage(pageNumber);
        const textContent = await page.getTextContent();
        let pageText = '';

        for (const item of textContent.items) {
          if (!('str' in item)) {
            continue;
          }

          pageText += item.str;
          pageText += item.hasEOL ? '\n' : ' ';
        }

        pages.push(pageText.replace(/[ \t]+\n/g, '\n').trim());
        page.cleanup();
      }

      return { pageCount: pdfDocument.numPages, pages };
    } finally {
      await pdfDocument.destroy();
    }
  }
}
