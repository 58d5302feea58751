/**
 * PDF Text Extraction
 *
 * Extracts text from PDF bytes using pdfjs-dist.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { logger, ExtractionError, type PageText, type PdfTextResult } from '@doc-structurer/shared';

// Configure worker for Node.js environment
const require = createRequire(import.meta.url);
const workerPath = path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'legacy/build/pdf.worker.mjs'
);
pdfjsLib.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;

export const PAGE_SEPARATOR = '\n';

type PdfDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;
type TextContent = Awaited<ReturnType<PdfPage['getTextContent']>>;
type TextContentItem = TextContent['items'][number];
type TextItem = Extract<TextContentItem, { str: string }>;

function isTextItem(item: TextContentItem): item is TextItem {
  return 'str' in item;
}

/**
 * Rebuild one page's text line by line.
 *
 * Groups text items by Y position to maintain document layout, so that a
 * label and the detail printed beside it stay on the same line.
 */
export function buildPageText(items: TextContentItem[]): string {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!isTextItem(item) || item.str.trim() === '') continue;

    // Round Y position to group items on the same line
    // (text on the same visual line may have slight Y variations)
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // Sort Y positions descending (top to bottom on page)
  const sortedYPositions = [...itemsByY.keys()].sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedYPositions) {
    // Sort items on same line by X position (left to right)
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems
      .map((item) => item.str)
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

/**
 * Extract the text of every page, in page order.
 *
 * Each page contributes its text followed by PAGE_SEPARATOR, so a page with
 * no text layer still occupies its position as an empty segment.
 */
export async function extractTextFromPdf(data: Uint8Array): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { bytes: data.byteLength });

  // pdfjs rejects Node Buffers and may detach what it is given
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
  });

  try {
    const pdf = await loadingTask.promise.catch((error: unknown) => {
      const reason =
        error instanceof Error && error.name === 'PasswordException'
          ? 'document is encrypted'
          : error instanceof Error
            ? error.message
            : String(error);
      throw new ExtractionError(`Unable to read PDF: ${reason}`, { cause: error });
    });

    if (pdf.numPages === 0) {
      throw new ExtractionError('Unable to read PDF: document has no pages');
    }

    const pages: PageText[] = [];
    let text = '';

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      try {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const pageText = buildPageText(textContent.items);

        pages.push({ pageNumber: pageNum, text: pageText });
        text += pageText + PAGE_SEPARATOR;
      } catch (error) {
        throw new ExtractionError(
          `Unable to read page ${pageNum} of PDF: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
      }
    }

    logger.info('PDF text extraction complete', {
      totalPages: pdf.numPages,
      totalChars: text.length,
    });

    return {
      pages,
      totalPages: pdf.numPages,
      text,
    };
  } finally {
    await loadingTask.destroy();
  }
}
