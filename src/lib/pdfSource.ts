/**
 * PDF page text access
 *
 * Reads PDFs with the pdfjs-dist legacy build (the Node.js build) and
 * returns one text string per page. The engine never writes to a PDF.
 */

import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { collectBatesLabels } from './bates';
import { LinkerError, PdfUnreadableError, describeError } from './errors';
import { createLogger } from './logger';
import { Ok, settle, type Result } from './result';
import { withRetry } from './retry';
import type { BatesRange } from './types';

const log = createLogger('pdf-source');

export interface PdfPages {
  pageCount: number;
  pages: string[];       // index 0 is page 1
}

export interface PdfTextSource {
  readPages(path: string): Promise<PdfPages>;
}

/**
 * Rebuild line breaks from positioned text items.
 *
 * Each item has a transform matrix [a, b, c, d, tx, ty] where ty is the
 * vertical position (higher = further up the page). A vertical gap starts a
 * new line; a horizontal gap on the same line becomes a space.
 */
export function reconstructPageText(items: ReadonlyArray<TextItem | TextMarkedContent>): string {
  const lines: string[] = [];
  let currentLine = '';
  let lastY: number | null = null;
  let lastEndX: number | null = null;

  for (const item of items) {
    if (!('str' in item)) continue;
    if (!item.str && !item.hasEOL) continue;

    const ty = item.transform ? Number(item.transform[5]) : null;
    const tx = item.transform ? Number(item.transform[4]) : null;
    const fontSize = item.transform ? Math.abs(Number(item.transform[0])) || 12 : 12;

    if (lastY !== null && ty !== null) {
      const yDiff = Math.abs(lastY - ty);

      if (yDiff > fontSize * 0.5) {
        if (currentLine.trim()) {
          lines.push(currentLine.trim());
        }
        currentLine = '';
      } else if (lastEndX !== null && tx !== null) {
        const xGap = tx - lastEndX;
        if (xGap > fontSize * 0.3 && currentLine && !currentLine.endsWith(' ')) {
          currentLine += ' ';
        }
      }
    }

    currentLine += item.str;

    if (ty !== null) lastY = ty;
    lastEndX = tx !== null && item.width ? tx + item.width : null;

    if (item.hasEOL) {
      if (currentLine.trim()) {
        lines.push(currentLine.trim());
      }
      currentLine = '';
    }
  }

  if (currentLine.trim()) {
    lines.push(currentLine.trim());
  }

  return lines.join('\n');
}

/**
 * PdfTextSource over pdfjs-dist
 */
export class PdfjsTextSource implements PdfTextSource {
  async readPages(path: string): Promise<PdfPages> {
    const data = new Uint8Array(await readFile(path));
    const loadingTask = getDocument({ data, isEvalSupported: false, verbosity: 0 });

    try {
      const pdf = await loadingTask.promise;
      const pages: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        pages.push(reconstructPageText(textContent.items));
        page.cleanup();
      }

      return { pageCount: pdf.numPages, pages };
    } finally {
      await loadingTask.destroy();
    }
  }
}

export interface PdfScanOptions {
  maxRetries: number;
  retryBaseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Memoized page scans for one run. Each PDF is read at most once; a failed
 * read is remembered as a failure and not attempted again.
 */
export class PdfScanCache {
  private readonly scans = new Map<string, Promise<Result<PdfPages, LinkerError>>>();
  private readonly ranges = new Map<string, Promise<Result<BatesRange, LinkerError>>>();

  constructor(
    private readonly source: PdfTextSource,
    private readonly options: PdfScanOptions
  ) {}

  scan(path: string): Promise<Result<PdfPages, LinkerError>> {
    let pending = this.scans.get(path);
    if (!pending) {
      pending = this.readWithRetry(path);
      this.scans.set(path, pending);
    }
    return pending;
  }

  /**
   * Every distinct Bates label physically present in the PDF
   */
  batesRange(path: string): Promise<Result<BatesRange, LinkerError>> {
    let pending = this.ranges.get(path);
    if (!pending) {
      pending = this.scan(path).then((scanned) =>
        scanned.ok
          ? Ok({ labels: collectBatesLabels(scanned.value.pages), pageCount: scanned.value.pageCount })
          : scanned
      );
      this.ranges.set(path, pending);
    }
    return pending;
  }

  get scannedCount(): number {
    return this.scans.size;
  }

  private readWithRetry(path: string): Promise<Result<PdfPages, LinkerError>> {
    const read = withRetry(() => this.source.readPages(path), {
      maxRetries: this.options.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
      label: path,
      sleep: this.options.sleep,
      onRetry: (error, attempt) => log.warn('Retrying PDF read', { path, attempt, error: describeError(error) }),
    }).then((pages) => {
      log.debug('Scanned PDF', { path, pageCount: pages.pageCount });
      return pages;
    });

    return settle(read, (error) => (error instanceof LinkerError ? error : new PdfUnreadableError(path, error)));
  }
}
