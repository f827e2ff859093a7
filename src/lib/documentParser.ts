/**
 * Source document readers
 *
 * A SourceDocument is a scoped handle on the document whose citations are
 * linked. The run orchestrator reads its text once and closes it on every
 * exit path.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import mammoth from 'mammoth';
import type { ExtractOptions } from './citationExtractor';
import { createLogger } from './logger';
import { PdfjsTextSource, type PdfTextSource } from './pdfSource';
import type { Citation } from './types';

const log = createLogger('document-parser');

export interface SourceDocument {
  readonly path: string;
  readText(): Promise<string>;
  /** Document-specific extraction; when absent the text grammar runs over readText() */
  extractCitations?(text: string, options: ExtractOptions): Iterable<Citation>;
  close(): Promise<void>;
}

/**
 * Plain text (.txt, .md)
 */
export class TextDocument implements SourceDocument {
  constructor(readonly path: string) {}

  async readText(): Promise<string> {
    return readFile(this.path, 'utf8');
  }

  async close(): Promise<void> {}
}

/**
 * Word .docx through mammoth's raw text extraction
 */
export class DocxDocument implements SourceDocument {
  constructor(readonly path: string) {}

  async readText(): Promise<string> {
    const result = await mammoth.extractRawText({ path: this.path });
    for (const message of result.messages) {
      log.debug('mammoth message', { path: this.path, type: message.type, message: message.message });
    }
    return result.value;
  }

  async close(): Promise<void> {}
}

/**
 * PDF briefs. Pages are joined with a blank line so a citation never spans
 * two pages.
 */
export class PdfDocument implements SourceDocument {
  constructor(
    readonly path: string,
    private readonly source: PdfTextSource = new PdfjsTextSource()
  ) {}

  async readText(): Promise<string> {
    const { pages } = await this.source.readPages(this.path);
    return pages.filter((page) => page.trim()).join('\n\n');
  }

  async close(): Promise<void> {}
}

export type DocumentFactory = (filePath: string) => SourceDocument;

const READERS: Record<string, DocumentFactory> = {
  '.txt': (filePath) => new TextDocument(filePath),
  '.md': (filePath) => new TextDocument(filePath),
  '.docx': (filePath) => new DocxDocument(filePath),
  '.pdf': (filePath) => new PdfDocument(filePath),
};

export function supportedExtensions(): string[] {
  return Object.keys(READERS);
}

/**
 * Open a source document by extension. Spreadsheets need a column and are
 * opened through openSpreadsheetColumn instead.
 *
 * @throws Error for unsupported file types
 */
export function openSourceDocument(filePath: string): SourceDocument {
  const extension = path.extname(filePath).toLowerCase();
  const factory = READERS[extension];

  if (!factory) {
    throw new Error(`Unsupported file type: ${extension || filePath}. Supported: ${supportedExtensions().join(', ')}`);
  }
  return factory(filePath);
}
