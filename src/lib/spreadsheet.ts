/**
 * Spreadsheet exhibit lists
 *
 * One column of a worksheet is the source document: each cell below the
 * header row holds an exhibit reference ("Ex. 4", "10", "B") or a Bates
 * number. Cells are joined with newlines so offsets in the combined text
 * map back to a cell address, and the linked workbook is written beside
 * the source workbook.
 */

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { extractCellCitations, type ExtractOptions } from './citationExtractor';
import type { SourceDocument } from './documentParser';
import { createLogger } from './logger';
import type { LinkWriteResult, LinkWriter } from './linkWriter';
import type { Citation, ResolvedLink } from './types';

const log = createLogger('spreadsheet');

// Cells Excel shows for missing or broken values
const EMPTY_VALUES = new Set(['none', 'null', '#n/a', '#value!', '#ref!']);

export interface ColumnOptions {
  /** Column letter ("B") or header text ("Exhibit") */
  column: string;
  /** Worksheet name; the first sheet when omitted */
  sheet?: string;
}

export interface CellAnchor {
  address: string;
  row: number;
  offset: number;
  text: string;
}

interface LoadedWorkbook {
  workbook: XLSX.WorkBook;
  sheet: XLSX.WorkSheet;
}

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

/**
 * Display text of a cell. Whole numbers drop the float tail Excel adds
 * (10 not 10.0); line breaks inside a cell become spaces.
 */
export function cellText(cell: XLSX.CellObject): string {
  if (cell.v === undefined) return '';
  const raw = typeof cell.v === 'number' && Number.isInteger(cell.v)
    ? String(cell.v)
    : cell.w ?? String(cell.v);
  const text = raw.replace(/[\r\n]+/g, ' ');
  return EMPTY_VALUES.has(text.trim().toLowerCase()) ? '' : text;
}

function pickSheet(workbook: XLSX.WorkBook, name: string | undefined): XLSX.WorkSheet {
  const sheetName = name ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error(`Worksheet not found: ${name ?? '(first sheet)'}`);
  }
  return sheet;
}

/**
 * Column index from a letter, or from header text in the first row
 */
export function resolveColumn(sheet: XLSX.WorkSheet, column: string): number {
  if (/^[A-Z]{1,3}$/i.test(column)) {
    return XLSX.utils.decode_col(column.toUpperCase());
  }

  const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1');
  const wanted = column.trim().toLowerCase();
  for (let c = range.s.c; c <= range.e.c; c++) {
    const header: unknown = sheet[XLSX.utils.encode_cell({ r: 0, c })];
    if (isCellObject(header) && cellText(header).trim().toLowerCase() === wanted) {
      return c;
    }
  }
  throw new Error(`Column not found: ${column}`);
}

/** exhibits.xlsx → exhibits_linked.xlsx, beside the source */
export function linkedWorkbookPath(sourcePath: string): string {
  const { dir, name } = path.parse(sourcePath);
  return path.join(dir, `${name}_linked.xlsx`);
}

export class SpreadsheetColumnDocument implements SourceDocument {
  private loaded?: LoadedWorkbook;
  private cells: CellAnchor[] = [];

  constructor(
    readonly path: string,
    private readonly options: ColumnOptions
  ) {}

  async readText(): Promise<string> {
    const workbook = XLSX.read(await readFile(this.path), { type: 'buffer' });
    const sheet = pickSheet(workbook, this.options.sheet);
    const column = resolveColumn(sheet, this.options.column);
    const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1');

    const cells: CellAnchor[] = [];
    let text = '';

    // Row 1 is the header
    for (let r = 1; r <= range.e.r; r++) {
      const address = XLSX.utils.encode_cell({ r, c: column });
      const cell: unknown = sheet[address];
      if (!isCellObject(cell)) continue;

      const value = cellText(cell);
      if (!value.trim()) continue;

      if (text) text += '\n';
      cells.push({ address, row: r + 1, offset: text.length, text: value });
      text += value;
    }

    this.loaded = { workbook, sheet };
    this.cells = cells;
    log.debug('Read spreadsheet column', { path: this.path, column: this.options.column, cells: cells.length });
    return text;
  }

  /**
   * Each line of the combined text is one cell
   */
  *extractCitations(text: string, options: ExtractOptions): Iterable<Citation> {
    let offset = 0;
    for (const line of text.split('\n')) {
      yield* extractCellCitations(line, offset, options);
      offset += line.length + 1;
    }
  }

  cellAt(offset: number): CellAnchor | undefined {
    return this.cells.find((cell) => offset >= cell.offset && offset < cell.offset + cell.text.length);
  }

  workbook(): LoadedWorkbook {
    if (!this.loaded) {
      throw new Error(`Spreadsheet not read yet: ${this.path}`);
    }
    return this.loaded;
  }

  async close(): Promise<void> {
    this.loaded = undefined;
    this.cells = [];
  }
}

/**
 * Sets a hyperlink on each cited cell and saves a copy of the workbook.
 * A cell holding two citations links to the first.
 */
export class XlsxLinkWriter implements LinkWriter {
  readonly outputPath: string;

  constructor(private readonly document: SpreadsheetColumnDocument, outputPath?: string) {
    this.outputPath = outputPath ?? linkedWorkbookPath(document.path);
  }

  async write(links: readonly ResolvedLink[]): Promise<LinkWriteResult> {
    const { workbook, sheet } = this.document.workbook();
    const linked = new Set<string>();

    for (const link of links) {
      const anchor = this.document.cellAt(link.sourceOffset);
      if (!anchor || linked.has(anchor.address)) continue;

      const cell: unknown = sheet[anchor.address];
      if (!isCellObject(cell)) continue;

      cell.l = { Target: link.target.href, Tooltip: link.rawText };
      linked.add(anchor.address);
    }

    const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    await writeFile(this.outputPath, data);
    log.info('Wrote linked workbook', { path: this.outputPath, links: linked.size });
    return { path: this.outputPath, written: linked.size };
  }
}
