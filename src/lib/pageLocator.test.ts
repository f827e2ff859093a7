import { describe, it, expect, vi } from 'vitest';
import { extractCitations } from './citationExtractor';
import { resolveCitation } from './citationResolver';
import { FileIndex, describeCandidate } from './fileIndex';
import { clampPage, locateBatesPage, locatePage } from './pageLocator';
import { PdfScanCache, type PdfPages } from './pdfSource';
import type { Match } from './types';

const ROOT = '/cases/exhibits';
const options = { fuzzyThreshold: 0.85, fuzzyEpsilon: 0.02 };

function setup(pages: Record<string, string[]>, names: string[]) {
  const source = {
    readPages: vi.fn(async (path: string): Promise<PdfPages> => {
      const found = pages[path];
      if (!found) throw new Error(`cannot open ${path}`);
      return { pageCount: found.length, pages: found };
    }),
  };
  const scans = new PdfScanCache(source, { maxRetries: 0, retryBaseDelayMs: 0 });
  const index = new FileIndex(ROOT, names.map((name) => describeCandidate(ROOT, `${ROOT}/${name}`)), [], scans);
  return { source, scans, index };
}

async function resolveFirst(text: string, index: FileIndex): Promise<Match> {
  const [citation] = extractCitations(text);
  return resolveCitation(citation, index, options);
}

function pageOf(match: Match): number | undefined {
  return match.status === 'resolved' ? match.resolvedPage : undefined;
}

describe('locateBatesPage', () => {
  it('stops at the first page carrying the label', () => {
    expect(locateBatesPage('SMITH_005', ['SMITH_003', 'SMITH_004', 'SMITH_005', 'SMITH_005'])).toEqual({ state: 'found', page: 3 });
  });

  it('reports how many pages were scanned when the label is absent', () => {
    expect(locateBatesPage('SMITH_009', ['SMITH_003', 'SMITH_004'])).toEqual({ state: 'exhausted', pagesScanned: 2 });
  });
});

describe('clampPage', () => {
  it('keeps the page inside the document', () => {
    expect(clampPage(40, 12)).toBe(12);
    expect(clampPage(0, 12)).toBe(1);
    expect(clampPage(5, 12)).toBe(5);
    expect(clampPage(3, 0)).toBe(1);
  });
});

describe('locatePage', () => {
  it('finds the Bates page inside a multi-page PDF', async () => {
    const { index, scans } = setup({ [`${ROOT}/SMITH_003.pdf`]: ['SMITH_003', 'SMITH_004', 'SMITH_005'] }, ['SMITH_003.pdf']);

    const located = await locatePage(await resolveFirst('SMITH_005', index), scans);

    expect(pageOf(located.match)).toBe(3);
    expect(located.issue).toBeUndefined();
  });

  it('finds the page in whichever of two ranges holds the label', async () => {
    const { index, scans } = setup(
      {
        [`${ROOT}/SMITH_003-006.pdf`]: ['SMITH_003', 'SMITH_004', 'SMITH_005', 'SMITH_006'],
        [`${ROOT}/SMITH_010-015.pdf`]: ['SMITH_010', 'SMITH_011', 'SMITH_012', 'SMITH_013', 'SMITH_014', 'SMITH_015'],
      },
      ['SMITH_003-006.pdf', 'SMITH_010-015.pdf']
    );

    const located = await locatePage(await resolveFirst('SMITH_012', index), scans);
    const early = await locatePage(await resolveFirst('SMITH_005', index), scans);

    expect(located.match.status === 'resolved' && located.match.file.fileName).toBe('SMITH_010-015.pdf');
    expect(pageOf(located.match)).toBe(3);
    expect(early.match.status === 'resolved' && early.match.file.fileName).toBe('SMITH_003-006.pdf');
    expect(pageOf(early.match)).toBe(3);
  });

  it('reads each PDF once per run', async () => {
    const { index, scans, source } = setup({ [`${ROOT}/SMITH_003.pdf`]: ['SMITH_003', 'SMITH_004'] }, ['SMITH_003.pdf']);

    await locatePage(await resolveFirst('SMITH_003', index), scans);
    await locatePage(await resolveFirst('SMITH_004', index), scans);

    expect(source.readPages).toHaveBeenCalledTimes(1);
    expect(scans.scannedCount).toBe(1);
  });

  it('counts the page from the file name start for unlabelled productions', async () => {
    const blank = Array.from({ length: 10 }, () => '');
    const { index, scans } = setup({ [`${ROOT}/SMITH_001.pdf`]: blank }, ['SMITH_001.pdf']);

    const match = await resolveFirst('SMITH_005', index);
    const located = await locatePage(match, scans);
    const beyond = await locatePage(await resolveFirst('SMITH_040', index), scans);

    expect(match).toMatchObject({ status: 'resolved', method: 'bates-sequence' });
    expect(pageOf(located.match)).toBe(5);
    expect(located.issue).toBeUndefined();
    expect(pageOf(beyond.match)).toBe(10);
  });

  it('links the whole document when an unlabelled production cannot be read', async () => {
    const { index, scans } = setup({}, ['SMITH_001.pdf']);

    const located = await locatePage(await resolveFirst('SMITH_005', index), scans);

    expect(located.match).toMatchObject({ status: 'resolved', method: 'bates-sequence' });
    expect(pageOf(located.match)).toBeUndefined();
    expect(located.issue).toMatchObject({ code: 'PAGE_SCAN_FAILURE', path: `${ROOT}/SMITH_001.pdf` });
  });

  it('uses the page hint of an exhibit citation, clamped to the page count', async () => {
    const twelvePages = Array.from({ length: 12 }, (_, i) => `page ${i + 1}`);
    const { index, scans } = setup({ [`${ROOT}/Ex. 1 Memo.pdf`]: twelvePages }, ['Ex. 1 Memo.pdf']);

    const inRange = await locatePage(await resolveFirst('Ex. 1 Memo, at p. 9', index), scans);
    const beyond = await locatePage(await resolveFirst('Ex. 1 Memo, at p. 40', index), scans);

    expect(pageOf(inRange.match)).toBe(9);
    expect(pageOf(beyond.match)).toBe(12);
  });

  it('degrades to a document link when the PDF cannot be read', async () => {
    const { index, scans } = setup({}, ['Ex. 1 Memo.pdf']);

    const located = await locatePage(await resolveFirst('Ex. 1 Memo, at p. 9', index), scans);

    expect(located.match.status).toBe('resolved');
    expect(pageOf(located.match)).toBeUndefined();
    expect(located.issue).toMatchObject({
      code: 'PAGE_SCAN_FAILURE',
      severity: 'warning',
      path: `${ROOT}/Ex. 1 Memo.pdf`,
      citation: { rawText: 'Ex. 1 Memo, at p. 9', sourceOffset: 0 },
    });
  });

  it('leaves non-PDF targets and unresolved matches alone', async () => {
    const { index, scans, source } = setup({}, ['Ex_2.docx']);

    const docx = await locatePage(await resolveFirst('Ex. 2, at p. 3', index), scans);
    const missing = await locatePage(await resolveFirst('Ex. 9', index), scans);

    expect(pageOf(docx.match)).toBeUndefined();
    expect(missing.match.status).toBe('unresolved');
    expect(source.readPages).not.toHaveBeenCalled();
  });
});
