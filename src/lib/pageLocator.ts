/**
 * Page location within a resolved PDF
 *
 * Bates citations: scan the PDF's pages in order for the first page whose
 * text carries the cited label. A file matched by its position in the
 * production has no readable labels, so its page is counted from the start
 * number in its name. Exhibit citations with "at p. N": use N, clamped to
 * the document's page count.
 */

import { containsBatesLabel } from './bates';
import type { LinkerError } from './errors';
import { createLogger } from './logger';
import type { PdfScanCache } from './pdfSource';
import type { BatesCitation, LinkerIssue, Match, ResolvedMatch } from './types';

const log = createLogger('page-locator');

export type ScanState = 'not-started' | 'scanning' | 'found' | 'exhausted';

export type PageLocation =
  | { state: 'found'; page: number }
  | { state: 'exhausted'; pagesScanned: number };

/**
 * Linear scan for the first page containing label. Bates numbers increase
 * through a production, so the first hit is the cited page.
 */
export function locateBatesPage(label: string, pages: readonly string[]): PageLocation {
  let state: ScanState = 'not-started';
  let scanned = 0;

  for (const text of pages) {
    state = 'scanning';
    scanned++;
    if (containsBatesLabel(text, label)) {
      state = 'found';
      break;
    }
  }

  return state === 'found' ? { state, page: scanned } : { state: 'exhausted', pagesScanned: scanned };
}

/**
 * "at p. 40" in a 12-page exhibit links to page 12
 */
export function clampPage(pageHint: number, pageCount: number): number {
  return Math.min(Math.max(1, pageHint), Math.max(1, pageCount));
}

export interface LocatedMatch {
  match: Match;
  issue?: LinkerIssue;
}

function scanFailure(match: ResolvedMatch, error: LinkerError): LinkerIssue {
  return {
    code: 'PAGE_SCAN_FAILURE',
    severity: 'warning',
    message: `Linking to the whole document: ${error.message}`,
    path: match.file.path,
    citation: { rawText: match.citation.rawText, sourceOffset: match.citation.sourceOffset },
  };
}

// SMITH_001.pdf cited as SMITH_005 → page 5
async function locateBySequence(match: ResolvedMatch, citation: BatesCitation, scans: PdfScanCache): Promise<LocatedMatch> {
  const start = match.file.bates?.start;
  if (start === undefined) return { match };

  const scanned = await scans.scan(match.file.path);
  if (!scanned.ok) return { match, issue: scanFailure(match, scanned.error) };

  return { match: { ...match, resolvedPage: clampPage(citation.number - start + 1, scanned.value.pageCount) } };
}

/**
 * Set resolvedPage where it can be determined. Unresolved matches and
 * non-PDF targets pass through unchanged.
 */
export async function locatePage(match: Match, scans: PdfScanCache): Promise<LocatedMatch> {
  if (match.status !== 'resolved' || match.file.extension !== '.pdf') {
    return { match };
  }

  const { citation } = match;

  switch (citation.kind) {
    case 'bates': {
      if (match.method === 'bates-sequence') return locateBySequence(match, citation, scans);
      if (match.method !== 'bates-range') return { match };

      const scanned = await scans.scan(match.file.path);
      if (!scanned.ok) return { match, issue: scanFailure(match, scanned.error) };

      const location = locateBatesPage(citation.label, scanned.value.pages);
      if (location.state === 'exhausted') {
        log.warn('Bates label not found on any page', { label: citation.label, file: match.file.relativeKey });
        return { match };
      }
      return { match: { ...match, resolvedPage: location.page } };
    }

    case 'exhibit': {
      if (citation.pageHint === undefined) return { match };

      const scanned = await scans.scan(match.file.path);
      if (!scanned.ok) return { match, issue: scanFailure(match, scanned.error) };

      const page = clampPage(citation.pageHint, scanned.value.pageCount);
      if (page !== citation.pageHint) {
        log.info('Page reference beyond document; clamped', {
          citation: citation.rawText,
          pageHint: citation.pageHint,
          page,
        });
      }
      return { match: { ...match, resolvedPage: page } };
    }

    default: {
      const unreachable: never = citation;
      throw new Error(`Unknown citation kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
