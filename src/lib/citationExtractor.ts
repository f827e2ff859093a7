/**
 * Citation extraction
 * Finds exhibit references ("Ex. 1 Memo, at p. 9") and Bates numbers
 * ("SMITH_005") in document text, in document order.
 */

import { scanBatesTokens, type BatesToken } from './bates';
import type { BatesCitation, Citation, ExhibitCitation } from './types';

export interface ExtractOptions {
  /** Only accept Bates tokens with this prefix ("SMITH" or "SMITH_") */
  batesPrefix?: string;
}

/** "ex." → "[Ee][Xx]\." */
function caseless(word: string): string {
  return word.replace(/[a-z]/g, (c) => `[${c.toUpperCase()}${c}]`).replace(/\./g, '\\.');
}

const SP = '[ \\t\\u00A0]';
const KEYWORD_START = `(?:${caseless('exhibits')}|${caseless('exhibit')}|${caseless('exh')}|${caseless('ex')})(?![A-Za-z])`;

const EXHIBIT_SOURCE = [
  '(?<![A-Za-z0-9_])',
  // 1: keyword followed by optional spacing; 2: bare "Ex" which needs a space or underscore
  `(?:(${caseless('exhibits')}|${caseless('exhibit')}|${caseless('exh.')}|${caseless('ex.')})${SP}*|(${caseless('ex')})(?:${SP}+|_))`,
  // 3: identifier, digits with optional letter, or letters
  '(\\d+[A-Za-z]?(?![A-Za-z0-9])|(?:[A-Z]{1,3}|[a-z])(?![A-Za-z0-9_]))',
  // 4: capitalized title words
  `((?:${SP}+(?!${KEYWORD_START})[A-Z][A-Za-z0-9'&]*(?![A-Za-z0-9_])){0,6})`,
  // 5: page reference
  `(?:,?${SP}+[Aa][Tt]${SP}+(?:[Pp][Pp]?\\.|[Pp][Gg]\\.|[Pp]age)${SP}*(\\d+))?`,
].join('');

function exhibitPattern(): RegExp {
  return new RegExp(EXHIBIT_SOURCE, 'g');
}

function* scanExhibits(text: string): Generator<ExhibitCitation> {
  const pattern = exhibitPattern();
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const [rawText, spacedKeyword, bareKeyword, identifier, titleText, page] = match;
    const titleWords = titleText.trim().split(/\s+/).filter(Boolean);
    const title = titleWords.length > 0 ? titleWords.join(' ') : undefined;

    yield {
      kind: 'exhibit',
      rawText,
      label: [identifier, ...titleWords].join(' '),
      sourceOffset: match.index,
      keyword: spacedKeyword ?? bareKeyword,
      identifier,
      ...(title ? { title } : {}),
      ...(page ? { pageHint: parseInt(page, 10) } : {}),
    };
  }
}

function toBatesCitation(token: BatesToken): BatesCitation {
  return {
    kind: 'bates',
    rawText: token.text,
    label: token.text,
    sourceOffset: token.index,
    prefix: token.prefix,
    separator: token.separator,
    number: token.number,
    digits: token.digits,
    ...(token.suffix ? { suffix: token.suffix } : {}),
  };
}

function comesFirst(exhibit: ExhibitCitation, bates: BatesCitation): boolean {
  if (exhibit.sourceOffset !== bates.sourceOffset) return exhibit.sourceOffset < bates.sourceOffset;
  return exhibit.rawText.length >= bates.rawText.length;
}

/**
 * Merge the two grammars' candidates by offset. At one offset the longer
 * candidate wins (exhibit on a tie); anything overlapping an accepted
 * candidate is dropped.
 */
function* mergeCandidates(text: string, options: ExtractOptions): Generator<Citation> {
  const exhibits = scanExhibits(text);
  const bates = (function* () {
    for (const token of scanBatesTokens(text, options.batesPrefix)) yield toBatesCitation(token);
  })();

  let nextExhibit = exhibits.next();
  let nextBates = bates.next();
  let acceptedEnd = 0;

  for (;;) {
    let candidate: Citation;

    if (!nextExhibit.done && (nextBates.done || comesFirst(nextExhibit.value, nextBates.value))) {
      candidate = nextExhibit.value;
      nextExhibit = exhibits.next();
    } else if (!nextBates.done) {
      candidate = nextBates.value;
      nextBates = bates.next();
    } else {
      return;
    }

    if (candidate.sourceOffset < acceptedEnd) continue;
    acceptedEnd = candidate.sourceOffset + candidate.rawText.length;
    yield candidate;
  }
}

/**
 * Extract citations from document text.
 *
 * The result is lazy and restartable: each iteration rescans the text.
 * Repeated citations of the same exhibit each produce their own record.
 */
export function extractCitations(text: string, options: ExtractOptions = {}): Iterable<Citation> {
  return {
    [Symbol.iterator]: () => mergeCandidates(text, options),
  };
}

// Header cells and other words that are never bare exhibit identifiers
const HEADER_WORDS = new Set(['exhibit', 'exhibits', 'ex', 'number', 'no', 'ref', 'reference', 'document', 'file']);

/**
 * Spreadsheet cell mode. Cells in an exhibit column often hold just "10",
 * "10.0" (a number Excel stored as float) or "B". When the regular grammar
 * finds nothing, a bare identifier becomes an exhibit citation.
 *
 * @param offset - position of the cell text in the combined document text
 */
export function extractCellCitations(cellText: string, offset: number, options: ExtractOptions = {}): Citation[] {
  const found = [...extractCitations(cellText, options)].map((c) => ({ ...c, sourceOffset: c.sourceOffset + offset }));
  if (found.length > 0) return found;

  const rawText = cellText.trim();
  if (!rawText || rawText.length > 10 || HEADER_WORDS.has(rawText.toLowerCase())) return [];

  let identifier: string | undefined;
  if (/^\d+(?:\.0+)?$/.test(rawText)) {
    identifier = String(parseInt(rawText, 10));
  } else if (/^[A-Za-z0-9]{1,5}$/.test(rawText)) {
    identifier = rawText.toUpperCase();
  }
  if (!identifier) return [];

  return [{
    kind: 'exhibit',
    rawText,
    label: identifier,
    sourceOffset: offset + cellText.indexOf(rawText),
    keyword: '',
    identifier,
  }];
}

/**
 * Format a citation for display in logs and reports
 */
export function formatCitation(citation: Citation): string {
  switch (citation.kind) {
    case 'exhibit':
      return citation.pageHint ? `Ex. ${citation.label} at p. ${citation.pageHint}` : `Ex. ${citation.label}`;
    case 'bates':
      return citation.label;
    default: {
      const unreachable: never = citation;
      return unreachable;
    }
  }
}
