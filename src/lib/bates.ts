/**
 * Bates number grammar: PREFIX, separator, 3+ digits, optional
 * sub-document suffix. SMITH_005, ABC-00123, SMITH_005-0002.
 */

import type { BatesLabelHit, FileBatesSpan } from './types';

export interface BatesToken {
  text: string;
  index: number;
  prefix: string;
  separator: string;
  digits: string;
  number: number;
  suffix?: string;
}

const BATES_SOURCE = '(?<![A-Za-z0-9_])([A-Z]+)([_-])(\\d{3,})((?:[.-]\\d{1,4})?)(?![A-Za-z0-9_])';

/**
 * Fresh global pattern; callers own its lastIndex
 */
export function batesPattern(): RegExp {
  return new RegExp(BATES_SOURCE, 'g');
}

/**
 * Iterate Bates tokens in text order
 */
export function* scanBatesTokens(text: string, prefix?: string): Generator<BatesToken> {
  const pattern = batesPattern();
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const token = toToken(match);
    if (prefix && !matchesPrefix(token, prefix)) continue;
    yield token;
  }
}

/**
 * A configured prefix may carry its separator ("SMITH_") or not ("SMITH")
 */
export function matchesPrefix(token: Pick<BatesToken, 'prefix' | 'separator'>, configured: string): boolean {
  const bare = configured.replace(/[_-]$/, '');
  if (token.prefix !== bare) return false;
  return bare === configured || configured.endsWith(token.separator);
}

/**
 * True when text contains label as a whole token (not inside SMITH_0051)
 */
export function containsBatesLabel(text: string, label: string): boolean {
  let from = 0;
  for (;;) {
    const index = text.indexOf(label, from);
    if (index < 0) return false;
    const before = index > 0 ? text.charAt(index - 1) : '';
    const after = text.charAt(index + label.length);
    if (!isWordChar(before) && !isWordChar(after)) return true;
    from = index + 1;
  }
}

/**
 * Collect every distinct Bates label in page order, remembering its first page
 */
export function collectBatesLabels(pages: readonly string[]): Map<string, BatesLabelHit> {
  const labels = new Map<string, BatesLabelHit>();

  pages.forEach((pageText, i) => {
    for (const token of scanBatesTokens(pageText)) {
      if (!labels.has(token.text)) {
        labels.set(token.text, { label: token.text, prefix: token.prefix, number: token.number, page: i + 1 });
      }
    }
  });

  return labels;
}

const FILE_SPAN_PATTERN = /^([A-Z]+)([_-])(\d{3,})(?:\s*-\s*(?:\1\2)?(\d{3,}))?$/i;

/**
 * Bates span encoded in a file stem: SMITH_003, SMITH_003-006, SMITH_003-SMITH_006
 */
export function parseFileBatesSpan(stem: string): FileBatesSpan | undefined {
  const match = FILE_SPAN_PATTERN.exec(stem.trim());
  if (!match) return undefined;

  const [, prefix, separator, startDigits, endDigits] = match;
  const start = parseInt(startDigits, 10);
  const end = endDigits === undefined ? undefined : parseInt(endDigits, 10);

  return {
    prefix: prefix.toUpperCase(),
    separator,
    start,
    ...(end !== undefined && end >= start ? { end } : {}),
  };
}

function toToken(match: RegExpExecArray): BatesToken {
  const [text, prefix, separator, digits, suffix] = match;
  return {
    text,
    index: match.index,
    prefix,
    separator,
    digits,
    number: parseInt(digits, 10),
    ...(suffix ? { suffix } : {}),
  };
}

function isWordChar(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}
