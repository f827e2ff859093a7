/**
 * Citation → file resolution
 *
 * Each citation is tried against the exhibit index in order: exact name,
 * normalized name, then edit-distance similarity. The first strategy that
 * yields a single file wins. Several equally good files leave the citation
 * unresolved rather than picking one.
 */

import type { FileIndex } from './fileIndex';
import { createLogger } from './logger';
import { normalizeName, similarity, spacingKey } from './similarity';
import type {
  BatesCitation,
  CandidateFile,
  Citation,
  ExhibitCitation,
  Match,
  MatchConfidence,
  MatchMethod,
  ResolvedMatch,
  UnresolvedMatch,
} from './types';

const log = createLogger('resolver');

export interface MatcherOptions {
  fuzzyThreshold: number;
  fuzzyEpsilon: number;
}

export interface RankedCandidate {
  file: CandidateFile;
  score: number;
}

function resolved(
  citation: Citation,
  file: CandidateFile,
  confidence: MatchConfidence,
  method: MatchMethod,
  score = 1
): ResolvedMatch {
  return { status: 'resolved', citation, file, confidence, method, similarity: score };
}

function unresolved(citation: Citation, candidates: CandidateFile[] = []): UnresolvedMatch {
  return {
    status: 'unresolved',
    citation,
    reason: candidates.length > 1 ? 'ambiguous' : 'no-candidate',
    candidates: candidates.map((file) => file.relativeKey),
  };
}

/**
 * The same exhibit saved twice in different formats ("Ex_1.pdf", "Ex_1.docx")
 * is one exhibit; link the PDF. Anything else stays ambiguous.
 */
export function collapseFormatVariants(files: CandidateFile[]): CandidateFile[] {
  if (files.length < 2) return files;
  const sameName = files.every((file) => file.normalizedName === files[0].normalizedName);
  const pdfs = files.filter((file) => file.extension === '.pdf');
  return sameName && pdfs.length === 1 ? pdfs : files;
}

/**
 * Outcome of one strategy: undefined when it found nothing, so the next
 * strategy runs; a Match (resolved or ambiguous) ends the search.
 */
function settleStage(
  citation: Citation,
  files: CandidateFile[],
  confidence: MatchConfidence,
  method: MatchMethod
): Match | undefined {
  const distinct = collapseFormatVariants(files);
  if (distinct.length === 0) return undefined;
  if (distinct.length === 1) return resolved(citation, distinct[0], confidence, method);
  return unresolved(citation, distinct);
}

function exhibitKeys(file: CandidateFile): string[] {
  return file.exhibitId === undefined ? [file.stem] : [file.exhibitId, file.stem];
}

/**
 * Rank every file by its best similarity to the label
 */
export function rankBySimilarity(label: string, files: readonly CandidateFile[]): RankedCandidate[] {
  const normalizedLabel = normalizeName(label);

  return files
    .map((file) => {
      const names = file.exhibitId === undefined
        ? [file.normalizedName]
        : [normalizeName(file.exhibitId), file.normalizedName];
      const score = Math.max(...names.map((name) => similarity(normalizedLabel, name)));
      return { file, score };
    })
    .sort((a, b) => b.score - a.score || a.file.relativeKey.localeCompare(b.file.relativeKey));
}

/**
 * Accept the top-ranked file only if it clears the threshold and no other
 * file is within epsilon of it. Scores carry three decimals, so the gap is
 * compared at that precision.
 */
export function pickFuzzy(
  ranked: RankedCandidate[],
  options: MatcherOptions
): { file?: CandidateFile; score: number; tied: CandidateFile[] } {
  const [top] = ranked;
  if (!top || top.score < options.fuzzyThreshold) {
    return { score: top?.score ?? 0, tied: [] };
  }

  const contenders = collapseFormatVariants(
    ranked
      .filter((candidate) => Math.round((top.score - candidate.score) * 1000) / 1000 <= options.fuzzyEpsilon)
      .map((candidate) => candidate.file)
  );
  if (contenders.length > 1) {
    return { score: top.score, tied: contenders };
  }
  return { file: contenders[0], score: top.score, tied: [] };
}

/**
 * A file may only be a fuzzy match for the exhibit it is numbered as.
 * "1" must not reach "13"; "14" may reach "14A". Files without an exhibit
 * id are compared by name alone.
 */
export function sameExhibitId(file: CandidateFile, normalizedId: string): boolean {
  if (file.exhibitId === undefined) return true;
  const id = normalizeName(file.exhibitId);
  if (!id.startsWith(normalizedId)) return false;

  const next = id.charAt(normalizedId.length);
  const last = normalizedId.charAt(normalizedId.length - 1);
  if (/\d/.test(next) && /\d/.test(last)) return false;
  return !(/[a-z]/.test(next) && /[a-z]/.test(last));
}

export function matchExhibit(
  citation: ExhibitCitation,
  files: readonly CandidateFile[],
  options: MatcherOptions
): Match {
  const labelKey = spacingKey(citation.label);

  const exact = settleStage(
    citation,
    files.filter((file) =>
      exhibitKeys(file).some((name) => spacingKey(name) === labelKey) || file.normalizedName === citation.label
    ),
    'exact',
    'name'
  );
  if (exact) return exact;

  const normalizedLabel = normalizeName(citation.label);
  const normalized = settleStage(
    citation,
    files.filter((file) => exhibitKeys(file).some((name) => normalizeName(name) === normalizedLabel)),
    'normalized',
    'name'
  );
  if (normalized) return normalized;

  // "Ex. 1" → "Ex. 1 Memo.pdf": the exhibit id starts with the identifier and a separator
  const normalizedId = normalizeName(citation.identifier);
  const byPrefix = settleStage(
    citation,
    files.filter((file) => {
      if (file.exhibitId === undefined) return false;
      const id = normalizeName(file.exhibitId);
      return id === normalizedId || id.startsWith(`${normalizedId}_`);
    }),
    'normalized',
    'prefix'
  );
  if (byPrefix) return byPrefix;

  const sameId = files.filter((file) => sameExhibitId(file, normalizedId));
  const fuzzy = pickFuzzy(rankBySimilarity(citation.label, sameId), options);
  if (fuzzy.file) {
    return resolved(citation, fuzzy.file, 'fuzzy', 'similarity', fuzzy.score);
  }
  return unresolved(citation, fuzzy.tied);
}

interface BatesContainment {
  file: CandidateFile;
  start: number;
}

export async function matchBates(citation: BatesCitation, index: FileIndex): Promise<Match> {
  const containing: BatesContainment[] = [];
  const unscanned: CandidateFile[] = [];

  for (const file of index.batesFiles) {
    const range = await index.batesRange(file);
    if (!range.ok || range.value.labels.size === 0) {
      unscanned.push(file);
      continue;
    }
    if (!range.value.labels.has(citation.label)) continue;

    const samePrefix = [...range.value.labels.values()]
      .filter((hit) => hit.prefix === citation.prefix)
      .map((hit) => hit.number);
    containing.push({ file, start: Math.min(...samePrefix) });
  }

  if (containing.length > 0) {
    // Closest start at or below the cited number wins
    const distance = (c: BatesContainment) =>
      c.start <= citation.number ? citation.number - c.start : Number.POSITIVE_INFINITY;
    containing.sort((a, b) => distance(a) - distance(b) || a.file.relativeKey.localeCompare(b.file.relativeKey));
    return resolved(citation, containing[0].file, 'exact', 'bates-range');
  }

  const normalizedLabel = normalizeName(citation.label);
  const byName = settleStage(
    citation,
    index.files.filter((file) => file.normalizedName === normalizedLabel),
    'normalized',
    'name'
  );
  if (byName) return byName;

  // Files whose pages could not be read: fall back to their position in the
  // production by the start number in their names
  const bySequence = unscanned
    .filter((file) => {
      const span = file.bates;
      if (!span || span.prefix !== citation.prefix) return false;
      return span.start <= citation.number && (span.end === undefined || citation.number <= span.end);
    })
    .sort((a, b) => (b.bates?.start ?? 0) - (a.bates?.start ?? 0));

  if (bySequence.length > 0) {
    return resolved(citation, bySequence[0], 'fuzzy', 'bates-sequence', 0);
  }

  return unresolved(citation);
}

/**
 * Resolve one citation against the index. Exactly one Match per citation.
 */
export async function resolveCitation(
  citation: Citation,
  index: FileIndex,
  options: MatcherOptions
): Promise<Match> {
  let match: Match;

  switch (citation.kind) {
    case 'exhibit':
      match = matchExhibit(citation, index.files, options);
      break;
    case 'bates':
      match = await matchBates(citation, index);
      break;
    default: {
      const unreachable: never = citation;
      throw new Error(`Unknown citation kind: ${JSON.stringify(unreachable)}`);
    }
  }

  if (match.status === 'resolved') {
    log.debug('Resolved citation', {
      citation: citation.rawText,
      file: match.file.relativeKey,
      confidence: match.confidence,
      method: match.method,
    });
  } else {
    log.debug('Unresolved citation', { citation: citation.rawText, reason: match.reason, candidates: match.candidates });
  }

  return match;
}
