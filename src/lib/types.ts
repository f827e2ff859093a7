/**
 * Shared record types for the citation linking pipeline
 */

interface CitationBase {
  rawText: string;       // Exact substring of the source text
  label: string;         // Identifier used for matching, derived from rawText
  sourceOffset: number;  // UTF-16 index of rawText in the source text
  pageHint?: number;     // "at p. 9" → 9
}

export interface ExhibitCitation extends CitationBase {
  kind: 'exhibit';
  keyword: string;       // "Ex.", "Exhibit", ... as written
  identifier: string;    // "1", "1A", "B"
  title?: string;        // "Memo" in "Ex. 1 Memo"
}

export interface BatesCitation extends CitationBase {
  kind: 'bates';
  prefix: string;        // "SMITH"
  separator: string;     // "_" or "-"
  number: number;        // 5 for "SMITH_005"
  digits: string;        // "005"
  suffix?: string;       // "-0002" sub-document suffix
}

export type Citation = ExhibitCitation | BatesCitation;

export type CitationKind = Citation['kind'];

/**
 * Bates span encoded in a file name, e.g. SMITH_003.pdf or SMITH_003-006.pdf
 */
export interface FileBatesSpan {
  prefix: string;
  separator: string;
  start: number;
  end?: number;
}

export interface CandidateFile {
  readonly path: string;          // Absolute path
  readonly relativeKey: string;   // Forward-slash path relative to the exhibits root
  readonly fileName: string;
  readonly stem: string;          // File name without extension
  readonly extension: string;     // Lowercase, with the dot: ".pdf"
  readonly normalizedName: string;
  readonly exhibitId?: string;    // Stem without its leading exhibit keyword
  readonly bates?: FileBatesSpan;
}

export interface BatesLabelHit {
  label: string;
  prefix: string;
  number: number;
  page: number;          // 1-based page of first appearance
}

/**
 * Distinct Bates labels physically present in one PDF
 */
export interface BatesRange {
  labels: Map<string, BatesLabelHit>;
  pageCount: number;
}

export type MatchConfidence = 'exact' | 'normalized' | 'fuzzy';

export type MatchMethod =
  | 'name'            // label equals the file's exhibit id, stem or normalized name
  | 'prefix'          // file's exhibit id starts with the cited identifier
  | 'similarity'      // edit-distance ranking
  | 'bates-range'     // label found in the file's scanned Bates labels
  | 'bates-sequence'; // numeric position among Bates-named files

export type UnresolvedReason = 'no-candidate' | 'ambiguous';

export interface ResolvedMatch {
  status: 'resolved';
  citation: Citation;
  file: CandidateFile;
  confidence: MatchConfidence;
  method: MatchMethod;
  similarity: number;
  resolvedPage?: number;
}

export interface UnresolvedMatch {
  status: 'unresolved';
  citation: Citation;
  reason: UnresolvedReason;
  candidates: string[];
}

export type Match = ResolvedMatch | UnresolvedMatch;

export type PdfViewer = 'acrobat' | 'chrome';

export interface LinkTarget {
  relativePath: string;
  pageFragment?: string;
  displayText: string;
  href: string;
}

/**
 * A LinkTarget together with the anchor it belongs to in the source document
 */
export interface ResolvedLink {
  citation: Citation;
  sourceOffset: number;
  rawText: string;
  target: LinkTarget;
}

export type IssueCode =
  | 'NO_CITATIONS_FOUND'
  | 'UNRESOLVED_CITATION'
  | 'INDEX_BUILD_FAILURE'
  | 'PAGE_SCAN_FAILURE'
  | 'SANITIZATION_FAILURE'
  | 'CHROME_UNSAFE_NAME';

export interface LinkerIssue {
  code: IssueCode;
  severity: 'info' | 'warning';
  message: string;
  path?: string;
  citation?: Pick<Citation, 'rawText' | 'sourceOffset'>;
}
