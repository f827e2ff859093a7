/**
 * Run orchestration
 *
 * extract → index → resolve → locate page → (sanitize) → build links → write
 *
 * Per-citation and per-file problems are collected as issues and returned
 * in one report. Only an unreadable source document or a sanitization
 * conflict stops the run; renames that fail after retries are rolled back
 * and the links keep the original names.
 */

import path from 'node:path';
import { extractCitations } from './citationExtractor';
import { resolveCitation } from './citationResolver';
import type { LinkerConfig } from './config';
import type { SourceDocument } from './documentParser';
import { SanitizationFailedError, SourceUnreadableError, describeError } from './errors';
import { buildFileIndex } from './fileIndex';
import { buildLinkTarget, chromeUnsafeName } from './linkBuilder';
import type { LinkWriteResult, LinkWriter } from './linkWriter';
import { createLogger } from './logger';
import { locatePage } from './pageLocator';
import { PdfScanCache, PdfjsTextSource, type PdfTextSource } from './pdfSource';
import { withRetry } from './retry';
import { applySanitization, nodeFileOps, planSanitization, type FileOps, type PlannedRename } from './sanitizer';
import type { CandidateFile, Citation, LinkerIssue, Match, ResolvedLink, ResolvedMatch, UnresolvedMatch } from './types';

const log = createLogger('pipeline');

export interface RunLinkerOptions {
  document: SourceDocument;
  config: LinkerConfig;
  pdfSource?: PdfTextSource;
  writer?: LinkWriter;
  fileOps?: FileOps;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

export interface LinkerSummary {
  citations: number;
  resolved: number;
  unresolved: number;
  linked: number;
}

export interface LinkerReport {
  source: string;
  citations: Citation[];
  matches: Match[];
  links: ResolvedLink[];
  issues: LinkerIssue[];
  renames: PlannedRename[];
  aborted: boolean;
  output?: LinkWriteResult;
  summary: LinkerSummary;
}

function unresolvedIssue(match: UnresolvedMatch): LinkerIssue {
  const { citation } = match;
  const message = match.reason === 'ambiguous'
    ? `"${citation.rawText}" matches several files: ${match.candidates.join(', ')}`
    : `No file found for "${citation.rawText}"`;

  return {
    code: 'UNRESOLVED_CITATION',
    severity: 'warning',
    message,
    citation: { rawText: citation.rawText, sourceOffset: citation.sourceOffset },
  };
}

function distinctFiles(matches: readonly ResolvedMatch[]): CandidateFile[] {
  const byPath = new Map<string, CandidateFile>();
  for (const match of matches) byPath.set(match.file.path, match.file);
  return [...byPath.values()];
}

function summarize(citations: Citation[], matches: Match[], links: ResolvedLink[]): LinkerSummary {
  const resolved = matches.filter((match) => match.status === 'resolved').length;
  return {
    citations: citations.length,
    resolved,
    unresolved: matches.length - resolved,
    linked: links.length,
  };
}

async function readSource(document: SourceDocument, config: LinkerConfig, sleep: RunLinkerOptions['sleep']): Promise<string> {
  try {
    return await withRetry(() => document.readText(), {
      maxRetries: config.maxPageScanRetries,
      baseDelayMs: config.retryBaseDelayMs,
      label: document.path,
      sleep,
      onRetry: (error, attempt) => log.warn('Retrying source read', { path: document.path, attempt, error: describeError(error) }),
    });
  } catch (error) {
    throw new SourceUnreadableError(document.path, error);
  }
}

/**
 * Link every citation in one source document.
 *
 * @throws SourceUnreadableError when the document cannot be read
 * @throws SanitizationConflictError when sanitized names would collide (nothing is renamed)
 */
export async function runLinker(options: RunLinkerOptions): Promise<LinkerReport> {
  const { document, config, writer, signal, sleep } = options;
  const fileOps = options.fileOps ?? nodeFileOps;
  const pdfSource = options.pdfSource ?? new PdfjsTextSource();

  const runLog = log.child(path.basename(document.path));

  const issues: LinkerIssue[] = [];
  const matches: Match[] = [];
  const links: ResolvedLink[] = [];
  let renames: PlannedRename[] = [];
  let aborted = false;

  try {
    const text = await readSource(document, config, sleep);
    const extractOptions = config.batesPrefix ? { batesPrefix: config.batesPrefix } : {};
    const citations = [...(document.extractCitations?.(text, extractOptions) ?? extractCitations(text, extractOptions))];

    if (citations.length === 0) {
      issues.push({ code: 'NO_CITATIONS_FOUND', severity: 'info', message: 'No citations found in document', path: document.path });
      runLog.info('No citations found', { source: document.path });
      return { source: document.path, citations, matches, links, issues, renames, aborted, summary: summarize(citations, matches, links) };
    }
    runLog.info('Extracted citations', { source: document.path, count: citations.length });

    const scans = new PdfScanCache(pdfSource, {
      maxRetries: config.maxPageScanRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      sleep,
    });
    const index = await buildFileIndex(config.exhibitsRoot, scans);
    issues.push(...index.warnings);

    const matcherOptions = { fuzzyThreshold: config.fuzzyThreshold, fuzzyEpsilon: config.fuzzyEpsilon };

    for (const citation of citations) {
      if (signal?.aborted) {
        aborted = true;
        runLog.warn('Run aborted', { processed: matches.length, remaining: citations.length - matches.length });
        break;
      }

      const located = await locatePage(await resolveCitation(citation, index, matcherOptions), scans);
      if (located.issue) issues.push(located.issue);
      if (located.match.status === 'unresolved') issues.push(unresolvedIssue(located.match));
      matches.push(located.match);
    }

    const resolvedMatches = matches.filter((match): match is ResolvedMatch => match.status === 'resolved');
    const targets = distinctFiles(resolvedMatches);
    let renamed = new Map<string, string>();
    let sanitized = false;

    if (config.sanitizeFilenames && aborted) {
      runLog.info('Skipping filename sanitization for aborted run');
    } else if (config.sanitizeFilenames) {
      const plan = await planSanitization(targets.map((file) => file.path), fileOps);
      try {
        renamed = await applySanitization(plan, fileOps, {
          maxRetries: config.maxPageScanRetries,
          baseDelayMs: config.retryBaseDelayMs,
          sleep,
        });
        renames = plan.renames;
        sanitized = true;
      } catch (error) {
        if (!(error instanceof SanitizationFailedError)) throw error;
        renames = [...error.stranded];
        renamed = new Map(error.stranded.map((step) => [step.from, step.to]));
        issues.push({
          code: 'SANITIZATION_FAILURE',
          severity: 'warning',
          message: `${error.message}: ${describeError(error.cause)}`,
        });
      }
    }

    if (config.viewer === 'chrome' && !sanitized) {
      const unsafe = targets.filter((candidate) => !renamed.has(candidate.path) && chromeUnsafeName(candidate.fileName));
      for (const file of unsafe) {
        issues.push({
          code: 'CHROME_UNSAFE_NAME',
          severity: 'warning',
          message: `Chrome may ignore the page in links to "${file.fileName}"; enable filename sanitization`,
          path: file.path,
        });
      }
    }

    const sourceDir = path.dirname(path.resolve(document.path));
    for (const match of resolvedMatches) {
      links.push({
        citation: match.citation,
        sourceOffset: match.citation.sourceOffset,
        rawText: match.citation.rawText,
        target: buildLinkTarget(match, sourceDir, { viewer: config.viewer, renamed }),
      });
    }

    const output = writer ? await writer.write(links) : undefined;
    const summary = summarize(citations, matches, links);
    runLog.info('Run complete', { source: document.path, ...summary, issues: issues.length, pdfsScanned: scans.scannedCount, aborted });

    return {
      source: document.path,
      citations,
      matches,
      links,
      issues,
      renames,
      aborted,
      ...(output ? { output } : {}),
      summary,
    };
  } finally {
    try {
      await document.close();
    } catch (error) {
      runLog.warn('Failed to close source document', { path: document.path, error: describeError(error) });
    }
  }
}
