/**
 * Exhibit folder index
 *
 * Walks the exhibits root once per run and describes every file as a
 * CandidateFile. Bates ranges are discovered lazily through the PDF scan
 * cache, so only files that a Bates citation actually needs get opened.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { parseFileBatesSpan } from './bates';
import { describeError, type LinkerError } from './errors';
import { createLogger } from './logger';
import type { PdfScanCache } from './pdfSource';
import type { Result } from './result';
import { normalizeName } from './similarity';
import type { BatesRange, CandidateFile, LinkerIssue } from './types';

const log = createLogger('file-index');

// "Ex. 1 Memo", "Ex_1_Memo", "Exh. 4", "Exhibit 12"
const EXHIBIT_STEM_PATTERN = /^(?:exhibits?|exh|ex)(?:[\s._-]+)(.+)$/i;

/**
 * Describe one file. Pure; does not touch the filesystem.
 */
export function describeCandidate(root: string, filePath: string): CandidateFile {
  const fileName = path.basename(filePath);
  const rawExtension = path.extname(fileName);
  const stem = rawExtension ? fileName.slice(0, -rawExtension.length) : fileName;
  const extension = rawExtension.toLowerCase();

  const exhibitMatch = EXHIBIT_STEM_PATTERN.exec(stem);
  const exhibitId = exhibitMatch ? exhibitMatch[1].trim() : undefined;
  const bates = extension === '.pdf' ? parseFileBatesSpan(stem) : undefined;

  return Object.freeze({
    path: filePath,
    relativeKey: path.relative(root, filePath).split(path.sep).join('/'),
    fileName,
    stem,
    extension,
    normalizedName: normalizeName(stem),
    ...(exhibitId ? { exhibitId } : {}),
    ...(bates ? { bates } : {}),
  });
}

function isSkipped(name: string): boolean {
  // Hidden files and Office lock files (~$Memo.docx)
  return name.startsWith('.') || name.startsWith('~$');
}

export class FileIndex {
  constructor(
    readonly root: string,
    readonly files: readonly CandidateFile[],
    readonly warnings: readonly LinkerIssue[],
    private readonly scans: PdfScanCache
  ) {}

  get batesFiles(): CandidateFile[] {
    return this.files.filter((file) => file.bates !== undefined);
  }

  /**
   * Scanned Bates labels for a Bates-named PDF; memoized for the run
   */
  batesRange(file: CandidateFile): Promise<Result<BatesRange, LinkerError>> {
    return this.scans.batesRange(file.path);
  }
}

/**
 * Recursively enumerate the exhibits root. Entries that cannot be read are
 * skipped and reported as INDEX_BUILD_FAILURE warnings. Links to files are
 * indexed under the link's own path; links to folders are not followed.
 */
export async function buildFileIndex(root: string, scans: PdfScanCache): Promise<FileIndex> {
  const absoluteRoot = path.resolve(root);
  const files: CandidateFile[] = [];
  const warnings: LinkerIssue[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      warnings.push({
        code: 'INDEX_BUILD_FAILURE',
        severity: 'warning',
        message: `Cannot read folder: ${describeError(error)}`,
        path: dir,
      });
      log.warn('Skipping unreadable folder', { path: dir, error: describeError(error) });
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (isSkipped(entry.name)) continue;
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        files.push(describeCandidate(absoluteRoot, fullPath));
      } else if (entry.isSymbolicLink()) {
        await followLink(fullPath);
      } else {
        skip(fullPath, 'Not a regular file');
      }
    }
  }

  async function followLink(linkPath: string): Promise<void> {
    try {
      const target = await stat(linkPath);
      if (target.isFile()) {
        files.push(describeCandidate(absoluteRoot, linkPath));
      } else {
        skip(linkPath, 'Link to a folder not followed');
      }
    } catch (error) {
      skip(linkPath, `Broken link: ${describeError(error)}`);
    }
  }

  function skip(filePath: string, message: string): void {
    warnings.push({ code: 'INDEX_BUILD_FAILURE', severity: 'warning', message, path: filePath });
  }

  await walk(absoluteRoot);
  log.info('Indexed exhibits folder', { root: absoluteRoot, files: files.length, warnings: warnings.length });

  return new FileIndex(absoluteRoot, files, warnings, scans);
}
