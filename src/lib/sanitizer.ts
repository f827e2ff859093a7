/**
 * Filename sanitization for Chrome-safe links
 *
 * Renames are planned as a set, checked for conflicts, then applied
 * together. Locked files are retried; a rename that still fails rolls back
 * the ones already made, so files and links never disagree about a name.
 */

import { access, readdir, rename } from 'node:fs/promises';
import path from 'node:path';
import { SanitizationConflictError, SanitizationFailedError, describeError, type ErrorDetail } from './errors';
import { createLogger } from './logger';
import { withRetry, type RetryOptions } from './retry';

const log = createLogger('sanitizer');

export interface FileOps {
  exists(filePath: string): Promise<boolean>;
  rename(from: string, to: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  async exists(filePath) {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  },
  rename: (from, to) => rename(from, to),
};

export interface PlannedRename {
  from: string;
  to: string;
}

export interface SanitizationPlan {
  renames: PlannedRename[];
  unchanged: string[];
  conflicts: ErrorDetail[];
}

/**
 * "Ex. 1 Memo.pdf" → "Ex_1_Memo.pdf"
 * Spaces and internal periods become underscores; the extension's dot stays.
 */
export function sanitizeFileName(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  const hasExtension = dot > 0 && dot < fileName.length - 1;
  const stem = hasExtension ? fileName.slice(0, dot) : fileName;
  const extension = hasExtension ? fileName.slice(dot) : '';

  const cleaned = stem
    .replace(/[\s.]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/_+$/, '');

  return `${cleaned || stem}${extension}`;
}

/**
 * Plan renames for the given files. Two files landing on one name, or a
 * name already taken on disk, are conflicts.
 */
export async function planSanitization(filePaths: readonly string[], ops: FileOps = nodeFileOps): Promise<SanitizationPlan> {
  const renames: PlannedRename[] = [];
  const unchanged: string[] = [];
  const conflicts: ErrorDetail[] = [];
  const claimed = new Map<string, string>();

  for (const from of [...new Set(filePaths)]) {
    const fileName = path.basename(from);
    const sanitized = sanitizeFileName(fileName);
    if (sanitized === fileName) {
      unchanged.push(from);
      continue;
    }

    const to = path.join(path.dirname(from), sanitized);
    // Case-insensitive filesystems treat Ex_1.pdf and ex_1.PDF as one file
    const key = to.toLowerCase();
    const other = claimed.get(key);

    if (other !== undefined) {
      conflicts.push({ path: from, message: `${fileName} and ${path.basename(other)} both sanitize to ${sanitized}` });
      continue;
    }
    if (from.toLowerCase() !== key && (await ops.exists(to))) {
      conflicts.push({ path: from, message: `${sanitized} already exists` });
      continue;
    }

    claimed.set(key, from);
    renames.push({ from, to });
  }

  return { renames, unchanged, conflicts };
}

export type RenameRetryOptions = Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'sleep'>;

function renameWithRetry(ops: FileOps, from: string, to: string, retry: RenameRetryOptions): Promise<void> {
  return withRetry(() => ops.rename(from, to), {
    ...retry,
    label: from,
    onRetry: (error, attempt) => log.warn('Retrying rename', { from, to, attempt, error: describeError(error) }),
  });
}

/**
 * Apply a conflict-free plan. Returns old path → new path.
 *
 * @throws SanitizationConflictError when the plan has conflicts (nothing is renamed)
 * @throws SanitizationFailedError when a rename fails after retries (completed renames are rolled back)
 */
export async function applySanitization(
  plan: SanitizationPlan,
  ops: FileOps = nodeFileOps,
  retry: RenameRetryOptions = {}
): Promise<Map<string, string>> {
  if (plan.conflicts.length > 0) {
    throw new SanitizationConflictError(plan.conflicts);
  }

  const done: PlannedRename[] = [];
  try {
    for (const step of plan.renames) {
      await renameWithRetry(ops, step.from, step.to, retry);
      done.push(step);
      log.info('Renamed exhibit file', { from: step.from, to: step.to });
    }
  } catch (error) {
    log.error('Rename failed; rolling back', { renamed: done.length, error: describeError(error) });
    const stranded: PlannedRename[] = [];
    for (const step of done.reverse()) {
      try {
        await renameWithRetry(ops, step.to, step.from, retry);
      } catch (rollbackError) {
        log.error('Rollback rename failed', { from: step.to, to: step.from, error: describeError(rollbackError) });
        stranded.push(step);
      }
    }
    throw new SanitizationFailedError(error, stranded);
  }

  return new Map(plan.renames.map((step) => [step.from, step.to]));
}

// Ex. 1, Ex 1, Ex_1, Exh. 2, Exhibit 3
const EXHIBIT_FILE_PATTERN = /^ex(?:h|hibits?)?[._\s]/i;

export interface RenameFolderOptions {
  dryRun?: boolean;
  ops?: FileOps;
  retry?: RenameRetryOptions;
}

/**
 * Stand-alone renamer for an exhibits folder: sanitizes every file whose
 * name looks like an exhibit. Dry run by default.
 */
export async function renameExhibitFiles(
  folder: string,
  options: RenameFolderOptions = {}
): Promise<SanitizationPlan & { applied: boolean }> {
  const { dryRun = true, ops = nodeFileOps, retry = {} } = options;

  const entries = await readdir(folder, { withFileTypes: true });
  const candidates = entries
    .filter((entry) => entry.isFile() && EXHIBIT_FILE_PATTERN.test(entry.name))
    .map((entry) => path.join(folder, entry.name));

  const plan = await planSanitization(candidates, ops);
  if (dryRun || plan.conflicts.length > 0) {
    return { ...plan, applied: false };
  }

  await applySanitization(plan, ops, retry);
  return { ...plan, applied: true };
}
