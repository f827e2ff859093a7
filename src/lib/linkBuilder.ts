/**
 * Link target construction
 *
 * Links are relative to the folder of the source document, so a document
 * and its exhibits folder can be moved or shared together.
 */

import type { LinkTarget, PdfViewer, ResolvedMatch } from './types';

// "C:\..." or "\\server\share\..."
const WINDOWS_ROOT = /^(?:[A-Za-z]:[\\/]|\\\\)/;

function splitPath(absolutePath: string): { root: string; parts: string[] } {
  // A backslash is only a separator on Windows; on POSIX it can be part of a name
  const windows = WINDOWS_ROOT.test(absolutePath);
  const parts = absolutePath.split(windows ? /[\\/]+/ : /\/+/);
  // "/a/b" → ["", "a", "b"]; "C:\a\b" → ["C:", "a", "b"]
  const root = parts.shift() ?? '';
  return { root: windows ? root.toLowerCase() : root, parts: parts.filter((part) => part && part !== '.') };
}

/**
 * Relative path from sourceDir to targetPath with forward slashes, via the
 * deepest common ancestor. Paths on different roots (drives) cannot be
 * related; the bare file name is returned.
 */
export function relativeLinkPath(sourceDir: string, targetPath: string): string {
  const from = splitPath(sourceDir);
  const to = splitPath(targetPath);
  const fileName = to.parts[to.parts.length - 1] ?? '';

  if (from.root !== to.root) return fileName;

  let common = 0;
  while (
    common < from.parts.length &&
    common < to.parts.length &&
    from.parts[common] === to.parts[common]
  ) {
    common++;
  }

  const up = from.parts.slice(common).map(() => '..');
  return [...up, ...to.parts.slice(common)].join('/');
}

/**
 * Acrobat and Chrome's viewer both open a PDF at a page through #page=N
 */
export function pageFragment(page: number | undefined): string | undefined {
  return page === undefined ? undefined : `#page=${page}`;
}

/**
 * Chrome's PDF viewer can treat names with spaces or extra periods as a
 * network address and drop the page fragment.
 */
export function chromeUnsafeName(fileName: string): boolean {
  const dot = fileName.lastIndexOf('.');
  const stem = dot > 0 ? fileName.slice(0, dot) : fileName;
  return /[\s.]/.test(stem);
}

/**
 * The address written into the output document
 */
export function linkHref(relativePath: string, fragment: string | undefined, viewer: PdfViewer): string {
  const pathPart = viewer === 'chrome'
    ? relativePath.split('/').map((segment) => (segment === '..' ? segment : encodeURIComponent(segment))).join('/')
    : relativePath;
  return `${pathPart}${fragment ?? ''}`;
}

export interface LinkBuildOptions {
  viewer: PdfViewer;
  /** Old absolute path → new absolute path for files renamed by sanitization */
  renamed?: ReadonlyMap<string, string>;
}

export function buildLinkTarget(match: ResolvedMatch, sourceDir: string, options: LinkBuildOptions): LinkTarget {
  const targetPath = options.renamed?.get(match.file.path) ?? match.file.path;
  const relativePath = relativeLinkPath(sourceDir, targetPath);
  const fragment = pageFragment(match.resolvedPage);

  return {
    relativePath,
    ...(fragment ? { pageFragment: fragment } : {}),
    displayText: match.citation.rawText,
    href: linkHref(relativePath, fragment, options.viewer),
  };
}
