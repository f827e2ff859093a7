/**
 * Output collaborators
 *
 * The engine produces ResolvedLinks; a LinkWriter puts them somewhere a
 * reader can use. The JSON manifest lists every anchor with its target so
 * another tool (a Word macro, a PDF stamper) can apply them.
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from './logger';
import type { ResolvedLink } from './types';

const log = createLogger('link-writer');

export interface LinkWriteResult {
  path: string;
  written: number;
}

export interface LinkWriter {
  write(links: readonly ResolvedLink[]): Promise<LinkWriteResult>;
}

export interface ManifestEntry {
  offset: number;
  rawText: string;
  kind: ResolvedLink['citation']['kind'];
  label: string;
  href: string;
  relativePath: string;
  page?: number;
}

export interface LinkManifest {
  source: string;
  links: ManifestEntry[];
}

/** brief.docx → brief.links.json, beside the source */
export function manifestPath(sourcePath: string): string {
  const { dir, name } = path.parse(sourcePath);
  return path.join(dir, `${name}.links.json`);
}

export function toManifest(sourcePath: string, links: readonly ResolvedLink[]): LinkManifest {
  return {
    source: path.basename(sourcePath),
    links: links.map((link) => {
      const page = link.target.pageFragment ? parseInt(link.target.pageFragment.replace('#page=', ''), 10) : undefined;
      return {
        offset: link.sourceOffset,
        rawText: link.rawText,
        kind: link.citation.kind,
        label: link.citation.label,
        href: link.target.href,
        relativePath: link.target.relativePath,
        ...(page !== undefined ? { page } : {}),
      };
    }),
  };
}

export class JsonManifestWriter implements LinkWriter {
  readonly outputPath: string;

  constructor(private readonly sourcePath: string, outputPath?: string) {
    this.outputPath = outputPath ?? manifestPath(sourcePath);
  }

  async write(links: readonly ResolvedLink[]): Promise<LinkWriteResult> {
    const manifest = toManifest(this.sourcePath, links);
    await writeFile(this.outputPath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
    log.info('Wrote link manifest', { path: this.outputPath, links: links.length });
    return { path: this.outputPath, written: links.length };
  }
}
