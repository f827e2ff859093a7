import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DocxDocument, PdfDocument, TextDocument, openSourceDocument } from './documentParser';

describe('openSourceDocument', () => {
  it('picks a reader by extension', () => {
    expect(openSourceDocument('/cases/brief.TXT')).toBeInstanceOf(TextDocument);
    expect(openSourceDocument('/cases/brief.docx')).toBeInstanceOf(DocxDocument);
    expect(openSourceDocument('/cases/brief.pdf')).toBeInstanceOf(PdfDocument);
  });

  it('rejects other file types', () => {
    expect(() => openSourceDocument('/cases/brief.rtf')).toThrow('Unsupported file type: .rtf');
  });
});

describe('TextDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'exhibit-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the file as UTF-8', async () => {
    const file = path.join(dir, 'brief.txt');
    await writeFile(file, 'See Ex. 1 Memo.\n', 'utf8');

    const document = openSourceDocument(file);

    await expect(document.readText()).resolves.toBe('See Ex. 1 Memo.\n');
    await document.close();
  });
});

describe('PdfDocument', () => {
  it('joins non-empty pages with a blank line', async () => {
    const document = new PdfDocument('/cases/brief.pdf', {
      readPages: async () => ({ pageCount: 3, pages: ['Page one', '  ', 'Page three'] }),
    });

    await expect(document.readText()).resolves.toBe('Page one\n\nPage three');
  });
});
