import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { SanitizationConflictError, SanitizationFailedError } from './errors';
import {
  applySanitization,
  planSanitization,
  renameExhibitFiles,
  sanitizeFileName,
  type FileOps,
} from './sanitizer';

function fakeOps(existing: string[] = []): { exists: FileOps['exists']; rename: Mock<FileOps['rename']> } {
  return {
    exists: async (filePath) => existing.includes(filePath),
    rename: vi.fn<FileOps['rename']>(async () => {}),
  };
}

function busy(): Error {
  return Object.assign(new Error('resource busy or locked'), { code: 'EBUSY' });
}

describe('sanitizeFileName', () => {
  it('replaces spaces and internal periods', () => {
    expect(sanitizeFileName('Ex. 1 Memo.pdf')).toBe('Ex_1_Memo.pdf');
  });

  it('collapses and trims underscores', () => {
    expect(sanitizeFileName('Report  final .docx')).toBe('Report_final.docx');
  });

  it('leaves clean names alone', () => {
    expect(sanitizeFileName('Ex_1.pdf')).toBe('Ex_1.pdf');
    expect(sanitizeFileName('README')).toBe('README');
  });
});

describe('planSanitization', () => {
  it('plans a rename for each name that changes', async () => {
    const plan = await planSanitization(['/x/Ex. 1 Memo.pdf', '/x/Ex_2.pdf'], fakeOps());

    expect(plan).toEqual({
      renames: [{ from: '/x/Ex. 1 Memo.pdf', to: '/x/Ex_1_Memo.pdf' }],
      unchanged: ['/x/Ex_2.pdf'],
      conflicts: [],
    });
  });

  it('flags two files that sanitize to one name', async () => {
    const plan = await planSanitization(['/x/Ex. 1.pdf', '/x/Ex 1.pdf'], fakeOps());

    expect(plan.renames).toEqual([{ from: '/x/Ex. 1.pdf', to: '/x/Ex_1.pdf' }]);
    expect(plan.conflicts).toEqual([{ path: '/x/Ex 1.pdf', message: 'Ex 1.pdf and Ex. 1.pdf both sanitize to Ex_1.pdf' }]);
  });

  it('flags a target that already exists', async () => {
    const plan = await planSanitization(['/x/Ex 2.pdf'], fakeOps(['/x/Ex_2.pdf']));
    expect(plan.conflicts).toEqual([{ path: '/x/Ex 2.pdf', message: 'Ex_2.pdf already exists' }]);
  });
});

describe('applySanitization', () => {
  it('renames nothing when the plan has conflicts', async () => {
    const ops = fakeOps();
    const plan = await planSanitization(['/x/Ex. 1.pdf', '/x/Ex 1.pdf'], ops);

    await expect(applySanitization(plan, ops)).rejects.toBeInstanceOf(SanitizationConflictError);
    expect(ops.rename).not.toHaveBeenCalled();
  });

  it('returns the old to new path map', async () => {
    const ops = fakeOps();
    const plan = await planSanitization(['/x/Ex. 1 Memo.pdf'], ops);

    const renamed = await applySanitization(plan, ops);

    expect([...renamed]).toEqual([['/x/Ex. 1 Memo.pdf', '/x/Ex_1_Memo.pdf']]);
    expect(ops.rename).toHaveBeenCalledWith('/x/Ex. 1 Memo.pdf', '/x/Ex_1_Memo.pdf');
  });

  it('rolls back completed renames when one fails', async () => {
    const ops = fakeOps();
    const failure = new Error('disk full');
    ops.rename.mockResolvedValueOnce(undefined).mockRejectedValueOnce(failure);
    const plan = await planSanitization(['/x/Ex 1.pdf', '/x/Ex 2.pdf'], ops);

    const error = await applySanitization(plan, ops).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SanitizationFailedError);
    expect(error).toMatchObject({ code: 'SANITIZATION_FAILED', cause: failure, stranded: [] });
    expect(ops.rename.mock.calls).toEqual([
      ['/x/Ex 1.pdf', '/x/Ex_1.pdf'],
      ['/x/Ex 2.pdf', '/x/Ex_2.pdf'],
      ['/x/Ex_1.pdf', '/x/Ex 1.pdf'],
    ]);
  });

  it('retries a rename while the file is locked', async () => {
    const ops = fakeOps();
    const sleep = vi.fn(async () => {});
    ops.rename.mockRejectedValueOnce(busy());
    const plan = await planSanitization(['/x/Ex 1.pdf'], ops);

    const renamed = await applySanitization(plan, ops, { maxRetries: 3, baseDelayMs: 10, sleep });

    expect([...renamed]).toEqual([['/x/Ex 1.pdf', '/x/Ex_1.pdf']]);
    expect(ops.rename).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it('gives up on a file that stays locked and restores the others', async () => {
    const ops = fakeOps();
    ops.rename.mockImplementation(async (from) => {
      if (from === '/x/Ex 2.pdf') throw busy();
    });
    const plan = await planSanitization(['/x/Ex 1.pdf', '/x/Ex 2.pdf'], ops);

    await expect(applySanitization(plan, ops, { maxRetries: 2, sleep: async () => {} })).rejects.toMatchObject({
      code: 'SANITIZATION_FAILED',
      stranded: [],
    });
    expect(ops.rename.mock.calls).toEqual([
      ['/x/Ex 1.pdf', '/x/Ex_1.pdf'],
      ['/x/Ex 2.pdf', '/x/Ex_2.pdf'],
      ['/x/Ex 2.pdf', '/x/Ex_2.pdf'],
      ['/x/Ex 2.pdf', '/x/Ex_2.pdf'],
      ['/x/Ex_1.pdf', '/x/Ex 1.pdf'],
    ]);
  });

  it('reports renames that could not be undone', async () => {
    const ops = fakeOps();
    ops.rename.mockImplementation(async (from) => {
      if (from !== '/x/Ex 1.pdf') throw new Error('read-only volume');
    });
    const plan = await planSanitization(['/x/Ex 1.pdf', '/x/Ex 2.pdf'], ops);

    await expect(applySanitization(plan, ops)).rejects.toMatchObject({
      stranded: [{ from: '/x/Ex 1.pdf', to: '/x/Ex_1.pdf' }],
      details: [
        { message: 'read-only volume' },
        { path: '/x/Ex_1.pdf', message: 'could not restore /x/Ex 1.pdf' },
      ],
    });
  });
});

describe('renameExhibitFiles', () => {
  let folder: string;

  beforeEach(async () => {
    folder = await mkdtemp(path.join(os.tmpdir(), 'exhibit-rename-'));
    await writeFile(path.join(folder, 'Ex. 1 Memo.pdf'), '');
    await writeFile(path.join(folder, 'Ex_2.pdf'), '');
    await writeFile(path.join(folder, 'notes on exhibits.txt'), '');
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it('only plans by default', async () => {
    const result = await renameExhibitFiles(folder);

    expect(result.applied).toBe(false);
    expect(result.renames).toEqual([
      { from: path.join(folder, 'Ex. 1 Memo.pdf'), to: path.join(folder, 'Ex_1_Memo.pdf') },
    ]);
    expect(result.unchanged).toEqual([path.join(folder, 'Ex_2.pdf')]);
    expect((await readdir(folder)).sort()).toEqual(['Ex. 1 Memo.pdf', 'Ex_2.pdf', 'notes on exhibits.txt']);
  });

  it('renames exhibit files when asked to', async () => {
    const result = await renameExhibitFiles(folder, { dryRun: false });

    expect(result.applied).toBe(true);
    expect((await readdir(folder)).sort()).toEqual(['Ex_1_Memo.pdf', 'Ex_2.pdf', 'notes on exhibits.txt']);
  });
});
