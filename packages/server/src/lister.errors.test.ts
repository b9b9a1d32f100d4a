import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import { DirectoryLister } from './lister.js';
import { makeTree, removeTree } from './test-utils.js';

const unreadable = vi.hoisted(() => new Set<string>());

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const dir = String(args[0]);
      if (unreadable.has(dir)) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
      }
      return actual.readdir(...args);
    },
  };
});

afterEach(() => {
  unreadable.clear();
});

describe('DirectoryLister walk errors', () => {
  it('discards partial results when a subdirectory cannot be read', async () => {
    const root = await makeTree({ open: { 'x.txt': '' }, locked: { 'y.txt': '' } });
    const locked = path.join(root, 'locked');
    unreadable.add(locked);

    try {
      expect(await new DirectoryLister().list(root, '')).toEqual({
        error: `EACCES: permission denied, scandir '${locked}'`,
      });
    } finally {
      await removeTree(root);
    }
  });

  it('reports a failure to read the walk root itself', async () => {
    const root = await makeTree({ 'x.txt': '' });
    unreadable.add(root);

    try {
      expect(await new DirectoryLister().list(root, '')).toEqual({
        error: `EACCES: permission denied, scandir '${root}'`,
      });
    } finally {
      await removeTree(root);
    }
  });
});
