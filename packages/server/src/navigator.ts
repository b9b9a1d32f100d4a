/**
 * Root Navigator
 * Tracks the directory a session browses from and applies `cd`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Replies } from '@treeport/protocol';
import type { ChangeRootResult } from './types.js';

async function isDirectory(target: string): Promise<boolean> {
  const stats = await fs.stat(target).catch(() => null);
  return stats?.isDirectory() ?? false;
}

export class RootNavigator {
  private root: string;
  private readonly boundary: string | undefined;

  /**
   * @param boundary - when set, the root never leaves this directory
   */
  constructor(root: string, boundary?: string) {
    this.root = path.resolve(root);
    this.boundary = boundary === undefined ? undefined : path.resolve(boundary);
  }

  get currentRoot(): string {
    return this.root;
  }

  /**
   * Whether an absolute path lies inside the confinement boundary
   */
  contains(target: string): boolean {
    if (this.boundary === undefined) return true;

    const relative = path.relative(this.boundary, target);
    return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
  }

  /**
   * Absolute path a listing of `target` would walk, or null when it falls
   * outside the boundary
   */
  resolve(target: string): string | null {
    const resolved = path.join(this.root, target);
    return this.contains(resolved) ? resolved : null;
  }

  async changeRoot(target: string): Promise<ChangeRootResult> {
    const from = this.root;

    if (target === '..') {
      const parent = path.dirname(from);
      if (parent === from || from === this.boundary || !(await isDirectory(parent))) {
        console.log(`[Navigator] Refused to go above ${from}`);
        return { ok: false, message: Replies.aboveRoot };
      }
      this.root = parent;
      return { ok: true, message: Replies.ok };
    }

    const next = path.join(from, target);
    if (!this.contains(next) || !(await isDirectory(next))) {
      console.log(`[Navigator] Invalid directory: ${target}`);
      return { ok: false, message: Replies.invalidDirectory };
    }

    this.root = next;
    return { ok: true, message: Replies.ok };
  }
}
