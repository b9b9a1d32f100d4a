/**
 * Bounded Directory Lister
 *
 * Walks a subtree top-down and records each directory's immediate children,
 * trimming names so the serialized reply stays within a byte budget. Levels
 * are taken greedily in walk order: once a level cannot fit even with no
 * names, the walk stops and the reply is marked partial.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ListingMessages,
  ROOT_LEVEL_KEY,
  serializeListing,
  truncatedLevelWarning,
  type DirectoryListing,
  type ListingLevel,
  type ListingReply,
} from '@treeport/protocol';

export const DEFAULT_MAX_ITEMS = 100;
export const DEFAULT_MAX_RESPONSE_BYTES = 2048;

export interface ListerOptions {
  /** Names shown per directory, split evenly between subdirectories and files */
  maxItems?: number;
  maxResponseBytes?: number;
}

interface WalkedDirectory {
  path: string;
  dirs: string[];
  files: string[];
}

async function* walk(dir: string): AsyncGenerator<WalkedDirectory> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const dirs: string[] = [];
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      dirs.push(entry.name);
    } else {
      files.push(entry.name);
    }
  }

  yield { path: dir, dirs, files };

  for (const name of dirs) {
    yield* walk(path.join(dir, name));
  }
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DirectoryLister {
  private readonly maxItems: number;
  private readonly maxResponseBytes: number;

  constructor(options: ListerOptions = {}) {
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
  }

  /**
   * List `target` (relative to `root`). Level keys and `current_path` are
   * relative to and equal to `root`, not the target.
   */
  async list(root: string, target: string): Promise<ListingReply> {
    const start = path.join(root, target);

    try {
      const stats = await fs.stat(start);
      if (!stats.isDirectory()) {
        return { error: ListingMessages.notADirectory };
      }
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return { error: ListingMessages.pathDoesNotExist };
      }
      return { error: errorMessage(error) };
    }

    const listing: DirectoryListing = { currentPath: root, levels: [] };

    try {
      for await (const dir of walk(start)) {
        const key = path.relative(root, dir.path) || ROOT_LEVEL_KEY;
        const level = this.fitLevel(listing, key, dir);

        if (level === null) {
          listing.warning = ListingMessages.partial;
          break;
        }

        listing.levels.push([key, level]);

        if (this.sizeOf(listing) > this.maxResponseBytes) {
          listing.warning = ListingMessages.partial;
          break;
        }
      }
    } catch (error) {
      console.error(`[Lister] Walk of ${start} failed:`, errorMessage(error));
      return { error: errorMessage(error) };
    }

    return listing;
  }

  /**
   * Largest prefix of the directory's names that still fits, or null when
   * not even an empty entry does. The trial reserves room for the partial
   * warning so the walk can stop after any level and stay in budget.
   */
  private fitLevel(listing: DirectoryListing, key: string, dir: WalkedDirectory): ListingLevel | null {
    const half = Math.floor(this.maxItems / 2);
    const total = dir.dirs.length + dir.files.length;
    let dirs = dir.dirs.slice(0, half);
    let files = dir.files.slice(0, half);

    const build = (): ListingLevel => {
      const level: ListingLevel = { dirs, files };
      if (total > dirs.length + files.length) {
        level.warning = truncatedLevelWarning(dirs.length, files.length, dir.dirs.length, dir.files.length);
      }
      return level;
    };

    let level = build();
    while (this.trialSize(listing, key, level) > this.maxResponseBytes) {
      if (dirs.length === 0 && files.length === 0) {
        return null;
      }
      dirs = dirs.slice(0, -1);
      files = files.slice(0, -1);
      level = build();
    }

    return level;
  }

  private trialSize(listing: DirectoryListing, key: string, level: ListingLevel): number {
    return this.sizeOf({
      currentPath: listing.currentPath,
      levels: [...listing.levels, [key, level]],
      warning: ListingMessages.partial,
    });
  }

  private sizeOf(listing: DirectoryListing): number {
    return Buffer.byteLength(serializeListing(listing), 'utf8');
  }
}
