/**
 * Directory listing model and its JSON wire form.
 *
 * On the wire a listing is one flat object: every key except `current_path`
 * and `warning` names a visited directory relative to the current root
 * (`.` for the root itself). Failures are `{ "error": "..." }` alone.
 */

import { z } from 'zod';

export const ROOT_LEVEL_KEY = '.';

export const ListingMessages = {
  pathDoesNotExist: 'Path does not exist',
  notADirectory: 'Path is not a directory',
  partial: 'Only part of the directory structure is shown due to response size limitation',
} as const;

export interface ListingLevel {
  dirs: string[];
  files: string[];
  warning?: string;
}

export interface DirectoryListing {
  currentPath: string;
  /** Visited directories in walk order */
  levels: Array<[key: string, level: ListingLevel]>;
  warning?: string;
}

export interface ListingError {
  error: string;
}

export type ListingReply = DirectoryListing | ListingError;

export function isListingError(reply: ListingReply): reply is ListingError {
  return 'error' in reply;
}

export function truncatedLevelWarning(
  shownDirs: number,
  shownFiles: number,
  totalDirs: number,
  totalFiles: number
): string {
  return `Shown ${shownDirs} directories and ${shownFiles} files out of ${totalDirs} directories and ${totalFiles} files`;
}

/**
 * Levels go out in walk order, then `current_path`, then `warning`. The
 * object is written field by field: a plain object would move integer-like
 * keys to the front and take a `__proto__` key as its prototype.
 */
export function serializeListing(reply: ListingReply): string {
  if (isListingError(reply)) {
    return JSON.stringify({ error: reply.error });
  }

  const fields = reply.levels.map(([key, level]) => `${JSON.stringify(key)}:${JSON.stringify(level)}`);
  fields.push(`"current_path":${JSON.stringify(reply.currentPath)}`);
  if (reply.warning !== undefined) {
    fields.push(`"warning":${JSON.stringify(reply.warning)}`);
  }
  return `{${fields.join(',')}}`;
}

function stringEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      i += 2;
    } else if (ch === '"') {
      return i;
    } else {
      i++;
    }
  }
  return text.length - 1;
}

/**
 * Keys of the outermost object in the order they appear in the text.
 * Expects text that has already parsed as a JSON object.
 */
export function topLevelKeys(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let expectKey = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '"') {
      const end = stringEnd(text, i);
      if (depth === 1 && expectKey) {
        const key: unknown = JSON.parse(text.slice(i, end + 1));
        if (typeof key === 'string' && !keys.includes(key)) {
          keys.push(key);
        }
        expectKey = false;
      }
      i = end;
    } else if (ch === '{' || ch === '[') {
      depth++;
      expectKey = depth === 1;
    } else if (ch === '}' || ch === ']') {
      depth--;
    } else if (ch === ',' && depth === 1) {
      expectKey = true;
    }
  }

  return keys;
}

const levelSchema = z.object({
  dirs: z.array(z.string()),
  files: z.array(z.string()),
  warning: z.string().optional(),
});

const errorSchema = z.object({ error: z.string() }).strict();


export class MalformedReplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedReplyError';
  }
}

/**
 * Parse a listing reply received from the server
 */
export function parseListing(payload: string): ListingReply {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    throw new MalformedReplyError('Reply is not valid JSON');
  }

  const failure = errorSchema.safeParse(raw);
  if (failure.success) {
    return { error: failure.data.error };
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new MalformedReplyError('Reply is not a JSON object');
  }

  let currentPath: string | undefined;
  let warning: string | undefined;
  const levels: DirectoryListing['levels'] = [];

  // JSON.parse puts integer-like keys first; walk order comes from the text
  for (const key of topLevelKeys(payload)) {
    const value: unknown = Object.getOwnPropertyDescriptor(raw, key)?.value;

    if (typeof value !== 'string') {
      const level = levelSchema.safeParse(value);
      if (!level.success) {
        throw new MalformedReplyError(`Unexpected reply shape at ${key}: ${level.error.issues[0]?.message ?? 'unknown'}`);
      }
      levels.push([key, level.data]);
    } else if (key === 'current_path') {
      currentPath = value;
    } else if (key === 'warning') {
      warning = value;
    } else {
      throw new MalformedReplyError(`Unexpected field: ${key}`);
    }
  }

  if (currentPath === undefined) {
    throw new MalformedReplyError('Reply has no current_path');
  }

  return warning === undefined ? { currentPath, levels } : { currentPath, levels, warning };
}
