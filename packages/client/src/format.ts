/**
 * Terminal rendering of server replies
 */

import chalk, { type ChalkInstance } from 'chalk';
import { isListingError, Replies, type ListingReply } from '@treeport/protocol';

export function formatListing(reply: ListingReply, paint: ChalkInstance = chalk): string {
  if (isListingError(reply)) {
    return paint.red(`Error: ${reply.error}`);
  }

  const lines: string[] = [];

  if (reply.warning) {
    lines.push(paint.yellow(reply.warning));
  }

  lines.push(paint.blue(`Current directory: ${reply.currentPath}`), '');

  for (const [key, level] of reply.levels) {
    lines.push(paint.green(key));
    level.dirs.forEach((dir) => lines.push(`\t📁 ${dir}`));
    level.files.forEach((file) => lines.push(`\t📄 ${file}`));

    if (level.warning) {
      lines.push('', paint.yellow(level.warning));
    }
  }

  return lines.join('\n');
}

export function formatChangeRoot(reply: string, target: string, paint: ChalkInstance = chalk): string {
  return reply === Replies.ok
    ? paint.green(`Current directory changed to ${target}`)
    : paint.red(reply);
}
