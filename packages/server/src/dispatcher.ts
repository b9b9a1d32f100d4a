/**
 * Command Dispatcher
 * Turns one command line into the reply string the session frames and sends.
 */

import { ListingMessages, Replies, serializeListing, type ListingReply } from '@treeport/protocol';
import type { DirectoryLister } from './lister.js';
import type { RootNavigator } from './navigator.js';

export interface ParsedCommand {
  verb: string;
  args: string[];
}

export function parseCommand(line: string): ParsedCommand {
  const [verb = '', ...args] = line.trim().split(/\s+/);
  return { verb, args };
}

export class CommandDispatcher {
  constructor(
    private readonly navigator: RootNavigator,
    private readonly lister: DirectoryLister
  ) {}

  async dispatch(line: string): Promise<string> {
    const { verb, args } = parseCommand(line);

    switch (verb) {
      case 'ls':
        return serializeListing(await this.list(args[0] ?? ''));
      case 'cd': {
        const target = args[0];
        if (target === undefined) {
          return Replies.missingArgument;
        }
        const result = await this.navigator.changeRoot(target);
        return result.message;
      }
      default:
        console.log(`[Dispatcher] Unknown command: ${verb}`);
        return Replies.unknownCommand;
    }
  }

  private async list(target: string): Promise<ListingReply> {
    const root = this.navigator.currentRoot;
    if (this.navigator.resolve(target) === null) {
      return { error: ListingMessages.pathDoesNotExist };
    }
    return this.lister.list(root, target);
  }
}
