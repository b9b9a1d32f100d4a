#!/usr/bin/env node

/**
 * Interactive treeport browser
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { MalformedReplyError } from '@treeport/protocol';
import { BrowseClient } from './client.js';
import { loadClientConfig } from './config.js';
import { formatChangeRoot, formatListing } from './format.js';
import { HELP_TEXT, parseInput, type BrowserAction } from './commands.js';

async function perform(client: BrowseClient, action: BrowserAction): Promise<string> {
  switch (action.kind) {
    case 'ls':
      return formatListing(await client.list(action.path));
    case 'cd':
      return formatChangeRoot(await client.changeRoot(action.target), action.target);
    case 'help':
      return HELP_TEXT;
    case 'invalid':
      return chalk.red(action.message);
    case 'clear':
    case 'exit':
      return '';
  }
}

async function main(): Promise<void> {
  const client = new BrowseClient(loadClientConfig());
  await client.connect();

  console.clear();
  console.log(HELP_TEXT + '\n');

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('treeport> ');
  rl.prompt();

  for await (const line of rl) {
    const action = parseInput(line);
    if (action.kind === 'exit') {
      break;
    }

    console.clear();
    try {
      const output = await perform(client, action);
      if (output) console.log(output);
    } catch (error) {
      if (error instanceof MalformedReplyError) {
        console.log(chalk.red(`Could not read the server reply: ${error.message}`));
      } else {
        console.log(chalk.red(`Request failed: ${error instanceof Error ? error.message : String(error)}`));
      }
    }

    if (!client.isConnected()) {
      console.log(chalk.red('Connection to the server was lost'));
      break;
    }
    rl.prompt();
  }

  rl.close();
  client.disconnect();
  console.log('Disconnected');
}

main().catch((error) => {
  console.error(chalk.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
