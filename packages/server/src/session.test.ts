import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as net from 'net';
import { once } from 'events';
import { FrameReader, type ListingReply } from '@treeport/protocol';
import { BrowseSession } from './session.js';
import { DirectoryLister } from './lister.js';
import { RootNavigator } from './navigator.js';
import { makeTree, removeTree } from './test-utils.js';

class FailingLister extends DirectoryLister {
  async list(): Promise<ListingReply> {
    throw new Error('disk unavailable');
  }
}

let root: string;

beforeAll(async () => {
  root = await makeTree({ a: {} });
});

afterAll(async () => {
  await removeTree(root);
});

/**
 * Run one session over a loopback connection and collect every reply
 * until the server side closes.
 */
async function runSession(commands: string[]): Promise<{ replies: string[]; sessions: BrowseSession[] }> {
  const sessions: BrowseSession[] = [];
  const server = net.createServer((socket) => {
    const session = new BrowseSession('test', socket, new RootNavigator(root), new FailingLister());
    sessions.push(session);
    socket.on('data', (chunk: Buffer) => session.receive(chunk));
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  const socket = net.createConnection({ host: '127.0.0.1', port });
  const reader = new FrameReader();
  const replies: string[] = [];
  socket.on('data', (chunk: Buffer) => replies.push(...reader.push(chunk)));
  const closed = once(socket, 'close');
  await once(socket, 'connect');

  for (const command of commands) {
    const before = replies.length;
    socket.write(command);
    while (replies.length === before && !socket.destroyed) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
  }

  await closed;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return { replies, sessions };
}

describe('BrowseSession', () => {
  it('answers a failed request with a framed error and ends the session', async () => {
    const { replies, sessions } = await runSession(['cd a', 'ls']);

    expect(replies).toEqual(['OK', 'Error processing request']);
    expect(sessions[0]?.getStats()).toMatchObject({ sessionId: 'test', commandCount: 2 });
  });
});
