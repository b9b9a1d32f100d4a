import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as net from 'net';
import * as path from 'path';
import { once } from 'events';
import { FrameReader, parseListing } from '@treeport/protocol';
import { BrowseServer } from './server.js';
import type { ServerConfig } from './types.js';
import { makeTree, removeTree } from './test-utils.js';

interface TestConnection {
  socket: net.Socket;
  request(command: string): Promise<string>;
}

async function connect(port: number): Promise<TestConnection> {
  const socket = net.createConnection({ host: '127.0.0.1', port });
  await once(socket, 'connect');

  const reader = new FrameReader();
  const frames: string[] = [];
  const waiting: Array<(frame: string) => void> = [];

  socket.on('data', (chunk: Buffer) => {
    for (const frame of reader.push(chunk)) {
      const resolve = waiting.shift();
      if (resolve) {
        resolve(frame);
      } else {
        frames.push(frame);
      }
    }
  });

  return {
    socket,
    request(command: string): Promise<string> {
      socket.write(command);
      const ready = frames.shift();
      if (ready !== undefined) {
        return Promise.resolve(ready);
      }
      return new Promise((resolve) => waiting.push(resolve));
    },
  };
}

let root: string;
let server: BrowseServer;
const connections: net.Socket[] = [];

async function startServer(overrides: Partial<ServerConfig> = {}) {
  server = new BrowseServer({
    host: '127.0.0.1',
    port: 0,
    root,
    rootScope: 'session',
    confine: false,
    ...overrides,
  });
  return server.start();
}

async function open(port: number): Promise<TestConnection> {
  const connection = await connect(port);
  connections.push(connection.socket);
  return connection;
}

beforeEach(async () => {
  root = await makeTree({ a: { '1.txt': '', '2.txt': '', '3.txt': '' }, b: {} });
});

afterEach(async () => {
  connections.splice(0).forEach((socket) => socket.destroy());
  await server.close();
  await removeTree(root);
});

describe('BrowseServer', () => {
  it('answers ls with a framed listing of the root', async () => {
    const { port } = await startServer();
    const client = await open(port);

    const reply = parseListing(await client.request('ls '));
    expect(reply).toMatchObject({ currentPath: root });
    expect('levels' in reply && reply.levels.map(([key]) => key).sort()).toEqual(['.', 'a', 'b']);
  });

  it('answers cd and later listings follow the new root', async () => {
    const { port } = await startServer();
    const client = await open(port);

    expect(await client.request('cd a')).toBe('OK');
    expect(parseListing(await client.request('ls'))).toEqual({
      currentPath: path.join(root, 'a'),
      levels: [['.', { dirs: [], files: expect.arrayContaining(['1.txt', '2.txt', '3.txt']) }]],
    });
  });

  it('keeps serving after an invalid, bare or unknown command', async () => {
    const { port } = await startServer();
    const client = await open(port);

    expect(await client.request('cd nonexistent')).toBe('Invalid directory path');
    expect(await client.request('cd')).toBe('Directory argument is required');
    expect(await client.request('foo bar')).toBe('Unknown command');
    expect(parseListing(await client.request('ls'))).toMatchObject({ currentPath: root });
  });

  it('gives each session its own root by default', async () => {
    const { port } = await startServer();
    const first = await open(port);
    const second = await open(port);

    expect(await first.request('cd a')).toBe('OK');
    expect(parseListing(await second.request('ls b'))).toMatchObject({ currentPath: root });
  });

  it('shares one root between sessions in shared scope', async () => {
    const { port } = await startServer({ rootScope: 'shared' });
    const first = await open(port);
    const second = await open(port);

    expect(await first.request('cd a')).toBe('OK');
    expect(parseListing(await second.request('ls'))).toMatchObject({ currentPath: path.join(root, 'a') });
  });

  it('confines navigation to the base root when asked', async () => {
    const { port } = await startServer({ confine: true });
    const client = await open(port);

    expect(await client.request('cd ..')).toBe('Cannot go above the root directory');
    expect(await client.request('ls ..')).toBe('{"error":"Path does not exist"}');
  });

  it('forgets a session once its client disconnects', async () => {
    const { port } = await startServer();
    const client = await open(port);
    await client.request('ls');
    expect(server.getSessions()).toHaveLength(1);

    client.socket.end();
    await vi.waitFor(() => expect(server.getSessions()).toHaveLength(0));
  });

  it('counts commands per session', async () => {
    const { port } = await startServer();
    const client = await open(port);
    await client.request('ls');
    await client.request('cd b');

    expect(server.getStats().sessions).toEqual([
      expect.objectContaining({ commandCount: 2, currentRoot: path.join(root, 'b') }),
    ]);
  });

  it('drops connected clients on close', async () => {
    const { port } = await startServer();
    const client = await open(port);
    const closed = once(client.socket, 'close');

    await server.close();
    await closed;
    expect(client.socket.destroyed).toBe(true);
  });

  it('refuses to start on a root that does not exist', async () => {
    await expect(startServer({ root: path.join(root, 'missing') })).rejects.toThrow('ENOENT');
  });

  it('reports health over HTTP when a health port is set', async () => {
    const { healthPort } = await startServer({ healthPort: 0 });

    const health = await fetch(`http://127.0.0.1:${healthPort}/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'ok', sessions: 0, rootScope: 'session' });

    const missing = await fetch(`http://127.0.0.1:${healthPort}/nope`);
    expect(missing.status).toBe(404);
  });

  it('answers only GET on the health endpoint', async () => {
    const { healthPort } = await startServer({ healthPort: 0 });

    const preflight = await fetch(`http://127.0.0.1:${healthPort}/health`, { method: 'OPTIONS' });
    expect(preflight.status).toBe(405);
    expect(preflight.headers.get('allow')).toBe('GET');
    expect(preflight.headers.get('access-control-allow-origin')).toBeNull();
    expect(await preflight.text()).toBe('Method Not Allowed');
  });
});
