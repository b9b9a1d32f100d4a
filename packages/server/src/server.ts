/**
 * treeport TCP Server
 * Accepts browsing connections and, optionally, serves health checks over HTTP
 */

import * as net from 'net';
import http from 'http';
import * as fs from 'fs/promises';
import { randomUUID } from 'crypto';
import { BrowseSession } from './session.js';
import { DirectoryLister, type ListerOptions } from './lister.js';
import { RootNavigator } from './navigator.js';
import type { ListeningAddress, ServerConfig, SessionStats } from './types.js';

function listen(server: net.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export class BrowseServer {
  private tcpServer: net.Server;
  private httpServer: http.Server | null = null;
  private sessions: Map<net.Socket, BrowseSession> = new Map();
  private sharedNavigator: RootNavigator | null = null;
  private lister: DirectoryLister;
  private startTime: number;

  constructor(private readonly config: ServerConfig, listerOptions: ListerOptions = {}) {
    this.startTime = Date.now();
    this.lister = new DirectoryLister(listerOptions);

    if (config.rootScope === 'shared') {
      this.sharedNavigator = this.createNavigator();
    }

    this.tcpServer = net.createServer((socket) => {
      this.handleConnection(socket);
    });

    this.tcpServer.on('error', (error) => {
      console.error('[Server] TCP server error:', error);
    });
  }

  /**
   * Check the base root, then bind the TCP listener and the health endpoint
   */
  async start(): Promise<ListeningAddress> {
    const stats = await fs.stat(this.config.root);
    if (!stats.isDirectory()) {
      throw new Error(`Root ${this.config.root} is not a directory`);
    }

    const port = await listen(this.tcpServer, this.config.port, this.config.host);
    console.log(`[Server] treeport listening on ${this.config.host}:${port}, root ${this.config.root}`);

    if (this.config.healthPort === undefined) {
      return { port };
    }

    this.httpServer = http.createServer((req, res) => {
      this.handleHttpRequest(req, res);
    });
    const healthPort = await listen(this.httpServer, this.config.healthPort, this.config.host);
    console.log(`[Server] Health endpoint on http://${this.config.host}:${healthPort}/health`);

    return { port, healthPort };
  }

  private createNavigator(): RootNavigator {
    return new RootNavigator(this.config.root, this.config.confine ? this.config.root : undefined);
  }

  private handleConnection(socket: net.Socket): void {
    const navigator = this.sharedNavigator ?? this.createNavigator();
    const session = new BrowseSession(randomUUID().slice(0, 8), socket, navigator, this.lister);
    this.sessions.set(socket, session);

    console.log(`[Server] New connection from ${session.peer}`);

    socket.on('data', (chunk: Buffer) => {
      session.receive(chunk);
    });

    socket.on('error', (error) => {
      console.error(`[Server] Connection error from ${session.peer}:`, error.message);
    });

    socket.on('close', () => {
      this.handleDisconnect(socket);
    });
  }

  private handleDisconnect(socket: net.Socket): void {
    const session = this.sessions.get(socket);
    if (session) {
      console.log(`[Server] Client disconnected: ${session.peer}`);
      this.sessions.delete(socket);
    }
  }

  private handleHttpRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (req.method !== 'GET') {
      res.writeHead(405, { Allow: 'GET' });
      res.end('Method Not Allowed');
      return;
    }

    if (req.url === '/health') {
      const health = {
        status: 'ok',
        uptime: this.getUptime(),
        sessions: this.sessions.size,
        rootScope: this.config.rootScope,
        timestamp: new Date().toISOString()
      };
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(health));
      return;
    }

    if (req.url === '/stats') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(this.getStats()));
      return;
    }

    if (req.url === '/' || req.url === '') {
      const info = {
        name: 'treeport server',
        version: '0.1.0',
        status: 'running',
        endpoints: {
          health: '/health',
          stats: '/stats'
        }
      };
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(info));
      return;
    }

    res.writeHead(404);
    res.end('Not Found');
  }

  /**
   * Get all active sessions
   */
  getSessions(): BrowseSession[] {
    return Array.from(this.sessions.values());
  }

  getStats(): { uptime: number; totalSessions: number; sessions: SessionStats[] } {
    return {
      uptime: this.getUptime(),
      totalSessions: this.sessions.size,
      sessions: this.getSessions().map((session) => session.getStats())
    };
  }

  private getUptime(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  /**
   * Drop every connection and stop listening. In-flight listings are not drained.
   */
  async close(): Promise<void> {
    console.log('[Server] Shutting down...');

    this.sessions.forEach((session) => {
      session.destroy();
    });
    this.sessions.clear();

    await Promise.all([
      closeServer(this.tcpServer),
      this.httpServer ? closeServer(this.httpServer) : Promise.resolve()
    ]);

    console.log('[Server] Server closed');
  }
}
