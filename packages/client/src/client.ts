/**
 * treeport Client
 * Sends unframed commands to a treeport server and reads its length-prefixed replies
 */

import * as net from 'net';
import {
  FrameReader,
  MAX_COMMAND_BYTES,
  parseListing,
  type ListingReply,
} from '@treeport/protocol';
import type { ClientConfig } from './config.js';

interface PendingRequest {
  resolve: (reply: string) => void;
  reject: (error: Error) => void;
}

export class BrowseClient {
  private socket: net.Socket | null = null;
  private reader = new FrameReader();
  private pending: PendingRequest | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private connected: boolean = false;

  constructor(private readonly config: ClientConfig) {}

  /**
   * Connect to the treeport server
   */
  async connect(): Promise<void> {
    if (this.connected) return;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.config.host, port: this.config.port });

      const onConnectError = (error: Error) => {
        reject(error);
      };
      socket.once('error', onConnectError);

      socket.once('connect', () => {
        socket.off('error', onConnectError);
        this.socket = socket;
        this.connected = true;
        console.error(`[Client] Connected to ${this.getServerAddress()}`);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.handleData(chunk);
      });

      socket.on('error', (error) => {
        if (this.connected) {
          console.error('[Client] Socket error:', error.message);
        }
      });

      socket.on('close', () => {
        this.handleClose();
      });
    });
  }

  private handleData(chunk: Uint8Array): void {
    for (const frame of this.reader.push(chunk)) {
      const pending = this.pending;
      if (!pending) {
        console.error('[Client] Dropping unsolicited reply');
        continue;
      }
      this.pending = null;
      pending.resolve(frame);
    }
  }

  private handleClose(): void {
    const truncated = this.reader.hasPartialFrame;
    this.connected = false;
    this.socket = null;
    this.reader.reset();

    if (this.pending) {
      this.pending.reject(new Error(truncated ? 'Connection closed in the middle of a reply' : 'Connection closed by server'));
      this.pending = null;
    }
  }

  /**
   * Send one command and wait for its reply. Calls made while a request is
   * in flight wait their turn.
   */
  request(command: string): Promise<string> {
    const run = () => this.send(command);
    const reply = this.queue.then(run, run);
    this.queue = reply.catch(() => undefined);
    return reply;
  }

  private send(command: string): Promise<string> {
    return new Promise((resolve, reject) => {
      if (!this.socket || !this.connected) {
        reject(new Error('Not connected to a treeport server'));
        return;
      }
      if (Buffer.byteLength(command, 'utf8') > MAX_COMMAND_BYTES) {
        reject(new Error(`Command is longer than ${MAX_COMMAND_BYTES} bytes`));
        return;
      }
      this.pending = { resolve, reject };
      this.socket.write(command);
    });
  }

  /**
   * List a directory relative to the server's current root
   */
  async list(path: string = ''): Promise<ListingReply> {
    const reply = await this.request(path ? `ls ${path}` : 'ls');
    return parseListing(reply);
  }

  /**
   * Change the server-side root; resolves with the server's reply text
   */
  changeRoot(target: string): Promise<string> {
    return this.request(`cd ${target}`);
  }

  /**
   * Disconnect from server
   */
  disconnect(): void {
    if (this.socket) {
      this.socket.end();
      this.socket = null;
      this.connected = false;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getServerAddress(): string {
    return `${this.config.host}:${this.config.port}`;
  }
}
