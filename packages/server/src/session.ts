/**
 * Session Management
 * One session per TCP connection. Commands are handled strictly in order,
 * one at a time, and every reply goes out as a length-prefixed frame.
 */

import type { Socket } from 'net';
import { encodeFrame, splitCommandChunk, Replies } from '@treeport/protocol';
import { CommandDispatcher } from './dispatcher.js';
import type { DirectoryLister } from './lister.js';
import type { RootNavigator } from './navigator.js';
import type { SessionStats } from './types.js';

export class BrowseSession {
  public readonly sessionId: string;
  public readonly peer: string;

  private readonly connectedAt: number;
  private readonly dispatcher: CommandDispatcher;
  private commandCount: number = 0;
  private queue: Promise<void> = Promise.resolve();
  private closed: boolean = false;

  constructor(
    sessionId: string,
    private readonly socket: Socket,
    private readonly navigator: RootNavigator,
    lister: DirectoryLister
  ) {
    this.sessionId = sessionId;
    this.peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.connectedAt = Date.now();
    this.dispatcher = new CommandDispatcher(navigator, lister);

    console.log(`[Session] Created session ${sessionId} for ${this.peer}`);
  }

  /**
   * Queue the commands carried by one chunk read from the socket
   */
  receive(chunk: Uint8Array): void {
    for (const command of splitCommandChunk(chunk)) {
      this.queue = this.queue
        .then(() => this.handleCommand(command))
        .catch((error) => {
          console.error(`[Session] Failed to answer ${this.peer}:`, error);
        });
    }
  }

  private async handleCommand(command: string): Promise<void> {
    if (this.closed) return;

    this.commandCount++;
    console.log(`[Session] ${this.sessionId} command: ${command.trim()}`);

    try {
      const reply = await this.dispatcher.dispatch(command);
      this.send(reply);
    } catch (error) {
      console.error(`[Session] Error handling request from ${this.peer}:`, error);
      this.send(Replies.requestFailed);
      this.close();
    }
  }

  private send(payload: string): void {
    if (this.closed || !this.socket.writable) return;
    this.socket.write(encodeFrame(payload));
  }

  /**
   * Finish pending writes, then end the connection
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.end();
  }

  /**
   * Drop the connection immediately
   */
  destroy(): void {
    this.closed = true;
    this.socket.destroy();
    console.log(`[Session] Destroyed session ${this.sessionId}`);
  }

  getStats(): SessionStats {
    return {
      sessionId: this.sessionId,
      peer: this.peer,
      connectedAt: this.connectedAt,
      commandCount: this.commandCount,
      currentRoot: this.navigator.currentRoot,
    };
  }
}
