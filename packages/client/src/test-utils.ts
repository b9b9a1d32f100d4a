import * as net from 'net';
import { encodeFrame } from '@treeport/protocol';

export interface StandInServer {
  port: number;
  /** Every command received, in order */
  commands: string[];
  close(): Promise<void>;
}

export type StandInHandler = (command: string, socket: net.Socket) => void;

/** Reply with the frame of `payload` */
export function reply(socket: net.Socket, payload: string): void {
  socket.write(encodeFrame(payload));
}

/**
 * An in-process TCP server that answers commands the way a test needs
 */
export async function startStandIn(handler: StandInHandler): Promise<StandInServer> {
  const commands: string[] = [];
  const sockets = new Set<net.Socket>();

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('data', (chunk: Buffer) => {
      const command = chunk.toString('utf8');
      commands.push(command);
      handler(command, socket);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  return {
    port,
    commands,
    close: () =>
      new Promise<void>((resolve) => {
        sockets.forEach((socket) => socket.destroy());
        server.close(() => resolve());
      }),
  };
}
