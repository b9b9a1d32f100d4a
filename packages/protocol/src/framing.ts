/**
 * treeport wire framing
 * Server replies are a 4-byte big-endian length followed by UTF-8 bytes.
 * Commands from the client travel unframed, one command per write.
 */

import { encoding, decoding, string } from 'lib0';

export const FRAME_HEADER_BYTES = 4;
export const MAX_FRAME_PAYLOAD_BYTES = 0xffffffff;

/** Largest command the server reads in one piece; longer writes are split. */
export const MAX_COMMAND_BYTES = 1024;

// Invalid sequences decode to U+FFFD instead of throwing
const utf8 = new TextDecoder('utf-8');

/**
 * Encode a reply as a length-prefixed frame
 */
export function encodeFrame(payload: string): Uint8Array {
  const bytes = string.encodeUtf8(payload);
  if (bytes.length > MAX_FRAME_PAYLOAD_BYTES) {
    throw new Error(`Frame payload too large: ${bytes.length} bytes`);
  }

  const encoder = encoding.createEncoder();
  encoding.writeUint32BigEndian(encoder, bytes.length);
  encoding.writeUint8Array(encoder, bytes);
  return encoding.toUint8Array(encoder);
}

/**
 * Split raw command bytes into the pieces the server treats as commands
 */
export function splitCommandChunk(chunk: Uint8Array): string[] {
  const commands: string[] = [];
  for (let offset = 0; offset < chunk.length; offset += MAX_COMMAND_BYTES) {
    commands.push(utf8.decode(chunk.subarray(offset, offset + MAX_COMMAND_BYTES)));
  }
  return commands;
}

/**
 * Incremental decoder for a stream of length-prefixed frames.
 * Chunks may end anywhere: inside the header, inside a payload, or after
 * several frames.
 */
export class FrameReader {
  private pending: Uint8Array = new Uint8Array(0);

  push(chunk: Uint8Array): string[] {
    if (this.pending.length > 0) {
      const encoder = encoding.createEncoder();
      encoding.writeUint8Array(encoder, this.pending);
      encoding.writeUint8Array(encoder, chunk);
      this.pending = encoding.toUint8Array(encoder);
    } else {
      this.pending = chunk;
    }

    const frames: string[] = [];
    const decoder = decoding.createDecoder(this.pending);

    while (decoder.arr.length - decoder.pos >= FRAME_HEADER_BYTES) {
      const frameStart = decoder.pos;
      const length = decoding.readUint32BigEndian(decoder);

      if (decoder.arr.length - decoder.pos < length) {
        decoder.pos = frameStart;
        break;
      }

      frames.push(utf8.decode(decoding.readUint8Array(decoder, length)));
    }

    this.pending = this.pending.subarray(decoder.pos);
    return frames;
  }

  /**
   * True while bytes of an incomplete frame are buffered.
   * A peer closing in this state has truncated the stream.
   */
  get hasPartialFrame(): boolean {
    return this.pending.length > 0;
  }

  reset(): void {
    this.pending = new Uint8Array(0);
  }
}
