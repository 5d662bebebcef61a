import WebSocket from 'ws';
import { PebbleConnectionError } from './errors.js';

const END_OF_STREAM = JSON.stringify({ command: 'end' });

export interface TaskWebSocket {
  readonly opened: Promise<void>;
  /** Everything received as binary frames until the end-of-stream marker or close. */
  readonly output: Promise<Buffer>;
  /** Tell the task there is no more input on this stream. */
  endInput(): void;
  close(): void;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

function isEndOfStream(text: string): boolean {
  try {
    const message: unknown = JSON.parse(text);
    return (
      typeof message === 'object' &&
      message !== null &&
      'command' in message &&
      message.command === 'end'
    );
  } catch {
    return false;
  }
}

/**
 * Connects to one of an exec task's websockets. Frames are collected from the
 * moment the socket is created so output sent right after the upgrade is kept.
 */
export function connectTaskWebSocket(url: string): TaskWebSocket {
  const ws = new WebSocket(url);
  const chunks: Buffer[] = [];

  const opened = new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.on('error', (error) => {
      reject(new PebbleConnectionError(`Cannot open task websocket ${url}: ${error.message}`, error));
    });
  });

  const output = new Promise<Buffer>((resolve) => {
    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        chunks.push(toBuffer(data));
        return;
      }
      if (isEndOfStream(toBuffer(data).toString('utf8'))) {
        resolve(Buffer.concat(chunks));
      }
    });
    ws.once('close', () => resolve(Buffer.concat(chunks)));
  });

  return {
    opened,
    output,
    endInput() {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(END_OF_STREAM);
      }
    },
    close() {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close();
      }
    },
  };
}
