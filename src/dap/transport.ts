/**
 * DAP Transport
 *
 * Content-Length framed JSON over a pair of streams (the adapter's stdout and stdin).
 * Responses are matched to requests by sequence number. The transport does not own
 * the adapter process; the client closes it when the process goes away.
 */

import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { Event, ProtocolMessage, Request, Response } from './protocol.js';

export type IncomingMessage = Request | Response | Event;

/** One frame taken off the wire: a message, or the raw text of an unusable frame */
export type Frame = { ok: true; message: IncomingMessage } | { ok: false; raw: string };

const SEPARATOR = '\r\n\r\n';
const LENGTH_PATTERN = /Content-Length:\s*(\d+)/i;

/**
 * Incremental frame decoder. Bytes may arrive split anywhere, including inside a
 * multi-byte character; lengths are counted in bytes.
 */
export class FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);

  /** Add bytes; returns every frame they complete, in order */
  push(chunk: Buffer): Frame[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    const frames: Frame[] = [];
    for (;;) {
      const headerEnd = this.pending.indexOf(SEPARATOR);
      if (headerEnd < 0) break;

      const header = this.pending.toString('utf-8', 0, headerEnd);
      const bodyStart = headerEnd + SEPARATOR.length;
      const length = LENGTH_PATTERN.exec(header);
      if (!length) {
        this.pending = this.pending.subarray(bodyStart);
        frames.push({ ok: false, raw: header });
        continue;
      }

      const bodyEnd = bodyStart + Number(length[1]);
      if (this.pending.length < bodyEnd) break;

      const body = this.pending.toString('utf-8', bodyStart, bodyEnd);
      this.pending = this.pending.subarray(bodyEnd);
      frames.push(decodeBody(body));
    }
    return frames;
  }
}

function decodeBody(body: string): Frame {
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    return { ok: false, raw: body };
  }
  return isIncomingMessage(value) ? { ok: true, message: value } : { ok: false, raw: body };
}

function isIncomingMessage(value: unknown): value is IncomingMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('seq' in value) || typeof value.seq !== 'number' || !('type' in value)) return false;
  return value.type === 'request' || value.type === 'response' || value.type === 'event';
}

/** Encode one message for the wire */
export function encodeMessage(message: ProtocolMessage): string {
  const json = JSON.stringify(message);
  return `Content-Length: ${Buffer.byteLength(json, 'utf-8')}${SEPARATOR}${json}`;
}

export interface TransportStreams {
  /** What the adapter writes (its stdout) */
  input: Readable;
  /** What the adapter reads (its stdin) */
  output: Writable;
  /** Adapter diagnostics (its stderr) */
  errors?: Readable | null;
}

interface Waiter {
  timer: NodeJS.Timeout;
  settle: (error: Error | null, response?: Response) => void;
}

/**
 * Events: 'event' (Event), 'malformed' (raw frame text), 'reverseRequest' (Request),
 * 'stderr' (string).
 */
export class DapTransport extends EventEmitter {
  private streams: TransportStreams;
  private decoder = new FrameDecoder();
  private waiters = new Map<number, Waiter>();
  private nextSeq = 1;
  private requestTimeout: number;
  private open = true;

  constructor(streams: TransportStreams, requestTimeout = 30000) {
    super();
    this.streams = streams;
    this.requestTimeout = requestTimeout;

    streams.input.on('data', (chunk: Buffer) => {
      for (const frame of this.decoder.push(chunk)) {
        if (frame.ok) {
          this.dispatch(frame.message);
        } else {
          this.emit('malformed', frame.raw);
        }
      }
    });
    streams.errors?.on('data', (chunk: Buffer) => this.emit('stderr', chunk.toString()));
  }

  /**
   * Send a request; resolves with the response body, rejects with the adapter's
   * message on failure or after the request timeout.
   */
  request<T>(command: string, args?: unknown): Promise<T> {
    if (!this.open) {
      return Promise.reject(new Error(`Cannot send '${command}': transport is closed`));
    }

    const seq = this.nextSeq++;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(seq);
        reject(new Error(`Request '${command}' timed out after ${this.requestTimeout}ms`));
      }, this.requestTimeout);

      this.waiters.set(seq, {
        timer,
        settle: (error, response) => {
          clearTimeout(timer);
          if (error) {
            reject(error);
          } else if (response?.success) {
            resolve(response.body as T);
          } else {
            reject(new Error(response?.message || `Request '${command}' failed`));
          }
        },
      });

      this.write({ seq, type: 'request', command, arguments: args } satisfies Request);
    });
  }

  /**
   * Stop sending and fail every request still waiting for an answer.
   */
  close(reason: Error = new Error('Transport closed')): void {
    if (!this.open) return;
    this.open = false;
    for (const waiter of this.waiters.values()) {
      waiter.settle(reason);
    }
    this.waiters.clear();
  }

  isOpen(): boolean {
    return this.open;
  }

  private write(message: Request | Response): void {
    if (!this.open || !this.streams.output.writable) return;
    this.streams.output.write(encodeMessage(message));
  }

  private dispatch(message: IncomingMessage): void {
    switch (message.type) {
      case 'response': {
        const waiter = this.waiters.get(message.request_seq);
        if (waiter) {
          this.waiters.delete(message.request_seq);
          waiter.settle(null, message);
        }
        break;
      }
      case 'event':
        this.emit('event', message);
        break;
      case 'request':
        this.emit('reverseRequest', message);
        // runInTerminal and friends are declined so the adapter does not wait on us
        this.write({
          seq: this.nextSeq++,
          type: 'response',
          request_seq: message.seq,
          command: message.command,
          success: false,
          message: `'${message.command}' is not supported`,
        } satisfies Response);
        break;
    }
  }
}
