import { PassThrough, Writable } from 'node:stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { DapTransport, FrameDecoder, encodeMessage } from '../../src/dap/transport.js';
import type { Frame, IncomingMessage } from '../../src/dap/transport.js';
import type { Event, Request } from '../../src/dap/protocol.js';

function frame(message: object): Buffer {
  const json = JSON.stringify(message);
  return Buffer.from(`Content-Length: ${Buffer.byteLength(json, 'utf-8')}\r\n\r\n${json}`);
}

function rawFrame(body: string): Buffer {
  return Buffer.from(`Content-Length: ${Buffer.byteLength(body, 'utf-8')}\r\n\r\n${body}`);
}

const stoppedEvent: Event = { seq: 4, type: 'event', event: 'stopped', body: { reason: 'exception', threadId: 1 } };

function messages(frames: Frame[]): IncomingMessage[] {
  return frames.flatMap((f) => (f.ok ? [f.message] : []));
}

describe('FrameDecoder', () => {
  it('decodes every message in a chunk', () => {
    const decoder = new FrameDecoder();
    const output: Event = { seq: 5, type: 'event', event: 'output', body: { output: 'hi\n' } };

    const frames = decoder.push(Buffer.concat([frame(stoppedEvent), frame(output)]));

    expect(messages(frames)).toEqual([stoppedEvent, output]);
  });

  it('waits for the rest of a body split inside a multi-byte character', () => {
    const decoder = new FrameDecoder();
    const event: Event = { seq: 1, type: 'event', event: 'output', body: { output: 'résumé' } };
    const bytes = frame(event);
    const cut = bytes.indexOf(Buffer.from('é')) + 1;

    expect(decoder.push(bytes.subarray(0, cut))).toEqual([]);
    expect(messages(decoder.push(bytes.subarray(cut)))).toEqual([event]);
  });

  it('skips an unparseable body and keeps decoding', () => {
    const decoder = new FrameDecoder();

    const frames = decoder.push(Buffer.concat([rawFrame('{oops'), frame(stoppedEvent)]));

    expect(frames).toEqual([
      { ok: false, raw: '{oops' },
      { ok: true, message: stoppedEvent },
    ]);
  });

  it('rejects JSON that is not a protocol message', () => {
    const decoder = new FrameDecoder();

    expect(decoder.push(rawFrame('{"type":"event"}'))).toEqual([{ ok: false, raw: '{"type":"event"}' }]);
    expect(decoder.push(rawFrame('[1,2]'))).toEqual([{ ok: false, raw: '[1,2]' }]);
  });

  it('drops a header without a length', () => {
    const decoder = new FrameDecoder();

    const frames = decoder.push(Buffer.concat([Buffer.from('X-Trace: on\r\n\r\n'), frame(stoppedEvent)]));

    expect(frames).toEqual([
      { ok: false, raw: 'X-Trace: on' },
      { ok: true, message: stoppedEvent },
    ]);
  });

  it('reads back what encodeMessage writes', () => {
    const request: Request = { seq: 9, type: 'request', command: 'evaluate', arguments: { expression: 'naïve' } };

    expect(messages(new FrameDecoder().push(Buffer.from(encodeMessage(request))))).toEqual([request]);
  });
});

function setup(requestTimeout?: number) {
  const input = new PassThrough();
  const errors = new PassThrough();
  const written: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
  const transport = new DapTransport({ input, output, errors }, requestTimeout);
  const sent = (): IncomingMessage[] => messages(new FrameDecoder().push(Buffer.from(written.join(''))));
  return { input, errors, transport, sent };
}

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('DapTransport', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves a request with the body of its response', async () => {
    const { input, transport, sent } = setup();

    const pending = transport.request('stackTrace', { threadId: 1 });
    expect(sent()).toEqual([{ seq: 1, type: 'request', command: 'stackTrace', arguments: { threadId: 1 } }]);

    input.write(frame({ seq: 2, type: 'response', request_seq: 1, command: 'stackTrace', success: true, body: { stackFrames: [] } }));

    await expect(pending).resolves.toEqual({ stackFrames: [] });
  });

  it('rejects with the message of a failed response', async () => {
    const { input, transport } = setup();

    const pending = transport.request('evaluate', { expression: 'total' });
    input.write(frame({ seq: 2, type: 'response', request_seq: 1, command: 'evaluate', success: false, message: "name 'total' is not defined" }));

    await expect(pending).rejects.toThrow("name 'total' is not defined");
  });

  it('gives up on a request after the timeout', async () => {
    vi.useFakeTimers();
    const { transport } = setup(1000);

    const assertion = expect(transport.request('scopes', { frameId: 1 })).rejects.toThrow(
      "Request 'scopes' timed out after 1000ms"
    );
    vi.advanceTimersByTime(1000);

    await assertion;
  });

  it('reports a malformed frame and still delivers the event behind it', async () => {
    const { input, transport } = setup();
    const malformed: string[] = [];
    const events: Event[] = [];
    transport.on('malformed', (raw: string) => malformed.push(raw));
    transport.on('event', (event: Event) => events.push(event));

    input.write(Buffer.concat([rawFrame('not json'), frame(stoppedEvent)]));
    await flush();

    expect(malformed).toEqual(['not json']);
    expect(events).toEqual([stoppedEvent]);
  });

  it('declines reverse requests with a failed response', async () => {
    const { input, transport, sent } = setup();
    const reverse: Request[] = [];
    transport.on('reverseRequest', (request: Request) => reverse.push(request));

    input.write(frame({ seq: 7, type: 'request', command: 'runInTerminal', arguments: { args: ['python3'] } }));
    await flush();

    expect(reverse.map((r) => r.command)).toEqual(['runInTerminal']);
    expect(sent()).toEqual([
      {
        seq: 1,
        type: 'response',
        request_seq: 7,
        command: 'runInTerminal',
        success: false,
        message: "'runInTerminal' is not supported",
      },
    ]);
  });

  it('fails waiting requests on close and refuses new ones', async () => {
    const { transport, sent } = setup();

    const pending = transport.request('continue', { threadId: 1 });
    transport.close(new Error('Debug adapter exited (code 1, signal null)'));

    await expect(pending).rejects.toThrow('Debug adapter exited (code 1, signal null)');
    await expect(transport.request('next', { threadId: 1 })).rejects.toThrow(
      "Cannot send 'next': transport is closed"
    );
    expect(transport.isOpen()).toBe(false);
    expect(sent()).toHaveLength(1);
  });

  it('forwards adapter stderr', async () => {
    const { errors, transport } = setup();
    const lines: string[] = [];
    transport.on('stderr', (text: string) => lines.push(text));

    errors.write('debugpy: listening\n');
    await flush();

    expect(lines).toEqual(['debugpy: listening\n']);
  });
});
