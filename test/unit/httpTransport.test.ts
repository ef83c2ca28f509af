import { describe, expect, it } from '@jest/globals';
import { Readable } from 'stream';
import Logger from '../../src/logger';
import { HttpClientTransport, HttpServerTransport, HttpStatusError, type IncomingBody } from '../../src/transport/HttpTransport';
import type { ServerRequest } from '../../src/transport/Transport';
import { RecordingReply, parsedBody } from '../helpers/transports';

async function nextRequest(transport: HttpServerTransport): Promise<ServerRequest> {
  const next = await transport.recv()[Symbol.asyncIterator]().next();
  if (next.done) throw new Error('transport closed');
  return next.value;
}

describe('HttpServerTransport', () => {
  it('queues the body as one frame and writes the response as JSON', async () => {
    const transport = new HttpServerTransport();
    const reply = new RecordingReply();
    await transport.handle(parsedBody('{"jsonrpc":"2.0","method":"A","id":1}'), reply);
    expect(transport.openExchanges).toBe(1);

    const request = await nextRequest(transport);
    expect(request.frame.toString('utf8')).toBe('{"jsonrpc":"2.0","method":"A","id":1}');
    await request.respond(Buffer.from('{"jsonrpc":"2.0","result":1,"id":1}'));

    expect(reply.statusCode).toBe(200);
    expect(reply.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(reply.body).toBe('{"jsonrpc":"2.0","result":1,"id":1}');
    expect(transport.openExchanges).toBe(0);
  });

  it('reads the request stream when no body parser ran', async () => {
    const transport = new HttpServerTransport();
    const reply = new RecordingReply();
    await transport.handle(Readable.from([Buffer.from('{"jsonrpc":'), Buffer.from('"2.0"}')]), reply);
    const request = await nextRequest(transport);
    expect(request.frame.toString('utf8')).toBe('{"jsonrpc":"2.0"}');
    await transport.close();
  });

  it('answers 204 when there is nothing to send', async () => {
    const transport = new HttpServerTransport();
    const reply = new RecordingReply();
    await transport.handle(parsedBody('{"jsonrpc":"2.0","method":"Ping"}'), reply);
    await (await nextRequest(transport)).respond(undefined);
    expect(reply.statusCode).toBe(204);
    expect(reply.ended).toBe(true);
    expect(reply.body).toBeUndefined();
  });

  it('rejects empty and unreadable bodies with 400', async () => {
    const transport = new HttpServerTransport();
    const empty = new RecordingReply();
    await transport.handle(parsedBody(''), empty);
    expect(empty.statusCode).toBe(400);
    expect(empty.body).toEqual({ error: 'empty request body' });

    Logger.enableMemoryHook();
    const broken: IncomingBody = {
      async *[Symbol.asyncIterator]() {
        throw new Error('connection aborted');
      },
    };
    const unreadable = new RecordingReply();
    await transport.handle(broken, unreadable);
    expect(unreadable.statusCode).toBe(400);
    expect(unreadable.body).toEqual({ error: 'unreadable request body' });
    expect(Logger.getMemory().map((m) => m.msg)).toEqual(['[JSONRPC Transport] unreadable request body']);
    Logger.disableMemoryHook();
    expect(transport.openExchanges).toBe(0);
  });

  it('answers open exchanges and later requests with 503 after close', async () => {
    const transport = new HttpServerTransport();
    const open = new RecordingReply();
    await transport.handle(parsedBody('{"jsonrpc":"2.0","method":"Slow","id":1}'), open);

    await transport.close();
    expect(open.statusCode).toBe(503);
    expect(open.body).toEqual({ error: 'transport closed' });

    const late = new RecordingReply();
    await transport.handle(parsedBody('{"jsonrpc":"2.0","method":"A","id":2}'), late);
    expect(late.statusCode).toBe(503);
    expect(transport.openExchanges).toBe(0);
  });

  it('builds an express application', () => {
    const app = new HttpServerTransport({ path: '/rpc' }).app();
    expect(typeof app.listen).toBe('function');
  });
});

describe('HttpClientTransport', () => {
  function fakeFetch(response: () => Response) {
    const calls: { url: string; init?: RequestInit }[] = [];
    const fn: typeof fetch = async (input, init) => {
      calls.push({ url: typeof input === 'string' ? input : String(input), init });
      return response();
    };
    return { calls, fn };
  }

  it('POSTs each frame and queues the response body', async () => {
    const { calls, fn } = fakeFetch(() => new Response('{"jsonrpc":"2.0","result":1,"id":1}', { status: 200 }));
    const transport = new HttpClientTransport('http://rpc.test/rpc', {
      headers: { Authorization: 'Bearer test-secret' },
      fetch: fn,
    });

    await transport.send(Buffer.from('{"jsonrpc":"2.0","method":"A","id":1}'));
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://rpc.test/rpc');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('{"jsonrpc":"2.0","method":"A","id":1}');
    expect(calls[0].init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
      Accept: 'application/json',
    });

    await transport.close();
    const frames: string[] = [];
    for await (const frame of transport.recv()) frames.push(frame.toString('utf8'));
    expect(frames).toEqual(['{"jsonrpc":"2.0","result":1,"id":1}']);
  });

  it('queues nothing for an empty body', async () => {
    const { fn } = fakeFetch(() => new Response(null, { status: 204 }));
    const transport = new HttpClientTransport('http://rpc.test/', { fetch: fn });
    await transport.send(Buffer.from('{"jsonrpc":"2.0","method":"Ping"}'));
    await transport.close();
    const frames: Buffer[] = [];
    for await (const frame of transport.recv()) frames.push(frame);
    expect(frames).toEqual([]);
  });

  it('turns a non-2xx status into an HttpStatusError', async () => {
    const { fn } = fakeFetch(() => new Response('', { status: 500, statusText: 'Internal Server Error' }));
    const transport = new HttpClientTransport('http://rpc.test/', { fetch: fn });
    const sending = transport.send(Buffer.from('{}'));
    await expect(sending).rejects.toBeInstanceOf(HttpStatusError);
    await expect(sending).rejects.toThrow('unexpected HTTP status 500 Internal Server Error');
  });

  it('refuses to send after close', async () => {
    const { calls, fn } = fakeFetch(() => new Response(null, { status: 204 }));
    const transport = new HttpClientTransport('http://rpc.test/', { fetch: fn });
    await transport.close();
    await expect(transport.send(Buffer.from('{}'))).rejects.toThrow('transport closed');
    expect(calls).toHaveLength(0);
  });
});
