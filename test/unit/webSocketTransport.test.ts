import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import WebSocket from 'ws';
import { Client } from '../../src/client/Client';
import { connectWebSocket } from '../../src/index';
import Logger from '../../src/logger';
import { ErrorKind } from '../../src/protocol/errors';
import type { ServerRequest } from '../../src/transport/Transport';
import { WebSocketClientTransport, WebSocketServerTransport } from '../../src/transport/WebSocketTransport';
import { FakeSocket, createSocketPair, flush } from '../helpers/transports';

async function nextRequest(transport: WebSocketServerTransport): Promise<ServerRequest> {
  const next = await transport.recv()[Symbol.asyncIterator]().next();
  if (next.done) throw new Error('transport closed');
  return next.value;
}

function warnings(): string[] {
  return Logger.getMemory()
    .filter((m) => m.level === 'warn')
    .map((m) => m.msg);
}

beforeEach(() => {
  Logger.enableMemoryHook();
});

afterEach(() => {
  Logger.disableMemoryHook();
});

describe('WebSocketServerTransport', () => {
  it('queues each text message with a writer bound to its own connection', async () => {
    const transport = new WebSocketServerTransport();
    const a = createSocketPair();
    const b = createSocketPair();
    transport.accept(a.server);
    transport.accept(b.server);
    expect(transport.connections).toBe(2);

    a.server.receive('{"jsonrpc":"2.0","method":"A","id":1}');
    b.server.receive('{"jsonrpc":"2.0","method":"B","id":1}');
    const first = await nextRequest(transport);
    const second = await nextRequest(transport);
    expect(first.frame.toString('utf8')).toBe('{"jsonrpc":"2.0","method":"A","id":1}');
    expect(second.frame.toString('utf8')).toBe('{"jsonrpc":"2.0","method":"B","id":1}');

    await second.respond(Buffer.from('{"jsonrpc":"2.0","result":"b","id":1}'));
    await first.respond(Buffer.from('{"jsonrpc":"2.0","result":"a","id":1}'));
    await first.respond(undefined);

    expect(a.server.sentText).toEqual(['{"jsonrpc":"2.0","result":"a","id":1}']);
    expect(b.server.sentText).toEqual(['{"jsonrpc":"2.0","result":"b","id":1}']);
    await transport.close();
  });

  it('skips binary messages', async () => {
    const transport = new WebSocketServerTransport();
    const pair = createSocketPair();
    transport.accept(pair.server);

    pair.server.receive('not text', true);
    pair.server.receive('{"jsonrpc":"2.0","method":"A"}');

    const request = await nextRequest(transport);
    expect(request.frame.toString('utf8')).toBe('{"jsonrpc":"2.0","method":"A"}');
    expect(warnings()).toEqual(['[JSONRPC Transport] websocket server: skipped binary message']);
    await transport.close();
  });

  it('rejects a response once its connection has gone away', async () => {
    const transport = new WebSocketServerTransport();
    const pair = createSocketPair();
    transport.accept(pair.server);
    pair.server.receive('{"jsonrpc":"2.0","method":"A","id":1}');
    const request = await nextRequest(transport);

    pair.client.close(1000);
    await flush();
    await flush();

    expect(transport.connections).toBe(0);
    await expect(request.respond(Buffer.from('{"jsonrpc":"2.0","result":1,"id":1}'))).rejects.toThrow(
      'socket is not open',
    );
    await transport.close();
  });

  it('closes open connections with 1001, ends iteration and turns away later sockets', async () => {
    const transport = new WebSocketServerTransport();
    const pair = createSocketPair();
    transport.accept(pair.server);
    const next = transport.recv()[Symbol.asyncIterator]().next();

    await transport.close();
    await expect(next).resolves.toEqual({ value: undefined, done: true });
    expect(pair.server.closeCode).toBe(1001);
    expect(transport.connections).toBe(0);

    const late = createSocketPair();
    transport.accept(late.server);
    expect(late.server.closeCode).toBe(1001);
    expect(transport.connections).toBe(0);
  });

  it('logs connection errors', async () => {
    const transport = new WebSocketServerTransport();
    const pair = createSocketPair();
    transport.accept(pair.server);
    pair.server.emit('error', new Error('ECONNRESET'));
    expect(Logger.getMemory().find((m) => m.level === 'warn')?.extra).toEqual({ err: 'ECONNRESET' });
    await transport.close();
  });
});

describe('WebSocketClientTransport', () => {
  it('sends frames as text and reads text messages until the connection closes', async () => {
    const pair = createSocketPair();
    const transport = new WebSocketClientTransport(pair.client);

    await transport.send(Buffer.from('{"jsonrpc":"2.0","method":"A","id":1}'));
    expect(pair.client.sentText).toEqual(['{"jsonrpc":"2.0","method":"A","id":1}']);

    pair.client.receive('{"jsonrpc":"2.0","result":1,"id":1}');
    pair.client.receive('AAEC', true);
    pair.server.close(1000);

    const frames: string[] = [];
    for await (const frame of transport.recv()) frames.push(frame.toString('utf8'));
    expect(frames).toEqual(['{"jsonrpc":"2.0","result":1,"id":1}']);
    expect(warnings()).toEqual(['[JSONRPC Transport] websocket client: skipped binary message']);

    await expect(transport.send(Buffer.from('{}'))).rejects.toThrow('transport closed');
  });

  it('refuses to send on a socket that is not open and closes it with 1000', async () => {
    const socket = new FakeSocket();
    socket.readyState = WebSocket.CONNECTING;
    const transport = new WebSocketClientTransport(socket);

    await expect(transport.send(Buffer.from('{}'))).rejects.toThrow('socket is not open');
    await transport.close();
    expect(socket.closeCode).toBe(1000);
  });

  it('rejects a send whose signal already aborted', async () => {
    const pair = createSocketPair();
    const transport = new WebSocketClientTransport(pair.client);
    const controller = new AbortController();
    controller.abort(new Error('caller gave up'));

    await expect(transport.send(Buffer.from('{}'), controller.signal)).rejects.toThrow('caller gave up');
    expect(pair.client.sentText).toEqual([]);
    await transport.close();
  });

  it('closes the client and fails pending calls when the peer goes away', async () => {
    const pair = createSocketPair();
    const client = new Client({ transport: new WebSocketClientTransport(pair.client), timeoutMs: 5000 });
    const joined = client.call('Slow').join();
    await flush();
    expect(pair.client.sentText).toEqual(['{"jsonrpc":"2.0","method":"Slow","params":[],"id":1}']);

    pair.server.close(1006);
    await client.closed;

    expect(client.isClosed).toBe(true);
    await expect(joined).rejects.toMatchObject({ kind: ErrorKind.Closed, message: 'cancel RPC 1 (Slow) by closing client' });
  });

  it('reports a connection that cannot be opened as a transport error', async () => {
    const err = await connectWebSocket('not a url').then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toMatchObject({ kind: ErrorKind.Transport });
    expect(err).toBeInstanceOf(Error);
    expect(err instanceof Error ? err.message : '').toMatch(/^transport error: /);
  });
});
