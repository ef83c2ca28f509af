import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { RpcError } from '../../src/protocol/errors';
import { Dispatcher } from '../../src/server/Dispatcher';
import { MethodRegistry, type CallContext } from '../../src/server/MethodRegistry';
import { optional, param } from '../../src/server/params';
import { decode } from '../helpers/transports';

function request(method: string, params: unknown[] | undefined, id: unknown = 1): string {
  return JSON.stringify({ jsonrpc: '2.0', method, params, id });
}

async function dispatchText(dispatcher: Dispatcher, frame: string): Promise<string | undefined> {
  const out = await dispatcher.dispatch(frame);
  return out?.toString('utf8');
}

describe('Dispatcher', () => {
  let registry: MethodRegistry;
  let dispatcher: Dispatcher;
  let pinged: jest.Mock<(value: string) => void>;
  let lastContext: CallContext | undefined;

  beforeEach(() => {
    pinged = jest.fn<(value: string) => void>();
    lastContext = undefined;
    registry = new MethodRegistry()
      .register({ name: 'SayHello', params: [param.string('name')], handler: (name) => name })
      .register({
        name: 'ErrorCall',
        params: [],
        handler: () => {
          throw new Error('error call');
        },
      })
      .register({
        name: 'Rejecting',
        params: [],
        handler: async () => {
          throw new RpcError(-32042, 'quota exceeded', { retryAfter: 5 });
        },
      })
      .register({
        name: 'Ping',
        params: [param.string('value')],
        handler: (value) => {
          pinged(value);
        },
      })
      .register({
        name: 'Divmod',
        params: [param.integer('a'), param.integer('b')],
        results: ['quotient', 'remainder'],
        handler: (a, b) => [Math.floor(a / b), a % b],
      })
      .register({ name: 'Short', params: [], results: ['a', 'b'], handler: () => [1] })
      .register({ name: 'Nothing', params: [], results: [], handler: () => 'ignored' })
      .register({ name: 'Void', params: [], handler: () => undefined })
      .register({
        name: 'Context',
        params: [optional(param.string('tag'))],
        handler: (tag, context) => {
          lastContext = context;
          return tag ?? 'none';
        },
      })
      .register({
        name: 'Cyclic',
        params: [],
        handler: () => {
          const value: Record<string, unknown> = {};
          value.self = value;
          return value;
        },
      });
    dispatcher = new Dispatcher(registry);
  });

  it('answers a request with the handler result', async () => {
    await expect(dispatchText(dispatcher, request('SayHello', ['Hello']))).resolves.toBe('{"jsonrpc":"2.0","result":"Hello","id":1}');
  });

  it('echoes string and null ids unchanged', async () => {
    expect(decode(await dispatcher.dispatch(request('SayHello', ['a'], 'abc-1')))).toEqual({ jsonrpc: '2.0', result: 'a', id: 'abc-1' });
    expect(decode(await dispatcher.dispatch(request('SayHello', ['b'], null)))).toEqual({ jsonrpc: '2.0', result: 'b', id: null });
  });

  it('answers an unknown method with MethodNotFound', async () => {
    expect(decode(await dispatcher.dispatch(request('Missing', [], 7)))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32601, message: 'Method not found: Missing' },
      id: 7,
    });
  });

  it('maps a thrown error to ServerError with the message verbatim', async () => {
    expect(decode(await dispatcher.dispatch(request('ErrorCall', [])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'error call' },
      id: 1,
    });
  });

  it('keeps the code, message and data of a thrown RpcError', async () => {
    expect(decode(await dispatcher.dispatch(request('Rejecting', [])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32042, message: 'quota exceeded', data: { retryAfter: 5 } },
      id: 1,
    });
  });

  it('answers binding failures with InvalidParams', async () => {
    expect(decode(await dispatcher.dispatch(request('SayHello', [])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32602, message: 'missing value for required argument 0' },
      id: 1,
    });
    expect(decode(await dispatcher.dispatch(request('SayHello', ['a', 'b'])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32602, message: 'too many arguments, want at most 1' },
      id: 1,
    });
    expect(decode(await dispatcher.dispatch(request('SayHello', [5])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32602, message: 'invalid argument 0: expected string, got number' },
      id: 1,
    });
  });

  it('answers an invalid request envelope with InvalidRequest', async () => {
    await expect(dispatchText(dispatcher, '{"jsonrpc":"2.0","id":5}')).resolves.toBe(
      '{"jsonrpc":"2.0","error":{"code":-32600,"message":"Invalid Request","data":"missing method"},"id":5}',
    );
    expect(decode(await dispatcher.dispatch('{"jsonrpc":"2.0","method":"SayHello","id":[1]}'))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32600, message: 'Invalid Request', data: 'invalid id' },
      id: null,
    });
  });

  it('runs notifications without producing bytes', async () => {
    await expect(dispatcher.dispatch('{"jsonrpc":"2.0","method":"Ping","params":["pong"]}')).resolves.toBeUndefined();
    expect(pinged).toHaveBeenCalledWith('pong');
    await expect(dispatcher.dispatch('{"jsonrpc":"2.0","method":"ErrorCall"}')).resolves.toBeUndefined();
    await expect(dispatcher.dispatch('{"jsonrpc":"2.0","method":"Missing"}')).resolves.toBeUndefined();
    await expect(dispatcher.dispatch('{"jsonrpc":"2.0","method":"Ping","params":[]}')).resolves.toBeUndefined();
    expect(pinged).toHaveBeenCalledTimes(1);
  });

  it('drops frames that are not envelopes', async () => {
    await expect(dispatcher.dispatch('not json')).resolves.toBeUndefined();
    await expect(dispatcher.dispatch('[1,2]')).resolves.toBeUndefined();
    await expect(dispatcher.dispatch('"hello"')).resolves.toBeUndefined();
    await expect(dispatcher.dispatch('{"jsonrpc":"2.0","params":[]}')).resolves.toBeUndefined();
  });

  it('emits several outputs as an ordered list', async () => {
    expect(decode(await dispatcher.dispatch(request('Divmod', [7, 2])))).toEqual({ jsonrpc: '2.0', result: [3, 1], id: 1 });
    expect(decode(await dispatcher.dispatch(request('Short', [])))).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'method Short must return 2 results' },
      id: 1,
    });
  });

  it('always carries a result key on success', async () => {
    await expect(dispatchText(dispatcher, request('Nothing', []))).resolves.toBe('{"jsonrpc":"2.0","result":null,"id":1}');
    await expect(dispatchText(dispatcher, request('Void', []))).resolves.toBe('{"jsonrpc":"2.0","result":null,"id":1}');
  });

  it('passes a call context after the bound arguments', async () => {
    const controller = new AbortController();
    const out = await dispatcher.dispatch(request('Context', [null], 'ctx'), { signal: controller.signal, correlationId: 'cid-7' });
    expect(decode(out)).toEqual({ jsonrpc: '2.0', result: 'none', id: 'ctx' });
    expect(lastContext?.method).toBe('Context');
    expect(lastContext?.id).toBe('ctx');
    expect(lastContext?.correlationId).toBe('cid-7');
    expect(lastContext?.signal).toBe(controller.signal);
  });

  it('reports results JSON cannot carry as InternalError', async () => {
    const response = decode(await dispatcher.dispatch(request('Cyclic', [], 3)));
    expect(response).toEqual({
      jsonrpc: '2.0',
      error: { code: -32603, message: expect.stringMatching(/^marshal result error: Converting circular structure to JSON/) },
      id: 3,
    });
  });

  it('builds one call site when many first calls race', async () => {
    const frames = Array.from({ length: 20 }, (_, i) => request('SayHello', [`n${i}`], i));
    const responses = await Promise.all(frames.map((frame) => dispatcher.dispatch(frame)));
    expect(registry.callSiteCount).toBe(1);
    expect(responses.map((r) => decode(r))).toEqual(frames.map((_, i) => ({ jsonrpc: '2.0', result: `n${i}`, id: i })));
  });
});
