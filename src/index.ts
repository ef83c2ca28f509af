import type { Express } from 'express';
import { Client, type ClientOptions } from './client/Client';
import { RpcRuntimeError } from './protocol/errors';
import type { MethodRegistry } from './server/MethodRegistry';
import { Server, type ServerOptions } from './server/Server';
import {
  HttpClientTransport,
  HttpServerTransport,
  type HttpClientTransportOptions,
  type HttpServerTransportOptions,
} from './transport/HttpTransport';
import { StreamClientTransport, StreamServerTransport, type StreamTransportOptions } from './transport/StreamTransport';
import {
  WebSocketClientTransport,
  WebSocketServerTransport,
  type WebSocketClientTransportOptions,
  type WebSocketServerTransportOptions,
} from './transport/WebSocketTransport';

export * from './protocol/Envelope';
export * from './protocol/errors';
export { parseEnvelope, parseResponse, isValidId, type ParsedFrame } from './protocol/Parser';
export * from './server/params';
export * from './server/MethodRegistry';
export { Dispatcher, shapeResult, type DispatchOptions } from './server/Dispatcher';
export { Server, type ServerOptions } from './server/Server';
export { Client, Reply, type ClientOptions, type JoinOptions, type DecodingJoinOptions } from './client/Client';
export { PendingCall, type CallOutcome } from './client/PendingCall';
export * from './transport/Transport';
export { FrameQueue } from './transport/FrameQueue';
export * from './transport/HttpTransport';
export * from './transport/StreamTransport';
export * from './transport/WebSocketTransport';
export { loadConfig, type RuntimeConfig, DEFAULT_CALL_TIMEOUT_MS, DEFAULT_DISPATCH_TIMEOUT_MS } from './config';
export { default as Logger, LoggerClass, type LogLevel, type LogRecord } from './logger';
export { deriveSignal, TimeoutError, type DerivedSignal } from './shared/signals';

type RuntimeServerOptions = Pick<ServerOptions, 'timeoutMs' | 'signal'>;
type RuntimeClientOptions = Pick<ClientOptions, 'timeoutMs' | 'signal'>;

export interface ServeHttpOptions extends RuntimeServerOptions, HttpServerTransportOptions {}

/**
 * 処理名: serveHttp
 * 処理概要: express アプリケーションの背後でサーバを起動します。listen は呼び出し側で行います（`app.listen(port)`）。
 */
export function serveHttp(
  registry: MethodRegistry,
  options: ServeHttpOptions = {},
): { server: Server; transport: HttpServerTransport; app: Express } {
  const transport = new HttpServerTransport({ path: options.path, limit: options.limit });
  const server = new Server({ transport, registry, timeoutMs: options.timeoutMs, signal: options.signal }).start();
  return { server, transport, app: transport.app() };
}

export interface ConnectHttpOptions extends RuntimeClientOptions, HttpClientTransportOptions {}

/** HTTP バインディングのクライアントを作ります。1フレームにつき1回 POST します。 */
export function connectHttp(url: string, options: ConnectHttpOptions = {}): Client {
  const transport = new HttpClientTransport(url, { headers: options.headers, fetch: options.fetch });
  return new Client({ transport, timeoutMs: options.timeoutMs, signal: options.signal });
}

/**
 * 処理名: serveStream
 * 処理概要: `input` から1行ずつ要求を読み、`output` へ応答を書き出すサーバを起動します。
 */
export function serveStream(
  registry: MethodRegistry,
  streams: StreamTransportOptions,
  options: RuntimeServerOptions = {},
): { server: Server; transport: StreamServerTransport } {
  const transport = new StreamServerTransport(streams);
  const server = new Server({ transport, registry, timeoutMs: options.timeoutMs, signal: options.signal }).start();
  return { server, transport };
}

export function connectStream(streams: StreamTransportOptions, options: RuntimeClientOptions = {}): Client {
  const transport = new StreamClientTransport(streams);
  return new Client({ transport, timeoutMs: options.timeoutMs, signal: options.signal });
}

export interface ServeWebSocketOptions extends RuntimeServerOptions, WebSocketServerTransportOptions {}

/**
 * 処理名: serveWebSocket
 * 処理概要: WebSocket 接続を受け付けるサーバを起動します。`server` を渡すとその HTTP サーバの
 *          アップグレードを受け取り、渡さない場合は `transport.handleUpgrade` か `transport.accept` で接続を渡します。
 */
export function serveWebSocket(
  registry: MethodRegistry,
  options: ServeWebSocketOptions = {},
): { server: Server; transport: WebSocketServerTransport } {
  const transport = new WebSocketServerTransport({
    server: options.server,
    path: options.path,
    maxPayload: options.maxPayload,
  });
  const server = new Server({ transport, registry, timeoutMs: options.timeoutMs, signal: options.signal }).start();
  return { server, transport };
}

export interface ConnectWebSocketOptions extends RuntimeClientOptions, WebSocketClientTransportOptions {}

/**
 * 処理名: connectWebSocket
 * 処理概要: WebSocket 接続を開き、その上のクライアントを返します。ハンドシェイクの失敗は transport エラーで reject します。
 */
export async function connectWebSocket(url: string, options: ConnectWebSocketOptions = {}): Promise<Client> {
  let transport: WebSocketClientTransport;
  try {
    transport = await WebSocketClientTransport.connect(url, { headers: options.headers, maxPayload: options.maxPayload });
  } catch (err) {
    throw RpcRuntimeError.transport(err);
  }
  return new Client({ transport, timeoutMs: options.timeoutMs, signal: options.signal });
}
