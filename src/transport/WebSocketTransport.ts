import type { IncomingMessage, Server as HttpServer } from 'http';
import type { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import Logger, { errExtra } from '../logger';
import { frameToString, type Frame } from '../protocol/Envelope';
import { FrameQueue } from './FrameQueue';
import type { ClientTransport, ResponseWriter, ServerRequest, ServerTransport } from './Transport';

/** The parts of a `ws` socket the transports use. */
export interface MessageSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * 処理名: テキストフレーム送信
 * 処理概要: フレームを1つのテキストメッセージとして送信し、ws の送信コールバックで完了を返します。
 * 実装理由: 閉じかけたソケットへの送信を即座に失敗させ、呼び出し側がタイムアウトまで待たないようにする為です。
 */
function sendText(socket: MessageSocket, frame: Frame, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    if (socket.readyState !== WebSocket.OPEN) {
      reject(new Error('socket is not open'));
      return;
    }
    socket.send(frameToString(frame), (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export interface WebSocketServerTransportOptions {
  /** HTTP server to take upgrades from. Without it, call {@link WebSocketServerTransport.handleUpgrade}. */
  server?: HttpServer;
  /** Only upgrades on this path are accepted when `server` is given. */
  path?: string;
  /** Largest accepted message in bytes (ws default: 100 MiB). */
  maxPayload?: number;
}

/**
 * 処理名: WebSocket サーバトランスポート
 * 処理概要: 各接続のテキストメッセージを1フレームとして受信キューへ積みます。respond は接続ごとに1つで、
 *          応答はその接続へ書き戻され、RPC id だけで対応付けられます。バイナリメッセージは破棄します。
 * 実装理由: 1本の接続で並行する要求の応答を完了順に返しつつ、複数接続の応答が混ざらないようにする為です。
 */
export class WebSocketServerTransport implements ServerTransport {
  private readonly queue = new FrameQueue<ServerRequest>();
  private readonly sockets = new Set<MessageSocket>();
  private readonly wss: WebSocketServer;

  constructor(options: WebSocketServerTransportOptions = {}) {
    this.wss = options.server
      ? new WebSocketServer({ server: options.server, path: options.path, maxPayload: options.maxPayload })
      : new WebSocketServer({ noServer: true, maxPayload: options.maxPayload });
    this.wss.on('connection', (socket) => this.accept(socket));
    this.wss.on('error', (err) => Logger.warn('[JSONRPC Transport] websocket server error', null, errExtra(err)));
  }

  get connections(): number {
    return this.sockets.size;
  }

  /**
   * 処理名: handleUpgrade（アップグレード処理）
   * 処理概要: HTTP サーバの 'upgrade' イベントから渡された接続を WebSocket に昇格させて受け入れます。
   *          クローズ後の接続は破棄します。
   */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.queue.isClosed) {
      socket.destroy();
      return;
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => this.wss.emit('connection', ws, req));
  }

  /**
   * 処理名: accept（接続受け入れ）
   * 処理概要: 確立済みのソケットを登録し、メッセージ・エラー・クローズを購読します。
   *          クローズ後に渡されたソケットは 1001 で閉じます。
   */
  accept(socket: MessageSocket): void {
    if (this.queue.isClosed) {
      socket.close(1001, 'transport closed');
      return;
    }
    this.sockets.add(socket);
    const respond: ResponseWriter = async (frame) => {
      if (frame === undefined) return;
      await sendText(socket, frame);
    };
    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        Logger.warn('[JSONRPC Transport] websocket server: skipped binary message');
        return;
      }
      if (!this.queue.push({ frame: toBuffer(data), respond })) {
        Logger.debug('[JSONRPC Transport] websocket server: dropped message after close');
      }
    });
    socket.on('error', (err) => {
      Logger.warn('[JSONRPC Transport] websocket server: connection error', null, errExtra(err));
    });
    socket.on('close', (code) => {
      this.sockets.delete(socket);
      Logger.info('[JSONRPC Transport] websocket server: connection closed', null, { code });
    });
    Logger.info('[JSONRPC Transport] websocket server: connection opened', null, { connections: this.sockets.size });
  }

  recv(): AsyncIterable<ServerRequest> {
    return this.queue;
  }

  /**
   * 処理名: close（トランスポート終了）
   * 処理概要: 受信キューを閉じ、開いている接続を 1001 (going away) で閉じてから WebSocket サーバを停止します。
   */
  async close(): Promise<void> {
    if (this.queue.isClosed) return;
    this.queue.close();
    const open = Array.from(this.sockets);
    this.sockets.clear();
    for (const socket of open) socket.close(1001, 'server closing');
    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });
    Logger.info('[JSONRPC Transport] websocket transport closed', null, { closed: open.length });
  }
}

export interface WebSocketClientTransportOptions {
  /** Extra headers sent with the opening handshake. */
  headers?: Record<string, string>;
  maxPayload?: number;
}

/**
 * 処理名: WebSocket クライアントトランスポート
 * 処理概要: 1本の WebSocket 接続上で、フレームをテキストメッセージとして送受信します。
 *          接続が閉じると受信側は EOF を観測します。
 */
export class WebSocketClientTransport implements ClientTransport {
  private readonly inbound = new FrameQueue<Frame>();

  constructor(private readonly socket: MessageSocket) {
    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        Logger.warn('[JSONRPC Transport] websocket client: skipped binary message');
        return;
      }
      if (!this.inbound.push(toBuffer(data))) {
        Logger.debug('[JSONRPC Transport] websocket client: dropped message after close');
      }
    });
    socket.on('error', (err) => {
      Logger.warn('[JSONRPC Transport] websocket client: connection error', null, errExtra(err));
    });
    socket.on('close', (code) => {
      Logger.info('[JSONRPC Transport] websocket client: connection closed', null, { code });
      this.inbound.close();
    });
  }

  /**
   * 処理名: connect（接続確立）
   * 処理概要: URL へ WebSocket 接続を開き、ハンドシェイク完了後にトランスポートを返します。
   *          ハンドシェイクが失敗した場合はそのエラーで reject します。
   */
  static connect(url: string, options: WebSocketClientTransportOptions = {}): Promise<WebSocketClientTransport> {
    const socket = new WebSocket(url, { headers: options.headers, maxPayload: options.maxPayload });
    return new Promise<WebSocketClientTransport>((resolve, reject) => {
      const onOpen = () => {
        socket.off('error', onError);
        resolve(new WebSocketClientTransport(socket));
      };
      const onError = (err: Error) => {
        socket.off('open', onOpen);
        reject(err);
      };
      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }

  async send(frame: Frame, signal?: AbortSignal): Promise<void> {
    if (this.inbound.isClosed) throw new Error('transport closed');
    await sendText(this.socket, frame, signal);
  }

  recv(): AsyncIterable<Frame> {
    return this.inbound;
  }

  async close(): Promise<void> {
    this.inbound.close();
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000, 'client closed');
    }
  }
}
