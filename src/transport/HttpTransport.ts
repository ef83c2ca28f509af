import express, { type Express, type RequestHandler } from 'express';
import Logger, { errExtra } from '../logger';
import { frameToString, type Frame } from '../protocol/Envelope';
import { FrameQueue } from './FrameQueue';
import type { ClientTransport, ResponseWriter, ServerRequest, ServerTransport } from './Transport';

export interface HttpServerTransportOptions {
  /** Route the application answers on. Defaults to `/`. */
  path?: string;
  /** Body size limit handed to `express.raw`. Defaults to `1mb`. */
  limit?: string;
}

/** The parts of an express request the transport reads. */
export interface IncomingBody extends AsyncIterable<unknown> {
  body?: unknown;
}

/** The parts of an express response the transport writes. */
export interface OutgoingReply {
  readonly headersSent: boolean;
  status(code: number): OutgoingReply;
  set(field: string, value: string): OutgoingReply;
  json(body: unknown): unknown;
  send(body: Buffer): unknown;
  end(): unknown;
}

async function readBody(req: IncomingBody): Promise<Buffer> {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }
  return Buffer.concat(chunks);
}

/**
 * 処理名: HTTP サーバトランスポート
 * 処理概要: POST されたボディを1フレームとして受信キューへ積み、respond で書き戻された
 *          レスポンスを HTTP ボディ（application/json）として返します。応答なしは 204、
 *          ボディが読めない・空の場合は 400、クローズ後は 503 を返します。
 * 実装理由: HTTP は1リクエスト1レスポンスのため、フレームごとに専用の respond を束縛し、
 *          サーバが応答しないまま接続を開きっぱなしにしない為です。
 */
export class HttpServerTransport implements ServerTransport {
  private readonly queue = new FrameQueue<ServerRequest>();
  private readonly exchanges = new Set<OutgoingReply>();
  private readonly path: string;
  private readonly limit: string;

  constructor(options: HttpServerTransportOptions = {}) {
    this.path = options.path ?? '/';
    this.limit = options.limit ?? '1mb';
  }

  /** Express handler; mount it behind `express.raw()` or let it read the stream itself. */
  readonly handler: RequestHandler = (req, res) => {
    void this.handle(req, res);
  };

  /**
   * Standalone application answering POST on the configured path.
   */
  app(): Express {
    const app = express();
    app.post(this.path, express.raw({ type: () => true, limit: this.limit }), this.handler);
    return app;
  }

  get openExchanges(): number {
    return this.exchanges.size;
  }

  recv(): AsyncIterable<ServerRequest> {
    return this.queue;
  }

  async close(): Promise<void> {
    if (this.queue.isClosed) return;
    this.queue.close();
    this.queue.drain();
    const open = Array.from(this.exchanges);
    this.exchanges.clear();
    for (const res of open) res.status(503).json({ error: 'transport closed' });
    Logger.info('[JSONRPC Transport] http transport closed', null, { answered: open.length });
  }

  /**
   * 処理名: handle（POST 受付）
   * 処理概要: 1回の POST を1フレームとして積みます。応答はサーバの respond 時、またはそれより先に
   *          クローズされた場合は 503 で書き戻します。予期しない失敗は 500 を返します。
   */
  async handle(req: IncomingBody, res: OutgoingReply): Promise<void> {
    try {
      await this.accept(req, res);
    } catch (err) {
      Logger.error('[JSONRPC Transport] http exchange failed', null, errExtra(err));
      this.exchanges.delete(res);
      if (!res.headersSent) res.status(500).json({ error: 'internal error' });
    }
  }

  private async accept(req: IncomingBody, res: OutgoingReply): Promise<void> {
    if (this.queue.isClosed) {
      res.status(503).json({ error: 'transport closed' });
      return;
    }

    let frame: Buffer;
    try {
      frame = await readBody(req);
    } catch (err) {
      Logger.warn('[JSONRPC Transport] unreadable request body', null, errExtra(err));
      res.status(400).json({ error: 'unreadable request body' });
      return;
    }
    if (frame.length === 0) {
      res.status(400).json({ error: 'empty request body' });
      return;
    }

    this.exchanges.add(res);
    const respond: ResponseWriter = async (out) => {
      // Already answered by close().
      if (!this.exchanges.delete(res)) return;
      if (out === undefined) {
        res.status(204).end();
        return;
      }
      res.status(200).set('Content-Type', 'application/json').send(out);
    };

    if (!this.queue.push({ frame, respond })) {
      this.exchanges.delete(res);
      res.status(503).json({ error: 'transport closed' });
    }
  }
}

export interface HttpClientTransportOptions {
  /** Extra request headers, sent with every POST. */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

/** 2xx 以外のステータスを受け取ったときの送信エラーです。 */
export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly statusText: string) {
    super(`unexpected HTTP status ${status}${statusText ? ' ' + statusText : ''}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * 処理名: HTTP クライアントトランスポート
 * 処理概要: フレームごとに1回 POST し、空でないレスポンスボディを受信フレームとして積みます。
 *          2xx 以外は {@link HttpStatusError} で送信を失敗させます。
 * 実装理由: 要求と応答が同じ HTTP 交換に乗るため、応答の読み出しを送信の完了に含め、
 *          受信ループ側は他のトランスポートと同じく RPC id で対応付けられるようにする為です。
 */
export class HttpClientTransport implements ClientTransport {
  private readonly inbound = new FrameQueue<Frame>();
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;

  constructor(readonly url: string, options: HttpClientTransportOptions = {}) {
    this.headers = { ...(options.headers ?? {}) };
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * 処理名: send（POST 送信）
   * 処理概要: フレームを JSON ボディとして POST します。signal は fetch へ渡し、中断時は即座に reject します。
   */
  async send(frame: Frame, signal?: AbortSignal): Promise<void> {
    if (this.inbound.isClosed) throw new Error('transport closed');
    const res = await this.fetchFn(this.url, {
      method: 'POST',
      headers: { ...this.headers, 'Content-Type': 'application/json', Accept: 'application/json' },
      body: frameToString(frame),
      signal,
    });
    if (!res.ok) throw new HttpStatusError(res.status, res.statusText);
    const body = Buffer.from(await res.arrayBuffer());
    if (body.length > 0 && !this.inbound.push(body)) {
      Logger.debug('[JSONRPC Transport] dropped response after close', null, { url: this.url });
    }
  }

  recv(): AsyncIterable<Frame> {
    return this.inbound;
  }

  async close(): Promise<void> {
    this.inbound.close();
  }
}
