import { v4 as uuidv4 } from 'uuid';
import { isValidTimeout, loadConfig } from '../config';
import Logger, { errExtra } from '../logger';
import type { Frame } from '../protocol/Envelope';
import { RpcRuntimeError } from '../protocol/errors';
import { deriveSignal, onAbort } from '../shared/signals';
import type { ResponseWriter, ServerRequest, ServerTransport } from '../transport/Transport';
import { Dispatcher } from './Dispatcher';
import type { MethodRegistry } from './MethodRegistry';

export interface ServerOptions {
  transport: ServerTransport;
  registry?: MethodRegistry;
  dispatcher?: Dispatcher;
  /** Per-dispatch timeout; defaults to `JSONRPC_DISPATCH_TIMEOUT_MS`. */
  timeoutMs?: number;
  /** Aborting this signal shuts the server down. */
  signal?: AbortSignal;
}

/**
 * 処理名: Server クラス
 * 処理概要: サーバトランスポートから受信したフレームを1フレーム1タスクで Dispatcher に渡し、
 *          結果を respond で書き戻すランタイムです。ハンドラには per-dispatch タイムアウト付きの
 *          シグナルと相関IDが渡されます。
 * 実装理由: 遅いハンドラが同じ接続上の他の要求を止めないようにし、終了時には実行中の処理を中断させる為です。
 */
export class Server {
  private readonly transport: ServerTransport;
  private readonly dispatcher: Dispatcher;
  private readonly timeoutMs: number;
  private readonly root = new AbortController();
  private readonly inflight = new Set<Promise<void>>();
  private readonly loopDone: Promise<void>;
  private resolveLoopDone: () => void = () => {};
  private started = false;
  private closing: Promise<void> | null = null;
  private detachParent: () => void = () => {};

  constructor(options: ServerOptions) {
    if (!options?.transport) throw RpcRuntimeError.configuration('server transport is required');
    const dispatcher = options.dispatcher ?? (options.registry ? new Dispatcher(options.registry) : undefined);
    if (!dispatcher) throw RpcRuntimeError.configuration('server requires a registry or a dispatcher');
    if (options.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
      throw RpcRuntimeError.configuration(`invalid dispatch timeout: ${options.timeoutMs}`);
    }
    this.transport = options.transport;
    this.dispatcher = dispatcher;
    this.timeoutMs = options.timeoutMs ?? loadConfig().dispatchTimeoutMs;
    this.loopDone = new Promise((resolve) => {
      this.resolveLoopDone = resolve;
    });
    if (options.signal) {
      this.detachParent = onAbort(options.signal, () => {
        this.close().catch((err) => Logger.error('[JSONRPC Server] close failed', null, errExtra(err)));
      });
    }
  }

  /** Resolves once the receive loop has ended. */
  get done(): Promise<void> {
    return this.loopDone;
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  get isClosed(): boolean {
    return this.root.signal.aborted;
  }

  /**
   * 処理名: start
   * 処理概要: 受信ループを開始します。2回目の呼び出しは configuration エラーです。
   */
  start(): this {
    if (this.started) throw RpcRuntimeError.configuration('server already started');
    if (this.root.signal.aborted) throw RpcRuntimeError.configuration('server is closed');
    this.started = true;
    Logger.info('[JSONRPC Server] started', null, { timeoutMs: this.timeoutMs });
    void this.receiveLoop().then(this.resolveLoopDone, this.resolveLoopDone);
    return this;
  }

  /**
   * 処理名: close
   * 処理概要: ルートシグナルを中断（実行中ハンドラへ伝播）し、トランスポートを閉じて受信ループの終了を待ちます。
   *          実行中ハンドラの完了は待ちません。複数回呼んでも同じ Promise を返します。
   */
  close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.detachParent();
    this.root.abort(new Error('server closed'));
    try {
      await this.transport.close();
    } catch (err) {
      Logger.warn('[JSONRPC Server] transport close failed', null, errExtra(err));
    }
    if (this.started) await this.loopDone;
    else this.resolveLoopDone();
    Logger.info('[JSONRPC Server] closed', null, { inflight: this.inflight.size });
  }

  private async receiveLoop(): Promise<void> {
    try {
      for await (const request of this.transport.recv()) {
        if (this.root.signal.aborted) {
          await this.respond(request.respond, undefined, null);
          break;
        }
        this.spawn(request);
      }
    } catch (err) {
      if (!this.root.signal.aborted) Logger.error('[JSONRPC Server] receive loop failed', null, errExtra(err));
    }
    Logger.debug('[JSONRPC Server] receive loop stopped');
  }

  private spawn(request: ServerRequest): void {
    const task: Promise<void> = this.handle(request).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
  }

  private async handle(request: ServerRequest): Promise<void> {
    const correlationId = uuidv4();
    if (request.frame.length === 0) {
      Logger.debug('[JSONRPC Server] skipped empty frame', correlationId);
      await this.respond(request.respond, undefined, correlationId);
      return;
    }

    const { signal, dispose } = deriveSignal(this.root.signal, this.timeoutMs);
    let response: Frame | undefined;
    try {
      response = await this.dispatcher.dispatch(request.frame, { signal, correlationId });
    } catch (err) {
      Logger.error('[JSONRPC Server] dispatch failed', correlationId, errExtra(err));
    } finally {
      dispose();
    }
    await this.respond(request.respond, response, correlationId);
  }

  private async respond(writer: ResponseWriter, frame: Frame | undefined, correlationId: string | null): Promise<void> {
    try {
      await writer(frame);
    } catch (err) {
      Logger.warn('[JSONRPC Server] failed to write response', correlationId, errExtra(err));
    }
  }
}
