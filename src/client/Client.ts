import { isValidTimeout, loadConfig } from '../config';
import Logger, { errExtra } from '../logger';
import {
  encodeFrame,
  formatNotification,
  formatRequest,
  isErrorResponse,
  type Frame,
  type JsonRpcResponse,
} from '../protocol/Envelope';
import { RpcError, RpcRuntimeError } from '../protocol/errors';
import { parseResponse } from '../protocol/Parser';
import { onAbort } from '../shared/signals';
import type { ClientTransport } from '../transport/Transport';
import { PendingCall } from './PendingCall';

export interface ClientOptions {
  transport: ClientTransport;
  /** Default per-call timeout; defaults to `JSONRPC_CALL_TIMEOUT_MS`. */
  timeoutMs?: number;
  /** Aborting this signal closes the client. */
  signal?: AbortSignal;
}

/**
 * Options of one {@link Reply.join}. The first join sends the request and its
 * signal and timeout bound the call itself. A later join with its own signal or
 * timeout bounds only its own wait: it rejects that joiner with a `cancelled` or
 * `timeout` error while the call and the other joiners keep waiting.
 */
export interface JoinOptions {
  /** Caller cancellation for this call. */
  signal?: AbortSignal;
  /** Overrides the client's per-call timeout. */
  timeoutMs?: number;
}

export interface DecodingJoinOptions<T> extends JoinOptions {
  /** Turns the raw `result` into the caller's type; a throw rejects with a `decode` error. */
  decode: (result: unknown) => T;
}

interface CallResult {
  id: number;
  result: unknown;
}

/**
 * 処理名: Reply（呼び出しハンドル）
 * 処理概要: {@link Client.call} が返す呼び出しハンドルです。最初の join まで何も送信せず、
 *          以降の join は最初の結果を共有します。
 * 実装理由: 呼び出しの組み立てと送信を分け、送信前のキャンセルや複数箇所からの待機を可能にする為です。
 */
export class Reply {
  private readonly cancelScope = new AbortController();
  private started: Promise<CallResult> | null = null;
  private issuedId: number | undefined;

  constructor(
    private readonly client: Client,
    readonly method: string,
    readonly params: readonly unknown[],
  ) {}

  /**
   * 処理名: join（結果待機）
   * 処理概要: 初回は要求を送信して結果を待ちます。2回目以降は送信済みの呼び出しの結果を共有し、
   *          その join 自身の signal と timeoutMs はその待機だけを打ち切ります。
   * 実装理由: 同じ呼び出しを複数の待機者が異なる期限で待てるようにする為です。
   * @returns 結果（decode 指定時は変換後の値）
   */
  join(options?: JoinOptions): Promise<unknown>;
  join<T>(options: DecodingJoinOptions<T>): Promise<T>;
  async join<T>(options: JoinOptions & { decode?: (result: unknown) => T } = {}): Promise<unknown> {
    let outcome: Promise<CallResult>;
    if (!this.started) {
      this.started = this.client.execute(this.method, this.params, this.cancelScope.signal, options, (id) => {
        this.issuedId = id;
      });
      outcome = this.started;
    } else {
      outcome = this.issuedId === undefined ? this.started : raceJoin(this.started, this.method, this.issuedId, options);
    }
    const { id, result } = await outcome;
    if (!options.decode) return result;
    try {
      return options.decode(result);
    } catch (err) {
      throw RpcRuntimeError.decode(err, this.method, id);
    }
  }

  /**
   * 処理名: cancel（呼び出し中止）
   * 処理概要: 呼び出しを中止します。待機中および以降の join は cancelled エラーで reject されます。
   */
  cancel(reason?: unknown): void {
    this.cancelScope.abort(reason ?? new Error('call cancelled'));
  }
}

/**
 * 処理名: Client クラス
 * 処理概要: リクエストにシーケンスIDを割り当てて保留テーブルに登録し、単一の受信ループで
 *          レスポンスを突き合わせる JSON-RPC クライアントです。各呼び出しは
 *          レスポンス到着・タイムアウト・キャンセル・クライアント終了のうち最初の1つで決着します。
 * 実装理由: 1本の接続上で並行する呼び出しを RPC id だけで対応付け、どの呼び出しも必ず1回だけ決着させる為です。
 */
export class Client {
  private readonly transport: ClientTransport;
  private readonly timeoutMs: number;
  private readonly pending = new Map<number, PendingCall>();
  private readonly root = new AbortController();
  private readonly closedPromise: Promise<void>;
  private resolveClosed: () => void = () => {};
  private transportClosed: Promise<void> | null = null;
  private detachParent: () => void = () => {};
  private nextId = 1;

  constructor(options: ClientOptions) {
    if (!options?.transport) throw RpcRuntimeError.configuration('client transport is required');
    if (options.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
      throw RpcRuntimeError.configuration(`invalid call timeout: ${options.timeoutMs}`);
    }
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? loadConfig().callTimeoutMs;
    this.closedPromise = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
    if (options.signal) {
      this.detachParent = onAbort(options.signal, () => this.terminate('parent signal aborted'));
    }
    void this.receiveLoop();
  }

  /**
   * 処理名: closed（終了待機）
   * 処理概要: 受信ループが終了し、トランスポートのクローズが完了した時点で解決します。
   */
  get closed(): Promise<void> {
    return this.closedPromise;
  }

  /** close、EOF、親シグナルのいずれかで終了済みなら true。 */
  get isClosed(): boolean {
    return this.root.signal.aborted;
  }

  /** 応答待ちの呼び出し数。 */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * 処理名: call（呼び出し生成）
   * 処理概要: メソッド名と位置引数から呼び出しハンドルを作ります。要求は最初の {@link Reply.join} で送信されます。
   * 実装理由: 引数の検証や ID の割り当てを送信時まで遅らせ、未送信の呼び出しで ID を消費しない為です。
   */
  call(method: string, ...args: unknown[]): Reply {
    return new Reply(this, method, args);
  }

  /**
   * 処理名: notify
   * 処理概要: 通知を送信します。保留エントリは作らず、トランスポートが受け付けた時点で完了します。
   * 実装理由: 通知には応答が返らないため、待機対象を残さない為です。
   */
  async notify(method: string, ...args: unknown[]): Promise<void> {
    if (this.isClosed) throw RpcRuntimeError.closed(method);
    let frame: Frame;
    try {
      frame = encodeFrame(formatNotification(method, args));
    } catch (err) {
      throw RpcRuntimeError.encode(err, method);
    }
    try {
      await this.transport.send(frame, this.root.signal);
    } catch (err) {
      if (this.isClosed) throw RpcRuntimeError.closed(method);
      throw RpcRuntimeError.transport(err, method);
    }
  }

  /**
   * 処理名: close
   * 処理概要: 保留中の全呼び出しを closed エラーで reject し、トランスポートを1回だけ閉じます。
   *          何度呼んでも同じ Promise を返します。
   */
  close(): Promise<void> {
    this.terminate('client closed');
    return this.closedPromise;
  }

  /**
   * 処理名: 呼び出し実行 (execute)
   * 処理概要: シーケンスIDを割り当てて保留エントリを登録してから送信し、4つの決着要因の最初の1つを待ちます。
   *          決着時にはタイマーとシグナル購読を必ず解除します。
   * @internal called by {@link Reply.join}
   */
  async execute(
    method: string,
    params: readonly unknown[],
    cancel: AbortSignal,
    options: JoinOptions,
    onIssued?: (id: number) => void,
  ): Promise<CallResult> {
    if (this.isClosed) throw RpcRuntimeError.closed(method);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    if (!isValidTimeout(timeoutMs)) throw RpcRuntimeError.configuration(`invalid call timeout: ${timeoutMs}`);

    const id = this.nextId++;
    onIssued?.(id);
    let frame: Frame;
    try {
      frame = encodeFrame(formatRequest(id, method, [...params]));
    } catch (err) {
      throw RpcRuntimeError.encode(err, method);
    }

    const call = new PendingCall(id, method);
    this.pending.set(id, call);

    const timer = setTimeout(() => {
      if (this.removePending(id)) call.fail(RpcRuntimeError.timeout(id, method, timeoutMs));
    }, timeoutMs);
    const detach = [cancel, options.signal].map((signal) =>
      onAbort(signal, () => {
        if (this.removePending(id)) call.fail(RpcRuntimeError.cancelled(id, method, signal?.reason));
      }),
    );

    try {
      if (!call.resolved) {
        Logger.debug('[JSONRPC Client] sending request', null, { id, method });
        await this.send(call, frame);
      }
      const outcome = await call.outcome;
      if (outcome.kind === 'failed') throw outcome.error;
      return { id, result: unwrap(outcome.response) };
    } finally {
      clearTimeout(timer);
      for (const off of detach) off();
    }
  }

  private async send(call: PendingCall, frame: Frame): Promise<void> {
    try {
      await this.transport.send(frame, call.signal);
    } catch (err) {
      // A call that already lost the race keeps its own error.
      if (this.removePending(call.id)) {
        Logger.warn('[JSONRPC Client] send failed', null, errExtra(err, { id: call.id, method: call.method }));
        call.fail(RpcRuntimeError.transport(err, call.method, call.id));
      }
    }
  }

  /** Removes a pending entry; a second removal returns undefined. */
  private removePending(id: number): PendingCall | undefined {
    const call = this.pending.get(id);
    if (!call) return undefined;
    this.pending.delete(id);
    return call;
  }

  private async receiveLoop(): Promise<void> {
    let iterator: AsyncIterator<Frame> | undefined;
    const stopped = new Promise<IteratorResult<Frame>>((resolve) => {
      onAbort(this.root.signal, () => resolve({ done: true, value: undefined }));
    });
    try {
      iterator = this.transport.recv()[Symbol.asyncIterator]();
      for (;;) {
        const next = await Promise.race([iterator.next(), stopped]);
        if (next.done) break;
        this.deliver(next.value);
      }
      if (!this.isClosed) Logger.info('[JSONRPC Client] transport reached EOF');
    } catch (err) {
      if (!this.isClosed) Logger.warn('[JSONRPC Client] receive loop failed', null, errExtra(err));
    }
    if (this.isClosed && iterator?.return) {
      iterator.return().catch((err) => Logger.debug('[JSONRPC Client] iterator return failed', null, errExtra(err)));
    }
    this.terminate('receive loop ended');
    await (this.transportClosed ?? Promise.resolve());
    this.resolveClosed();
  }

  private deliver(frame: Frame): void {
    let response: JsonRpcResponse;
    try {
      response = parseResponse(frame);
    } catch (err) {
      Logger.warn('[JSONRPC Client] dropped undecodable frame', null, errExtra(err));
      return;
    }

    const id = response.id;
    const call = typeof id === 'number' ? this.removePending(id) : undefined;
    if (!call) {
      if (typeof id === 'number' && Number.isInteger(id) && id >= 1 && id < this.nextId) {
        Logger.debug('[JSONRPC Client] discarded response for abandoned call', null, { id });
      } else {
        Logger.warn('[JSONRPC Client] response for unknown id', null, { id });
      }
      return;
    }
    if (!call.deliver(response)) {
      Logger.debug('[JSONRPC Client] discarded response for settled call', null, { id });
    }
  }

  /**
   * Synchronous, one-way shutdown: fail every pending call, stop the loop and
   * start closing the transport.
   */
  private terminate(reason: string): void {
    if (this.root.signal.aborted) return;
    this.root.abort(new Error(reason));
    this.detachParent();
    const calls = Array.from(this.pending.values());
    this.pending.clear();
    for (const call of calls) call.fail(RpcRuntimeError.closed(call.method, call.id));
    Logger.info('[JSONRPC Client] closed', null, { reason, pending: calls.length });
    this.transportClosed = this.closeTransport();
  }

  private async closeTransport(): Promise<void> {
    if (!this.transport.close) return;
    try {
      await this.transport.close();
    } catch (err) {
      Logger.warn('[JSONRPC Client] transport close failed', null, errExtra(err));
    }
  }
}

/**
 * Bound a later join by its own signal and timeout. Only this joiner rejects;
 * the shared call is left running.
 */
function raceJoin(shared: Promise<CallResult>, method: string, id: number, options: JoinOptions): Promise<CallResult> {
  const { signal, timeoutMs } = options;
  if (!signal && timeoutMs === undefined) return shared;
  if (timeoutMs !== undefined && !isValidTimeout(timeoutMs)) {
    return Promise.reject(RpcRuntimeError.configuration(`invalid call timeout: ${timeoutMs}`));
  }
  return new Promise<CallResult>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    let detach: () => void = () => {};
    const settle = () => {
      clearTimeout(timer);
      detach();
    };
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        settle();
        reject(RpcRuntimeError.timeout(id, method, timeoutMs));
      }, timeoutMs);
    }
    detach = onAbort(signal, () => {
      settle();
      reject(RpcRuntimeError.cancelled(id, method, signal?.reason));
    });
    shared.then(
      (result) => {
        settle();
        resolve(result);
      },
      (err: unknown) => {
        settle();
        reject(err);
      },
    );
  });
}

function unwrap(response: JsonRpcResponse): unknown {
  if (isErrorResponse(response)) throw RpcError.fromObject(response.error);
  return response.result;
}
