import Logger, { errExtra } from '../logger';
import {
  ErrorCodes,
  encodeFrame,
  formatError,
  formatResult,
  type Frame,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from '../protocol/Envelope';
import { RpcError, describeError } from '../protocol/errors';
import { parseEnvelope } from '../protocol/Parser';
import type { CallContext, CallSite, MethodRegistry } from './MethodRegistry';
import { bindParams } from './params';

export interface DispatchOptions {
  /** Observed by handlers through `CallContext.signal`. */
  signal?: AbortSignal;
  correlationId?: string | null;
}

/**
 * 処理名: Dispatcher クラス
 * 処理概要: 受信した1フレームを高々1つのレスポンスフレームへ変換します。メソッドの解決は MethodRegistry に委ねます。
 * 実装理由: どのような入力でも例外を外へ出さず、エラーレスポンスか応答なしのどちらかに必ず落とし込む為です。
 */
export class Dispatcher {
  private readonly methods: MethodRegistry;

  /**
   * 処理名: Dispatcher 初期化
   * 処理概要: 与えられた MethodRegistry をバインドします。
   * @param registry メソッドレジストリ
   */
  constructor(registry: MethodRegistry) {
    this.methods = registry;
  }

  get registry(): MethodRegistry {
    return this.methods;
  }

  /**
   * 処理名: フレームのディスパッチ
   * 処理概要: 受信フレームを解析し、id キーの有無で request / notification を判定して処理します。
   *          request には必ずレスポンスのバイト列を、notification と破棄したフレームには undefined を返します。
   *          例外は投げません。
   * @param frame 受信したフレーム
   * @param options シグナルと相関ID
   */
  async dispatch(frame: Frame | string, options: DispatchOptions = {}): Promise<Frame | undefined> {
    const correlationId = options.correlationId ?? null;
    const signal = options.signal ?? new AbortController().signal;
    const parsed = parseEnvelope(frame);

    switch (parsed.kind) {
      case 'invalid':
        Logger.warn('[JSONRPC Dispatcher] dropped frame', correlationId, { reason: parsed.reason });
        return undefined;
      case 'invalid-request':
        Logger.warn('[JSONRPC Dispatcher] invalid request', correlationId, { reason: parsed.reason, id: parsed.id });
        return this.encode(formatError(parsed.id, ErrorCodes.InvalidRequest, 'Invalid Request', parsed.reason), correlationId);
      case 'notification':
        await this.handleNotification(parsed.notification, signal, correlationId);
        return undefined;
      case 'request':
        return this.encode(await this.handleRequest(parsed.request, signal, correlationId), correlationId);
    }
  }

  /**
   * 処理名: リクエスト処理
   * 処理概要: CallSite を解決し、引数をバインドしてハンドラを実行、結果またはエラーを JSON-RPC レスポンスに整形します。
   */
  private async handleRequest(request: JsonRpcRequest, signal: AbortSignal, correlationId: string | null): Promise<JsonRpcResponse> {
    const { method, params, id } = request;
    const site = this.methods.resolve(method);
    if (!site) {
      Logger.debug('[JSONRPC Dispatcher] method not found', correlationId, { method });
      return RpcError.methodNotFound(method).toResponse(id);
    }

    try {
      const value = await this.invoke(site, params, { method, id, signal, correlationId });
      return formatResult(id, shapeResult(site, value));
    } catch (err) {
      if (err instanceof RpcError) {
        Logger.debug('[JSONRPC Dispatcher] method returned rpc error', correlationId, { method, code: err.code, err: err.message });
        return err.toResponse(id);
      }
      Logger.error('[JSONRPC Dispatcher] Unexpected method error', correlationId, errExtra(err, { method }));
      return formatError(id, ErrorCodes.ServerError, describeError(err));
    }
  }

  /**
   * 処理名: 通知ハンドリング
   * 処理概要: 応答不要の通知を実行します。未知のメソッドや失敗はログ出力のみ行います。
   */
  private async handleNotification(notification: JsonRpcNotification, signal: AbortSignal, correlationId: string | null): Promise<void> {
    const { method, params } = notification;
    const site = this.methods.resolve(method);
    if (!site) {
      Logger.warn('[JSONRPC Dispatcher] notification for unknown method', correlationId, { method });
      return;
    }
    try {
      await this.invoke(site, params, { method, signal, correlationId });
    } catch (err) {
      Logger.error('[JSONRPC Dispatcher] notification failed', correlationId, errExtra(err, { method }));
    }
  }

  private async invoke(site: CallSite, params: unknown[] | undefined, context: CallContext): Promise<unknown> {
    const args = await bindParams(params, site.params);
    return site.invoke(args, context);
  }

  private encode(response: JsonRpcResponse, correlationId: string | null): Frame {
    try {
      return encodeFrame(response);
    } catch (err) {
      Logger.error('[JSONRPC Dispatcher] failed to encode response', correlationId, errExtra(err, { id: response.id }));
      return encodeFrame(formatError(response.id, ErrorCodes.InternalError, `marshal result error: ${describeError(err)}`));
    }
  }
}

/**
 * Map a handler's return value onto the declared outputs: none ⇒ `null`, one
 * ⇒ the value itself, several ⇒ an ordered list of exactly that length.
 */
export function shapeResult(site: CallSite, value: unknown): unknown {
  const count = site.results.length;
  if (count === 0) return null;
  if (count === 1) return value === undefined ? null : value;
  if (!Array.isArray(value) || value.length !== count) {
    throw RpcError.internalError(`method ${site.name} must return ${count} results`);
  }
  return value.map((v: unknown) => (v === undefined ? null : v));
}
