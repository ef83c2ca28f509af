import { ErrorCodes, formatError, type JsonRpcErrorObject, type JsonRpcErrorResponse, type JsonRpcId } from './Envelope';

/**
 * 処理名: RpcError
 * 処理概要: JSON-RPC の error オブジェクト（code / message / data）を例外として表現します。
 *          サーバ側ではハンドラが投げるとそのままレスポンスへ写され、クライアント側では
 *          error 付きレスポンスを受け取った join がこれで reject します。
 */
export class RpcError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
    if (data !== undefined) this.data = data;
  }

  static parseError(message = 'Parse error'): RpcError {
    return new RpcError(ErrorCodes.ParseError, message);
  }

  static invalidRequest(message = 'Invalid Request'): RpcError {
    return new RpcError(ErrorCodes.InvalidRequest, message);
  }

  static methodNotFound(method: string): RpcError {
    return new RpcError(ErrorCodes.MethodNotFound, `Method not found: ${method}`);
  }

  static invalidParams(message: string, data?: unknown): RpcError {
    return new RpcError(ErrorCodes.InvalidParams, message, data);
  }

  static internalError(message: string): RpcError {
    return new RpcError(ErrorCodes.InternalError, message);
  }

  static serverError(message: string, data?: unknown): RpcError {
    return new RpcError(ErrorCodes.ServerError, message, data);
  }

  static fromObject(error: JsonRpcErrorObject): RpcError {
    return new RpcError(error.code, error.message, error.data);
  }

  toObject(): JsonRpcErrorObject {
    const obj: JsonRpcErrorObject = { code: this.code, message: this.message };
    if (this.data !== undefined) obj.data = this.data;
    return obj;
  }

  toResponse(id: JsonRpcId): JsonRpcErrorResponse {
    return formatError(id, this.code, this.message, this.data);
  }
}

/**
 * Failures that never travel on the wire: client-local outcomes of a call and
 * construction mistakes.
 */
export enum ErrorKind {
  Timeout = 'timeout',
  Cancelled = 'cancelled',
  Closed = 'closed',
  Transport = 'transport',
  Encode = 'encode',
  Decode = 'decode',
  Configuration = 'configuration',
}

export interface RuntimeErrorDetails {
  id?: number;
  method?: string;
  cause?: unknown;
}

export class RpcRuntimeError extends Error {
  readonly kind: ErrorKind;
  readonly id?: number;
  readonly method?: string;

  constructor(kind: ErrorKind, message: string, details: RuntimeErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'RpcRuntimeError';
    this.kind = kind;
    this.id = details.id;
    this.method = details.method;
  }

  static timeout(id: number, method: string, timeoutMs: number): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Timeout, `RPC ${id} (${method}) timed out after ${timeoutMs}ms`, { id, method });
  }

  static cancelled(id: number, method: string, cause?: unknown): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Cancelled, `RPC ${id} (${method}) canceled`, { id, method, cause });
  }

  static closed(method: string, id?: number): RpcRuntimeError {
    const label = id === undefined ? method : `${id} (${method})`;
    return new RpcRuntimeError(ErrorKind.Closed, `cancel RPC ${label} by closing client`, { id, method });
  }

  static transport(cause: unknown, method?: string, id?: number): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Transport, `transport error: ${describeError(cause)}`, { id, method, cause });
  }

  static encode(cause: unknown, method: string): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Encode, `marshal request error: ${describeError(cause)}`, { method, cause });
  }

  static decode(cause: unknown, method: string, id: number): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Decode, `unmarshal result error: ${describeError(cause)}`, { id, method, cause });
  }

  static configuration(message: string): RpcRuntimeError {
    return new RpcRuntimeError(ErrorKind.Configuration, message);
  }
}

export function isRuntimeError(err: unknown, kind?: ErrorKind): err is RpcRuntimeError {
  return err instanceof RpcRuntimeError && (kind === undefined || err.kind === kind);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
