/**
 * JSON-RPC 2.0 wire shapes shared by the client and the server.
 *
 * See: https://www.jsonrpc.org/specification
 */

export const JSONRPC_VERSION = '2.0';

/**
 * Reserved error codes. Everything at or below -32000 belongs to the protocol.
 */
export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerError: -32000,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Correlation id. This client only issues positive integers; servers echo whatever they receive. */
export type JsonRpcId = number | string | null;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: unknown[];
  id: JsonRpcId;
}

export interface JsonRpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: unknown[];
}

export interface JsonRpcSuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  result: unknown;
  id: JsonRpcId;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  error: JsonRpcErrorObject;
  id: JsonRpcId;
}

/** Exactly one of `result` / `error` is present. */
export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// Wire type only: no batch execution contract exists.
export type BatchResponses = JsonRpcResponse[];

/** Opaque frame moved by transports: UTF-8 encoded JSON. */
export type Frame = Buffer;

export function isErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return 'error' in response;
}

export function formatRequest(id: number, method: string, params: unknown[]): JsonRpcRequest {
  return { jsonrpc: JSONRPC_VERSION, method, params, id };
}

export function formatNotification(method: string, params: unknown[]): JsonRpcNotification {
  return { jsonrpc: JSONRPC_VERSION, method, params };
}

export function formatResult(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  // JSON has no undefined: a success response always carries the key.
  return { jsonrpc: JSONRPC_VERSION, result: result === undefined ? null : result, id };
}

export function formatError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  const error: JsonRpcErrorObject = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: JSONRPC_VERSION, error, id };
}

/**
 * Serialize a message into a frame. Throws when the value is not JSON
 * serializable (cycles, BigInt).
 */
export function encodeFrame(message: unknown): Frame {
  return Buffer.from(JSON.stringify(message), 'utf8');
}

export function frameToString(frame: Frame | string): string {
  return typeof frame === 'string' ? frame : frame.toString('utf8');
}
