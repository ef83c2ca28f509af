import {
  JSONRPC_VERSION,
  frameToString,
  type Frame,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './Envelope';

/**
 * 処理名: フレーム解析結果型
 * 処理概要: 受信フレームを汎用的に解析した結果。id キーの有無で request / notification を区別し、
 *          envelope として不正なものは invalid-request（応答可能）か invalid（破棄）に分類する。
 */
export type ParsedFrame =
  | { kind: 'request'; request: JsonRpcRequest }
  | { kind: 'notification'; notification: JsonRpcNotification }
  | { kind: 'invalid-request'; id: JsonRpcId; reason: string }
  | { kind: 'invalid'; reason: string };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Parse raw JSON, returning `undefined` for blank input and throwing on
 * malformed JSON.
 */
function parseJson(frame: Frame | string): unknown {
  const trimmed = frameToString(frame).trim();
  if (!trimmed) throw new Error('empty frame');
  try {
    return JSON.parse(trimmed);
  } catch (err) {
    throw new Error('invalid json');
  }
}

/**
 * 処理名: JSON-RPC メッセージ解析
 * 処理概要: 1フレーム分の JSON-RPC ペイロードをパースし、request / notification の判定と
 *          envelope の基本検証（jsonrpc, method, params, id）を行う。例外は投げない。
 * @param frame 受信したフレーム
 */
export function parseEnvelope(frame: Frame | string): ParsedFrame {
  let obj: unknown;
  try {
    obj = parseJson(frame);
  } catch (err) {
    return { kind: 'invalid', reason: err instanceof Error ? err.message : String(err) };
  }
  if (Array.isArray(obj)) return { kind: 'invalid', reason: 'batch frames are not supported' };
  if (!isObject(obj)) return { kind: 'invalid', reason: 'not an object' };

  const problem = envelopeProblem(obj);

  if ('id' in obj) {
    const id = obj.id;
    if (!isValidId(id)) return { kind: 'invalid-request', id: null, reason: 'invalid id' };
    if (problem) return { kind: 'invalid-request', id, reason: problem };
    return { kind: 'request', request: { jsonrpc: JSONRPC_VERSION, method: String(obj.method), params: paramsOf(obj), id } };
  }

  if (problem) return { kind: 'invalid', reason: problem };
  return { kind: 'notification', notification: { jsonrpc: JSONRPC_VERSION, method: String(obj.method), params: paramsOf(obj) } };
}

function envelopeProblem(obj: JsonObject): string | undefined {
  if (obj.jsonrpc !== JSONRPC_VERSION) return 'unsupported jsonrpc version';
  if (typeof obj.method !== 'string' || obj.method.length === 0) return 'missing method';
  if (obj.params !== undefined && obj.params !== null && !Array.isArray(obj.params)) return 'non-array params';
  return undefined;
}

function paramsOf(obj: JsonObject): unknown[] | undefined {
  return Array.isArray(obj.params) ? obj.params : undefined;
}

function isErrorObject(value: unknown): value is JsonRpcErrorObject {
  return isObject(value) && typeof value.code === 'number' && Number.isInteger(value.code) && typeof value.message === 'string';
}

/**
 * Decode a frame received by a client as a single Response. Throws when the
 * frame is not a well-formed response.
 */
export function parseResponse(frame: Frame | string): JsonRpcResponse {
  const obj = parseJson(frame);
  if (!isObject(obj)) throw new Error('not an object');
  if (!('id' in obj) || !isValidId(obj.id)) throw new Error('missing id');
  const hasResult = 'result' in obj;
  const hasError = 'error' in obj && obj.error !== null && obj.error !== undefined;
  if (hasResult === hasError) throw new Error('response must carry exactly one of result or error');
  if (hasError) {
    if (!isErrorObject(obj.error)) throw new Error('malformed error object');
    const error: JsonRpcErrorObject = { code: obj.error.code, message: obj.error.message };
    if (obj.error.data !== undefined) error.data = obj.error.data;
    return { jsonrpc: JSONRPC_VERSION, error, id: obj.id };
  }
  return { jsonrpc: JSONRPC_VERSION, result: obj.result, id: obj.id };
}
