import Logger from './logger';

export const DEFAULT_CALL_TIMEOUT_MS = 60_000;
export const DEFAULT_DISPATCH_TIMEOUT_MS = 60_000;

export interface RuntimeConfig {
  /** Default per-call timeout applied by clients. */
  callTimeoutMs: number;
  /** Per-dispatch timeout applied by servers to each inbound frame. */
  dispatchTimeoutMs: number;
}

/**
 * 処理名: 設定読み込み (loadConfig)
 * 処理概要: 環境変数 `JSONRPC_CALL_TIMEOUT_MS` / `JSONRPC_DISPATCH_TIMEOUT_MS` を読み取り、
 *          不正値（数値でない・0以下）は警告ログを出して既定値に戻す。
 * 実装理由: 設定ミスで呼び出しが即時タイムアウトしたり無期限に待ったりしないようにする為。
 * @param env 参照する環境変数（既定は process.env）
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    callTimeoutMs: readTimeout(env, 'JSONRPC_CALL_TIMEOUT_MS', DEFAULT_CALL_TIMEOUT_MS),
    dispatchTimeoutMs: readTimeout(env, 'JSONRPC_DISPATCH_TIMEOUT_MS', DEFAULT_DISPATCH_TIMEOUT_MS),
  };
}

function readTimeout(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!isValidTimeout(value)) {
    Logger.warn('[JSONRPC Config] ignoring invalid timeout', null, { key, value: raw, fallback });
    return fallback;
  }
  return value;
}

/** 有限の正の数だけをタイムアウト値として認めます。 */
export function isValidTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}
