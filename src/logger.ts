/* Logger for the JSON-RPC runtime
 * - default: write to stderr (stdout is reserved for the stdio binding)
 * - supports JSON mode and plain text
 * - level controlled by JSONRPC_LOG_LEVEL (error,warn,info,debug)
 * - test hook: collect logs in memory when enableMemoryHook() was called
 */
import { Writable } from 'stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  msg: string;
  correlationId?: string | null;
  extra?: Record<string, unknown> | null;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * 処理名: LoggerClass（ロギングユーティリティ）
 * 処理概要: レベル付きログを標準エラー出力へ出力するユーティリティクラスです。JSON形式出力と
 *          テスト用のメモリフック（インメモリでログ収集）をサポートします。
 * 実装理由: 標準出力は stdio バインディングのフレーム専用のため、診断出力を別経路へ分離する必要がある為です。
 */
export class LoggerClass {
  private level: LogLevel;
  private json: boolean;
  private out: Writable;
  private memory: LogRecord[] | null = null;

  /**
   * 処理名: コンストラクタ（インスタンス初期化）
   * 処理概要: 環境変数 `JSONRPC_LOG_LEVEL` と `JSONRPC_LOG_JSON` を参照して
   *          ログレベルとJSON出力モードを初期化します。
   * 実装理由: テストから環境変数と出力先を差し替えられるようにする為です。
   * @param env 参照する環境変数（既定は process.env）
   * @param out 出力先（既定は stderr）
   */
  constructor(env: NodeJS.ProcessEnv = process.env, out: Writable = process.stderr) {
    const envLevel = (env.JSONRPC_LOG_LEVEL || 'info').toLowerCase();
    this.level = isLogLevel(envLevel) ? envLevel : 'info';
    this.json = (env.JSONRPC_LOG_JSON || '0') === '1';
    this.out = out;
  }

  /**
   * 処理名: enableMemoryHook（メモリログ収集開始）
   * 処理概要: ログ出力をメモリ内配列へも蓄積するフックを有効化します。呼ぶたびに収集内容はリセットされます。
   * 実装理由: テストで出力ストリームを読まずにログ内容を検証する為です。
   */
  enableMemoryHook() {
    this.memory = [];
  }

  /**
   * 処理名: disableMemoryHook（メモリログ収集停止）
   * 処理概要: enableMemoryHook によるメモリ収集を無効化します。収集中のログは破棄されます。
   */
  disableMemoryHook() {
    this.memory = null;
  }

  /**
   * 処理名: getMemory（メモリログ取得）
   * 処理概要: メモリ収集されているログのコピーを返します。
   */
  getMemory(): LogRecord[] {
    return this.memory ? [...this.memory] : [];
  }

  /**
   * 処理名: setLevel（ログレベル設定）
   * 処理概要: 出力する最小レベルを変更します。未知のレベルは無視します。
   * 実装理由: 実行中やテスト中に debug ログを一時的に有効化する為です。
   */
  setLevel(l: LogLevel) {
    if (!isLogLevel(l)) return;
    this.level = l;
  }

  /** 現在のログレベルを返します。 */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * 処理名: setJson（JSON出力切替）
   * 処理概要: 1行JSON形式とプレーンテキスト形式を切り替えます。
   */
  setJson(enabled: boolean) {
    this.json = enabled;
  }

  private shouldLog(l: LogLevel) {
    return LEVELS[l] <= LEVELS[this.level];
  }

  /**
   * 処理名: format（ログ整形）
   * 処理概要: JSONモードなら1行のJSON、そうでなければ `[時刻] LEVEL: msg cid=... {extra}` 形式の文字列を返します。
   */
  format(rec: LogRecord): string {
    if (this.json) return JSON.stringify(rec);
    const cid = rec.correlationId ? ' cid=' + rec.correlationId : '';
    const extra = rec.extra ? ' ' + JSON.stringify(rec.extra) : '';
    return `[${rec.timestamp}] ${rec.level.toUpperCase()}: ${rec.msg}${cid}${extra}`;
  }

  private record(level: LogLevel, msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    const rec: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      correlationId: correlationId ?? null,
      extra: extra ?? null,
    };

    if (this.memory) this.memory.push(rec);

    let line: string;
    try {
      line = this.format(rec);
    } catch (e) {
      // extra was not serializable (cycle, BigInt)
      line = this.format({ ...rec, extra: { unserializable: true } });
    }
    if (this.out.writable) this.out.write(line + '\n');
  }

  /**
   * 処理名: error（エラーログ）
   * 処理概要: エラーレベルのログを記録します。処理を継続できない失敗に使います。
   * @param msg ログメッセージ
   * @param correlationId 相関ID（任意）
   * @param extra 追加メタ情報（任意）
   */
  error(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('error')) return;
    this.record('error', msg, correlationId, extra);
  }

  /**
   * 処理名: warn（警告ログ）
   * 処理概要: 警告レベルのログを記録します。
   * 実装理由: 呼び出しは継続できるが、フレーム破棄やストリーム障害など運用者が知るべき事象を残す為です。
   */
  warn(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('warn')) return;
    this.record('warn', msg, correlationId, extra);
  }

  /**
   * 処理名: info（情報ログ）
   * 処理概要: 起動・終了・EOF など接続の状態遷移を記録します。
   */
  info(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('info')) return;
    this.record('info', msg, correlationId, extra);
  }

  /**
   * 処理名: debug（デバッグログ）
   * 処理概要: 送受信ごとの詳細を記録します。既定レベル（info）では出力されません。
   */
  debug(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('debug')) return;
    this.record('debug', msg, correlationId, extra);
  }
}

const Logger = new LoggerClass();

export default Logger;

/**
 * 処理名: errExtra（エラー付帯情報の生成）
 * 処理概要: 捕捉したエラーのメッセージを `err` キーに入れた extra レコードを返します。
 * 実装理由: Error オブジェクトはそのままでは JSON 化されないため、メッセージだけをログへ残す為です。
 */
export function errExtra(err: unknown, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...extra, err: err instanceof Error ? err.message : String(err) };
}
