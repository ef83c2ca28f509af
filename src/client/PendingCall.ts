import type { JsonRpcResponse } from '../protocol/Envelope';

export type CallOutcome = { kind: 'response'; response: JsonRpcResponse } | { kind: 'failed'; error: Error };

/**
 * 処理名: PendingCall（保留中の呼び出し）
 * 処理概要: クライアントの保留テーブルに載る1件の呼び出しです。レスポンス・タイムアウト・キャンセル・終了のうち
 *          最初に決着させたものが勝ち、以降の試行は false を返します。outcome の Promise は reject しません。
 * 実装理由: 複数の決着要因が競合しても結果を1回だけ確定させ、未処理の reject を残さない為です。
 */
export class PendingCall {
  readonly id: number;
  readonly method: string;
  readonly outcome: Promise<CallOutcome>;
  private readonly abortSend = new AbortController();
  private settle: (outcome: CallOutcome) => void = () => {};
  private done = false;

  constructor(id: number, method: string) {
    this.id = id;
    this.method = method;
    this.outcome = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get resolved(): boolean {
    return this.done;
  }

  /** Aborts an in-progress send once the call has failed. */
  get signal(): AbortSignal {
    return this.abortSend.signal;
  }

  /** レスポンスで決着させます。既に決着済みなら false。 */
  deliver(response: JsonRpcResponse): boolean {
    if (this.done) return false;
    this.done = true;
    this.settle({ kind: 'response', response });
    return true;
  }

  /** エラーで決着させ、進行中の送信を中断します。既に決着済みなら false。 */
  fail(error: Error): boolean {
    if (this.done) return false;
    this.done = true;
    this.abortSend.abort(error);
    this.settle({ kind: 'failed', error });
    return true;
  }
}
