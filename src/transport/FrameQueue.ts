type Waiter<T> = (result: IteratorResult<T>) => void;

/**
 * 処理名: FrameQueue（非同期受信キュー）
 * 処理概要: トランスポートの受信側を支える上限なしの非同期キューです。生産者は push し、
 *          単一の消費者が `for await` で読み出します。close 後もバッファ済みの要素は読み出され、その後に終端します。
 * 実装理由: readline・HTTP ハンドラ・WebSocket のイベントといったコールバック型の入力を、
 *          受信ループが待てる AsyncIterable に揃える為です。終端は恒久的で、再開はしません。
 */
export class FrameQueue<T extends object> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * 処理名: push（要素追加）
   * 処理概要: 待機中の消費者がいれば直接渡し、いなければバッファへ積みます。クローズ後は false を返します。
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** 以降の push を拒否し、待機中の消費者へ終端を通知します。 */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /** 読み出されなかったバッファ済み要素を取り除いて返します。 */
  drain(): T[] {
    return this.items.splice(0);
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
