import readline from 'readline';
import type { Readable, Writable } from 'stream';
import Logger, { errExtra } from '../logger';
import { frameToString, type Frame } from '../protocol/Envelope';
import { FrameQueue } from './FrameQueue';
import type { ClientTransport, ResponseWriter, ServerRequest, ServerTransport } from './Transport';

export interface StreamTransportOptions {
  input: Readable;
  output: Writable;
}

/**
 * 処理名: LineWriter（行単位ライター）
 * 処理概要: 1本の出力ストリームへの書き込みを直列化し、フレームを1行ずつ書き出します。
 *          バックプレッシャ時は drain を待ち、シグナル中断・ストリームのクローズ・エラーで reject します。
 * 実装理由: 複数の呼び出しが同じ接続を共有するため、行の混在を防ぎ、書き込み失敗を呼び出し元へ返す必要がある為です。
 */
export class LineWriter {
  private tail: Promise<void> = Promise.resolve();
  private ended = false;
  private failure: Error | null = null;

  /**
   * 処理名: コンストラクタ
   * 処理概要: 出力ストリームに常設の error リスナーを登録し、最初のエラーを記録します。
   * 実装理由: リスナーのない error イベントはプロセスを終了させるため、ストリームの寿命全体で受け止める必要があります。
   */
  constructor(private readonly output: Writable) {
    output.on('error', (err: Error) => {
      if (this.failure) return;
      this.failure = err;
      Logger.warn('[JSONRPC Transport] output stream error', null, errExtra(err));
    });
  }

  /** First error the output stream reported, if any. */
  get error(): Error | null {
    return this.failure;
  }

  /**
   * 処理名: write（行書き込み）
   * 処理概要: 先行する書き込みの完了後にフレームを1行として書き込みます。失敗しても後続の書き込みは継続します。
   * 実装理由: 呼び出し順を保ったまま、各書き込みの成否を個別に返す為です。
   */
  write(frame: Frame, signal?: AbortSignal): Promise<void> {
    const run = this.tail.then(() => this.writeNow(frame, signal));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * 処理名: flush（書き込み待機）
   * 処理概要: これまでに積まれた書き込みがすべて完了（成功・失敗を問わず）した時点で解決します。
   */
  flush(): Promise<void> {
    return this.tail;
  }

  /** 以降の書き込みを受け付けません。積まれた書き込みは実行されます。 */
  end(): void {
    this.ended = true;
  }

  private writeNow(frame: Frame, signal?: AbortSignal): Promise<void> {
    const out = this.output;
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      if (this.failure) {
        reject(this.failure);
        return;
      }
      if (this.ended || out.destroyed || out.writableEnded) {
        reject(new Error('output stream closed'));
        return;
      }

      const flushed = out.write(frameToString(frame) + '\n', (err) => {
        if (err) reject(err);
      });
      if (flushed) {
        resolve();
        return;
      }

      const cleanup = () => {
        out.off('drain', onDrain);
        out.off('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(this.failure ?? new Error('output stream closed'));
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason);
      };
      out.once('drain', onDrain);
      out.once('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * 処理名: 行リーダー
 * 処理概要: readline で入力を行単位に読み取り、空行以外をフレームとしてキューへ積みます。
 *          入力の終端またはエラーでキューを閉じ、受信側は EOF を観測します。
 * 実装理由: 接続リセット等の入力エラーで受信ループが止まらないまま保留呼び出しが残ることを防ぐ為です。
 */
function readLines(input: Readable, queue: FrameQueue<Frame>, label: string): readline.Interface {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let failed = false;
  const onError = (err: Error) => {
    if (!failed) {
      failed = true;
      Logger.warn(`[JSONRPC Transport] ${label}: input error`, null, errExtra(err));
    }
    queue.close();
    rl.close();
  };
  input.on('error', onError);
  rl.on('error', onError);
  rl.on('line', (line) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    if (!queue.push(Buffer.from(trimmed, 'utf8'))) {
      Logger.debug(`[JSONRPC Transport] ${label}: dropped line after close`);
    }
  });
  rl.on('close', () => {
    Logger.info(`[JSONRPC Transport] ${label}: input closed`);
    queue.close();
  });
  return rl;
}

/**
 * 処理名: ストリームクライアントトランスポート
 * 処理概要: 永続接続上で、双方向に1行1JSONドキュメントとしてフレームを送受信します。
 * 実装理由: 子プロセスの stdio やソケットなど任意の Readable/Writable の組をクライアントに接続する為です。
 */
export class StreamClientTransport implements ClientTransport {
  private readonly inbound = new FrameQueue<Frame>();
  private readonly writer: LineWriter;
  private readonly rl: readline.Interface;

  constructor(options: StreamTransportOptions) {
    this.writer = new LineWriter(options.output);
    this.rl = readLines(options.input, this.inbound, 'stream client');
  }

  /**
   * 処理名: send（フレーム送信）
   * 処理概要: フレームを1行として書き込みます。入力が EOF に達した後は 'transport closed' で reject します。
   * 実装理由: 応答を受け取れない接続へ要求を書き込み、タイムアウトまで待たせないようにする為です。
   */
  async send(frame: Frame, signal?: AbortSignal): Promise<void> {
    if (this.inbound.isClosed) throw new Error('transport closed');
    await this.writer.write(frame, signal);
  }

  recv(): AsyncIterable<Frame> {
    return this.inbound;
  }

  async close(): Promise<void> {
    this.writer.end();
    this.inbound.close();
    this.rl.close();
  }
}

/**
 * 処理名: ストリームサーバトランスポート
 * 処理概要: 受信した各行を、共有ライターに束縛した respond と組にして受信キューへ積みます。
 *          応答は RPC id だけで対応付けられます（応答なしの場合は何も書きません）。
 * 実装理由: 1本の接続で並行に処理される要求の応答を、完了順に書き出せるようにする為です。
 */
export class StreamServerTransport implements ServerTransport {
  private readonly frames = new FrameQueue<Frame>();
  private readonly writer: LineWriter;
  private readonly rl: readline.Interface;
  private readonly respond: ResponseWriter;

  constructor(options: StreamTransportOptions) {
    this.writer = new LineWriter(options.output);
    this.rl = readLines(options.input, this.frames, 'stream server');
    this.respond = async (frame) => {
      if (frame === undefined) return;
      await this.writer.write(frame);
    };
  }

  async *recv(): AsyncIterable<ServerRequest> {
    for await (const frame of this.frames) {
      yield { frame, respond: this.respond };
    }
  }

  async close(): Promise<void> {
    this.frames.close();
    this.rl.close();
    // Let responses already queued reach the output.
    await this.writer.flush();
    this.writer.end();
  }
}

/**
 * 処理名: stdio サーバトランスポート
 * 処理概要: 自プロセスの stdin/stdout に束縛したサーバトランスポートを返します。ログは stderr へ出るため、stdout はフレーム専用です。
 */
export function stdioServerTransport(): StreamServerTransport {
  return new StreamServerTransport({ input: process.stdin, output: process.stdout });
}
