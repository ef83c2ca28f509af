import type { Frame } from '../protocol/Envelope';

/**
 * 処理名: ClientTransport（クライアント側トランスポート契約）
 * 処理概要: 信頼性があり順序が保たれる双方向のフレーム通路のクライアント側です。
 * 実装理由: クライアントの相関処理を HTTP・ストリーム・WebSocket のいずれからも切り離す為です。
 */
export interface ClientTransport {
  /**
   * Send one frame. May suspend on backpressure; must reject promptly when
   * `signal` aborts.
   */
  send(frame: Frame, signal?: AbortSignal): Promise<void>;
  /**
   * Continuous source of inbound frames. Exhaustion is a permanent EOF and
   * the owner has to tear the transport down.
   */
  recv(): AsyncIterable<Frame>;
  close?(): Promise<void>;
}

/**
 * Writes the reply for one inbound frame. Called exactly once per frame:
 * with the response bytes, or with `undefined` when nothing is sent back.
 */
export type ResponseWriter = (frame: Frame | undefined) => Promise<void>;

/**
 * Inbound frame paired with the path its reply has to take. Request/response
 * transports bind a fresh writer per frame; persistent connections share one
 * writer and rely on the RPC id for correlation.
 */
export interface ServerRequest {
  frame: Frame;
  respond: ResponseWriter;
}

/** 受信フレームの供給源。close 後に recv の反復は終端します。 */
export interface ServerTransport {
  recv(): AsyncIterable<ServerRequest>;
  close(): Promise<void>;
}
