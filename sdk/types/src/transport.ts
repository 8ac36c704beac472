import type { Event } from './event';

export interface TransportRequest {
  body: string;
}

export interface TransportMakeRequestResponse {
  statusCode?: number;
}

export type TransportRequestExecutor = (
  request: TransportRequest,
) => PromiseLike<TransportMakeRequestResponse>;

export interface BaseTransportOptions {
  /** 同时在途的请求上限，超过后新的事件会被丢弃 */
  bufferSize?: number;
}

/**
 * 上报管道：接收一个完整的事件（错误事件或事务事件），负责把它送出进程
 */
export interface Transport {
  send(event: Event): PromiseLike<TransportMakeRequestResponse>;
  /**
   * 等待所有在途的请求完成
   *
   * @param timeout 超时时间（毫秒），超时返回 false
   */
  flush(timeout?: number): PromiseLike<boolean>;
}
