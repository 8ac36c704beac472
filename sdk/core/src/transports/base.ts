import type {
  BaseTransportOptions,
  Event,
  Transport,
  TransportMakeRequestResponse,
  TransportRequestExecutor,
} from '@lantern-monitor/types';
import type { PromiseBuffer } from '@lantern-monitor/utils';
import {
  DEBUG_BUILD,
  LanternError,
  logger,
  makePromiseBuffer,
} from '@lantern-monitor/utils';

export const DEFAULT_TRANSPORT_BUFFER_SIZE = 64;

/**
 * 创建 Transport 实例，负责把事件发送出进程
 *
 * 事件序列化为 json 之后交给 makeRequest，同时在途的请求数量由 Promise 缓冲区限制，
 * 缓冲区满时新的事件会被丢弃并记录一条错误日志
 *
 * @param options 配置选项，例如缓冲区大小
 * @param makeRequest 发送请求的执行函数，由各平台的 transport 提供
 * @param buffer Promise 缓冲区，用于限制并发的请求数量
 */
export function createTransport(
  options: BaseTransportOptions,
  makeRequest: TransportRequestExecutor,
  buffer: PromiseBuffer<TransportMakeRequestResponse> = makePromiseBuffer(
    options.bufferSize || DEFAULT_TRANSPORT_BUFFER_SIZE,
  ),
): Transport {
  const flush = (timeout?: number): PromiseLike<boolean> =>
    buffer.drain(timeout);

  function send(event: Event): PromiseLike<TransportMakeRequestResponse> {
    const requestTask = (): PromiseLike<TransportMakeRequestResponse> =>
      makeRequest({ body: JSON.stringify(event) }).then((response) => {
        // 服务端返回非 2xx 时不抛出，只记录日志
        if (
          response.statusCode !== undefined &&
          (response.statusCode < 200 || response.statusCode >= 300)
        ) {
          DEBUG_BUILD &&
            logger.warn(
              `Collector responded with status code ${response.statusCode} to sent ${event.type}.`,
            );
        }
        return response;
      });

    return buffer.add(requestTask).then(
      (result) => result,
      (error: unknown) => {
        // 缓冲区满了会抛出 LanternError
        if (error instanceof LanternError) {
          DEBUG_BUILD &&
            logger.error(
              `Skipped sending ${event.type} because buffer is full.`,
            );
          return {};
        }
        throw error;
      },
    );
  }

  return {
    send,
    flush,
  };
}
