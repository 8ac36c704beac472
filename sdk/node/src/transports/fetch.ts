import type {
  Transport,
  TransportMakeRequestResponse,
  TransportRequest,
} from '@lantern-monitor/types';
import { createTransport } from '@lantern-monitor/core';

import type { FetchImpl, NodeTransportOptions } from './types';

/**
 * 基于 fetch 的 transport，把事件以 json 的形式 POST 到 options.url
 *
 * @param options transport 的配置
 */
export function makeFetchTransport(options: NodeTransportOptions): Transport {
  const fetchImpl: FetchImpl | undefined =
    options.fetchImpl ||
    (typeof globalThis.fetch === 'function' ? globalThis.fetch : undefined);

  function makeRequest(
    request: TransportRequest,
  ): PromiseLike<TransportMakeRequestResponse> {
    if (!fetchImpl) {
      return Promise.reject(new Error('No fetch implementation available'));
    }

    const requestOptions = {
      body: request.body,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
    };

    try {
      return fetchImpl(options.url, requestOptions).then((response) => ({
        statusCode: response.status,
      }));
    } catch (e) {
      return Promise.reject(e);
    }
  }

  return createTransport(options, makeRequest);
}
