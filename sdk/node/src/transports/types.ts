import type { BaseTransportOptions } from '@lantern-monitor/types';

/**
 * 发送请求用的 fetch 实现，默认为 node 自带的 fetch
 */
export type FetchImpl = (
  url: string,
  init: {
    method: string;
    body: string;
    headers: { [key: string]: string };
  },
) => PromiseLike<{ status: number }>;

export interface NodeTransportOptions extends BaseTransportOptions {
  /** 事件的接收地址 */
  url: string;
  /** 随请求发送的额外头部，例如鉴权信息 */
  headers?: { [key: string]: string };
  /** 替换默认的 fetch，测试中用它来拦截请求 */
  fetchImpl?: FetchImpl;
}
