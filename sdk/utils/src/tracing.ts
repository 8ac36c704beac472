import type { SpanContext, TraceparentData } from '@lantern-monitor/types';

import { DEBUG_BUILD } from './debug-build';
import { MalformedTraceHeader } from './error';
import { parseSpanId, parseTraceId } from './ids';
import { logger } from './logger';

/** 传播链路信息的 http 头部名称 */
export const SENTRY_TRACE_HEADER = 'sentry-trace';

/**
 * 解码 sentry-trace 头部
 *
 * 格式为 `<traceId>-<spanId>[-<sampled>]`：
 * - traceId: 32 位十六进制
 * - spanId: 调用方 span 的 16 位十六进制 ID，会成为新事务的 parentSpanId
 * - sampled: 可选，`1` 或 `0`，表示上游是否采样了这条链路
 *
 * @throws {MalformedTraceHeader} 头部不符合上面的格式
 */
export function decodeTraceHeader(headerValue: string): TraceparentData {
  // 允许首尾的空格和制表符
  const segments = headerValue.replace(/^[ \t]+|[ \t]+$/g, '').split('-');

  if (segments.length !== 2 && segments.length !== 3) {
    throw new MalformedTraceHeader(
      headerValue,
      `expected 2 or 3 segments, got ${segments.length}`,
    );
  }

  const [rawTraceId = '', rawSpanId = '', rawSampled] = segments;

  let traceId: string;
  let parentSpanId: string;
  try {
    traceId = parseTraceId(rawTraceId);
    parentSpanId = parseSpanId(rawSpanId);
  } catch (error) {
    throw new MalformedTraceHeader(headerValue, 'invalid identifier', error);
  }

  // 检查采样标志，只接受 '1' 和 '0'
  let parentSampled: boolean | undefined;
  if (rawSampled === '1') {
    parentSampled = true;
  } else if (rawSampled === '0') {
    parentSampled = false;
  } else if (rawSampled !== undefined) {
    throw new MalformedTraceHeader(
      headerValue,
      `sampled flag must be "0" or "1", got ${JSON.stringify(rawSampled)}`,
    );
  }

  return {
    traceId,
    parentSpanId,
    parentSampled,
  };
}

/**
 * 把 span 的身份信息编码为 sentry-trace 头部的值，采样决策未知时省略第三段
 */
export function encodeTraceHeader({
  traceId,
  spanId,
  sampled,
}: Pick<SpanContext, 'traceId' | 'spanId' | 'sampled'>): string {
  let sampledString = '';
  if (sampled !== undefined) {
    sampledString = sampled ? '-1' : '-0';
  }
  return `${traceId}-${spanId}${sampledString}`;
}

/**
 * 宽松版本的解码：头部缺失或者格式错误时返回 undefined，格式错误会记录一条警告
 *
 * @param traceparent sentry-trace 头部的值
 * @returns 头部中的数据，头部缺失或格式错误时为 undefined
 */
export function extractTraceparentData(
  traceparent?: string | string[] | null,
): TraceparentData | undefined {
  // 同名头部出现多次时只取第一个
  const value = Array.isArray(traceparent) ? traceparent[0] : traceparent;
  if (!value) {
    return undefined;
  }

  try {
    return decodeTraceHeader(value);
  } catch (error) {
    DEBUG_BUILD &&
      logger.warn(
        '[Tracing] Ignoring incoming trace header:',
        error instanceof Error ? error.message : error,
      );
    return undefined;
  }
}
