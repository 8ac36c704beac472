import { InvalidIdentifierFormat } from './error';
import { uuid4 } from './misc';

const TRACE_ID_REGEXP = /^[0-9a-f]{32}$/;
const SPAN_ID_REGEXP = /^[0-9a-f]{16}$/;

/** 全为 0 的 trace id，只用于不会被上报的 NoOp span */
export const EMPTY_TRACE_ID = '0'.repeat(32);
/** 全为 0 的 span id，只用于不会被上报的 NoOp span */
export const EMPTY_SPAN_ID = '0'.repeat(16);

/**
 * 生成新的 trace id：16 字节，32 位小写十六进制
 */
export function generateTraceId(): string {
  return uuid4();
}

/**
 * 生成新的 span id：8 字节，16 位小写十六进制
 */
export function generateSpanId(): string {
  return uuid4().substring(16);
}

/**
 * 把字符串解析为 trace id，返回规范的小写形式
 *
 * @throws {InvalidIdentifierFormat} 长度不是 32 或者包含非十六进制字符
 */
export function parseTraceId(value: string): string {
  const normalized = value.toLowerCase();
  if (!TRACE_ID_REGEXP.test(normalized)) {
    throw new InvalidIdentifierFormat('trace', value);
  }
  return normalized;
}

/**
 * 把字符串解析为 span id，返回规范的小写形式
 *
 * @throws {InvalidIdentifierFormat} 长度不是 16 或者包含非十六进制字符
 */
export function parseSpanId(value: string): string {
  const normalized = value.toLowerCase();
  if (!SPAN_ID_REGEXP.test(normalized)) {
    throw new InvalidIdentifierFormat('span', value);
  }
  return normalized;
}

/** 是否是规范形式的 trace id */
export function isTraceId(value: unknown): value is string {
  return typeof value === 'string' && TRACE_ID_REGEXP.test(value);
}

/** 是否是规范形式的 span id */
export function isSpanId(value: unknown): value is string {
  return typeof value === 'string' && SPAN_ID_REGEXP.test(value);
}
