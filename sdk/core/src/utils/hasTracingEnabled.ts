import type { ClientOptions } from '@lantern-monitor/types';

// 构建时可以把 __LANTERN_TRACING__ 定义为 false，移除所有的追踪逻辑
declare const __LANTERN_TRACING__: boolean | undefined;

/**
 * 检查是否启用了追踪功能
 * 配置了 tracesSampleRate 和 tracesSampler 中的至少一个时启用
 */
export function hasTracingEnabled(
  options?: Pick<ClientOptions, 'tracesSampleRate' | 'tracesSampler'>,
): boolean {
  if (typeof __LANTERN_TRACING__ === 'boolean' && !__LANTERN_TRACING__) {
    return false;
  }

  return (
    !!options &&
    (options.tracesSampleRate !== undefined ||
      typeof options.tracesSampler === 'function')
  );
}
