import type { Hub } from '@lantern-monitor/core';
import { isThenable } from '@lantern-monitor/utils';

export interface WrapContext {
  /** 事务名称，默认为函数名 */
  name?: string;
  /**
   * 事务的操作类型
   * @default 'function'
   */
  op?: string;
}

/**
 * 在一个事务中执行函数，适用于定时任务、消息消费者这类不经过 http 的入口
 *
 * 作用域上已经绑定了事务时直接执行函数，不会创建新的事务。
 * 否则开始一个绑定到作用域的事务，函数正常返回（或者返回的 promise 完成）时以 ok 结束，
 * 抛出异常（或者 promise 被拒绝）时以 internal_error 结束，异常会原样抛出
 */
export function wrapInTransaction<T>(
  hub: Hub,
  context: WrapContext,
  fn: () => Promise<T>,
): Promise<T>;
export function wrapInTransaction<T>(
  hub: Hub,
  context: WrapContext,
  fn: () => T,
): T;
export function wrapInTransaction(
  hub: Hub,
  context: WrapContext,
  fn: () => unknown,
): unknown {
  const hasTransaction = hub.withTransaction(
    (transaction) => transaction !== undefined,
  );
  if (hasTransaction) {
    return fn();
  }

  const transaction = hub.startTransaction(
    context.name || fn.name || '<anonymous>',
    context.op || 'function',
    undefined,
    true,
  );

  let result: unknown;
  try {
    result = fn();
  } catch (error) {
    transaction.finish('internal_error');
    throw error;
  }

  if (isThenable(result)) {
    return Promise.resolve(result).then(
      (value) => {
        transaction.finish();
        return value;
      },
      (error: unknown) => {
        transaction.finish('internal_error');
        throw error;
      },
    );
  }

  transaction.finish();
  return result;
}
