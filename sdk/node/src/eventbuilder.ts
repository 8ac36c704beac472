import type {
  ErrorEvent,
  EventHint,
  Exception,
  Extras,
  SeverityLevel,
} from '@lantern-monitor/types';
import {
  addExceptionMechanism,
  isError,
  isPlainObject,
} from '@lantern-monitor/utils';

/**
 * 把 Error 转换为异常信息，堆栈保留原始字符串，不做解析
 */
export function exceptionFromError(error: Error): Exception {
  const exception: Exception = {
    type: error.name || error.constructor.name,
    value: error.message,
  };

  if (error.stack) {
    exception.stack = error.stack;
  }

  return exception;
}

/**
 * 从任意值构建错误事件
 *
 * - Error 直接转换
 * - 普通对象序列化到 extra 中，并生成一条描述它的 key 的消息
 * - 其他值转为字符串，堆栈取自 hint 中的合成异常
 *
 * 后两种情况的 mechanism 会标记为 synthetic
 */
export function eventFromException(
  exception: unknown,
  hint?: EventHint,
): ErrorEvent {
  let value: Exception;
  let extra: Extras | undefined;
  let synthetic = false;

  if (isError(exception)) {
    value = exceptionFromError(exception);
  } else if (isPlainObject(exception)) {
    const keys = Object.keys(exception).sort();
    value = {
      type: 'Error',
      value: `Object captured as exception with keys: ${keys.join(', ')}`,
    };
    extra = { __serialized__: exception };
    synthetic = true;
  } else {
    value = { type: 'Error', value: String(exception) };
    synthetic = true;
  }

  const syntheticStack =
    hint && hint.syntheticException && hint.syntheticException.stack;
  if (synthetic && syntheticStack) {
    value.stack = syntheticStack;
  }

  const event: ErrorEvent = {
    type: 'event',
    exception: {
      values: [value],
    },
  };

  if (extra) {
    event.extra = extra;
  }

  addExceptionMechanism(event, {
    type: 'generic',
    handled: true,
    ...(synthetic && { synthetic: true }),
    ...(hint && hint.mechanism),
  });

  return event;
}

/**
 * 从消息构建错误事件
 */
export function eventFromMessage(
  message: string,
  level: SeverityLevel = 'info',
): ErrorEvent {
  return {
    type: 'event',
    message,
    level,
  };
}
