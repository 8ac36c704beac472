import type { Event, Exception, Mechanism } from '@lantern-monitor/types';

import { GLOBAL_OBJ } from './worldwide';

/**
 * 生成 UUIDv4，去掉中间的破折号，得到 32 位小写十六进制字符串
 *
 * 这里只要求唯一，不要求不可预测
 *
 * @returns string Generated UUID4.
 */
export function uuid4(): string {
  const crypto = GLOBAL_OBJ.crypto;

  // 默认使用 Math.random() 生成 0 到 16 之间的随机数
  let getRandomByte = (): number => Math.random() * 16;
  try {
    // 支持 randomUUID 时直接使用，并去掉其中的破折号
    if (crypto && crypto.randomUUID) {
      return crypto.randomUUID().replace(/-/g, '');
    }

    if (crypto && crypto.getRandomValues) {
      getRandomByte = () => {
        const typedArray = new Uint8Array(1);
        crypto.getRandomValues(typedArray);
        return typedArray[0] ?? Math.random() * 16;
      };
    }
  } catch (_) {
    // 某些运行时调用 crypto 会直接崩溃，此时退回到 Math.random
  }

  /**
   * UUIDv4 的结构是 xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
   * 先拼出模板 10000000100040008000100000000000，再把其中的 0、1、8 替换为随机的十六进制数字
   */
  return (String(1e7) + 1e3 + 4e3 + 8e3 + 1e11).replace(/[018]/g, (c) =>
    // eslint-disable-next-line no-bitwise
    (Number(c) ^ ((getRandomByte() & 15) >> (Number(c) / 4))).toString(16),
  );
}

function getFirstException(event: Event): Exception | undefined {
  return event.exception && event.exception.values
    ? event.exception.values[0]
    : undefined;
}

/**
 * 从事件中提取一段可读的描述，用于日志
 *
 * @returns event's description
 */
export function getEventDescription(event: Event): string {
  const { message, event_id: eventId } = event;
  if (message) {
    return message;
  }

  if (event.type === 'transaction') {
    return event.transaction;
  }

  const firstException = getFirstException(event);
  if (firstException) {
    if (firstException.type && firstException.value) {
      return `${firstException.type}: ${firstException.value}`;
    }
    return (
      firstException.type || firstException.value || eventId || '<unknown>'
    );
  }
  return eventId || '<unknown>';
}

/**
 * 给事件中的第一个异常补充捕获机制，已有的字段不会被覆盖
 *
 * @param event 要修改的事件
 * @param newMechanism 要合并的机制信息
 */
export function addExceptionMechanism(
  event: Event,
  newMechanism?: Partial<Mechanism>,
): void {
  const firstException = getFirstException(event);
  if (!firstException) {
    return;
  }

  const defaultMechanism = { type: 'generic', handled: true };
  const currentMechanism = firstException.mechanism;
  firstException.mechanism = {
    ...defaultMechanism,
    ...currentMechanism,
    ...newMechanism,
  };

  if (newMechanism && 'data' in newMechanism) {
    const mergedData = {
      ...(currentMechanism && currentMechanism.data),
      ...newMechanism.data,
    };
    firstException.mechanism.data = mergedData;
  }
}
