import { isPlainObject } from './is';

/**
 * 从给定对象中移除所有值为 undefined 的字段，对普通对象和数组递归处理
 *
 * 注意：返回的对象会保留输入中的循环引用
 */
export function dropUndefinedKeys<T>(inputValue: T): T {
  // 记录已经访问过的节点对应的输出，用于处理循环引用
  const memoizationMap = new Map<unknown, unknown>();

  return _dropUndefinedKeys(inputValue, memoizationMap);
}

function _dropUndefinedKeys<T>(
  inputValue: T,
  memoizationMap: Map<unknown, unknown>,
): T;
function _dropUndefinedKeys(
  inputValue: unknown,
  memoizationMap: Map<unknown, unknown>,
): unknown {
  if (isPojo(inputValue)) {
    const memoVal = memoizationMap.get(inputValue);
    if (memoVal !== undefined) {
      return memoVal;
    }

    const returnValue: { [key: string]: unknown } = {};
    memoizationMap.set(inputValue, returnValue);

    for (const key of Object.keys(inputValue)) {
      if (typeof inputValue[key] !== 'undefined') {
        returnValue[key] = _dropUndefinedKeys(inputValue[key], memoizationMap);
      }
    }

    return returnValue;
  }

  if (Array.isArray(inputValue)) {
    const memoVal = memoizationMap.get(inputValue);
    if (memoVal !== undefined) {
      return memoVal;
    }

    const returnValue: unknown[] = [];
    memoizationMap.set(inputValue, returnValue);

    inputValue.forEach((item: unknown) => {
      returnValue.push(_dropUndefinedKeys(item, memoizationMap));
    });

    return returnValue;
  }

  return inputValue;
}

/**
 * 判断一个值是否为普通对象（构造函数是 Object 或者没有构造函数）
 */
function isPojo(input: unknown): input is Record<string, unknown> {
  if (!isPlainObject(input)) {
    return false;
  }

  try {
    const prototype: unknown = Object.getPrototypeOf(input);
    if (prototype === null) {
      return true;
    }
    const name =
      typeof prototype === 'object' &&
      'constructor' in prototype &&
      typeof prototype.constructor === 'function'
        ? prototype.constructor.name
        : '';
    return !name || name === 'Object';
  } catch {
    return true;
  }
}
