import type { Primitive } from '@lantern-monitor/types';

const objectToString = Object.prototype.toString;

/**
 * 检查传入的是否符合 Promise A+ 规范，也就是检查是否为 promise
 */
export function isThenable(wat: unknown): wat is PromiseLike<unknown> {
  return (
    typeof wat === 'object' &&
    wat !== null &&
    'then' in wat &&
    typeof wat.then === 'function'
  );
}

/**
 * 用于检查一个给定的值是否是特定内置类（如 Array、Date、RegExp 等）
 */
function isBuiltin(wat: unknown, className: string): boolean {
  return objectToString.call(wat) === `[object ${className}]`;
}

/**
 * 用于检查一个给定的值是否是一个普通对象字面量或类实例
 */
export function isPlainObject(wat: unknown): wat is Record<string, unknown> {
  return isBuiltin(wat, 'Object');
}

/**
 * 检查给定的值是否是 Error 或者它的子类
 */
export function isError(wat: unknown): wat is Error {
  switch (objectToString.call(wat)) {
    case '[object Error]':
    case '[object Exception]':
    case '[object DOMException]':
      return true;
    default:
      return wat instanceof Error;
  }
}

/**
 * 检查给定的值是否是原始值
 */
export function isPrimitive(wat: unknown): wat is Primitive {
  return (
    wat === null || (typeof wat !== 'object' && typeof wat !== 'function')
  );
}
