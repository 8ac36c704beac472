/**
 * SDK 在全局对象上会用到的属性
 *
 * 这里只描述属性的形状，SDK 不会在全局对象上存放任何状态：作用域和客户端都由 Hub 显式持有
 */
export type InternalGlobal = {
  console: Console;
  crypto?: {
    getRandomValues(array: Uint8Array): Uint8Array;
    randomUUID?(): string;
  };
  performance?: {
    now(): number;
    timeOrigin?: number;
  };
};

/** 运行环境的全局对象，node 中就是 globalThis */
export const GLOBAL_OBJ = globalThis as unknown as InternalGlobal;
