/**
 * 描述异常是怎么被捕获的
 */
export interface Mechanism {
  /**
   * 捕获方式，例如:
   * - generic: 通过 captureException 手动捕获
   * - middleware: 由 http 中间件捕获
   * - function: 由 wrapInTransaction 捕获
   */
  type: string;

  /**
   * 异常是否已经被用户代码处理
   */
  handled?: boolean;

  /** 与捕获方式相关的任意数据 */
  data?: {
    [key: string]: string | boolean;
  };

  /**
   * 传入 captureException 的不是 Error 实例时为 true，表示这是一个合成的异常
   */
  synthetic?: boolean;
}
