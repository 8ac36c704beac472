import type { Mechanism } from './mechanism';

/**
 * 存储和传递关于异常的详细信息
 */
export interface Exception {
  /**
   * 异常的类型，通常是异常类的名称，例如 "TypeError"
   */
  type?: string;
  /**
   * 异常的描述信息，通常是抛出错误时提供的消息
   */
  value?: string;
  /**
   * 异常的捕获机制
   */
  mechanism?: Mechanism;
  /**
   * 原始的堆栈字符串，不做解析
   */
  stack?: string;
}
