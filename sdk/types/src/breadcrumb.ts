import type { SeverityLevel } from './severity';

/**
 * 面包屑用来记录问题发生之前的一条事件轨迹，帮助开发者回溯并分析问题的根源。
 *
 * 与传统日志相比，面包屑是结构化的：类型、级别、类别、时间戳以及与事件相关的上下文数据。
 */
export interface Breadcrumb {
  /**
   * 面包屑的类型，默认是 default。
   * 生命周期相关的面包屑使用 navigation
   */
  type?: string;

  /**
   * 严重性级别，默认值是 info
   */
  level?: SeverityLevel;

  event_id?: string;

  /**
   * 描述面包屑来源的点分字符串，例如 ui.lifecycle、http
   */
  category?: string;

  /**
   * 面包屑的可读消息
   */
  message?: string;

  /**
   * 与面包屑相关的任意数据，内容依赖于面包屑的类型
   */
  data?: { [key: string]: unknown };

  /**
   * 面包屑发生的时间，自 Unix 纪元以来的秒数（可以是浮点数）
   */
  timestamp?: number;
}

/**
 * 创建面包屑时额外传递的上下文，只会交给 beforeBreadcrumb，不会上报
 */
export interface BreadcrumbHint {
  [key: string]: unknown;
}
