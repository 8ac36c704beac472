import type { SpanStatusType } from './span';

export type Context = Record<string, unknown>;

/**
 * 事件的上下文集合，trace 和 runtime 是 SDK 自己会写入的两个
 */
export interface Contexts extends Record<string, Context | undefined> {
  trace?: TraceContext;
  runtime?: RuntimeContext;
}

/**
 * 运行时的信息，例如 node 的名称和版本
 */
export interface RuntimeContext extends Record<string, unknown> {
  /** 运行时名称，例如 node */
  name?: string;
  /** 运行时版本，例如 v20.11.0 */
  version?: string;
  /**
   * 无法拆分成 name / version 时使用的原始描述
   */
  raw_description?: string;
}

/**
 * 事件所属的链路信息，对事务事件而言就是事务本身的根 span
 */
export interface TraceContext extends Record<string, unknown> {
  trace_id: string;
  span_id: string;
  parent_span_id?: string;
  op?: string;
  description?: string;
  status?: SpanStatusType;
  sampled?: boolean;
  tags?: { [key: string]: string };
  data?: { [key: string]: unknown };
}
