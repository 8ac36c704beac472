import type { Breadcrumb } from './breadcrumb';
import type { Context, Contexts } from './context';
import type { Event, EventHint, EventProcessor } from './event';
import type { Extra, Extras } from './misc';
import type { Request } from './request';
import type { SeverityLevel } from './severity';
import type { Transaction } from './transaction';
import type { User } from './user';

/**
 * 作用域里的数据快照
 */
export interface ScopeData {
  breadcrumbs: Breadcrumb[];
  user: User;
  tags: { [key: string]: string };
  extra: Extras;
  contexts: Contexts;
  request?: Request;
  level?: SeverityLevel;
  fingerprint: string[];
  eventProcessors: EventProcessor[];
  transaction?: Transaction;
}

/**
 * 作用域：一个工作单元（一次请求、一次页面切换）的上下文状态
 *
 * 作用域不会在并发的工作单元之间共享，每个工作单元开始时从 Hub 拿到自己的作用域
 */
export interface Scope {
  /** 复制一个新的作用域 */
  clone(): Scope;

  /**
   * 绑定事务。已经绑定了事务时什么都不做，保留原来的事务
   *
   * @returns 是否绑定成功
   */
  setTransaction(transaction: Transaction): boolean;

  /** 解除绑定的事务 */
  clearTransaction(): this;

  /** 当前绑定的事务 */
  getTransaction(): Transaction | undefined;

  /** 只读地访问当前绑定的事务 */
  withTransaction<T>(callback: (transaction: Transaction | undefined) => T): T;

  /**
   * 互斥地执行一次修改：同一个作用域上正在执行修改时，新的修改会排队，等前一个完成后再执行
   */
  runExclusive(mutator: (scope: this) => void): void;

  setUser(user: User | null): this;
  getUser(): User;

  setTag(key: string, value: string): this;
  setTags(tags: { [key: string]: string }): this;
  removeTag(key: string): this;

  setExtra(key: string, extra: Extra): this;
  setExtras(extras: Extras): this;

  /** 传入 null 会删除对应的上下文 */
  setContext(key: string, context: Context | null): this;

  setRequest(request: Request | undefined): this;
  getRequest(): Request | undefined;

  setLevel(level: SeverityLevel): this;
  setFingerprint(fingerprint: string[]): this;

  /**
   * 添加面包屑，超出上限时丢弃最旧的
   */
  addBreadcrumb(breadcrumb: Breadcrumb, maxBreadcrumbs?: number): this;
  getLastBreadcrumb(): Breadcrumb | undefined;
  clearBreadcrumbs(): this;

  addEventProcessor(callback: EventProcessor): this;

  /** 清空除了事件处理器之外的所有状态 */
  clear(): this;

  getScopeData(): ScopeData;

  /**
   * 把作用域里的数据合并到事件上，事件上已有的值不会被覆盖。
   * 任意一个事件处理器返回 null 时返回 null
   */
  applyToEvent(event: Event, hint?: EventHint): Event | null;
}
