import type {
  Breadcrumb,
  Context,
  Contexts,
  Event,
  EventHint,
  EventProcessor,
  Extra,
  Extras,
  Request,
  Scope as ScopeInterface,
  ScopeData,
  SeverityLevel,
  Transaction,
  User,
} from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  dateTimestampInSeconds,
  logger,
} from '@lantern-monitor/utils';

/**
 * 作用域中保留的面包屑数量的默认值
 */
export const DEFAULT_MAX_BREADCRUMBS = 100;

/**
 * 一个工作单元（一次请求、一次页面切换）的上下文状态：绑定的事务、面包屑、标签、用户、请求等
 *
 * 作用域不在并发的工作单元之间共享，需要新的工作单元时通过 Hub.fork() 复制一份
 */
class ScopeClass implements ScopeInterface {
  /**
   * 绑定到作用域上的事务，最多一个
   * 作用域只持有引用，事务的生命周期由创建它的 Hub 负责
   */
  protected _transaction?: Transaction;

  /**
   * 事件处理器，按添加顺序在事件发送之前执行，返回 null 会丢弃事件
   */
  protected _eventProcessors: EventProcessor[];

  /**
   * 面包屑：事件发生之前的关键操作记录，超出上限时丢弃最旧的
   */
  protected _breadcrumbs: Breadcrumb[];

  protected _user: User;

  /**
   * 标签：简短的键值对，用来对事件分类和过滤
   */
  protected _tags: { [key: string]: string };

  protected _extra: Extras;

  protected _contexts: Contexts;

  /** 当前处理的请求 */
  protected _request?: Request;

  protected _level?: SeverityLevel;

  protected _fingerprint?: string[];

  /** 是否正在执行 runExclusive 的修改 */
  private _mutating: boolean;

  /** 排队等待执行的修改 */
  private _pendingMutators: Array<(scope: this) => void>;

  // 注意：这里添加的字段不仅要在构造函数中初始化，还要添加到 clone 方法中

  public constructor() {
    this._eventProcessors = [];
    this._breadcrumbs = [];
    this._user = {};
    this._tags = {};
    this._extra = {};
    this._contexts = {};
    this._mutating = false;
    this._pendingMutators = [];
  }

  /**
   * 复制作用域。绑定的事务引用会被保留，需要一个不带事务的作用域时再调用 clearTransaction
   * @inheritDoc
   */
  public clone(): ScopeClass {
    const newScope = new ScopeClass();
    newScope._breadcrumbs = [...this._breadcrumbs];
    newScope._tags = { ...this._tags };
    newScope._extra = { ...this._extra };
    newScope._contexts = { ...this._contexts };
    newScope._user = this._user;
    newScope._request = this._request;
    newScope._level = this._level;
    newScope._fingerprint = this._fingerprint;
    newScope._eventProcessors = [...this._eventProcessors];
    newScope._transaction = this._transaction;

    return newScope;
  }

  /**
   * 已经绑定了事务时不会覆盖，保留原来的事务
   * @inheritDoc
   */
  public setTransaction(transaction: Transaction): boolean {
    if (this._transaction) {
      DEBUG_BUILD &&
        logger.debug(
          `[Tracing] Scope already has transaction "${this._transaction.getName()}" bound, not binding "${transaction.getName()}".`,
        );
      return false;
    }
    this._transaction = transaction;
    return true;
  }

  /** @inheritDoc */
  public clearTransaction(): this {
    this._transaction = undefined;
    return this;
  }

  /** @inheritDoc */
  public getTransaction(): Transaction | undefined {
    return this._transaction;
  }

  /** @inheritDoc */
  public withTransaction<T>(
    callback: (transaction: Transaction | undefined) => T,
  ): T {
    return callback(this._transaction);
  }

  /**
   * 同一个作用域上的修改按提交顺序一个接一个地执行。
   * 修改的回调里再次提交的修改会排队，等当前修改完成之后才执行，不会看到修改了一半的作用域
   *
   * 抛出异常的修改会被记录下来，不会影响后面排队的修改
   */
  public runExclusive(mutator: (scope: this) => void): void {
    this._pendingMutators.push(mutator);
    if (this._mutating) {
      return;
    }

    this._mutating = true;
    try {
      let next = this._pendingMutators.shift();
      while (next) {
        try {
          next(this);
        } catch (error) {
          DEBUG_BUILD && logger.error('Error while configuring scope:', error);
        }
        next = this._pendingMutators.shift();
      }
    } finally {
      this._mutating = false;
    }
  }

  /**
   * 添加事件处理器，返回实例以便链式调用
   * @inheritDoc
   */
  public addEventProcessor(callback: EventProcessor): this {
    this._eventProcessors.push(callback);
    return this;
  }

  /**
   * 传入 null 时清空用户信息，但保留这些 key，这样后续处理中已有的值也会被清除
   * @inheritDoc
   */
  public setUser(user: User | null): this {
    this._user = user || {
      email: undefined,
      id: undefined,
      ip_address: undefined,
      username: undefined,
    };
    return this;
  }

  /** @inheritDoc */
  public getUser(): User {
    return this._user;
  }

  /** @inheritDoc */
  public setTags(tags: { [key: string]: string }): this {
    this._tags = {
      ...this._tags,
      ...tags,
    };
    return this;
  }

  /** @inheritDoc */
  public setTag(key: string, value: string): this {
    this._tags = { ...this._tags, [key]: value };
    return this;
  }

  /** @inheritDoc */
  public removeTag(key: string): this {
    const tags = { ...this._tags };
    delete tags[key];
    this._tags = tags;
    return this;
  }

  /** @inheritDoc */
  public setExtras(extras: Extras): this {
    this._extra = {
      ...this._extra,
      ...extras,
    };
    return this;
  }

  /** @inheritDoc */
  public setExtra(key: string, extra: Extra): this {
    this._extra = { ...this._extra, [key]: extra };
    return this;
  }

  /**
   * 传入 null 时删除对应的上下文
   * @inheritDoc
   */
  public setContext(key: string, context: Context | null): this {
    if (context === null) {
      const contexts = { ...this._contexts };
      delete contexts[key];
      this._contexts = contexts;
    } else {
      this._contexts[key] = context;
    }
    return this;
  }

  /** @inheritDoc */
  public setRequest(request: Request | undefined): this {
    this._request = request;
    return this;
  }

  /** @inheritDoc */
  public getRequest(): Request | undefined {
    return this._request;
  }

  /** @inheritDoc */
  public setLevel(level: SeverityLevel): this {
    this._level = level;
    return this;
  }

  /** @inheritDoc */
  public setFingerprint(fingerprint: string[]): this {
    this._fingerprint = fingerprint;
    return this;
  }

  /**
   * 添加面包屑并限制最大数量，超出时丢弃最旧的
   * @inheritDoc
   */
  public addBreadcrumb(breadcrumb: Breadcrumb, maxBreadcrumbs?: number): this {
    const maxCrumbs =
      typeof maxBreadcrumbs === 'number'
        ? maxBreadcrumbs
        : DEFAULT_MAX_BREADCRUMBS;

    if (maxCrumbs <= 0) {
      return this;
    }

    const mergedBreadcrumb = {
      timestamp: dateTimestampInSeconds(),
      ...breadcrumb,
    };

    const breadcrumbs = this._breadcrumbs;
    breadcrumbs.push(mergedBreadcrumb);
    this._breadcrumbs =
      breadcrumbs.length > maxCrumbs
        ? breadcrumbs.slice(-maxCrumbs)
        : breadcrumbs;

    return this;
  }

  /** @inheritDoc */
  public getLastBreadcrumb(): Breadcrumb | undefined {
    return this._breadcrumbs[this._breadcrumbs.length - 1];
  }

  /** @inheritDoc */
  public clearBreadcrumbs(): this {
    this._breadcrumbs = [];
    return this;
  }

  /**
   * 清空作用域的状态，事件处理器会保留
   * @inheritDoc
   */
  public clear(): this {
    this._breadcrumbs = [];
    this._tags = {};
    this._extra = {};
    this._user = {};
    this._contexts = {};
    this._request = undefined;
    this._level = undefined;
    this._fingerprint = undefined;
    this._transaction = undefined;
    return this;
  }

  /** @inheritDoc */
  public getScopeData(): ScopeData {
    return {
      breadcrumbs: [...this._breadcrumbs],
      user: { ...this._user },
      tags: { ...this._tags },
      extra: { ...this._extra },
      contexts: { ...this._contexts },
      request: this._request,
      level: this._level,
      fingerprint: this._fingerprint ? [...this._fingerprint] : [],
      eventProcessors: [...this._eventProcessors],
      transaction: this._transaction,
    };
  }

  /**
   * 把作用域中的数据合并到事件上，事件上已有的值优先。
   * 错误事件还会带上绑定事务的链路信息，这样错误可以和事务关联起来
   *
   * @returns 合并后的新事件，被事件处理器丢弃时为 null
   */
  public applyToEvent(event: Event, hint: EventHint = {}): Event | null {
    const processed: Event = { ...event };

    if (Object.keys(this._tags).length) {
      processed.tags = { ...this._tags, ...event.tags };
    }
    if (Object.keys(this._extra).length) {
      processed.extra = { ...this._extra, ...event.extra };
    }
    if (Object.keys(this._user).length) {
      processed.user = { ...this._user, ...event.user };
    }
    if (Object.keys(this._contexts).length) {
      processed.contexts = { ...this._contexts, ...event.contexts };
    }
    if (this._request && !event.request) {
      processed.request = this._request;
    }

    if (processed.type === 'event') {
      if (this._level && !event.level) {
        processed.level = this._level;
      }
      if (this._fingerprint && !event.fingerprint) {
        processed.fingerprint = this._fingerprint;
      }
      if (this._breadcrumbs.length) {
        processed.breadcrumbs = [
          ...this._breadcrumbs,
          ...(event.breadcrumbs || []),
        ];
      }
      this._applyTransactionToEvent(processed);
    }

    let result: Event = processed;
    for (const processor of this._eventProcessors) {
      const next = processor(result, hint);
      if (next === null) {
        DEBUG_BUILD && logger.log('Event processor dropped the event.');
        return null;
      }
      result = next;
    }

    return result;
  }

  /**
   * 把绑定事务的链路信息写入错误事件的 contexts.trace，并在事件没有名称时使用事务的名称
   */
  private _applyTransactionToEvent(event: Event): void {
    const transaction = this._transaction;
    if (!transaction) {
      return;
    }

    if (!event.contexts || !event.contexts.trace) {
      const { traceId, spanId, parentSpanId, op, sampled } =
        transaction.spanContext();
      event.contexts = {
        ...event.contexts,
        trace: {
          trace_id: traceId,
          span_id: spanId,
          parent_span_id: parentSpanId,
          op,
          sampled,
        },
      };
    }

    if (!event.transaction) {
      event.transaction = transaction.getName();
    }
  }
}

/**
 * Scope 既作为类导出又作为类型导出：
 * 运行时用类来创建实例，其他包通过 import type { Scope } 只拿到接口
 */
export const Scope = ScopeClass;

export type Scope = ScopeInterface;
