import type { Transaction } from '@lantern-monitor/types';
import { DEBUG_BUILD, logger } from '@lantern-monitor/utils';

import type { Hub } from './hub';
import { hasTracingEnabled } from './utils/hasTracingEnabled';

export interface LifecycleTrackerOptions {
  /**
   * ready 时是否自动结束事务，为 false 时只有 end 才会结束
   * @default true
   */
  autoFinish?: boolean;
  /**
   * 是否为生命周期的每个阶段记录面包屑
   * @default true
   */
  breadcrumbs?: boolean;
  /**
   * 事务的操作类型
   * @default 'navigation'
   */
  op?: string;
}

interface TrackedLifecycle {
  name: string;
  transaction?: Transaction;
}

/**
 * 把宿主的生命周期回调（页面、activity、后台任务）转换为事务
 *
 * 用生命周期自己的 ID 而不是宿主对象作为 key，并且在 end 时显式移除，不依赖垃圾回收来清理
 *
 * @example
 * const tracker = new LifecycleTracker(hub);
 * tracker.begin('checkout#1', 'CheckoutScreen');
 * tracker.mark('checkout#1', 'started');
 * tracker.ready('checkout#1');
 * tracker.end('checkout#1');
 */
export class LifecycleTracker {
  private readonly _hub: Hub;
  private readonly _autoFinish: boolean;
  private readonly _breadcrumbs: boolean;
  private readonly _op: string;
  private readonly _lifecycles: Map<string, TrackedLifecycle>;

  public constructor(hub: Hub, options: LifecycleTrackerOptions = {}) {
    this._hub = hub;
    this._autoFinish = options.autoFinish !== false;
    this._breadcrumbs = options.breadcrumbs !== false;
    this._op = options.op || 'navigation';
    this._lifecycles = new Map();
  }

  /**
   * 生命周期开始：结束其他还在进行中的事务，然后为它开始一个新的事务。
   * 作用域上没有绑定事务时才会绑定这个事务
   *
   * @param id 生命周期的唯一标识
   * @param name 事务名称，同时作为面包屑中的 screen
   * @returns 新开始的事务，或者这个 id 已经在进行中的事务。没有启用追踪时为 undefined
   */
  public begin(id: string, name: string): Transaction | undefined {
    const existing = this._lifecycles.get(id);
    if (
      existing &&
      existing.transaction &&
      !existing.transaction.isFinished()
    ) {
      return existing.transaction;
    }

    const lifecycle: TrackedLifecycle = { name };
    this._lifecycles.set(id, lifecycle);
    this._addBreadcrumb(lifecycle, 'created');

    const client = this._hub.getClient();
    if (
      !this._hub.isEnabled() ||
      !hasTracingEnabled(client && client.getOptions())
    ) {
      return undefined;
    }

    this._finishOthers(id);

    lifecycle.transaction = this._hub.startTransaction(
      name,
      this._op,
      undefined,
      true,
    );
    return lifecycle.transaction;
  }

  /**
   * 记录生命周期的一个阶段，例如 started、paused
   */
  public mark(id: string, state: string): void {
    const lifecycle = this._lifecycles.get(id);
    this._addBreadcrumb(lifecycle || { name: id }, state);
  }

  /**
   * 生命周期进入可交互状态，autoFinish 为 true 时结束事务
   */
  public ready(id: string): void {
    if (!this._autoFinish) {
      return;
    }
    const lifecycle = this._lifecycles.get(id);
    if (lifecycle && lifecycle.transaction) {
      lifecycle.transaction.finish();
    }
  }

  /**
   * 生命周期结束：无论 autoFinish 如何都会结束事务，并移除这个 id
   */
  public end(id: string): void {
    const lifecycle = this._lifecycles.get(id);
    if (!lifecycle) {
      DEBUG_BUILD && logger.debug(`[Tracing] Unknown lifecycle "${id}" ended.`);
      return;
    }

    this._addBreadcrumb(lifecycle, 'destroyed');
    if (lifecycle.transaction) {
      lifecycle.transaction.finish();
    }
    this._lifecycles.delete(id);
  }

  /** 当前 id 对应的事务 */
  public getTransaction(id: string): Transaction | undefined {
    const lifecycle = this._lifecycles.get(id);
    return lifecycle && lifecycle.transaction;
  }

  /**
   * 结束所有事务并清空
   */
  public close(): void {
    this._lifecycles.forEach((lifecycle) => {
      if (lifecycle.transaction && !lifecycle.transaction.isFinished()) {
        lifecycle.transaction.finish();
      }
    });
    this._lifecycles.clear();
  }

  /**
   * 结束其他生命周期上还在进行中的事务，状态沿用之前设置的，默认为 ok
   */
  private _finishOthers(id: string): void {
    this._lifecycles.forEach((lifecycle, otherId) => {
      const transaction = lifecycle.transaction;
      if (otherId !== id && transaction && !transaction.isFinished()) {
        transaction.finish();
      }
    });
  }

  private _addBreadcrumb(lifecycle: TrackedLifecycle, state: string): void {
    if (!this._breadcrumbs) {
      return;
    }
    this._hub.addBreadcrumb({
      type: 'navigation',
      category: 'ui.lifecycle',
      level: 'info',
      data: {
        state,
        screen: lifecycle.name,
      },
    });
  }
}
