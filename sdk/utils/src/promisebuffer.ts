import { LanternError } from './error';

export interface PromiseBuffer<T> {
  // 暴露内部数组，测试里用来断言缓冲区状态
  $: Array<PromiseLike<T>>;
  add(taskProducer: () => PromiseLike<T>): PromiseLike<T>;
  drain(timeout?: number): PromiseLike<boolean>;
}

/**
 * 创建一个 Promise 缓冲区，限制同时进行中的 Promise 数量，并提供添加任务和等待全部完成的方法
 *
 * @param limit 缓冲区中允许的最大 Promise 数量，超过限制时新的任务不会被执行
 */
export function makePromiseBuffer<T>(limit?: number): PromiseBuffer<T> {
  const buffer: Array<PromiseLike<T>> = [];

  /** 判断缓冲区是否可以接受新的 promise */
  function isReady(): boolean {
    return limit === undefined || buffer.length < limit;
  }

  /** 从队列中移除指定 promise */
  function remove(task: PromiseLike<T>): void {
    const index = buffer.indexOf(task);
    if (index !== -1) {
      buffer.splice(index, 1);
    }
  }

  /**
   * 将任务添加到队列，并在任务完成时自动移除自己
   *
   * @param taskProducer 生产 Promise 的函数。
   *        只有确认缓冲区还有空间时才会调用它，缓冲区已满时任务根本不会开始执行
   *
   * @returns 任务本身的 promise
   */
  function add(taskProducer: () => PromiseLike<T>): PromiseLike<T> {
    if (!isReady()) {
      return Promise.reject(
        new LanternError('Not adding Promise because buffer limit was reached.'),
      );
    }

    const task = taskProducer();
    if (buffer.indexOf(task) === -1) {
      buffer.push(task);
    }
    // PromiseLike 没有 catch()，用 then(onFulfilled, onRejected) 处理两种结果
    void Promise.resolve(task).then(
      () => remove(task),
      () => remove(task),
    );
    return task;
  }

  /**
   * 等待缓冲区中的所有任务完成。
   * 所有任务在超时前完成时返回 true，否则返回 false
   *
   * @param timeout 为 0 或不传时一直等到所有任务完成
   */
  function drain(timeout?: number): PromiseLike<boolean> {
    return new Promise<boolean>((resolve) => {
      let counter = buffer.length;

      if (!counter) {
        resolve(true);
        return;
      }

      const capturedSetTimeout =
        timeout && timeout > 0
          ? setTimeout(() => resolve(false), timeout)
          : undefined;

      const settle = (): void => {
        if (!--counter) {
          clearTimeout(capturedSetTimeout);
          resolve(true);
        }
      };

      // 失败的任务也算作已完成，drain 只关心缓冲区是否清空
      buffer.forEach((item) => {
        void Promise.resolve(item).then(settle, settle);
      });
    });
  }

  return {
    $: buffer,
    add,
    drain,
  };
}
