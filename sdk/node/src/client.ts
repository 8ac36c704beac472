import type {
  ClientOptions,
  ErrorEvent,
  Event,
  EventHint,
  Scope,
  SeverityLevel,
} from '@lantern-monitor/types';
import { BaseClient, applySdkMetadata } from '@lantern-monitor/core';

import { eventFromException, eventFromMessage } from './eventbuilder';
import type { NodeTransportOptions } from './transports/types';

/**
 * node client 的配置
 */
export type NodeClientOptions = ClientOptions<NodeTransportOptions>;

/**
 * node 平台的 client：事件的 platform 为 node，并带上运行时的名称和版本
 */
export class NodeClient extends BaseClient<NodeClientOptions> {
  /**
   * @param options client 的配置
   * @throws {SamplingConfigurationError} tracesSampleRate 无效
   */
  public constructor(options: NodeClientOptions) {
    const opts: NodeClientOptions = {
      platform: 'node',
      ...options,
    };

    applySdkMetadata(opts, 'node');

    super(opts);
  }

  /** @inheritDoc */
  public eventFromException(exception: unknown, hint?: EventHint): ErrorEvent {
    return eventFromException(exception, hint);
  }

  /** @inheritDoc */
  public eventFromMessage(
    message: string,
    level: SeverityLevel = 'info',
  ): ErrorEvent {
    return eventFromMessage(message, level);
  }

  /**
   * 为事件补充运行时信息，事件上已有的 runtime 上下文优先
   * @inheritDoc
   */
  protected _prepareEvent(
    event: Event,
    hint: EventHint,
    scope?: Scope,
  ): Event | null {
    const contexts = event.contexts || {};
    const nodeEvent: Event = {
      ...event,
      contexts: {
        ...contexts,
        runtime: contexts.runtime || {
          name: 'node',
          version: process.version,
        },
      },
    };

    return super._prepareEvent(nodeEvent, hint, scope);
  }
}
