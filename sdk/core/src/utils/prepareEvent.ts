import type {
  ClientOptions,
  Event,
  EventHint,
  Scope,
} from '@lantern-monitor/types';
import {
  addExceptionMechanism,
  dateTimestampInSeconds,
  dropUndefinedKeys,
  truncate,
  uuid4,
} from '@lantern-monitor/utils';

/** 没有配置 environment 时使用的默认值 */
export const DEFAULT_ENVIRONMENT = 'production';

/**
 * 在事件发送之前把它加工完整：
 * 补充事件 ID 和时间戳，写入 client 的配置（environment、release 等），
 * 合并作用域中的数据并执行事件处理器
 *
 * @param options client 的配置
 * @param event 原始事件
 * @param hint 事件的附加信息
 * @param scope 合并到事件上的作用域
 * @returns 加工完成的新事件，被事件处理器丢弃时返回 null
 */
export function prepareEvent(
  options: ClientOptions,
  event: Event,
  hint: EventHint,
  scope?: Scope,
): Event | null {
  const prepared: Event = {
    ...event,
    event_id: event.event_id || hint.event_id || uuid4(),
    timestamp: event.timestamp || dateTimestampInSeconds(),
  };

  applyClientOptions(prepared, options);

  const exceptionValues = prepared.exception && prepared.exception.values;
  if (hint.mechanism && exceptionValues) {
    // mechanism 写在异常对象上，先复制一份，不修改调用方的事件
    prepared.exception = {
      ...prepared.exception,
      values: exceptionValues.map((exception) => ({ ...exception })),
    };
    addExceptionMechanism(prepared, hint.mechanism);
  }

  const result = scope ? scope.applyToEvent(prepared, hint) : prepared;
  if (!result) {
    return null;
  }

  // 作用域写入的 request 同样需要截断，所以放在合并作用域之后
  return dropUndefinedKeys(
    truncateEventValues(result, options.maxValueLength ?? 250),
  );
}

/**
 * 把 client 的配置写入事件，事件上已有的值优先
 */
function applyClientOptions(event: Event, options: ClientOptions): void {
  const { environment, release, dist, serverName, platform } = options;

  if (event.environment === undefined) {
    event.environment = environment || DEFAULT_ENVIRONMENT;
  }

  if (event.release === undefined && release !== undefined) {
    event.release = release;
  }

  if (event.dist === undefined && dist !== undefined) {
    event.dist = dist;
  }

  if (event.server_name === undefined && serverName !== undefined) {
    event.server_name = serverName;
  }

  if (event.platform === undefined && platform !== undefined) {
    event.platform = platform;
  }

  if (event.sdk === undefined && options._metadata && options._metadata.sdk) {
    event.sdk = { ...options._metadata.sdk };
  }
}

/**
 * 截断 message、异常描述和请求 url，返回新的事件，不修改嵌套的对象
 */
function truncateEventValues(event: Event, maxValueLength: number): Event {
  const truncated: Event = { ...event };

  if (event.message) {
    truncated.message = truncate(event.message, maxValueLength);
  }

  const values = event.exception && event.exception.values;
  if (values) {
    truncated.exception = {
      ...event.exception,
      values: values.map((exception) =>
        exception.value
          ? { ...exception, value: truncate(exception.value, maxValueLength) }
          : exception,
      ),
    };
  }

  const request = event.request;
  if (request && request.url) {
    truncated.request = {
      ...request,
      url: truncate(request.url, maxValueLength),
    };
  }

  return truncated;
}
