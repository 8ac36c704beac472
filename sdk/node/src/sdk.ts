import { Hub } from '@lantern-monitor/core';
import { DEBUG_BUILD, GLOBAL_OBJ, logger } from '@lantern-monitor/utils';
import { hostname } from 'node:os';

import type { NodeClientOptions } from './client';
import { NodeClient } from './client';
import { makeFetchTransport } from './transports/fetch';
import { envToBool } from './utils/envToBool';

/**
 * init 的配置：transport 可以省略，默认使用 fetch transport
 */
export type NodeOptions = Omit<NodeClientOptions, 'transport'> &
  Partial<Pick<NodeClientOptions, 'transport'>>;

/**
 * 读取环境变量中的采样率，空字符串视为未设置，
 * 无法解析的值会原样交给 client 校验并抛出 SamplingConfigurationError
 */
function sampleRateFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * 合并用户的配置和默认配置，用户没有设置的项依次从环境变量和默认值中读取：
 * - release: LANTERN_RELEASE
 * - environment: LANTERN_ENVIRONMENT
 * - tracesSampleRate: LANTERN_TRACES_SAMPLE_RATE
 * - debug: LANTERN_DEBUG
 */
function getClientOptions(
  options: NodeOptions,
  env: NodeJS.ProcessEnv,
): NodeClientOptions {
  return {
    ...options,
    release: options.release ?? env.LANTERN_RELEASE,
    environment: options.environment ?? env.LANTERN_ENVIRONMENT,
    tracesSampleRate:
      options.tracesSampleRate ??
      sampleRateFromEnv(env.LANTERN_TRACES_SAMPLE_RATE),
    debug: options.debug ?? envToBool(env.LANTERN_DEBUG) ?? false,
    serverName: options.serverName || hostname(),
    transport: options.transport || makeFetchTransport,
  };
}

/**
 * 初始化 node SDK，返回一个新的 Hub
 *
 * 返回的 Hub 不是全局的，应用需要自己持有它。每个请求或任务开始时调用 hub.fork() 得到自己的 Hub
 *
 * @example
 * ```
 * import { init } from '@lantern-monitor/node';
 *
 * const hub = init({
 *   release: '1.2.0',
 *   tracesSampleRate: 0.2,
 *   transportOptions: { url: 'https://collector.example.com/api/events' },
 * });
 * ```
 *
 * @throws {SamplingConfigurationError} 配置或环境变量中的采样率无效
 */
export function init(
  options: NodeOptions,
  env: NodeJS.ProcessEnv = process.env,
): Hub {
  const clientOptions = getClientOptions(options, env);

  if (clientOptions.debug) {
    if (DEBUG_BUILD) {
      logger.enable();
    } else {
      // 不使用 logger，这样这条警告在非调试构建中也能输出
      GLOBAL_OBJ.console.warn(
        '[Lantern] Cannot initialize SDK with `debug` option using a non-debug bundle.',
      );
    }
  }

  const client = new NodeClient(clientOptions);
  return new Hub(client);
}
