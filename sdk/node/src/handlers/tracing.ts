import type { IncomingMessage, ServerResponse } from 'node:http';

import type { Hub } from '@lantern-monitor/core';
import type { Request } from '@lantern-monitor/types';
import {
  SENTRY_TRACE_HEADER,
  extractTraceparentData,
} from '@lantern-monitor/utils';

/**
 * 经过 tracingHandler 处理的请求。route 和 baseUrl 由 express 之类的框架写入
 */
export interface LanternRequest extends IncomingMessage {
  /** 当前请求专属的 Hub */
  lanternHub?: Hub;
  originalUrl?: string;
  baseUrl?: string;
  route?: {
    path?: unknown;
  };
}

export type NextFunction = (error?: unknown) => void;

export interface TracingHandlerOptions {
  /**
   * 响应结束时提供参数化的路由，例如 /product/:id。
   * 返回 undefined 时事务保留原始的 url 作为名称。
   * 默认读取 express 写入的 req.baseUrl 和 req.route.path
   */
  routeProvider?: (req: LanternRequest) => string | undefined;

  /**
   * 为 true 时请求描述中保留 authorization、cookie 等可能带有用户身份的头部
   * @default false
   */
  sendDefaultPii?: boolean;
}

/** sendDefaultPii 关闭时不写入请求描述的头部 */
const PII_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-forwarded-for',
]);

/**
 * 为每个 http 请求创建一个事务的中间件（connect / express 风格）
 *
 * 每个请求都会 fork 出自己的 Hub，挂在 req.lanternHub 上，请求描述写入它的作用域。
 * 事务名称为 "<METHOD> <path>"，接续请求中 sentry-trace 头部的链路，并绑定到作用域上。
 * 响应结束时，如果能拿到参数化的路由就用它重命名事务，然后根据状态码设置状态并结束事务。
 * 响应没有写完连接就关闭时，事务以 cancelled 状态结束
 *
 * Hub 被禁用时只调用 next()
 *
 * @example
 * ```
 * const hub = init({ transportOptions: { url } });
 * app.use(tracingHandler(hub));
 * ```
 */
export function tracingHandler(
  hub: Hub,
  options: TracingHandlerOptions = {},
): (req: LanternRequest, res: ServerResponse, next: NextFunction) => void {
  const routeProvider = options.routeProvider || getExpressRoute;

  return function lanternTracingMiddleware(
    req: LanternRequest,
    res: ServerResponse,
    next: NextFunction,
  ): void {
    if (!hub.isEnabled()) {
      next();
      return;
    }

    const requestHub = hub.fork();
    req.lanternHub = requestHub;

    const request = extractRequestData(req, {
      sendDefaultPii: options.sendDefaultPii,
    });
    requestHub.configureScope((scope) => {
      scope.setRequest(request);
    });

    const method = request.method || 'GET';
    const [path] = (req.originalUrl || req.url || '/').split('?');
    const traceparentData = extractTraceparentData(
      req.headers[SENTRY_TRACE_HEADER],
    );

    const transaction = requestHub.startTransaction(
      {
        name: `${method} ${path}`,
        op: 'http.server',
        source: 'url',
        ...traceparentData,
      },
      { request: req },
      true,
    );

    const applyRoute = (): void => {
      const route = routeProvider(req);
      if (route) {
        transaction.setName(`${method} ${route}`, 'route');
      }
    };

    res.once('finish', () => {
      if (transaction.isFinished()) {
        return;
      }
      applyRoute();
      transaction.setHttpStatus(res.statusCode);
      transaction.finish();
    });

    // 正常的响应在 finish 之后才 close，这里只处理客户端中途断开的情况
    res.once('close', () => {
      if (transaction.isFinished()) {
        return;
      }
      applyRoute();
      transaction.finish('cancelled');
    });

    next();
  };
}

/**
 * express 会在路由匹配之后写入 req.route，加上挂载点 req.baseUrl 就是完整的路由
 */
function getExpressRoute(req: LanternRequest): string | undefined {
  const route = req.route;
  if (!route || typeof route.path !== 'string') {
    return undefined;
  }
  return `${req.baseUrl || ''}${route.path}`;
}

/**
 * 从 node 的请求中提取事件里的请求描述
 *
 * 默认去掉 authorization、cookie 和 x-forwarded-for 之类的头部，sendDefaultPii 为 true 时全部保留
 */
export function extractRequestData(
  req: LanternRequest,
  options: { sendDefaultPii?: boolean | undefined } = {},
): Request {
  const originalUrl = req.originalUrl || req.url || '/';
  const [, queryString] = originalUrl.split('?');
  const host = req.headers.host || 'localhost';
  const headers: { [key: string]: string } = {};

  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) {
      continue;
    }
    if (!options.sendDefaultPii && PII_HEADERS.has(key.toLowerCase())) {
      continue;
    }
    headers[key] = Array.isArray(value) ? value.join(', ') : value;
  }

  const request: Request = {
    url: `http://${host}${originalUrl}`,
    method: (req.method || 'GET').toUpperCase(),
    headers,
  };
  if (queryString) {
    request.query_string = queryString;
  }
  return request;
}
