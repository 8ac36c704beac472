import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';

import type { LanternRequest } from '../src/handlers/tracing';

/**
 * 创建一对没有连接的请求和响应对象
 */
export function makeRequestResponse(
  method: string,
  url: string,
  headers: { [key: string]: string } = {},
): { req: LanternRequest; res: ServerResponse } {
  const req: LanternRequest = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = { host: 'localhost:3000', ...headers };

  const res = new ServerResponse(req);
  return { req, res };
}
