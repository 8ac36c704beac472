/** 定义了一个请求的相关信息 */
export interface Request {
  // 请求的 URL
  url?: string;
  // 请求的方法
  method?: string;
  // 请求体中的数据，通常用于 POST 或 PUT 请求
  data?: unknown;
  // 查询参数，表示 URL 中 ? 后面的部分
  query_string?: QueryParams;
  // 请求中包含的 cookies
  cookies?: { [key: string]: string };
  // 环境变量，可以用于存储请求处理中的环境信息，格式为键值对
  env?: { [key: string]: string };
  /**
   * 请求的头部信息，例如 Content-Type、Authorization 等
   */
  headers?: { [key: string]: string };
}

// 用于定义查询参数的格式
export type QueryParams =
  | string
  | { [key: string]: string }
  // 元组
  | Array<[string, string]>;
