import type { SpanStatusType } from '@lantern-monitor/types';

/**
 * 把 HTTP 状态码转换为 span 的状态
 *
 * @param httpStatus HTTP 响应状态码
 * @returns 该状态码对应的 span 状态
 */
export function getSpanStatusFromHttpCode(httpStatus: number): SpanStatusType {
  // 1xx、2xx、3xx 都表示请求成功或被重定向
  if (httpStatus < 400 && httpStatus >= 100) {
    return 'ok';
  }

  // 4xx 客户端错误
  if (httpStatus >= 400 && httpStatus < 500) {
    switch (httpStatus) {
      case 401:
        return 'unauthenticated';
      case 403:
        return 'permission_denied';
      case 404:
        return 'not_found';
      case 409:
        return 'already_exists';
      case 413:
        return 'failed_precondition';
      case 429:
        return 'resource_exhausted';
      case 499:
        // 客户端取消请求
        return 'cancelled';
      default:
        return 'invalid_argument';
    }
  }

  // 5xx 服务器错误
  if (httpStatus >= 500 && httpStatus < 600) {
    switch (httpStatus) {
      case 501:
        return 'unimplemented';
      case 503:
        return 'unavailable';
      case 504:
        return 'deadline_exceeded';
      default:
        return 'internal_error';
    }
  }

  return 'unknown_error';
}
